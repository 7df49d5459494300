/**
 * Run a Policy and wait for its job.
 * Usage: npx tsx scripts/zn-policy-run.ts <policy id or name> [run options JSON] [key file] [--no-wait]
 */

import * as dotenv from "dotenv";
import { z } from "zod";
import { createScriptServices, exitWithUsage, runPolicy, runScript, splitArgs } from "../lib/commands";
import { isSuccessfulJobStatus, ZeroNorthConfigError } from "../lib/infrastructure/zeronorth";

dotenv.config({ path: ".env.local" });
dotenv.config();

const SCRIPT_NAME = "zn-policy-run";

const USAGE = `
Invokes a Policy and, unless told otherwise, waits for the job to end.

Usage: ${SCRIPT_NAME} <policy id or name> [<run options JSON>] [<key file>] [--no-wait]

  Example: ${SCRIPT_NAME} "My Policy" '{"scanDepth":"full"}'
`;

const RunOptionsSchema = z.record(z.unknown());

function parseRunOptions(raw: string | undefined): Record<string, unknown> {
  if (!raw) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ZeroNorthConfigError(
      `Run options are not valid JSON: ${raw}`,
      error instanceof Error ? error : undefined,
    );
  }
  const result = RunOptionsSchema.safeParse(parsed);
  if (!result.success) {
    throw new ZeroNorthConfigError("Run options must be a JSON object");
  }
  return result.data;
}

const { positionals, flags } = splitArgs(process.argv.slice(2));
if (positionals.length < 1) {
  exitWithUsage(USAGE);
}
const [policy, runOptionsJson, keyFile] = positionals;

runScript(SCRIPT_NAME, async () => {
  const runOptions = parseRunOptions(runOptionsJson);
  const services = createScriptServices(SCRIPT_NAME, { keyFile });
  const outcome = await runPolicy(services, { policy, runOptions, wait: !flags.has("no-wait") });
  console.log(outcome.jobId);

  if (!outcome.waited) {
    services.logger.info(`Job '${outcome.jobId}' started, not waited.`);
    return 0;
  }
  services.logger.info(`Job '${outcome.jobId}' ended with status '${outcome.status}'.`);
  return outcome.status !== undefined && isSuccessfulJobStatus(outcome.status) ? 0 : 1;
});
