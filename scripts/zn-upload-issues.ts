/**
 * Upload a scanner results file to a manual-upload Policy.
 * Exits 0 only when the resulting job finishes successfully.
 * Usage: npx tsx scripts/zn-upload-issues.ts <policy id> <data file> [key file] [--no-wait]
 */

import * as dotenv from "dotenv";
import { createScriptServices, exitWithUsage, runScript, splitArgs, uploadIssues } from "../lib/commands";
import { isSuccessfulJobStatus } from "../lib/infrastructure/zeronorth";

dotenv.config({ path: ".env.local" });
dotenv.config();

const SCRIPT_NAME = "zn-upload-issues";

const USAGE = `
Runs a manual-upload Policy with the given issues file and waits for the job.

Usage: ${SCRIPT_NAME} <policy id> <data file> [<key file>] [--no-wait]

  --no-wait  Return once the job is resumed, without waiting for it to finish.
`;

const { positionals, flags } = splitArgs(process.argv.slice(2));
if (positionals.length < 2) {
  exitWithUsage(USAGE);
}
const [policyId, filePath, keyFile] = positionals;

runScript(SCRIPT_NAME, async () => {
  const services = createScriptServices(SCRIPT_NAME, { keyFile });
  const outcome = await uploadIssues(services, { policyId, filePath, wait: !flags.has("no-wait") });
  console.log(outcome.jobId);

  if (!outcome.waited) {
    services.logger.info(`Job '${outcome.jobId}' started, not waited.`);
    return 0;
  }
  services.logger.info(`Job '${outcome.jobId}' ended with status '${outcome.status}'.`);
  return outcome.status !== undefined && isSuccessfulJobStatus(outcome.status) ? 0 : 1;
});
