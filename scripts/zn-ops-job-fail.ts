/**
 * Mark a stuck job as failed.
 * Usage: npx tsx scripts/zn-ops-job-fail.ts <job id> [key file]
 */

import * as dotenv from "dotenv";
import { createScriptServices, exitWithUsage, failJob, runScript, splitArgs } from "../lib/commands";

dotenv.config({ path: ".env.local" });
dotenv.config();

const SCRIPT_NAME = "zn-ops-job-fail";

const USAGE = `
Forces the specified job into the FAILED state.

Usage: ${SCRIPT_NAME} <job id> [<key file>]
`;

const { positionals } = splitArgs(process.argv.slice(2));
if (positionals.length < 1) {
  exitWithUsage(USAGE);
}
const [jobId, keyFile] = positionals;

runScript(SCRIPT_NAME, async () => {
  const services = createScriptServices(SCRIPT_NAME, { keyFile });
  const result = await failJob(services, jobId);
  console.log(result.status);
});
