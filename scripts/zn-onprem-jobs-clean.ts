/**
 * Fail jobs waiting in the on-prem queue.
 * Usage: npx tsx scripts/zn-onprem-jobs-clean.ts CLEAN <count> [key file]
 */

import * as dotenv from "dotenv";
import { cleanOnPremJobs, createScriptServices, exitWithUsage, runScript, splitArgs } from "../lib/commands";

dotenv.config({ path: ".env.local" });
dotenv.config();

const SCRIPT_NAME = "zn-onprem-jobs-clean";

const USAGE = `
Cleans up the on-prem jobs queue by marking the queued jobs as FAILED.

Usage: ${SCRIPT_NAME} CLEAN <count> [<key file>]

  CLEAN    Required keyword.
  <count>  Maximum number of jobs to clean, an integer of 0 or more.
`;

const { positionals } = splitArgs(process.argv.slice(2));
const [mode, countArg, keyFile] = positionals;
const count = Number(countArg);
if (mode !== "CLEAN" || !countArg || !Number.isInteger(count) || count < 0) {
  exitWithUsage(USAGE);
}

runScript(SCRIPT_NAME, async () => {
  const services = createScriptServices(SCRIPT_NAME, { keyFile });
  const cleaned = await cleanOnPremJobs(services, count);
  for (const jobId of cleaned) {
    console.log(jobId);
  }
});
