/**
 * Count finished jobs per Target and Policy.
 * Usage: npx tsx scripts/zn-targets-job-list.ts ALL [key file]
 */

import * as dotenv from "dotenv";
import { createScriptServices, exitWithUsage, runScript, splitArgs, summarizeTargetJobs } from "../lib/commands";

dotenv.config({ path: ".env.local" });
dotenv.config();

const SCRIPT_NAME = "zn-targets-job-list";

const USAGE = `
Prints, for every Target and each of its Policies, how many of the Policy's
10 most recent jobs FINISHED.

Usage: ${SCRIPT_NAME} ALL [<key file>]

  ALL  Required keyword.
`;

const { positionals } = splitArgs(process.argv.slice(2));
if (positionals[0] !== "ALL") {
  exitWithUsage(USAGE);
}
const [, keyFile] = positionals;

runScript(SCRIPT_NAME, async () => {
  const services = createScriptServices(SCRIPT_NAME, { keyFile });
  for (const line of await summarizeTargetJobs(services)) {
    console.log(line);
  }
});
