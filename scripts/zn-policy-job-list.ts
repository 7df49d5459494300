/**
 * List the jobs of a Policy as CSV.
 * Usage: npx tsx scripts/zn-policy-job-list.ts <policy id> <since> [key file]
 */

import * as dotenv from "dotenv";
import { createScriptServices, exitWithUsage, listPolicyJobs, runScript, splitArgs } from "../lib/commands";

dotenv.config({ path: ".env.local" });
dotenv.config();

const SCRIPT_NAME = "zn-policy-job-list";

const USAGE = `
Prints the jobs of a Policy with their date, ID, status, start, end and
duration in minutes. Output is limited to 2000 jobs.

Usage: ${SCRIPT_NAME} <policy id> <since> [<key file>]

  <since>  UTC date/time in ISO-8601, e.g. 2020-06-01 or 2020-06-01T00:00:00
`;

const { positionals } = splitArgs(process.argv.slice(2));
if (positionals.length < 2) {
  exitWithUsage(USAGE);
}
const [policyId, since, keyFile] = positionals;

runScript(SCRIPT_NAME, async () => {
  const services = createScriptServices(SCRIPT_NAME, { keyFile });
  for (const line of await listPolicyJobs(services, policyId, since)) {
    console.log(line);
  }
});
