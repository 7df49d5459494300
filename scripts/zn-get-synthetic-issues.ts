/**
 * Dump the synthetic issues of a Target as a JSON array.
 * Usage: npx tsx scripts/zn-get-synthetic-issues.ts <target id> [since YYYY-MM-DD] [key file]
 */

import * as dotenv from "dotenv";
import { createScriptServices, exitWithUsage, exportSyntheticIssues, runScript, splitArgs } from "../lib/commands";

dotenv.config({ path: ".env.local" });
dotenv.config();

const SCRIPT_NAME = "zn-get-synthetic-issues";

const USAGE = `
Prints all synthetic issues of a Target as JSON.

Usage: ${SCRIPT_NAME} <target id> [<since YYYY-MM-DD>] [<key file>]
`;

const { positionals } = splitArgs(process.argv.slice(2));
if (positionals.length < 1) {
  exitWithUsage(USAGE);
}
const [targetId, since, keyFile] = positionals;

runScript(SCRIPT_NAME, async () => {
  const services = createScriptServices(SCRIPT_NAME, { keyFile });
  const issues = await exportSyntheticIssues(services, { targetId, since: since || undefined });
  console.log(JSON.stringify(issues, null, 2));
});
