/**
 * Export every Target of the account, pipe-delimited, to stdout.
 * Usage: npx tsx scripts/zn-get-all-targets.ts ALL [key file] [--no-headers]
 */

import * as dotenv from "dotenv";
import { createScriptServices, exitWithUsage, exportTargets, runScript, splitArgs } from "../lib/commands";

dotenv.config({ path: ".env.local" });
dotenv.config();

const SCRIPT_NAME = "zn-get-all-targets";

const USAGE = `
Lists all the Targets of the account with their essential attributes.

Usage: ${SCRIPT_NAME} ALL [<key file>] [--no-headers]

  ALL           Required, for safety.
  --no-headers  Do not print the field headings.
`;

const { positionals, flags } = splitArgs(process.argv.slice(2));
if (positionals[0] !== "ALL") {
  exitWithUsage(USAGE);
}
const keyFile = positionals[1];

runScript(SCRIPT_NAME, async () => {
  const services = createScriptServices(SCRIPT_NAME, { keyFile });
  const lines = await exportTargets(services, { includeHeader: !flags.has("no-headers") });
  for (const line of lines) {
    console.log(line);
  }
});
