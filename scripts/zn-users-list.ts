/**
 * List the Users of the account as CSV.
 * Usage: npx tsx scripts/zn-users-list.ts <ALL|email> [key file] [--no-headers]
 */

import * as dotenv from "dotenv";
import { createScriptServices, exitWithUsage, listUsers, runScript, splitArgs } from "../lib/commands";

dotenv.config({ path: ".env.local" });
dotenv.config();

const SCRIPT_NAME = "zn-users-list";

const USAGE = `
Prints the Users of the account specified by the API key in CSV format.

Usage: ${SCRIPT_NAME} <ALL|email> [<key file>] [--no-headers]

  ALL           Every User; otherwise only the User with that email.
  --no-headers  Do not print the field headings.
`;

const { positionals, flags } = splitArgs(process.argv.slice(2));
if (positionals.length < 1) {
  exitWithUsage(USAGE);
}
const [selector, keyFile] = positionals;

runScript(SCRIPT_NAME, async () => {
  const services = createScriptServices(SCRIPT_NAME, { keyFile });
  const lines = await listUsers(services, {
    email: selector === "ALL" ? undefined : selector,
    includeHeader: !flags.has("no-headers"),
  });
  for (const line of lines) {
    console.log(line);
  }
});
