/**
 * Rename a Target.
 * Usage: npx tsx scripts/zn-target-rename.ts <target id or name> <new name> [key file]
 */

import * as dotenv from "dotenv";
import { createScriptServices, exitWithUsage, renameResource, runScript, splitArgs } from "../lib/commands";

dotenv.config({ path: ".env.local" });
dotenv.config();

const SCRIPT_NAME = "zn-target-rename";

const USAGE = `
Renames the Target identified by ID or by its current name.
Refuses when another Target already uses the new name.

Usage: ${SCRIPT_NAME} <target id or name> <new name> [<key file>]
`;

const { positionals } = splitArgs(process.argv.slice(2));
if (positionals.length < 2) {
  exitWithUsage(USAGE);
}
const [idOrName, newName, keyFile] = positionals;

runScript(SCRIPT_NAME, async () => {
  const services = createScriptServices(SCRIPT_NAME, { keyFile });
  const result = await renameResource(services, { resourceType: "targets", idOrName, newName });
  console.log(result.id);
});
