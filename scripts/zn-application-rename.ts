/**
 * Rename a Application.
 * Usage: npx tsx scripts/zn-application-rename.ts <application id or name> <new name> [key file]
 */

import * as dotenv from "dotenv";
import { createScriptServices, exitWithUsage, renameResource, runScript, splitArgs } from "../lib/commands";

dotenv.config({ path: ".env.local" });
dotenv.config();

const SCRIPT_NAME = "zn-application-rename";

const USAGE = `
Renames the Application identified by ID or by its current name.
Refuses when another Application already uses the new name.

Usage: ${SCRIPT_NAME} <application id or name> <new name> [<key file>]
`;

const { positionals } = splitArgs(process.argv.slice(2));
if (positionals.length < 2) {
  exitWithUsage(USAGE);
}
const [idOrName, newName, keyFile] = positionals;

runScript(SCRIPT_NAME, async () => {
  const services = createScriptServices(SCRIPT_NAME, { keyFile });
  const result = await renameResource(services, { resourceType: "applications", idOrName, newName });
  console.log(result.id);
});
