/**
 * Ensure an Application exists and includes the given Target.
 * Usage: npx tsx scripts/zn-create-app-target.ts <application name> <target name> [key file]
 */

import * as dotenv from "dotenv";
import { createApplicationWithTarget, createScriptServices, exitWithUsage, runScript, splitArgs } from "../lib/commands";

dotenv.config({ path: ".env.local" });
dotenv.config();

const SCRIPT_NAME = "zn-create-app-target";

const USAGE = `
Creates the Application when it does not exist and adds the Target to it.
The Target must already exist.

Usage: ${SCRIPT_NAME} <application name> <target name> [<key file>]
`;

const { positionals } = splitArgs(process.argv.slice(2));
if (positionals.length < 2) {
  exitWithUsage(USAGE);
}
const [applicationName, targetName, keyFile] = positionals;

runScript(SCRIPT_NAME, async () => {
  const services = createScriptServices(SCRIPT_NAME, { keyFile });
  const result = await createApplicationWithTarget(services, applicationName, targetName);
  console.log(result.applicationId);
});
