/**
 * Create a Target and a manual-upload Policy for it, reusing either when it already exists.
 * Prints the Policy ID on stdout.
 * Usage: npx tsx scripts/zn-create-target-n-policy.ts <policy name> <scenario id> <integration id> <target name> [key file]
 */

import * as dotenv from "dotenv";
import { createScriptServices, createTargetAndPolicy, exitWithUsage, runScript, splitArgs } from "../lib/commands";

dotenv.config({ path: ".env.local" });
dotenv.config();

const SCRIPT_NAME = "zn-create-target-n-policy";

const USAGE = `
Creates a Target and a Policy for uploading scanner results into it.
Existing Target or Policy names are reused.

Usage: ${SCRIPT_NAME} <policy name> <scenario id> <integration id> <target name> [<key file>] [--find-once]

  --find-once  Look each name up once instead of twice before creating it.
`;

const { positionals, flags } = splitArgs(process.argv.slice(2));
if (positionals.length < 4) {
  exitWithUsage(USAGE);
}
const [policyName, scenarioId, integrationId, targetName, keyFile] = positionals;

runScript(SCRIPT_NAME, async () => {
  const services = createScriptServices(SCRIPT_NAME, { keyFile });
  const result = await createTargetAndPolicy(services, {
    policyName,
    scenarioId,
    integrationId,
    targetName,
    findTwice: !flags.has("find-once"),
  });
  console.log(result.policy.id);
});
