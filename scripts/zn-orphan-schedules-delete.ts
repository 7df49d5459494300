/**
 * Delete the schedules left behind by a deleted Policy.
 * Usage: npx tsx scripts/zn-orphan-schedules-delete.ts <policy id> [key file]
 */

import * as dotenv from "dotenv";
import { createScriptServices, deleteOrphanSchedules, exitWithUsage, runScript, splitArgs } from "../lib/commands";

dotenv.config({ path: ".env.local" });
dotenv.config();

const SCRIPT_NAME = "zn-orphan-schedules-delete";

const USAGE = `
Deletes the schedules of a Policy that no longer exists. Aborts when the
Policy is still there.

Usage: ${SCRIPT_NAME} <policy id> [<key file>]
`;

const { positionals } = splitArgs(process.argv.slice(2));
if (positionals.length < 1) {
  exitWithUsage(USAGE);
}
const [policyId, keyFile] = positionals;

runScript(SCRIPT_NAME, async () => {
  const services = createScriptServices(SCRIPT_NAME, { keyFile });
  const result = await deleteOrphanSchedules(services, policyId);
  return result.failed > 0 ? 1 : 0;
});
