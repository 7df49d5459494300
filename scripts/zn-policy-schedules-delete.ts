/**
 * Delete the schedules of every Policy in the account.
 * Usage: npx tsx scripts/zn-policy-schedules-delete.ts [NOEXEC] <customer name> DELETE_ALL_POLICIES_SCHEDULES [key file]
 */

import * as dotenv from "dotenv";
import {
  createScriptServices,
  deleteAllSchedules,
  exitWithUsage,
  promptLine,
  runScript,
  splitArgs,
} from "../lib/commands";

dotenv.config({ path: ".env.local" });
dotenv.config();

const SCRIPT_NAME = "zn-policy-schedules-delete";
const KEYWORD = "DELETE_ALL_POLICIES_SCHEDULES";

const USAGE = `
Deletes the schedules of every Policy in the account specified by the API key.

Usage: ${SCRIPT_NAME} [NOEXEC] <customer name> ${KEYWORD} [<key file>]

  NOEXEC           Dry run: list the schedules without deleting them.
  <customer name>  The account's customer name (case-sensitive safety check).
  ${KEYWORD}  Required keyword.

Before deleting, asks for the number of schedules found as confirmation.
`;

const { positionals } = splitArgs(process.argv.slice(2));
const dryRun = positionals[0] === "NOEXEC";
const [customerName, keyword, keyFile] = dryRun ? positionals.slice(1) : positionals;
if (!customerName || keyword !== KEYWORD) {
  exitWithUsage(USAGE);
}

runScript(SCRIPT_NAME, async () => {
  const services = createScriptServices(SCRIPT_NAME, { keyFile });
  const result = await deleteAllSchedules(services, {
    customerName,
    dryRun,
    confirm: async (schedules) => {
      const answer = await promptLine(
        "Enter the number of schedules shown above to proceed with deleting them: ",
      );
      return answer === String(schedules.length);
    },
  });
  for (const schedule of result.schedules) {
    console.log(`${schedule.policyId}|${schedule.policyName}|${schedule.scheduleId}`);
  }
  return result.failed > 0 ? 1 : 0;
});
