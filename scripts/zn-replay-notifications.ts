/**
 * Replay notifications for the jobs behind a Target's open issues.
 * Usage: npx tsx scripts/zn-replay-notifications.ts [NOEXEC] <customer id> <customer name> <target id> <target name> [key file]
 */

import * as dotenv from "dotenv";
import {
  createScriptServices,
  exitWithUsage,
  promptLine,
  replayNotifications,
  runScript,
  splitArgs,
} from "../lib/commands";

dotenv.config({ path: ".env.local" });
dotenv.config();

const SCRIPT_NAME = "zn-replay-notifications";

const USAGE = `
Retroactively triggers Notification processing for the existing Issues of a
Target, after a Notification was added to it. Works once per Target.

Usage: ${SCRIPT_NAME} [NOEXEC] <customer id> <customer name> <target id> <target name> [<key file>]

  NOEXEC           Dry run: list the jobs without replaying them.
  <customer name>  Case-sensitive safety check against the account.
  <target name>    Case-sensitive safety check against the Target.

The replay call needs a privileged token, read from ZN_REPLAY_API_KEY or
asked for on the terminal.
`;

const { positionals } = splitArgs(process.argv.slice(2));
const dryRun = positionals[0] === "NOEXEC";
const args = dryRun ? positionals.slice(1) : positionals;
if (args.length < 4) {
  exitWithUsage(USAGE);
}
const [customerId, customerName, targetId, targetName, keyFile] = args;

runScript(SCRIPT_NAME, async () => {
  const services = createScriptServices(SCRIPT_NAME, { keyFile });
  const replayToken = process.env.ZN_REPLAY_API_KEY || (await promptLine("Enter the replay API token: "));
  const result = await replayNotifications(services, {
    customerId,
    customerName,
    targetId,
    targetName,
    replayToken,
    dryRun,
  });
  for (const job of result.jobs) {
    console.log(`${job.date},${job.jobId}`);
  }
  return result.failed > 0 ? 1 : 0;
});
