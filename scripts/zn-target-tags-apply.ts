/**
 * List, add, replace or delete the tags of a Target.
 * Usage: npx tsx scripts/zn-target-tags-apply.ts <target id or name> <LIST|ADD|UPDATE|DELETE> <tags|ALL> [key file]
 */

import * as dotenv from "dotenv";
import {
  applyTargetTags,
  createScriptServices,
  exitWithUsage,
  runScript,
  splitArgs,
  type TagAction,
} from "../lib/commands";
import { parseTagList } from "../lib/infrastructure/zeronorth";

dotenv.config({ path: ".env.local" });
dotenv.config();

const SCRIPT_NAME = "zn-target-tags-apply";

const USAGE = `
Inquiry and maintenance of the tags of a Target. Only the "tags" attribute
is touched, not "customerMetadata".

Usage: ${SCRIPT_NAME} <target id or name> <mode> <tag(s)> [<key file>]

  <mode>    LIST    Prints 1 when the (first) given tag is on the Target, 0 otherwise.
                    Use the tag ALL to print every tag, one per line.
            ADD     Add the given tags that are not on the Target yet.
            UPDATE  Replace the tags with the given ones.
            DELETE  Delete the given tags, or every tag with ALL.
  <tag(s)>  Comma-separated list; white space around the commas is ignored.
`;

const MODES = ["LIST", "ADD", "UPDATE", "DELETE"];

const { positionals } = splitArgs(process.argv.slice(2));
if (positionals.length < 3) {
  exitWithUsage(USAGE);
}
const [target, mode, tagArg, keyFile] = positionals;
if (!MODES.includes(mode)) {
  exitWithUsage(`'${mode}' is not a valid mode.\n${USAGE}`);
}

function toAction(): TagAction {
  const tags = parseTagList(tagArg);
  switch (mode) {
    case "LIST":
      return tagArg === "ALL" ? { kind: "list" } : { kind: "check", tag: tagArg.split(",")[0] };
    case "ADD":
      return { kind: "add", tags };
    case "UPDATE":
      return { kind: "update", tags };
    default:
      return tagArg === "ALL" ? { kind: "delete-all" } : { kind: "delete", tags };
  }
}

runScript(SCRIPT_NAME, async () => {
  const services = createScriptServices(SCRIPT_NAME, { keyFile });
  const action = toAction();
  const result = await applyTargetTags(services, target, action);

  if (action.kind === "check") {
    console.log(result.present ? "1" : "0");
  } else if (action.kind === "list") {
    for (const tag of result.tags ?? []) {
      console.log(tag);
    }
  }
});
