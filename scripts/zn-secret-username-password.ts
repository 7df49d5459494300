/**
 * Add, read or delete a usernamePassword secret.
 * Usage: npx tsx scripts/zn-secret-username-password.ts <ADD|GET|DELETE> [secret key] [key file]
 */

import * as dotenv from "dotenv";
import {
  addSecret,
  createScriptServices,
  deleteSecret,
  exitWithUsage,
  getSecret,
  promptLine,
  runScript,
  splitArgs,
} from "../lib/commands";

dotenv.config({ path: ".env.local" });
dotenv.config();

const SCRIPT_NAME = "zn-secret-username-password";

const USAGE = `
Adds, retrieves or deletes a usernamePassword secret.

Usage: ${SCRIPT_NAME} ADD [<key file>]
       ${SCRIPT_NAME} GET <secret key> [<key file>]
       ${SCRIPT_NAME} DELETE <secret key> [<key file>]

  ADD     Takes the username and password from ZN_SECRET_USERNAME and
          ZN_SECRET_PASSWORD, or asks for them on the terminal. Prints the
          new secret key; store it securely, it is never shown again.
  GET     Prints "username:password" of the secret.
  DELETE  Deletes the secret.
`;

const { positionals } = splitArgs(process.argv.slice(2));
const [mode] = positionals;
if (mode !== "ADD" && mode !== "GET" && mode !== "DELETE") {
  exitWithUsage(USAGE);
}
if (mode !== "ADD" && positionals.length < 2) {
  exitWithUsage(USAGE);
}

runScript(SCRIPT_NAME, async () => {
  if (mode === "ADD") {
    const [, keyFile] = positionals;
    const username = process.env.ZN_SECRET_USERNAME || (await promptLine("Enter username: "));
    const password = process.env.ZN_SECRET_PASSWORD || (await promptLine("Enter password: "));
    const services = createScriptServices(SCRIPT_NAME, { keyFile });
    console.log(await addSecret(services, { username, password }));
    return;
  }

  const [, secretKey, keyFile] = positionals;
  const services = createScriptServices(SCRIPT_NAME, { keyFile });
  if (mode === "GET") {
    console.log(await getSecret(services, secretKey));
  } else {
    await deleteSecret(services, secretKey);
  }
});
