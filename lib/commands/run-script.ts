/**
 * Shared plumbing for the operator scripts: service wiring, argv splitting
 * and the exit-code contract (0 on success, 1 on any error).
 */

import * as readline from "node:readline";
import { loadConfig, type LoadConfigOptions } from "../config";
import { describeError } from "../infrastructure/zeronorth/errors";
import { createZeroNorthServices, type ZeroNorthServices } from "../infrastructure/zeronorth/repositories";
import { createLogger, type Logger } from "../utils/logger";

export type ScriptMain = () => Promise<number | void>;

export interface ParsedArgs {
  positionals: string[];
  flags: Set<string>;
}

/**
 * Separate `--flag` switches from positional arguments
 */
export function splitArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Set<string>();
  for (const arg of argv) {
    if (arg.startsWith("--")) {
      flags.add(arg.slice(2));
    } else {
      positionals.push(arg);
    }
  }
  return { positionals, flags };
}

export function createScriptServices(scriptName: string, options: LoadConfigOptions = {}): ZeroNorthServices {
  const config = loadConfig(options);
  const logger = createLogger(scriptName, { debug: config.debug });
  logger.debug(
    `Using API key from ${config.credential.source} (${config.credential.token.length} characters)`,
  );
  return createZeroNorthServices(config, { logger });
}

/**
 * Run a script body and map its outcome to an exit code
 */
export async function executeScript(logger: Logger, main: ScriptMain): Promise<number> {
  try {
    const code = await main();
    return code ?? 0;
  } catch (error) {
    logger.error(describeError(error));
    return 1;
  }
}

/**
 * Sets the exit code and lets the process end by itself, so piped stdout is flushed first
 */
export function runScript(scriptName: string, main: ScriptMain): void {
  void executeScript(createLogger(scriptName), main).then((code) => {
    process.exitCode = code;
  });
}

export function exitWithUsage(usage: string): never {
  console.error(usage.trim());
  process.exit(1);
}

/**
 * Ask one question on the terminal and return the trimmed answer
 */
export async function promptLine(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stderr,
  });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}
