import * as fs from "node:fs";
import { ZeroNorthConfigError } from "../infrastructure/zeronorth/errors";
import { CONFIG_DEFINITIONS, CONFIG_KEYS, SettingsSchema, type ZeroNorthSettings } from "./registry";

export type Environment = Record<string, string | undefined>;

export type CredentialSource = "key-file" | "environment" | "inline";

export interface Credential {
  readonly token: string;
  readonly source: CredentialSource;
}

export interface ZeroNorthConfig extends Readonly<ZeroNorthSettings> {
  readonly credential: Credential;
}

export interface LoadConfigOptions {
  /** Defaults to process.env; only read here, never deeper in the library */
  env?: Environment;
  /** Path to a file whose sole content is the API token */
  keyFile?: string;
  /** Lowest-precedence token, for callers that embed one */
  inlineApiKey?: string;
  overrides?: Partial<ZeroNorthSettings>;
}

export const API_KEY_ENV_VAR = "API_KEY";

/**
 * Resolve the API token once: key file, then the API_KEY variable, then an inline value.
 */
export function resolveCredential(options: Pick<LoadConfigOptions, "env" | "keyFile" | "inlineApiKey"> = {}): Credential {
  const env = options.env ?? process.env;

  if (options.keyFile) {
    let content: string;
    try {
      content = fs.readFileSync(options.keyFile, "utf-8");
    } catch (error) {
      throw new ZeroNorthConfigError(
        `Unable to read API key file '${options.keyFile}'`,
        error instanceof Error ? error : undefined,
      );
    }

    const token = content.trim();
    if (!token) {
      throw new ZeroNorthConfigError(`API key file '${options.keyFile}' is empty`);
    }
    return { token, source: "key-file" };
  }

  const fromEnv = env[API_KEY_ENV_VAR]?.trim();
  if (fromEnv) {
    return { token: fromEnv, source: "environment" };
  }

  const inline = options.inlineApiKey?.trim();
  if (inline) {
    return { token: inline, source: "inline" };
  }

  throw new ZeroNorthConfigError(
    `No API key provided. Pass a key file or set the ${API_KEY_ENV_VAR} environment variable.`,
  );
}

/**
 * Read every setting from its environment variable. Empty values count as unset.
 */
export function readSettings(env: Environment = process.env): ZeroNorthSettings {
  const raw: Record<string, string> = {};
  for (const key of CONFIG_KEYS) {
    const value = env[CONFIG_DEFINITIONS[key].envVar];
    if (value !== undefined && value.trim() !== "") {
      raw[key] = value.trim();
    }
  }

  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${envVarFor(issue.path[0])}: ${issue.message}`)
      .join("; ");
    throw new ZeroNorthConfigError(`Invalid configuration: ${details}`);
  }

  return parsed.data;
}

function envVarFor(pathKey: string | number | undefined): string {
  const key = CONFIG_KEYS.find((candidate) => candidate === pathKey);
  return key ? CONFIG_DEFINITIONS[key].envVar : String(pathKey);
}

/**
 * Build the immutable configuration threaded through every component.
 */
export function loadConfig(options: LoadConfigOptions = {}): ZeroNorthConfig {
  const env = options.env ?? process.env;
  const settings = { ...readSettings(env), ...options.overrides };
  const credential = resolveCredential({ env, keyFile: options.keyFile, inlineApiKey: options.inlineApiKey });

  return Object.freeze({
    ...settings,
    apiRoot: settings.apiRoot.replace(/\/$/, ""),
    credential: Object.freeze(credential),
  });
}
