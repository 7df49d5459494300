// Barrel export for config module
export {
  loadConfig,
  readSettings,
  resolveCredential,
  API_KEY_ENV_VAR,
} from "./loader";
export type { Credential, CredentialSource, Environment, LoadConfigOptions, ZeroNorthConfig } from "./loader";
export { CONFIG_DEFINITIONS, CONFIG_KEYS, SettingsSchema } from "./registry";
export type { ConfigDefinition, ConfigKey, ZeroNorthSettings } from "./registry";
