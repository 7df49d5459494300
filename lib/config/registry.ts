import { z } from "zod";

export type ConfigValueType = "string" | "number" | "boolean";

export interface ConfigDefinition {
  envVar: string;
  type: ConfigValueType;
  description: string;
}

const TRUE_VALUES = new Set(["1", "true", "yes"]);

const booleanFlag = z
  .string()
  .optional()
  .transform((raw) => raw !== undefined && TRUE_VALUES.has(raw.trim().toLowerCase()));

/**
 * Settings schema. Defaults mirror what the operator scripts always used:
 * 1000-item pages, 10 s job polling, 3 s pause between upload and resume.
 */
export const SettingsSchema = z.object({
  apiRoot: z.string().url().default("https://api.zeronorth.io/v1"),
  requestTimeoutMs: z.coerce.number().int().positive().default(30000),
  maxRetries: z.coerce.number().int().min(0).default(0),
  retryDelayMs: z.coerce.number().int().min(0).default(1000),
  pageSize: z.coerce.number().int().positive().default(1000),
  scanLimit: z.coerce.number().int().positive().default(10000),
  pollIntervalMs: z.coerce.number().int().min(0).default(10000),
  maxPollAttempts: z.coerce.number().int().positive().default(360),
  uploadSettleMs: z.coerce.number().int().min(0).default(3000),
  findTwiceMaxJitterMs: z.coerce.number().int().min(0).default(4000),
  debug: booleanFlag,
});

export type ZeroNorthSettings = z.infer<typeof SettingsSchema>;

export type ConfigKey = keyof ZeroNorthSettings;

export const CONFIG_DEFINITIONS: Record<ConfigKey, ConfigDefinition> = {
  apiRoot: {
    envVar: "ZN_API_ROOT",
    type: "string",
    description: "Root URL of the ZeroNorth REST API",
  },
  requestTimeoutMs: {
    envVar: "ZN_REQUEST_TIMEOUT_MS",
    type: "number",
    description: "Per-request timeout in milliseconds",
  },
  maxRetries: {
    envVar: "ZN_MAX_RETRIES",
    type: "number",
    description: "Retries on connection failures and timeouts (0 disables)",
  },
  retryDelayMs: {
    envVar: "ZN_RETRY_DELAY_MS",
    type: "number",
    description: "Base delay for exponential retry backoff",
  },
  pageSize: {
    envVar: "ZN_PAGE_SIZE",
    type: "number",
    description: "Items requested per page by list exports",
  },
  scanLimit: {
    envVar: "ZN_SCAN_LIMIT",
    type: "number",
    description: "Collection size fetched when a resource type has no server-side name filter",
  },
  pollIntervalMs: {
    envVar: "ZN_POLL_INTERVAL_MS",
    type: "number",
    description: "Delay between job status checks",
  },
  maxPollAttempts: {
    envVar: "ZN_MAX_POLL_ATTEMPTS",
    type: "number",
    description: "Job status checks before giving up",
  },
  uploadSettleMs: {
    envVar: "ZN_UPLOAD_SETTLE_MS",
    type: "number",
    description: "Pause between uploading results and resuming the job",
  },
  findTwiceMaxJitterMs: {
    envVar: "ZN_FIND_TWICE_MAX_JITTER_MS",
    type: "number",
    description: "Upper bound of the random pause between the two lookups of find-twice",
  },
  debug: {
    envVar: "ZN_DEBUG",
    type: "boolean",
    description: "Emit request-level debug messages",
  },
};

export const CONFIG_KEYS: readonly ConfigKey[] = SettingsSchema.keyof().options;
