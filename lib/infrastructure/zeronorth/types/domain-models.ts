/**
 * ZeroNorth Domain Models
 *
 * Client-side types for resource lookup and the job lifecycle.
 */

export type LookupStrategy = "server-filter" | "client-scan";

export interface ResourceTypeDefinition {
  /** API path segment, e.g. "targets" */
  path: string;
  /** Singular label used in log lines and errors */
  label: string;
  lookup: LookupStrategy;
  /** Field under `data` compared against the requested name */
  nameField: string;
  /** Extra query parameters sent with lookups and detail reads */
  query?: Record<string, string>;
  /** Collection size fetched by client-scan lookups (falls back to config.scanLimit) */
  scanLimit?: number;
}

/**
 * Known resource collections.
 * Users and integrations have no server-side name filter,
 * so they are fetched in bulk and filtered locally.
 */
export const RESOURCE_TYPES = {
  targets: { path: "targets", label: "Target", lookup: "server-filter", nameField: "name" },
  policies: { path: "policies", label: "Policy", lookup: "server-filter", nameField: "name" },
  applications: {
    path: "applications",
    label: "Application",
    lookup: "server-filter",
    nameField: "name",
    query: { expand: "false" },
  },
  environments: { path: "environments", label: "Integration", lookup: "client-scan", nameField: "name", scanLimit: 1000 },
  users: { path: "users", label: "User", lookup: "client-scan", nameField: "email", scanLimit: 2000 },
} as const satisfies Record<string, ResourceTypeDefinition>;

export type ResourceTypeKey = keyof typeof RESOURCE_TYPES;

export function getResourceType(key: ResourceTypeKey): ResourceTypeDefinition {
  return RESOURCE_TYPES[key];
}

export type Resolution =
  | { status: "not_found" }
  | { status: "found"; id: string };

export interface UpsertResult {
  id: string;
  created: boolean;
}

/**
 * Job statuses the API is known to report. Anything outside PENDING/RUNNING
 * is treated as terminal; the server does not publish a closed list.
 */
export const ACTIVE_JOB_STATUSES = ["PENDING", "RUNNING"] as const;

export type ActiveJobStatus = (typeof ACTIVE_JOB_STATUSES)[number];

export type JobStatus = ActiveJobStatus | "FINISHED" | "FAILED" | (string & {});

export function isActiveJobStatus(status: string): status is ActiveJobStatus {
  return ACTIVE_JOB_STATUSES.some((active) => active === status);
}

export function isSuccessfulJobStatus(status: string): boolean {
  return status === "FINISHED";
}

export type JobDriverState = "not_started" | "started" | "uploaded" | "resumed" | "polling" | "terminal";

export interface JobOutcome {
  jobId: string;
  /** Undefined when the caller chose not to wait */
  status?: JobStatus;
  waited: boolean;
}
