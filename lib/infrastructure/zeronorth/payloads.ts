/**
 * Request payload builders for create and update calls.
 * Payloads are plain objects serialized with JSON.stringify, never assembled
 * as strings, so names containing quotes, colons or slashes survive intact.
 */

import {
  ApplicationDataSchema,
  TargetDataSchema,
  type ApplicationData,
  type PolicyData,
  type TargetData,
} from "./types/api-responses";

export interface TargetPayloadInput {
  name: string;
  integrationId: string;
  integrationType: string;
  tags?: string[];
  parameters?: Record<string, unknown>;
}

export function buildTargetPayload(input: TargetPayloadInput): TargetData {
  const parameters: Record<string, unknown> = { ...input.parameters };
  // "direct" integrations reject a Target without a hostname
  if (input.integrationType === "direct" && parameters.hostname === undefined) {
    parameters.hostname = "dummy";
  }

  const payload: TargetData = {
    name: input.name,
    environmentId: input.integrationId,
    environmentType: input.integrationType,
    parameters,
  };
  if (input.tags && input.tags.length > 0) {
    payload.tags = normalizeTags(input.tags);
  }
  return payload;
}

export function parseTargetPayload(json: string): TargetData {
  return TargetDataSchema.parse(JSON.parse(json));
}

export interface UploadPolicyPayloadInput {
  name: string;
  integrationId: string;
  integrationType: string;
  targetId: string;
  scenarioId: string;
  description?: string;
}

/**
 * Policy that accepts manually uploaded scanner results
 */
export function buildUploadPolicyPayload(input: UploadPolicyPayloadInput): Record<string, unknown> {
  return {
    name: input.name,
    environmentId: input.integrationId,
    environmentType: input.integrationType,
    policySite: "manual",
    policyType: "manualUpload",
    targets: [{ id: input.targetId }],
    scenarioIds: [input.scenarioId],
    description: input.description ?? "Policy created by zn-create-target-n-policy",
    permanentRunOptions: {},
  };
}

export function buildApplicationPayload(name: string, targetIds: string[] = [], description?: string): ApplicationData {
  const payload: ApplicationData = { name, targetIds };
  if (description) {
    payload.description = description;
  }
  return payload;
}

export function parseApplicationPayload(json: string): ApplicationData {
  return ApplicationDataSchema.parse(JSON.parse(json));
}

export function buildRunPayload(runOptions: Record<string, unknown> = {}): { options: { runOptions: Record<string, unknown> } } {
  return { options: { runOptions } };
}

/**
 * Trimmed, de-duplicated, sorted tag list
 */
export function normalizeTags(tags: Iterable<string>): string[] {
  const unique = new Set<string>();
  for (const tag of tags) {
    const trimmed = tag.trim();
    if (trimmed) {
      unique.add(trimmed);
    }
  }
  return [...unique].sort();
}

export function parseTagList(raw: string): string[] {
  return normalizeTags(raw.split(","));
}

export function mergeTags(existing: readonly string[] | null | undefined, added: readonly string[]): string[] {
  return normalizeTags([...(existing ?? []), ...added]);
}

function isEmptyObject(value: unknown): boolean {
  return typeof value === "object" && value !== null && !Array.isArray(value) && Object.keys(value).length === 0;
}

/**
 * Target `data` ready for PUT. Older Targets carry null regex lists and an
 * object-shaped `notifications`, which the update endpoint rejects.
 */
export function buildTargetUpdatePayload(data: TargetData, changes: Partial<TargetData> = {}): TargetData {
  const payload: TargetData = { ...data, ...changes };
  payload.includeRegex = payload.includeRegex ?? [];
  payload.excludeRegex = payload.excludeRegex ?? [];
  if (payload.notifications === undefined || payload.notifications === null || isEmptyObject(payload.notifications)) {
    payload.notifications = [];
  }
  return payload;
}

/**
 * Policy fields the update endpoint accepts. Expanded `targets` entries are
 * reduced to their IDs and scenario parameters are reset.
 */
export function buildPolicyUpdatePayload(data: PolicyData, name: string = data.name): Record<string, unknown> {
  return {
    name,
    description: data.description,
    environmentId: data.environmentId,
    environmentType: data.environmentType,
    targets: (data.targets ?? []).map((target) => ({ id: target.id })),
    scenarioIds: data.scenarioIds ?? [],
    scenarioParameters: [],
    policyType: data.policyType,
    policySite: data.policySite,
    permanentRunOptions: data.permanentRunOptions,
  };
}

/**
 * Application fields the update endpoint accepts. The risk estimate is
 * carried over only when the Application has one.
 */
export function buildApplicationUpdatePayload(
  data: ApplicationData,
  changes: { name?: string; targetIds?: string[] } = {},
): Record<string, unknown> {
  const payload: Record<string, unknown> = {
    name: changes.name ?? data.name,
    description: data.description ?? "",
    targetIds: changes.targetIds ?? data.targetIds ?? [],
  };
  if (data.typeOfRiskEstimate) {
    payload.typeOfRiskEstimate = data.typeOfRiskEstimate;
  }
  if (data.technicalImpact) {
    payload.technicalImpact = data.technicalImpact;
  }
  if (data.businessImpact) {
    payload.businessImpact = data.businessImpact;
  }
  return payload;
}

export function buildSecretPayload(username: string, password: string, description: string): Record<string, unknown> {
  return {
    type: "usernamePassword",
    secret: { username, password },
    description,
  };
}
