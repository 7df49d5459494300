/**
 * Inspect or maintain the `tags` of a Target
 */

import { NotFoundError } from "../infrastructure/zeronorth/errors";
import { buildTargetUpdatePayload, mergeTags, normalizeTags } from "../infrastructure/zeronorth/payloads";
import type { ZeroNorthServices } from "../infrastructure/zeronorth/repositories";

export type TagAction =
  | { kind: "list" }
  /** Is this one tag on the Target */
  | { kind: "check"; tag: string }
  /** Add the tags that are missing */
  | { kind: "add"; tags: string[] }
  /** Replace every tag */
  | { kind: "update"; tags: string[] }
  | { kind: "delete"; tags: string[] }
  | { kind: "delete-all" };

export interface TargetTagsResult {
  targetId: string;
  /** Tags after the action; null once every tag was deleted */
  tags: string[] | null;
  updated: boolean;
  /** Set for `check` */
  present?: boolean;
}

function sameTags(left: readonly string[] | null, right: readonly string[] | null): boolean {
  if (left === null || right === null) {
    return left === right;
  }
  return left.length === right.length && left.every((tag, index) => tag === right[index]);
}

function nextTags(current: string[], action: Exclude<TagAction, { kind: "list" } | { kind: "check" }>): string[] | null {
  switch (action.kind) {
    case "add":
      return mergeTags(current, action.tags);
    case "update":
      return normalizeTags(action.tags);
    case "delete":
      return current.filter((tag) => !action.tags.includes(tag));
    case "delete-all":
      return null;
  }
}

export async function applyTargetTags(
  services: ZeroNorthServices,
  target: string,
  action: TagAction,
): Promise<TargetTagsResult> {
  const { logger, repositories, resolver } = services;

  const targetId = await resolver.resolveIdOrName("targets", target);
  const resource = await repositories.targets.findById(targetId);
  if (!resource) {
    throw new NotFoundError("Target", targetId);
  }

  const stored = resource.data.tags ?? null;
  const current = stored ?? [];
  if (action.kind === "list") {
    return { targetId, tags: normalizeTags(current), updated: false };
  }
  if (action.kind === "check") {
    return { targetId, tags: current, updated: false, present: current.includes(action.tag.trim()) };
  }

  const tags = nextTags(current, action);
  if (sameTags(stored, tags)) {
    logger.info(`Tags of Target '${resource.data.name}' are unchanged.`);
    return { targetId, tags, updated: false };
  }

  logger.info(`Setting tags [${(tags ?? []).join(",")}] on Target '${resource.data.name}'...`);
  await repositories.targets.update(targetId, buildTargetUpdatePayload(resource.data, { tags }));
  return { targetId, tags, updated: true };
}
