/**
 * Rename a Target, Policy or Application, addressed by ID or current name
 */

import { NameTakenError, NotFoundError, ZeroNorthConfigError } from "../infrastructure/zeronorth/errors";
import {
  buildApplicationUpdatePayload,
  buildPolicyUpdatePayload,
  buildTargetUpdatePayload,
} from "../infrastructure/zeronorth/payloads";
import type { ResourceRepository, ZeroNorthServices } from "../infrastructure/zeronorth/repositories";
import { getResourceType } from "../infrastructure/zeronorth/types";

export type RenamableResourceType = "targets" | "policies" | "applications";

export interface RenameResourceInput {
  resourceType: RenamableResourceType;
  idOrName: string;
  newName: string;
}

export interface RenameResult {
  id: string;
  previousName: string;
  newName: string;
}

interface PreparedRename {
  previousName: string;
  payload: Record<string, unknown>;
}

async function loadData<T extends { data: { name: string } }>(
  repository: ResourceRepository<T>,
  label: string,
  id: string,
): Promise<T["data"]> {
  const resource = await repository.findById(id);
  if (!resource) {
    throw new NotFoundError(label, id);
  }
  return resource.data;
}

/**
 * Read the resource and build the update body its type accepts
 */
async function prepareRename(
  services: ZeroNorthServices,
  resourceType: RenamableResourceType,
  id: string,
  newName: string,
): Promise<PreparedRename> {
  const { repositories } = services;
  const label = getResourceType(resourceType).label;

  switch (resourceType) {
    case "targets": {
      const data = await loadData(repositories.targets, label, id);
      return { previousName: data.name, payload: buildTargetUpdatePayload(data, { name: newName }) };
    }
    case "policies": {
      const data = await loadData(repositories.policies, label, id);
      return { previousName: data.name, payload: buildPolicyUpdatePayload(data, newName) };
    }
    case "applications": {
      const data = await loadData(repositories.applications, label, id);
      return { previousName: data.name, payload: buildApplicationUpdatePayload(data, { name: newName }) };
    }
  }
}

export async function renameResource(services: ZeroNorthServices, input: RenameResourceInput): Promise<RenameResult> {
  const { logger, repositories, resolver } = services;
  const label = getResourceType(input.resourceType).label;
  const newName = input.newName.trim();
  if (!newName) {
    throw new ZeroNorthConfigError(`New ${label} name must not be empty`);
  }

  const id = await resolver.resolveIdOrName(input.resourceType, input.idOrName);

  const existing = await resolver.resolve(input.resourceType, newName);
  if (existing.status === "found" && existing.id !== id) {
    throw new NameTakenError(label, newName, existing.id);
  }

  const { previousName, payload } = await prepareRename(services, input.resourceType, id, newName);
  logger.info(`Renaming ${label} '${previousName}' (${id}) to '${newName}'...`);
  await repositories[input.resourceType].update(id, payload);
  logger.info("Done.");

  return { id, previousName, newName };
}
