import { NotFoundError } from "../infrastructure/zeronorth/errors";
import { buildApplicationPayload, buildApplicationUpdatePayload } from "../infrastructure/zeronorth/payloads";
import type { ZeroNorthServices } from "../infrastructure/zeronorth/repositories";

export interface ApplicationTargetResult {
  applicationId: string;
  created: boolean;
  targetId: string;
  /** False when the Target was already part of the Application */
  linked: boolean;
}

/**
 * Ensure an Application exists and contains the (existing) Target
 */
export async function createApplicationWithTarget(
  services: ZeroNorthServices,
  applicationName: string,
  targetName: string,
): Promise<ApplicationTargetResult> {
  const { logger, repositories, resolver, upsert } = services;

  const targetId = await resolver.resolveExisting("targets", targetName);
  const application = await upsert.ensure("applications", applicationName, () =>
    buildApplicationPayload(applicationName, [targetId]),
  );

  if (application.created) {
    return { applicationId: application.id, created: true, targetId, linked: true };
  }

  const existing = await repositories.applications.findById(application.id);
  if (!existing) {
    throw new NotFoundError("Application", application.id);
  }

  const targetIds = existing.data.targetIds ?? [];
  if (targetIds.includes(targetId)) {
    logger.info(`Target '${targetName}' is already part of Application '${applicationName}'.`);
    return { applicationId: application.id, created: false, targetId, linked: false };
  }

  logger.info(`Adding Target '${targetName}' to Application '${applicationName}'...`);
  await repositories.applications.update(
    application.id,
    buildApplicationUpdatePayload(existing.data, { targetIds: [...targetIds, targetId] }),
  );
  return { applicationId: application.id, created: false, targetId, linked: true };
}
