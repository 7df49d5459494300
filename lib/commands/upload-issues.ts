/**
 * Feed a scanner results file into a manual-upload Policy and wait for the job
 */

import * as fs from "node:fs/promises";
import { NotFoundError, ZeroNorthConfigError } from "../infrastructure/zeronorth/errors";
import type { ZeroNorthServices } from "../infrastructure/zeronorth/repositories";
import type { JobOutcome } from "../infrastructure/zeronorth/types";

export interface UploadIssuesInput {
  policyId: string;
  filePath: string;
  wait?: boolean;
  signal?: AbortSignal;
}

export async function uploadIssues(services: ZeroNorthServices, input: UploadIssuesInput): Promise<JobOutcome> {
  const { logger, repositories } = services;

  // Fail before a job is started rather than leave it waiting for a file
  try {
    await fs.access(input.filePath);
  } catch (error) {
    throw new ZeroNorthConfigError(
      `Issues file '${input.filePath}' is not readable`,
      error instanceof Error ? error : undefined,
    );
  }

  const policy = await repositories.policies.findById(input.policyId);
  if (!policy) {
    throw new NotFoundError("Policy", input.policyId);
  }
  logger.info(`Policy '${input.policyId}' is '${policy.data.name}'.`);

  if (policy.data.policyType !== "manualUpload") {
    logger.warn(
      `Policy '${input.policyId}' has type '${policy.data.policyType ?? "unknown"}', expected 'manualUpload'.`,
    );
  }

  const driver = services.createJobDriver();
  return driver.runUploadAndWait(input.policyId, input.filePath, {
    wait: input.wait,
    signal: input.signal,
  });
}
