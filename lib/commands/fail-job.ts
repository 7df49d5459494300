import { NotFoundError } from "../infrastructure/zeronorth/errors";
import type { ZeroNorthServices } from "../infrastructure/zeronorth/repositories";
import type { JobStatus } from "../infrastructure/zeronorth/types";

export interface FailJobResult {
  jobId: string;
  previousStatus: JobStatus;
  status: JobStatus;
}

/**
 * Force a stuck job into the FAILED state
 */
export async function failJob(services: ZeroNorthServices, jobId: string): Promise<FailJobResult> {
  const job = await services.repositories.jobs.findById(jobId);
  if (!job) {
    throw new NotFoundError("Job", jobId);
  }
  const previousStatus = job.data.status;
  services.logger.info(`Job '${jobId}' is currently '${previousStatus}'.`);

  const driver = services.createJobDriver();
  await driver.fail(jobId);
  const status = await driver.getStatus(jobId);
  services.logger.info(`Job '${jobId}' is now '${status}'.`);

  return { jobId, previousStatus, status };
}
