import { ZeroNorthConfigError } from "../infrastructure/zeronorth/errors";
import type { ZeroNorthServices } from "../infrastructure/zeronorth/repositories";

/**
 * Drain up to `maxJobs` jobs from the on-prem queue by failing them.
 * A queue head whose Policy was deleted is traced to that Policy's PENDING job.
 */
export async function cleanOnPremJobs(services: ZeroNorthServices, maxJobs: number): Promise<string[]> {
  if (!Number.isInteger(maxJobs) || maxJobs < 0) {
    throw new ZeroNorthConfigError(`'${maxJobs}' is not a valid maximum number of jobs to clean`);
  }

  const { logger, repositories } = services;
  const driver = services.createJobDriver();
  const cleaned: string[] = [];

  while (cleaned.length < maxJobs) {
    const head = await repositories.onPremQueue.peek();

    let jobId: string | undefined;
    if (head.kind === "job") {
      jobId = head.jobId;
    } else if (head.kind === "orphaned") {
      logger.info(`Found an on-prem job of the missing Policy '${head.policyId}'...`);
      const jobs = await repositories.jobs.listAll({ query: { policyId: head.policyId } });
      jobId = jobs.find((job) => job.data.status === "PENDING")?.id;
      if (!jobId) {
        logger.warn("Can't find the PENDING job of that Policy.");
      }
    }
    if (!jobId) {
      break;
    }

    logger.info(`Found on-prem job '${jobId}'...`);
    await driver.fail(jobId);
    cleaned.push(jobId);
  }

  logger.info(`${cleaned.length} ${cleaned.length === 1 ? "job" : "jobs"} removed from the on-prem jobs queue.`);
  return cleaned;
}
