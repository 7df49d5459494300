/**
 * Job reports: the run history of one Policy, and a finished-job count
 * for every Policy of every Target.
 */

import { NotFoundError } from "../infrastructure/zeronorth/errors";
import type { ZeroNorthServices } from "../infrastructure/zeronorth/repositories";
import type { Job } from "../infrastructure/zeronorth/types";
import { formatApiTimestamp, formatCsv, type CsvValue } from "../utils/csv";

export const POLICY_JOB_HEADER = ["date", "jobId", "status", "start", "end", "dur.(mins)"];
export const TARGET_JOB_HEADER = ["target_name", "policy_name", "jobs"];

const POLICY_JOB_LIMIT = 2000;
const RECENT_JOB_LIMIT = 10;

function epochSeconds(timestamp: string): number {
  return Math.floor(Date.parse(timestamp) / 1000);
}

function policyJobRow(job: Job): CsvValue[] {
  const created = job.meta?.created;
  const lastModified = job.meta?.lastModified;
  const minutes =
    created && lastModified ? String((epochSeconds(lastModified) - epochSeconds(created)) / 60) : "";

  return [
    created ? created.split("T")[0] : "",
    job.id,
    job.data.status,
    formatApiTimestamp(created),
    formatApiTimestamp(lastModified),
    minutes,
  ];
}

/**
 * Jobs of a Policy since `since` (ISO-8601, UTC), oldest first
 */
export async function listPolicyJobs(
  services: ZeroNorthServices,
  policyId: string,
  since: string,
): Promise<string[]> {
  const { logger, repositories } = services;

  const policy = await repositories.policies.findById(policyId);
  if (!policy) {
    throw new NotFoundError("Policy", policyId);
  }
  logger.info(`Found Policy '${policy.data.name}' with ID '${policyId}'.`);

  const jobs = await repositories.jobs.listAll({ query: { policyId, since }, maxItems: POLICY_JOB_LIMIT });
  logger.info(`Found ${jobs.length} job(s).`);

  const sorted = [...jobs].sort((left, right) => (left.meta?.created ?? "").localeCompare(right.meta?.created ?? ""));
  return formatCsv(POLICY_JOB_HEADER, sorted.map(policyJobRow));
}

/**
 * One row per Target and Policy with the number of FINISHED jobs among the
 * Policy's most recent ones. A Target without Policies gets a row of its own.
 */
export async function summarizeTargetJobs(services: ZeroNorthServices): Promise<string[]> {
  const { logger, repositories } = services;

  const customerName = await repositories.accounts.getCustomerName();
  logger.info(`Customer Account: '${customerName}'`);

  const targets = await repositories.targets.listAll();
  logger.info(`Found ${targets.length} Targets.`);

  const rows: CsvValue[][] = [];
  for (const target of targets) {
    const policies = await repositories.policies.listAll({ query: { targetId: target.id } });
    if (policies.length === 0) {
      rows.push([target.data.name, "", ""]);
      continue;
    }

    for (const policy of policies) {
      const jobs = await repositories.jobs.listAll({ query: { policyId: policy.id }, maxItems: RECENT_JOB_LIMIT });
      const finished = jobs.filter((job) => job.data.status === "FINISHED").length;
      rows.push([target.data.name, policy.data.name, finished]);
    }
  }

  return formatCsv(TARGET_JOB_HEADER, rows);
}
