/**
 * Replay notifications for the jobs behind a Target's open Synthetic Issues,
 * after a Notification was added to a Target that already had Issues.
 * Issues are notification-processed once, so a second replay does nothing.
 */

import { createHttpClient, type ZeroNorthServices } from "../infrastructure/zeronorth/repositories";
import { expectAccepted } from "../infrastructure/zeronorth/client";
import { describeError, NotFoundError, ZeroNorthConfigError } from "../infrastructure/zeronorth/errors";
import type { SyntheticIssue } from "../infrastructure/zeronorth/types";

export interface ReplayNotificationsInput {
  customerId: string;
  /** Safety checks; both must match exactly */
  customerName: string;
  targetId: string;
  targetName: string;
  /** Token of the privileged account allowed to replay */
  replayToken: string;
  dryRun?: boolean;
  /** Pause before each replay call */
  pauseMs?: number;
}

export interface IssueJob {
  date: string;
  jobId: string;
}

export interface ReplayResult {
  jobs: IssueJob[];
  replayed: number;
  failed: number;
}

const ISSUE_LIMIT = 1000;

function toIsoSeconds(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Distinct jobs of the Issues that are neither remediated nor ignored, oldest first
 */
export function collectIssueJobs(issues: SyntheticIssue[]): IssueJob[] {
  const lines = new Set<string>();
  for (const issue of issues) {
    const data = issue.data;
    if (!data || data.status === "Remediation" || data.ignore !== false) {
      continue;
    }
    for (const issueJob of data.issueJobs ?? []) {
      lines.add(`${toIsoSeconds(issueJob.runTime)},${issueJob.jobId}`);
    }
  }
  return [...lines].sort().map((line) => {
    const [date, jobId] = line.split(",");
    return { date, jobId };
  });
}

export async function replayNotifications(
  services: ZeroNorthServices,
  input: ReplayNotificationsInput,
): Promise<ReplayResult> {
  const { config, logger, repositories, sleep } = services;

  const customerName = await repositories.accounts.getCustomerName();
  if (customerName !== input.customerName) {
    throw new ZeroNorthConfigError(
      `Customer name '${customerName}' does not match the specified customer name '${input.customerName}'`,
    );
  }
  logger.info(`Customer name '${customerName}' validated.`);

  const target = await repositories.targets.findById(input.targetId);
  if (!target) {
    throw new NotFoundError("Target", input.targetId);
  }
  if (target.data.name !== input.targetName) {
    throw new ZeroNorthConfigError(
      `Target name '${target.data.name}' does not match the specified Target name '${input.targetName}'`,
    );
  }
  logger.info(`Target name '${target.data.name}' validated.`);

  const issues = await repositories.syntheticIssues.listAll({
    query: { targetId: input.targetId },
    maxItems: ISSUE_LIMIT,
  });
  const jobs = collectIssueJobs(issues);
  if (jobs.length === 0) {
    logger.info("The Target has no qualifying jobs. Nothing to do.");
    return { jobs, replayed: 0, failed: 0 };
  }
  logger.info(`Found ${jobs.length} qualifying job(s).`);

  if (!input.replayToken) {
    throw new ZeroNorthConfigError("A replay API token is required");
  }
  const replayClient = createHttpClient(config, { apiKey: input.replayToken, logger, sleep });
  const pauseMs = input.pauseMs ?? 5000;

  let replayed = 0;
  let failed = 0;
  for (const job of jobs) {
    await sleep(pauseMs);
    logger.info(`Processing job '${job.jobId}' from ${job.date}...`);
    if (input.dryRun) {
      continue;
    }

    try {
      const result = await replayClient.post("/jobs/replay-notifications", {
        customerId: input.customerId,
        jobId: job.jobId,
      });
      expectAccepted(result);
      replayed++;
    } catch (error) {
      failed++;
      logger.warn(`Problem processing job '${job.jobId}', continuing: ${describeError(error)}`);
    }
  }

  return { jobs, replayed, failed };
}
