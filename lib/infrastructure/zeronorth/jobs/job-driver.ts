/**
 * Job Driver
 *
 * Drives one policy execution through its lifecycle:
 *
 *   not_started -> started -> [uploaded] -> resumed -> polling -> terminal
 *
 * Manual-upload policies pause after `run` until the issues file is attached
 * and the job is resumed. Policies that scan on their own go straight from
 * `started` to polling. A driver instance tracks a single job; calls made out
 * of order raise JobStateError.
 */

import type { ZeroNorthHttpClient } from "../client/http-client";
import { expectAccepted, parseWith } from "../client/response-classifier";
import { JobStartError, JobStateError, PollTimeoutError, TransportError, ZeroNorthError } from "../errors";
import { buildRunPayload } from "../payloads";
import { JobSchema, RunPolicyResponseSchema } from "../types/api-responses";
import {
  isActiveJobStatus,
  type JobDriverState,
  type JobOutcome,
  type JobStatus,
} from "../types/domain-models";
import { silentLogger, type Logger } from "../../../utils/logger";
import { sleep as defaultSleep, type SleepFn } from "../../../utils/sleep";

export interface JobDriverConfig {
  pollIntervalMs?: number;
  maxPollAttempts?: number;
  /** Pause between upload and resume while the server registers the file */
  uploadSettleMs?: number;
  logger?: Logger;
  sleep?: SleepFn;
}

export interface PollOptions {
  intervalMs?: number;
  maxAttempts?: number;
  signal?: AbortSignal;
}

export interface RunOptions extends PollOptions {
  runOptions?: Record<string, unknown>;
  /** When false, return right after the job is started */
  wait?: boolean;
}

export class JobDriver {
  private currentState: JobDriverState = "not_started";
  private currentJobId?: string;

  private readonly pollIntervalMs: number;
  private readonly maxPollAttempts: number;
  private readonly uploadSettleMs: number;
  private readonly logger: Logger;
  private readonly sleep: SleepFn;

  constructor(
    private readonly httpClient: ZeroNorthHttpClient,
    config: JobDriverConfig = {},
  ) {
    this.pollIntervalMs = config.pollIntervalMs ?? 10000;
    this.maxPollAttempts = config.maxPollAttempts ?? 360;
    this.uploadSettleMs = config.uploadSettleMs ?? 3000;
    this.logger = config.logger ?? silentLogger;
    this.sleep = config.sleep ?? defaultSleep;
  }

  get state(): JobDriverState {
    return this.currentState;
  }

  get jobId(): string | undefined {
    return this.currentJobId;
  }

  /**
   * Start a job for the policy and return its ID
   *
   * @throws JobStartError when the API rejects the run or answers without a job ID
   */
  async run(policyId: string, runOptions: Record<string, unknown> = {}): Promise<string> {
    this.requireState("run", ["not_started"]);

    this.logger.info(`Invoking policy '${policyId}'...`);
    let jobId: string;
    try {
      // Without run options the request carries no body at all
      const body = Object.keys(runOptions).length > 0 ? buildRunPayload(runOptions) : undefined;
      const result = await this.httpClient.post(`/policies/${encodeURIComponent(policyId)}/run`, body);
      jobId = parseWith(RunPolicyResponseSchema, result).jobId;
    } catch (error) {
      if (error instanceof TransportError || !(error instanceof ZeroNorthError)) {
        throw error;
      }
      throw new JobStartError(policyId, error);
    }

    this.currentJobId = jobId;
    this.currentState = "started";
    this.logger.info(`Policy '${policyId}' started job '${jobId}'.`);
    return jobId;
  }

  /**
   * Attach an issues file to a started manual-upload job
   */
  async upload(jobId: string, filePath: string): Promise<void> {
    this.requireState("upload", ["started"], jobId);

    this.logger.info(`Uploading file '${filePath}' to job '${jobId}'...`);
    const result = await this.httpClient.upload(`/onprem/issues/${encodeURIComponent(jobId)}`, filePath);
    expectAccepted(result);

    this.currentState = "uploaded";
    this.logger.info("Upload complete.");
  }

  async resume(jobId: string): Promise<void> {
    this.requireState("resume", ["started", "uploaded"], jobId);

    this.logger.info(`Resuming job '${jobId}'...`);
    expectAccepted(await this.httpClient.post(`/jobs/${encodeURIComponent(jobId)}/resume`));
    this.currentState = "resumed";
  }

  /**
   * Mark any job as failed. Operator action; does not touch the driver's own state.
   */
  async fail(jobId: string): Promise<void> {
    this.logger.info(`Failing job '${jobId}'...`);
    expectAccepted(await this.httpClient.post(`/jobs/${encodeURIComponent(jobId)}/fail`));
  }

  async getStatus(jobId: string): Promise<JobStatus> {
    const result = await this.httpClient.get(`/jobs/${encodeURIComponent(jobId)}`);
    return parseWith(JobSchema, result).data.status;
  }

  /**
   * Check the job until it leaves PENDING/RUNNING. N checks sleep N-1 times.
   *
   * @throws PollTimeoutError after `maxAttempts` checks that all reported an active status
   * @throws AbortedError when `signal` fires during a wait
   */
  async poll(jobId: string, options: PollOptions = {}): Promise<JobStatus> {
    this.requireState("poll", ["started", "resumed"], jobId);

    const intervalMs = options.intervalMs ?? this.pollIntervalMs;
    const maxAttempts = options.maxAttempts ?? this.maxPollAttempts;
    this.currentState = "polling";

    let status: JobStatus = "";
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1) {
        await this.sleep(intervalMs, options.signal);
      }

      status = await this.getStatus(jobId);
      this.logger.info(`Job '${jobId}' status: ${status}`);

      if (!isActiveJobStatus(status)) {
        this.currentState = "terminal";
        return status;
      }
    }

    throw new PollTimeoutError(jobId, maxAttempts, status);
  }

  /**
   * run -> upload -> settle -> resume -> poll
   */
  async runUploadAndWait(policyId: string, filePath: string, options: RunOptions = {}): Promise<JobOutcome> {
    const jobId = await this.run(policyId, options.runOptions);
    await this.upload(jobId, filePath);
    await this.sleep(this.uploadSettleMs, options.signal);
    await this.resume(jobId);

    if (options.wait === false) {
      return { jobId, waited: false };
    }
    const status = await this.poll(jobId, options);
    return { jobId, status, waited: true };
  }

  /**
   * run -> poll, for policies that produce their own results
   */
  async runAndWait(policyId: string, options: RunOptions = {}): Promise<JobOutcome> {
    const jobId = await this.run(policyId, options.runOptions);

    if (options.wait === false) {
      return { jobId, waited: false };
    }
    const status = await this.poll(jobId, options);
    return { jobId, status, waited: true };
  }

  private requireState(operation: string, allowed: JobDriverState[], jobId?: string): void {
    if (!allowed.includes(this.currentState)) {
      throw new JobStateError(
        `Cannot ${operation} while the job is '${this.currentState}' (expected ${allowed.join(" or ")})`,
      );
    }
    if (jobId !== undefined && jobId !== this.currentJobId) {
      throw new JobStateError(`Job '${jobId}' is not the job started by this driver ('${this.currentJobId}')`);
    }
  }
}
