/**
 * Repository Factory
 *
 * Creates the HTTP client, repositories and workflow components from one
 * resolved configuration
 */

import type { ZeroNorthConfig } from "../../../config";
import { silentLogger, type Logger } from "../../../utils/logger";
import { sleep as defaultSleep, type SleepFn } from "../../../utils/sleep";
import { ZeroNorthHttpClient, type ZeroNorthClientConfig } from "../client/http-client";
import { ZeroNorthListApiClient } from "../client/list-api-client";
import { JobDriver } from "../jobs/job-driver";
import { NameResolver } from "../resolvers/name-resolver";
import { ResourceUpsert } from "../resolvers/resource-upsert";
import {
  ApplicationSchema,
  IntegrationSchema,
  JobSchema,
  PolicySchema,
  SyntheticIssueSchema,
  TargetSchema,
  UserSchema,
} from "../types/api-responses";
import { RESOURCE_TYPES } from "../types/domain-models";
import {
  ZeroNorthAccountRepository,
  ZeroNorthOnPremQueueRepository,
  ZeroNorthResourceRepository,
  ZeroNorthScheduleRepository,
  ZeroNorthSecretRepository,
} from "./resource-repository.impl";

export interface ServiceOptions {
  logger?: Logger;
  fetchFn?: typeof fetch;
  sleep?: SleepFn;
  random?: () => number;
}

/**
 * Create ZeroNorthHttpClient from resolved configuration
 */
export function createHttpClient(
  config: ZeroNorthConfig,
  overrides?: Partial<ZeroNorthClientConfig>,
): ZeroNorthHttpClient {
  return new ZeroNorthHttpClient({
    apiRoot: config.apiRoot,
    apiKey: config.credential.token,
    defaultTimeout: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
    retryDelay: config.retryDelayMs,
    ...overrides,
  });
}

export function createRepositories(httpClient: ZeroNorthHttpClient, listClient: ZeroNorthListApiClient) {
  return {
    accounts: new ZeroNorthAccountRepository(httpClient),
    targets: new ZeroNorthResourceRepository(httpClient, listClient, RESOURCE_TYPES.targets, TargetSchema),
    policies: new ZeroNorthResourceRepository(httpClient, listClient, RESOURCE_TYPES.policies, PolicySchema),
    applications: new ZeroNorthResourceRepository(
      httpClient,
      listClient,
      RESOURCE_TYPES.applications,
      ApplicationSchema,
    ),
    integrations: new ZeroNorthResourceRepository(
      httpClient,
      listClient,
      RESOURCE_TYPES.environments,
      IntegrationSchema,
    ),
    users: new ZeroNorthResourceRepository(httpClient, listClient, RESOURCE_TYPES.users, UserSchema),
    jobs: new ZeroNorthResourceRepository(httpClient, listClient, { path: "jobs", label: "Job" }, JobSchema),
    syntheticIssues: new ZeroNorthResourceRepository(
      httpClient,
      listClient,
      { path: "syntheticIssues", label: "Synthetic issue" },
      SyntheticIssueSchema,
    ),
    schedules: new ZeroNorthScheduleRepository(httpClient, listClient),
    secrets: new ZeroNorthSecretRepository(httpClient),
    onPremQueue: new ZeroNorthOnPremQueueRepository(httpClient),
  };
}

export type ZeroNorthRepositories = ReturnType<typeof createRepositories>;

export interface ZeroNorthServices {
  config: ZeroNorthConfig;
  logger: Logger;
  httpClient: ZeroNorthHttpClient;
  listClient: ZeroNorthListApiClient;
  resolver: NameResolver;
  upsert: ResourceUpsert;
  repositories: ZeroNorthRepositories;
  sleep: SleepFn;
  /** A fresh driver per job; drivers track the state of a single job */
  createJobDriver(): JobDriver;
}

/**
 * Wire every component for one script invocation
 */
export function createZeroNorthServices(config: ZeroNorthConfig, options: ServiceOptions = {}): ZeroNorthServices {
  const logger = options.logger ?? silentLogger;
  const sleep = options.sleep ?? defaultSleep;
  const httpClient = createHttpClient(config, { logger, fetchFn: options.fetchFn, sleep });
  const listClient = new ZeroNorthListApiClient(httpClient, config.pageSize);
  const resolver = new NameResolver(httpClient, { scanLimit: config.scanLimit, logger });
  const upsert = new ResourceUpsert(httpClient, resolver, {
    maxJitterMs: config.findTwiceMaxJitterMs,
    logger,
    sleep,
    random: options.random,
  });

  return {
    config,
    logger,
    httpClient,
    listClient,
    resolver,
    upsert,
    repositories: createRepositories(httpClient, listClient),
    sleep,
    createJobDriver: () =>
      new JobDriver(httpClient, {
        pollIntervalMs: config.pollIntervalMs,
        maxPollAttempts: config.maxPollAttempts,
        uploadSettleMs: config.uploadSettleMs,
        logger,
        sleep,
      }),
  };
}
