/**
 * Resource Upsert
 *
 * Guarantees a named resource exists: reuse the single match, create when
 * there is none, refuse when the name is ambiguous.
 *
 * The optional "find twice" mode resolves the name twice with a random pause
 * in between and only proceeds once both lookups agree. That narrows the
 * window in which two concurrent invocations can both decide to create the
 * same name, but it does not close it: two processes that both pass the
 * double check before either creates will still produce duplicates. Only a
 * server-side uniqueness constraint would prevent that.
 */

import type { ZeroNorthHttpClient } from "../client/http-client";
import { parseWith } from "../client/response-classifier";
import { CreateFailedError, RaceDetectedError, TransportError, ZeroNorthError } from "../errors";
import { CreatedResourceSchema } from "../types/api-responses";
import {
  getResourceType,
  type Resolution,
  type ResourceTypeKey,
  type UpsertResult,
} from "../types/domain-models";
import type { NameResolver } from "./name-resolver";
import { silentLogger, type Logger } from "../../../utils/logger";
import { sleep as defaultSleep, type SleepFn } from "../../../utils/sleep";

export interface UpsertOptions {
  findTwice?: boolean;
}

export interface ResourceUpsertConfig {
  /** Upper bound of the random pause between the two lookups */
  maxJitterMs?: number;
  /** Rounds of paired lookups before giving up on agreement */
  maxAgreementAttempts?: number;
  logger?: Logger;
  sleep?: SleepFn;
  random?: () => number;
}

function sameResolution(a: Resolution, b: Resolution): boolean {
  if (a.status === "found" && b.status === "found") {
    return a.id === b.id;
  }
  return a.status === b.status;
}

export class ResourceUpsert {
  private readonly maxJitterMs: number;
  private readonly maxAgreementAttempts: number;
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly random: () => number;

  constructor(
    private readonly httpClient: ZeroNorthHttpClient,
    private readonly resolver: NameResolver,
    config: ResourceUpsertConfig = {},
  ) {
    this.maxJitterMs = config.maxJitterMs ?? 4000;
    this.maxAgreementAttempts = config.maxAgreementAttempts ?? 5;
    this.logger = config.logger ?? silentLogger;
    this.sleep = config.sleep ?? defaultSleep;
    this.random = config.random ?? Math.random;
  }

  /**
   * Return the ID of the resource named `name`, creating it from `buildPayload()` when absent
   *
   * @throws AmbiguousNameError without attempting a create
   * @throws CreateFailedError when the create call is rejected or returns no ID
   */
  async ensure(
    resourceType: ResourceTypeKey,
    name: string,
    buildPayload: () => Record<string, unknown>,
    options: UpsertOptions = {},
  ): Promise<UpsertResult> {
    const definition = getResourceType(resourceType);
    const resolution = options.findTwice
      ? await this.resolveTwice(resourceType, name)
      : await this.resolver.resolve(resourceType, name);

    if (resolution.status === "found") {
      this.logger.info(`${definition.label} '${name}' found with ID '${resolution.id}'.`);
      return { id: resolution.id, created: false };
    }

    this.logger.info(`Creating a ${definition.label} with name '${name}'...`);
    const id = await this.create(resourceType, name, buildPayload());
    this.logger.info(`${definition.label} '${name}' created with ID '${id}'.`);
    return { id, created: true };
  }

  /**
   * Resolve, pause a random moment, resolve again; repeat until both agree
   */
  async resolveTwice(resourceType: ResourceTypeKey, name: string): Promise<Resolution> {
    const pauseMs = Math.floor(this.random() * this.maxJitterMs);

    for (let attempt = 1; attempt <= this.maxAgreementAttempts; attempt++) {
      this.logger.info(`Looking up '${name}'. Try #1...`);
      const first = await this.resolver.resolve(resourceType, name);

      this.logger.info(`Sleeping for ${pauseMs} ms...`);
      await this.sleep(pauseMs);

      this.logger.info(`Looking up '${name}'. Try #2...`);
      const second = await this.resolver.resolve(resourceType, name);

      if (sameResolution(first, second)) {
        return second;
      }

      this.logger.warn(`Lookups of '${name}' disagree, trying again (round ${attempt}/${this.maxAgreementAttempts})`);
    }

    throw new RaceDetectedError(getResourceType(resourceType).label, name, this.maxAgreementAttempts);
  }

  private async create(resourceType: ResourceTypeKey, name: string, payload: Record<string, unknown>): Promise<string> {
    const definition = getResourceType(resourceType);
    try {
      const result = await this.httpClient.post(`/${definition.path}`, payload);
      return parseWith(CreatedResourceSchema, result).id;
    } catch (error) {
      if (error instanceof TransportError || !(error instanceof ZeroNorthError)) {
        throw error;
      }
      throw new CreateFailedError(definition.label, name, error);
    }
  }
}
