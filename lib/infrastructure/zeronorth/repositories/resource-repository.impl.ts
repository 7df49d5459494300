import type { z } from "zod";
import type { QueryParams, ZeroNorthHttpClient } from "../client/http-client";
import type { PaginatedQueryOptions, ZeroNorthListApiClient } from "../client/list-api-client";
import { classifyResult, expectAccepted, parseWith, toError } from "../client/response-classifier";
import { MalformedResponseError } from "../errors";
import {
  AccountSchema,
  CreatedSecretSchema,
  OnPremQueueSchema,
  ScheduleSchema,
  SecretSchema,
  type Schedule,
  type Secret,
} from "../types/api-responses";
import type {
  AccountRepository,
  OnPremQueueEntry,
  OnPremQueueRepository,
  ResourceRepository,
  ScheduleRepository,
  SecretRepository,
} from "./resource-repository.interface";

export interface ResourceCollection {
  path: string;
  label: string;
  /** Sent with every detail read, e.g. `expand=false` */
  query?: QueryParams;
}

export class ZeroNorthResourceRepository<S extends z.ZodTypeAny> implements ResourceRepository<z.infer<S>> {
  constructor(
    private readonly httpClient: ZeroNorthHttpClient,
    private readonly listClient: ZeroNorthListApiClient,
    private readonly collection: ResourceCollection,
    private readonly schema: S,
  ) {}

  async findById(id: string): Promise<z.infer<S> | null> {
    const result = await this.httpClient.get(this.itemPath(id), this.collection.query);
    const classification = classifyResult(result);

    if (!classification.ok) {
      if (classification.kind === "api" && classification.code === 404) {
        return null;
      }
      throw toError(classification, result.endpoint);
    }

    return parseWith(this.schema, result);
  }

  async update(id: string, data: Record<string, unknown>): Promise<void> {
    expectAccepted(await this.httpClient.put(this.itemPath(id), data));
  }

  async listAll(options: PaginatedQueryOptions = {}): Promise<z.infer<S>[]> {
    return this.listClient.fetchAll(`/${this.collection.path}`, this.schema, options);
  }

  private itemPath(id: string): string {
    return `/${this.collection.path}/${encodeURIComponent(id)}`;
  }
}

export class ZeroNorthAccountRepository implements AccountRepository {
  constructor(private readonly httpClient: ZeroNorthHttpClient) {}

  async getCustomerName(): Promise<string> {
    const account = parseWith(AccountSchema, await this.httpClient.get("/accounts/me"));
    return account.customer.data.name;
  }
}

export class ZeroNorthScheduleRepository implements ScheduleRepository {
  constructor(
    private readonly httpClient: ZeroNorthHttpClient,
    private readonly listClient: ZeroNorthListApiClient,
  ) {}

  async listForPolicy(policyId: string): Promise<Schedule[]> {
    return this.listClient.fetchAll(`/policies/${encodeURIComponent(policyId)}/schedules`, ScheduleSchema);
  }

  async delete(policyId: string, scheduleId: string, etag?: string): Promise<void> {
    const result = await this.httpClient.delete(
      `/policies/${encodeURIComponent(policyId)}/schedules/${encodeURIComponent(scheduleId)}`,
      { headers: etag ? { etag } : undefined },
    );
    expectAccepted(result);
  }
}

export class ZeroNorthSecretRepository implements SecretRepository {
  constructor(private readonly httpClient: ZeroNorthHttpClient) {}

  async create(payload: Record<string, unknown>): Promise<string> {
    return parseWith(CreatedSecretSchema, await this.httpClient.post("/secrets", payload)).key;
  }

  async findByKey(key: string): Promise<Secret | null> {
    const result = await this.httpClient.get(this.keyPath(key));
    const classification = classifyResult(result);
    if (!classification.ok) {
      if (classification.kind === "api" && classification.code === 404) {
        return null;
      }
      throw toError(classification, result.endpoint);
    }
    return parseWith(SecretSchema, result);
  }

  async delete(key: string): Promise<void> {
    expectAccepted(await this.httpClient.delete(this.keyPath(key)));
  }

  private keyPath(key: string): string {
    return `/secrets/${encodeURIComponent(key)}`;
  }
}

const MISSING_POLICY_PATTERN = /Resource with id: '([^']+)' does not exist/;

export class ZeroNorthOnPremQueueRepository implements OnPremQueueRepository {
  constructor(private readonly httpClient: ZeroNorthHttpClient) {}

  async peek(): Promise<OnPremQueueEntry> {
    const result = await this.httpClient.get("/onprem/jobs");
    const classification = classifyResult(result);

    if (!classification.ok) {
      // The queue answers with an error when the head job's Policy was deleted
      const missing = classification.kind === "api" ? MISSING_POLICY_PATTERN.exec(classification.message) : null;
      if (missing) {
        return { kind: "orphaned", policyId: missing[1] };
      }
      throw toError(classification, result.endpoint);
    }

    const parsed = OnPremQueueSchema.safeParse(classification.body);
    if (!parsed.success) {
      throw new MalformedResponseError("Unexpected on-prem queue shape", result.endpoint, result.body);
    }
    const jobId = parsed.data[0]?.payload.jobId;
    return jobId ? { kind: "job", jobId } : { kind: "empty" };
  }
}
