/**
 * Resource Repository Interface
 *
 * Collection-oriented access to one ZeroNorth resource type,
 * abstracting the REST paths and the `[items, { count }]` list format
 */

import type { PaginatedQueryOptions } from "../client/list-api-client";
import type { Schedule, Secret } from "../types/api-responses";

export interface ResourceRepository<T> {
  /**
   * Find a resource by ID; null when the API reports it missing
   */
  findById(id: string): Promise<T | null>;

  /**
   * Replace the `data` section of a resource
   */
  update(id: string, data: Record<string, unknown>): Promise<void>;

  /**
   * Every resource of the collection, page by page
   */
  listAll(options?: PaginatedQueryOptions): Promise<T[]>;
}

export interface AccountRepository {
  /**
   * Name of the customer (tenant) the API key belongs to
   */
  getCustomerName(): Promise<string>;
}

export interface ScheduleRepository {
  listForPolicy(policyId: string): Promise<Schedule[]>;

  /**
   * @param etag - sent as the `etag` header when the schedule carries one
   */
  delete(policyId: string, scheduleId: string, etag?: string): Promise<void>;
}

export interface SecretRepository {
  /**
   * Store a secret and return its key
   */
  create(payload: Record<string, unknown>): Promise<string>;
  findByKey(key: string): Promise<Secret | null>;
  delete(key: string): Promise<void>;
}

export type OnPremQueueEntry =
  | { kind: "empty" }
  | { kind: "job"; jobId: string }
  /** The head of the queue belongs to a Policy that no longer exists */
  | { kind: "orphaned"; policyId: string };

export interface OnPremQueueRepository {
  /**
   * Head of the on-prem job queue, without removing it
   */
  peek(): Promise<OnPremQueueEntry>;
}
