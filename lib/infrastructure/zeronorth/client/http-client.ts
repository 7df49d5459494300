/**
 * ZeroNorth HTTP Client
 *
 * Low-level HTTP client for the ZeroNorth REST API with:
 * - Token authentication (raw token in the Authorization header)
 * - Timeouts via AbortController
 * - Optional retry with exponential backoff for transport failures
 * - Multipart file upload
 *
 * Returns raw response text. Whether a body is an error is decided by the
 * response classifier, because the API embeds error documents in bodies.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { TransportError, TransportTimeoutError, ZeroNorthConfigError } from "../errors";
import { silentLogger, type Logger } from "../../../utils/logger";
import { sleep as defaultSleep, type SleepFn } from "../../../utils/sleep";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface ZeroNorthClientConfig {
  apiRoot: string;
  apiKey: string;
  defaultTimeout?: number; // milliseconds
  maxRetries?: number;
  retryDelay?: number; // base delay in milliseconds
  logger?: Logger;
  fetchFn?: typeof fetch;
  sleep?: SleepFn;
}

export interface RequestOptions {
  /** Object bodies are serialized; strings are sent as-is (caller-built JSON text) */
  body?: unknown;
  query?: QueryParams;
  timeout?: number;
  skipRetry?: boolean;
  /** Extra request headers, e.g. `etag` for conditional deletes */
  headers?: Record<string, string>;
}

export interface HttpResult {
  status: number;
  body: string;
  endpoint: string;
}

/**
 * Internal configuration with required properties
 */
interface InternalConfig {
  apiRoot: string;
  apiKey: string;
  defaultTimeout: number;
  maxRetries: number;
  retryDelay: number;
}

export class ZeroNorthHttpClient {
  private readonly config: InternalConfig;
  private readonly logger: Logger;
  private readonly fetchFn: typeof fetch;
  private readonly sleep: SleepFn;

  constructor(config: ZeroNorthClientConfig) {
    if (!config.apiRoot) {
      throw new ZeroNorthConfigError("ZeroNorth API root URL is required");
    }
    if (!config.apiKey) {
      throw new ZeroNorthConfigError("ZeroNorth API key is required");
    }

    this.config = {
      apiRoot: config.apiRoot.replace(/\/$/, ""), // Remove trailing slash
      apiKey: config.apiKey,
      defaultTimeout: config.defaultTimeout ?? 30000,
      maxRetries: config.maxRetries ?? 0,
      retryDelay: config.retryDelay ?? 1000,
    };
    this.logger = config.logger ?? silentLogger;
    // Resolved per call so interceptors installed after construction still apply
    this.fetchFn = config.fetchFn ?? ((input, init) => fetch(input, init));
    this.sleep = config.sleep ?? defaultSleep;
  }

  /**
   * Execute an HTTP request, retrying transport failures when configured
   */
  async request(method: HttpMethod, apiPath: string, options: RequestOptions = {}): Promise<HttpResult> {
    const url = this.buildUrl(apiPath, options.query);
    const hasBody = options.body !== undefined;
    const init: RequestInit = {
      method,
      headers: { ...this.buildHeaders(hasBody), ...options.headers },
      body: hasBody ? this.serializeBody(options.body) : undefined,
    };

    return this.withRetry(options, () => this.execute(url, init, options.timeout));
  }

  async get(apiPath: string, query?: QueryParams, options: Omit<RequestOptions, "query" | "body"> = {}): Promise<HttpResult> {
    return this.request("GET", apiPath, { ...options, query });
  }

  async post(apiPath: string, body?: unknown, options: Omit<RequestOptions, "body"> = {}): Promise<HttpResult> {
    return this.request("POST", apiPath, { ...options, body });
  }

  async put(apiPath: string, body: unknown, options: Omit<RequestOptions, "body"> = {}): Promise<HttpResult> {
    return this.request("PUT", apiPath, { ...options, body });
  }

  async delete(apiPath: string, options: Omit<RequestOptions, "body"> = {}): Promise<HttpResult> {
    return this.request("DELETE", apiPath, options);
  }

  /**
   * Multipart POST of a local file
   */
  async upload(
    apiPath: string,
    filePath: string,
    options: { fieldName?: string; timeout?: number; skipRetry?: boolean } = {},
  ): Promise<HttpResult> {
    let content: Buffer;
    try {
      content = await fs.readFile(filePath);
    } catch (error) {
      throw new ZeroNorthConfigError(
        `Unable to read upload file '${filePath}'`,
        error instanceof Error ? error : undefined,
      );
    }

    const url = this.buildUrl(apiPath);
    const form = new FormData();
    form.append(options.fieldName ?? "file", new Blob([new Uint8Array(content)]), path.basename(filePath));

    // Content-Type is left to fetch so the multipart boundary is set
    const init: RequestInit = {
      method: "POST",
      headers: this.buildHeaders(false),
      body: form,
    };

    this.logger.debug(`Uploading '${filePath}' (${content.length} bytes)`);
    return this.withRetry(options, () => this.execute(url, init, options.timeout));
  }

  private buildHeaders(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      Authorization: this.config.apiKey,
    };
    if (hasBody) {
      headers["Content-Type"] = "application/json";
    }
    return headers;
  }

  private serializeBody(body: unknown): string {
    return typeof body === "string" ? body : JSON.stringify(body);
  }

  private buildUrl(apiPath: string, query?: QueryParams): string {
    if (!apiPath || !apiPath.trim()) {
      throw new ZeroNorthConfigError("Request path must not be empty");
    }

    const normalizedPath = apiPath.startsWith("/") ? apiPath : `/${apiPath}`;
    const queryString = query ? this.buildQueryString(query) : "";
    if (!queryString) {
      return `${this.config.apiRoot}${normalizedPath}`;
    }
    const separator = normalizedPath.includes("?") ? "&" : "?";
    return `${this.config.apiRoot}${normalizedPath}${separator}${queryString}`;
  }

  private buildQueryString(params: QueryParams): string {
    return Object.entries(params)
      .filter((entry): entry is [string, string | number | boolean] => entry[1] !== undefined)
      .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`)
      .join("&");
  }

  private async withRetry(
    options: { skipRetry?: boolean },
    attemptFn: () => Promise<HttpResult>,
  ): Promise<HttpResult> {
    const maxAttempts = options.skipRetry ? 1 : this.config.maxRetries + 1;

    for (let attempt = 0; ; attempt++) {
      if (attempt > 0) {
        await this.sleep(this.calculateRetryDelay(attempt));
      }

      try {
        return await attemptFn();
      } catch (error) {
        // Only transport failures are retried; API errors arrive as bodies
        if (!(error instanceof TransportError) || attempt >= maxAttempts - 1) {
          throw error;
        }
        this.logger.warn(
          `Request failed (attempt ${attempt + 1}/${maxAttempts}), retrying: ${error.message}`,
        );
      }
    }
  }

  /**
   * Execute a single HTTP request with timeout
   */
  private async execute(url: string, init: RequestInit, timeoutOverride?: number): Promise<HttpResult> {
    const timeout = timeoutOverride ?? this.config.defaultTimeout;
    const endpoint = url.slice(this.config.apiRoot.length);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    this.logger.debug(`${init.method} ${endpoint}`);

    try {
      const response = await this.fetchFn(url, { ...init, signal: controller.signal });
      const body = await response.text();
      this.logger.debug(`${init.method} ${endpoint} -> HTTP ${response.status} (${body.length} bytes)`);
      return { status: response.status, body, endpoint };
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new TransportTimeoutError(`Request timed out after ${timeout}ms`, timeout, endpoint, error);
      }
      throw new TransportError(
        `Request failed: ${error instanceof Error ? error.message : String(error)}`,
        endpoint,
        error instanceof Error ? error : undefined,
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Exponential backoff: delay * (2 ^ attempt) with jitter
   */
  private calculateRetryDelay(attempt: number): number {
    const exponentialDelay = this.config.retryDelay * Math.pow(2, attempt - 1);
    const jitter = Math.random() * this.config.retryDelay;
    return exponentialDelay + jitter;
  }
}
