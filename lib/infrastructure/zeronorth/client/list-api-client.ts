/**
 * ZeroNorth List API Client
 *
 * High-level access to list endpoints with:
 * - offset/limit pagination
 * - schema validation of each page
 * - `.[1].count` handling
 *
 * List endpoints answer with `[items, { count }]`. Depending on the endpoint
 * `count` is either the collection total or the size of the returned page.
 */

import type { z } from "zod";
import { listPageSchema } from "../types/api-responses";
import type { ZeroNorthHttpClient, QueryParams } from "./http-client";
import { parseWith } from "./response-classifier";

export interface ListPage<T> {
  items: T[];
  count: number;
  offset: number;
}

export interface PaginatedQueryOptions {
  query?: QueryParams;
  pageSize?: number; // Items per page (default: 1000)
  maxItems?: number; // Maximum total items to fetch (default: unlimited)
  onPage?: (pageIndex: number, fetched: number, total?: number) => void; // Progress callback
}

export class ZeroNorthListApiClient {
  constructor(
    private readonly httpClient: ZeroNorthHttpClient,
    private readonly defaultPageSize = 1000,
  ) {}

  /**
   * Fetch a single page
   */
  async fetchPage<S extends z.ZodTypeAny>(
    path: string,
    itemSchema: S,
    query: QueryParams = {},
  ): Promise<ListPage<z.infer<S>>> {
    const result = await this.httpClient.get(path, query);
    const [items, meta] = parseWith(listPageSchema(itemSchema), result);
    const offset = typeof query.offset === "number" ? query.offset : 0;
    return { items, count: meta.count, offset };
  }

  /**
   * Walk a list endpoint page by page.
   *
   * Stops on a short page. When the first page reports a count larger than
   * itself, that count is taken as the total so a collection that is an exact
   * multiple of the page size does not cost an extra empty request.
   */
  async *walk<S extends z.ZodTypeAny>(
    path: string,
    itemSchema: S,
    options: PaginatedQueryOptions = {},
  ): AsyncGenerator<ListPage<z.infer<S>>, void, undefined> {
    const pageSize = options.pageSize ?? this.defaultPageSize;
    const { maxItems, onPage } = options;

    let offset = 0;
    let fetched = 0;
    let pageIndex = 0;
    let total: number | undefined;

    while (true) {
      if (maxItems !== undefined && fetched >= maxItems) {
        return;
      }

      const limit = maxItems !== undefined ? Math.min(pageSize, maxItems - fetched) : pageSize;
      const page = await this.fetchPage(path, itemSchema, { ...options.query, limit, offset });

      if (pageIndex === 0 && page.count > page.items.length) {
        total = page.count;
      }

      fetched += page.items.length;
      onPage?.(pageIndex, fetched, total);
      pageIndex++;

      if (page.items.length > 0) {
        yield page;
      }

      if (page.items.length < limit) {
        return; // Last page
      }
      if (total !== undefined && fetched >= total) {
        return;
      }
      offset += limit;
    }
  }

  /**
   * Fetch every item of a list endpoint
   */
  async fetchAll<S extends z.ZodTypeAny>(
    path: string,
    itemSchema: S,
    options: PaginatedQueryOptions = {},
  ): Promise<z.infer<S>[]> {
    const items: z.infer<S>[] = [];
    for await (const page of this.walk(path, itemSchema, options)) {
      items.push(...page.items);
    }
    return items;
  }
}
