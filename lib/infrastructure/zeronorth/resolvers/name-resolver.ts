/**
 * Name Resolver
 *
 * Maps a human-assigned resource name to its ID. Names are not unique at the
 * API layer and the server-side `?name=` filter is a loose superset, so
 * candidates are narrowed to case-insensitive exact matches here and the
 * count decides: none, one, or an ambiguity error.
 */

import type { ZeroNorthHttpClient } from "../client/http-client";
import { classifyResult, parseWith } from "../client/response-classifier";
import { AmbiguousNameError, NotFoundError } from "../errors";
import { NamedResourceListSchema, NamedResourceSchema, type NamedResource } from "../types/api-responses";
import {
  getResourceType,
  type Resolution,
  type ResourceTypeDefinition,
  type ResourceTypeKey,
} from "../types/domain-models";
import { silentLogger, type Logger } from "../../../utils/logger";

export interface NameResolverOptions {
  /** Collection size for client-scan lookups when the resource type sets none */
  scanLimit?: number;
  logger?: Logger;
}

/**
 * Case-insensitive exact match on `data[nameField]`
 */
export function selectExactMatches(
  candidates: NamedResource[],
  name: string,
  nameField = "name",
): NamedResource[] {
  const wanted = name.toLowerCase();
  return candidates.filter((candidate) => {
    const value = candidate.data[nameField];
    return typeof value === "string" && value.toLowerCase() === wanted;
  });
}

export class NameResolver {
  private readonly scanLimit: number;
  private readonly logger: Logger;

  constructor(
    private readonly httpClient: ZeroNorthHttpClient,
    options: NameResolverOptions = {},
  ) {
    this.scanLimit = options.scanLimit ?? 10000;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Resolve a name to zero or one resource. Never creates anything.
   *
   * @throws AmbiguousNameError when more than one resource carries the name
   */
  async resolve(resourceType: ResourceTypeKey, name: string): Promise<Resolution> {
    const matches = await this.findMatches(resourceType, name);
    const definition = getResourceType(resourceType);

    if (matches.length > 1) {
      this.logger.error(`Found multiple matches for the ${definition.label} name '${name}'`);
      throw new AmbiguousNameError(
        definition.label,
        name,
        matches.map((match) => match.id),
      );
    }

    if (matches.length === 0) {
      this.logger.info(`Did not find ${definition.label} '${name}'.`);
      return { status: "not_found" };
    }

    const id = matches[0].id;
    this.logger.info(`Found ${definition.label} '${name}', ID: ${id}`);
    return { status: "found", id };
  }

  /**
   * Resolve a name that must already exist
   *
   * @throws NotFoundError when no resource carries the name
   */
  async resolveExisting(resourceType: ResourceTypeKey, name: string): Promise<string> {
    const resolution = await this.resolve(resourceType, name);
    if (resolution.status === "not_found") {
      throw new NotFoundError(getResourceType(resourceType).label, name);
    }
    return resolution.id;
  }

  /**
   * Accept either an ID or a name: try the ID first, fall back to a name lookup
   */
  async resolveIdOrName(resourceType: ResourceTypeKey, idOrName: string): Promise<string> {
    const definition = getResourceType(resourceType);
    const result = await this.httpClient.get(`/${definition.path}/${encodeURIComponent(idOrName)}`, definition.query);
    const classification = classifyResult(result);

    if (classification.ok) {
      const parsed = NamedResourceSchema.safeParse(classification.body);
      if (parsed.success && parsed.data.id === idOrName) {
        this.logger.info(`${definition.label} with ID '${idOrName}' found.`);
        return parsed.data.id;
      }
    }

    return this.resolveExisting(resourceType, idOrName);
  }

  /**
   * All case-insensitive exact matches, using the lookup strategy of the resource type
   */
  async findMatches(resourceType: ResourceTypeKey, name: string): Promise<NamedResource[]> {
    const definition = getResourceType(resourceType);
    const candidates =
      definition.lookup === "server-filter"
        ? await this.fetchServerFiltered(definition, name)
        : await this.fetchCollection(definition);

    return selectExactMatches(candidates, name, definition.nameField);
  }

  private async fetchServerFiltered(definition: ResourceTypeDefinition, name: string): Promise<NamedResource[]> {
    // Trailing slash matches the form the API documents for name search
    const result = await this.httpClient.get(`/${definition.path}/`, {
      ...definition.query,
      name,
    });
    const [items] = parseWith(NamedResourceListSchema, result);
    return items;
  }

  private async fetchCollection(definition: ResourceTypeDefinition): Promise<NamedResource[]> {
    const limit = definition.scanLimit ?? this.scanLimit;
    const result = await this.httpClient.get(`/${definition.path}`, {
      ...definition.query,
      limit,
    });
    const [items, meta] = parseWith(NamedResourceListSchema, result);
    if (meta.count > items.length && items.length >= limit) {
      this.logger.warn(
        `${definition.label} collection holds ${meta.count} entries but only ${limit} were scanned`,
      );
    }
    return items;
  }
}
