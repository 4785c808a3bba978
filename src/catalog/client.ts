/**
 * Catalog Client
 * Fetches, searches and resolves learning paths, courses, modules and units
 */

import { CatalogResponseSchema } from "../types";
import type {
  ApiConfig,
  CatalogEntity,
  CatalogFilters,
  CatalogResponse,
  EntityType,
  RawCatalogItem,
} from "../types";
import type { HttpClient } from "../http/http-client";
import { describeError } from "../http/http-client";
import type { Logger } from "../utils/logger";
import type { Tracker } from "../utils/tracker";
import { matchesQuery } from "../utils/match-query";

const DEFAULT_SEARCH_TYPES: EntityType[] = ["learningPaths", "courses"];

/**
 * Normalize a raw API item into a CatalogEntity
 */
export function toCatalogEntity(
  raw: RawCatalogItem,
  type: EntityType,
): CatalogEntity {
  let children: string[] = [];
  if (type === "learningPaths") {
    children = raw.modules ?? [];
  } else if (type === "modules") {
    children = raw.units ?? [];
  } else if (type === "courses") {
    children = (raw.study_guide ?? [])
      .filter((item) => item.type === "learningPath")
      .map((item) => item.uid);
  }

  return {
    uid: raw.uid,
    type,
    title: raw.title ?? "",
    summary: raw.summary ?? "",
    url: raw.url ?? "",
    durationInMinutes: raw.duration_in_minutes ?? 0,
    courseNumber: raw.course_number ?? "",
    children: [...children],
  };
}

/**
 * Re-order entities to follow a UID sequence; UIDs without an entity are dropped
 */
export function orderByUids(
  entities: readonly CatalogEntity[],
  uids: readonly string[],
): CatalogEntity[] {
  const byUid = new Map(entities.map((entity) => [entity.uid, entity]));
  return uids.flatMap((uid) => {
    const entity = byUid.get(uid);
    return entity ? [entity] : [];
  });
}

export class CatalogClient {
  constructor(
    private readonly config: ApiConfig,
    private readonly http: HttpClient,
    private readonly logger: Logger,
    private readonly tracker?: Tracker,
  ) {}

  /**
   * Issue one catalog request. Throws once retries are exhausted.
   */
  async fetchCatalog(filters: CatalogFilters = {}): Promise<CatalogResponse> {
    const url = new URL(this.config.baseUrl);
    url.searchParams.set("locale", filters.locale ?? this.config.locale);
    if (filters.type) {
      url.searchParams.set("type", filters.type);
    }
    if (filters.uid !== undefined) {
      const uids = typeof filters.uid === "string" ? [filters.uid] : filters.uid;
      url.searchParams.set("uid", uids.join(","));
    }

    const body = await this.http.getJson(url.toString());
    return CatalogResponseSchema.parse(body);
  }

  /**
   * Fetch entities of one type, optionally restricted to some UIDs
   */
  async fetchEntities(
    type: EntityType,
    uids?: readonly string[],
  ): Promise<CatalogEntity[]> {
    const data = await this.fetchCatalog({ type, uid: uids });
    return (data[type] ?? []).map((raw) => toCatalogEntity(raw, type));
  }

  /**
   * Search whole entity collections in-process, in catalog order
   */
  async searchCatalog(
    query: string,
    types: readonly EntityType[] = DEFAULT_SEARCH_TYPES,
  ): Promise<CatalogEntity[]> {
    this.logger.info(
      `Searching catalog for '${query}' (types: ${types.join(", ")})...`,
    );

    const items: CatalogEntity[] = [];
    for (const type of types) {
      items.push(...(await this.fetchEntities(type)));
    }

    return items.filter((item) => matchesQuery(item, query));
  }

  /**
   * Resolve an entity by exact UID. Returns null when the catalog has no such entity.
   */
  async resolveByUid(
    uid: string,
    type: EntityType = "learningPaths",
  ): Promise<CatalogEntity | null> {
    this.logger.debug(`Fetching ${type}: ${uid}`);
    const [entity] = await this.fetchEntities(type, [uid]);
    return entity?.uid === uid ? entity : null;
  }

  /**
   * Resolve a learning path from its page URL (…/paths/<slug>/)
   */
  async resolveByUrl(url: string): Promise<CatalogEntity | null> {
    const uid = pathUidFromUrl(url);
    if (!uid) {
      this.logger.warn(`Could not extract learning path UID from URL: ${url}`);
      return null;
    }
    return this.resolveByUid(uid, "learningPaths");
  }

  /**
   * Fetch a learning path's modules in one call, in path order
   */
  async fetchModules(path: CatalogEntity): Promise<CatalogEntity[]> {
    if (path.children.length === 0) {
      return [];
    }

    this.logger.info(`Fetching ${path.children.length} modules...`);
    const modules = await this.fetchEntities("modules", path.children);
    return orderByUids(modules, path.children);
  }

  /**
   * Fetch the units of several modules in batches, grouped per module in module order.
   * A failed batch is logged and skipped.
   */
  async fetchUnitsForModules(
    modules: readonly CatalogEntity[],
  ): Promise<Map<string, CatalogEntity[]>> {
    const result = new Map<string, CatalogEntity[]>();
    const allUnitUids = modules.flatMap((module) => module.children);
    if (allUnitUids.length === 0) {
      return result;
    }

    this.logger.info(`Fetching ${allUnitUids.length} units...`);

    // Batched to stay under the API's URL length limit
    const batchSize = this.config.unitBatchSize;
    const units: CatalogEntity[] = [];
    for (let i = 0; i < allUnitUids.length; i += batchSize) {
      const batch = allUnitUids.slice(i, i + batchSize);
      try {
        units.push(...(await this.fetchEntities("units", batch)));
      } catch (error) {
        if (this.http.signal?.aborted) throw error;
        this.logger.warn(
          `Failed to fetch batch of units: ${describeError(error)}`,
        );
        this.tracker?.trackError(batch.join(","), error, "catalog");
      }
    }

    for (const module of modules) {
      result.set(module.uid, orderByUids(units, module.children));
    }
    return result;
  }
}

/**
 * Build the conventional learning path UID ("learn.<slug>") from a page URL
 */
export function pathUidFromUrl(url: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url;
  }

  const parts = pathname.split("/").filter((part) => part.length > 0);
  const index = parts.indexOf("paths");
  if (index === -1 || index + 1 >= parts.length) {
    return null;
  }
  return `learn.${parts[index + 1]}`;
}
