/**
 * Unit Resolver
 * Finds the content URL of a unit, which the catalog does not expose directly
 *
 * 1. A URL harvested from the module page's unit list, if it serves real content
 * 2. Otherwise, slug candidates under the module URL, tried in order
 */

import { load } from "cheerio";
import type { CatalogEntity } from "../types";
import type { HttpClient } from "../http/http-client";
import type { Logger } from "../utils/logger";
import { OrderedSet } from "../utils/ordered-set";
import { slugify } from "../utils/slugify";
import { isNotFoundPage } from "../utils/is-not-found-page";

// Product-family prefixes that unit UIDs carry but page slugs often drop
export const SLUG_PREFIXES = [
  "flow",
  "power-apps",
  "canvas-apps",
  "model-driven-apps",
];

const PREFIX_PATTERN = new RegExp(`^(${SLUG_PREFIXES.join("|")})-`);

export interface ResolvedUnit {
  url: string;
  html: string;
}

/**
 * Strip a known product prefix (e.g. "flow-introduction" -> "introduction")
 */
export function cleanSlug(slug: string): string {
  return slug.replace(PREFIX_PATTERN, "");
}

/**
 * Trailing UID segment of a unit ("learn.module.introduction" -> "introduction").
 * Null when the UID has fewer than three segments.
 */
export function unitSlug(uid: string): string | null {
  const parts = uid.split(".");
  return parts.length < 3 ? null : parts[parts.length - 1];
}

/**
 * Module URL without query string or trailing slash
 */
export function moduleBaseUrl(url: string): string {
  return url.split("?")[0].replace(/\/+$/, "");
}

/**
 * Ordered, de-duplicated path segments to try for a unit
 */
export function buildCandidates(
  unit: CatalogEntity,
  ordinal: number,
): string[] {
  const slug = unitSlug(unit.uid);
  if (!slug) return [];

  const titleSlug = slugify(unit.title);
  const cleaned = cleanSlug(slug);

  return new OrderedSet([
    `${ordinal}-${slug}`,
    titleSlug && `${ordinal}-${titleSlug}`,
    slug,
    titleSlug,
    `${ordinal}-${cleaned}`,
    cleaned,
    `${ordinal}-introduction`,
  ]).toArray();
}

/**
 * Harvest unit UID -> absolute unit URL from a module page
 */
export function parseUnitLinks(
  html: string,
  moduleUrl: string,
): Map<string, string> {
  const $ = load(html);
  const base = `${moduleBaseUrl(moduleUrl)}/`;
  const links = new Map<string, string>();

  $("li.module-unit").each((_index, element) => {
    const item = $(element);
    const uid = item.attr("data-unit-uid");
    const href = item.find("a.unit-title").first().attr("href");
    if (!uid || !href) return;

    try {
      links.set(uid, new URL(href, base).href);
    } catch {
      // Unusable href; the unit falls back to slug probing
    }
  });

  return links;
}

export class UnitResolver {
  constructor(
    private readonly http: HttpClient,
    private readonly logger: Logger,
  ) {}

  /**
   * Candidate URLs in the order they are tried
   */
  candidateUrls(
    module: CatalogEntity,
    unit: CatalogEntity,
    ordinal: number,
  ): string[] {
    const base = moduleBaseUrl(module.url);
    return buildCandidates(unit, ordinal).map((slug) => `${base}/${slug}`);
  }

  /**
   * Resolve a unit's URL and page markup, or null when nothing serves content
   */
  async resolve(
    module: CatalogEntity,
    unit: CatalogEntity,
    ordinal: number,
    knownUrl?: string,
  ): Promise<ResolvedUnit | null> {
    if (knownUrl) {
      const resolved = await this.tryCandidate(knownUrl);
      if (resolved) return resolved;
    }

    const candidates = this.candidateUrls(module, unit, ordinal);
    if (candidates.length === 0) {
      this.logger.warn(`Could not construct URL for unit: ${unit.uid}`);
      return null;
    }

    for (const url of candidates) {
      const resolved = await this.tryCandidate(url);
      if (resolved) return resolved;
    }

    this.logger.warn(
      `No valid page for unit: ${unit.uid} (tried ${candidates.length} candidates)`,
    );
    return null;
  }

  private async tryCandidate(url: string): Promise<ResolvedUnit | null> {
    const html = await this.http.fetchPage(url, { silent: true });
    if (!html || isNotFoundPage(html)) {
      this.logger.debug(`Not found: ${url}`);
      return null;
    }
    return { url, html };
  }
}
