/**
 * Scraper Module
 * Turns a module and its units into content records
 */

import type TurndownService from "turndown";
import type {
  CatalogEntity,
  ContentRecord,
  DownloadContext,
  ModuleContent,
} from "../types";
import { htmlToMarkdown } from "../turndown";
import { UnitResolver, parseUnitLinks } from "./resolver";
import { extractMainContent, extractImages } from "./extractor";

export class ModuleScraper {
  private readonly resolver: UnitResolver;

  constructor(
    private readonly ctx: DownloadContext,
    private readonly turndown: TurndownService,
  ) {
    this.resolver = new UnitResolver(ctx.http, ctx.logger);
  }

  /**
   * Scrape every unit of a module, in unit order.
   * Units that cannot be resolved or have no content are left out.
   */
  async scrapeModule(
    module: CatalogEntity,
    units: readonly CatalogEntity[],
  ): Promise<ModuleContent> {
    const { logger, tracker } = this.ctx;
    logger.info(`Scraping module: ${module.title}`);

    const unitLinks = await this.fetchUnitLinks(module);
    const content: ModuleContent = { module, records: [], images: [] };

    for (const [index, unit] of units.entries()) {
      const ordinal = index + 1;
      logger.debug(`Unit ${ordinal}/${units.length}: ${unit.title}`);
      this.ctx.onProgress?.({
        stage: "units",
        current: ordinal,
        total: units.length,
        item: unit.title,
      });

      const resolved = await this.resolver.resolve(
        module,
        unit,
        ordinal,
        unitLinks.get(unit.uid),
      );
      if (!resolved) {
        tracker.trackUnitFailure(unit.uid, "unresolved");
        continue;
      }

      const record = this.buildRecord(unit, resolved.url, resolved.html);
      if (!record) {
        logger.warn(`Could not find main content for unit: ${resolved.url}`);
        tracker.trackUnitFailure(resolved.url, "no-content");
        continue;
      }

      tracker.incrementResolvedUnits();
      content.records.push(record);
      content.images.push(...record.images);
    }

    return content;
  }

  /**
   * Extract a content record from a unit page
   */
  buildRecord(
    unit: CatalogEntity,
    url: string,
    html: string,
  ): ContentRecord | null {
    const main = extractMainContent(html);
    if (!main) return null;

    const { $, region } = main;
    const images = extractImages($, region, url);
    const fragment = $.html(region);
    const text = region.text();

    this.ctx.logger.debug(
      `Extracted HTML chars: ${fragment.length}, text chars: ${text.length}`,
    );

    return {
      unit,
      url,
      html: fragment,
      markdown: htmlToMarkdown(this.turndown, fragment),
      text,
      images,
    };
  }

  private async fetchUnitLinks(
    module: CatalogEntity,
  ): Promise<Map<string, string>> {
    if (!module.url) return new Map();

    const html = await this.ctx.http.fetchPage(module.url, { silent: true });
    return html ? parseUnitLinks(html, module.url) : new Map();
  }
}
