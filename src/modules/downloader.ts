/**
 * Downloader Module
 * Drives catalog resolution, unit scraping, image materialization and writing
 * for learning paths, modules and courses
 */

import { rm } from "fs/promises";
import { join } from "node:path";
import type {
  CatalogEntity,
  DownloadContext,
  ModuleContent,
  ProgressListener,
} from "../types";
import { createTurndownService } from "../turndown";
import { describeError } from "../http/http-client";
import type { JobStore } from "../utils/job-store";
import { ModuleScraper } from "./scraper";
import { extractLearningPathUids } from "./extractor";
import {
  IMAGES_SUBDIR,
  ImageMaterializer,
  rewriteHtmlReferences,
  rewriteMarkdownReferences,
} from "./images";
import { documentName, writeDocuments } from "./writer";

// ============================================================================
// Types
// ============================================================================

export type DownloadTarget =
  | { kind: "path"; uid: string }
  | { kind: "path-url"; url: string }
  | { kind: "module"; uid: string }
  | { kind: "course"; uid: string }
  | { kind: "course-url"; url: string };

export type DownloadErrorReason = "not-found" | "empty";

/**
 * A top-level download that cannot produce an artifact
 */
export class DownloadError extends Error {
  constructor(
    readonly reason: DownloadErrorReason,
    message: string,
  ) {
    super(message);
    this.name = "DownloadError";
  }
}

export interface DownloadResult {
  title: string;
  outputDir: string;
  files: string[];
  modules: number;
  units: number;
}

export type BatchItemResult =
  | { target: DownloadTarget; ok: true; result: DownloadResult }
  | { target: DownloadTarget; ok: false; error: string };

export interface BatchResult {
  requested: number;
  succeeded: number;
  items: BatchItemResult[];
}

export function describeTarget(target: DownloadTarget): string {
  switch (target.kind) {
    case "path":
    case "module":
    case "course":
      return `${target.kind} ${target.uid}`;
    case "path-url":
    case "course-url":
      return target.url;
  }
}

/**
 * Classify a learning-path URL; course pages are downloaded as courses
 */
export function targetFromUrl(url: string): DownloadTarget {
  return url.includes("/courses/")
    ? { kind: "course-url", url }
    : { kind: "path-url", url };
}

// ============================================================================
// Downloader
// ============================================================================

export class Downloader {
  constructor(private readonly ctx: DownloadContext) {}

  /**
   * Download one target. Failures are tracked and rethrown.
   */
  async download(
    target: DownloadTarget,
    outputDir: string = this.ctx.config.storage.outputDir,
    onProgress?: ProgressListener,
  ): Promise<DownloadResult> {
    const { tracker, logger } = this.ctx;
    const label = describeTarget(target);
    tracker.addRequestedItems(1);

    try {
      const result = await this.run(target, outputDir, onProgress);
      tracker.incrementDownloadedItems();
      logger.info(
        `Downloaded ${result.title}: ${result.modules} modules, ${result.units} units`,
      );
      return result;
    } catch (error) {
      const reason = error instanceof DownloadError ? error.reason : "error";
      tracker.trackItemFailure(label, reason, describeError(error));
      throw error;
    }
  }

  /**
   * Download several targets; one failing target does not stop the others.
   * Cancellation stops the whole batch.
   */
  async downloadBatch(
    targets: readonly DownloadTarget[],
    outputDir: string = this.ctx.config.storage.outputDir,
    jobs?: JobStore,
  ): Promise<BatchResult> {
    const items: BatchItemResult[] = [];

    for (const [index, target] of targets.entries()) {
      const label = describeTarget(target);
      this.ctx.logger.info(`Processing ${index + 1}/${targets.length}: ${label}`);

      const job = jobs?.create(label);
      if (job) jobs?.start(job.id);

      try {
        const result = await this.download(
          target,
          outputDir,
          job ? (event) => jobs?.report(job.id, event) : undefined,
        );
        if (job) jobs?.complete(job.id);
        items.push({ target, ok: true, result });
      } catch (error) {
        const message = describeError(error);
        if (job) jobs?.fail(job.id, message);
        if (this.ctx.http.signal?.aborted) throw error;

        this.ctx.logger.error(`Failed to download ${label}: ${message}`, error);
        items.push({ target, ok: false, error: message });
      }
    }

    const succeeded = items.filter((item) => item.ok).length;
    this.ctx.logger.info(
      `Batch complete. ${succeeded}/${targets.length} items downloaded successfully.`,
    );
    return { requested: targets.length, succeeded, items };
  }

  private async run(
    target: DownloadTarget,
    outputDir: string,
    onProgress?: ProgressListener,
  ): Promise<DownloadResult> {
    const emit: ProgressListener = (event) => {
      this.ctx.onProgress?.(event);
      onProgress?.(event);
    };

    switch (target.kind) {
      case "path":
        return this.downloadLearningPath(
          await this.requireEntity(target.uid, "learningPaths"),
          outputDir,
          emit,
        );
      case "path-url": {
        const path = await this.ctx.catalog.resolveByUrl(target.url);
        if (!path) {
          throw new DownloadError(
            "not-found",
            `Learning path not found for URL: ${target.url}`,
          );
        }
        return this.downloadLearningPath(path, outputDir, emit);
      }
      case "module":
        return this.downloadModule(
          await this.requireEntity(target.uid, "modules"),
          outputDir,
          emit,
        );
      case "course": {
        const course = await this.requireEntity(target.uid, "courses");
        return this.downloadCourse(
          course.title || course.uid,
          course.children,
          join(outputDir, course.uid),
          emit,
        );
      }
      case "course-url": {
        this.ctx.logger.info(`Scraping course page: ${target.url}`);
        const html = await this.ctx.http.fetchPage(target.url);
        const uids = html ? extractLearningPathUids(html) : [];
        const slug = target.url.replace(/\/+$/, "").split("/").pop() || "course";
        return this.downloadCourse(slug, uids, join(outputDir, slug), emit);
      }
    }
  }

  private async requireEntity(
    uid: string,
    type: "learningPaths" | "modules" | "courses",
  ): Promise<CatalogEntity> {
    const entity = await this.ctx.catalog.resolveByUid(uid, type);
    if (!entity) {
      throw new DownloadError("not-found", `Not found in catalog: ${uid}`);
    }
    this.ctx.logger.info(`Found ${entity.title || uid}`);
    return entity;
  }

  /**
   * Download a learning path: modules -> units -> pages -> images -> documents
   */
  async downloadLearningPath(
    path: CatalogEntity,
    outputDir: string,
    emit: ProgressListener = () => {},
  ): Promise<DownloadResult> {
    const { catalog, logger, tracker } = this.ctx;
    logger.info(
      `Learning path: ${path.title} (${path.children.length} modules, ${path.durationInMinutes} minutes)`,
    );

    const modules = await catalog.fetchModules(path);
    if (modules.length === 0) {
      throw new DownloadError("empty", "No modules found for this learning path");
    }

    const unitsByModule = await catalog.fetchUnitsForModules(modules);
    const scraper = this.createScraper(emit);
    const contents: ModuleContent[] = [];

    for (const [index, module] of modules.entries()) {
      emit({
        stage: "catalog",
        current: index + 1,
        total: modules.length,
        item: module.title,
      });

      const units = unitsByModule.get(module.uid) ?? [];
      if (units.length === 0) {
        logger.warn(`No units found for module: ${module.uid}`);
        tracker.trackModuleFailure(module.uid, "no-units");
        continue;
      }

      const content = await scraper.scrapeModule(module, units);
      if (content.records.length === 0) {
        logger.warn(`No unit content could be downloaded for module: ${module.uid}`);
        tracker.trackModuleFailure(module.uid, "no-content");
        continue;
      }

      tracker.incrementModules();
      contents.push(content);
    }

    return this.finalize(path, contents, outputDir, emit);
  }

  /**
   * Download a single module
   */
  async downloadModule(
    module: CatalogEntity,
    outputDir: string,
    emit: ProgressListener = () => {},
  ): Promise<DownloadResult> {
    const unitsByModule = await this.ctx.catalog.fetchUnitsForModules([module]);
    const units = unitsByModule.get(module.uid) ?? [];
    if (units.length === 0) {
      throw new DownloadError("empty", "No units found for this module");
    }

    const content = await this.createScraper(emit).scrapeModule(module, units);
    if (content.records.length > 0) {
      this.ctx.tracker.incrementModules();
    }

    return this.finalize(
      module,
      content.records.length > 0 ? [content] : [],
      outputDir,
      emit,
    );
  }

  /**
   * Download each learning path of a course into the course directory
   */
  async downloadCourse(
    title: string,
    pathUids: readonly string[],
    courseDir: string,
    emit: ProgressListener = () => {},
  ): Promise<DownloadResult> {
    const { catalog, logger } = this.ctx;
    if (pathUids.length === 0) {
      throw new DownloadError("empty", "No learning paths found in this course");
    }

    logger.info(`Found ${pathUids.length} learning paths in course`);

    const result: DownloadResult = {
      title,
      outputDir: courseDir,
      files: [],
      modules: 0,
      units: 0,
    };
    let succeeded = 0;

    for (const [index, uid] of pathUids.entries()) {
      logger.info(`Processing learning path ${index + 1}/${pathUids.length}: ${uid}`);

      try {
        const path = await catalog.resolveByUid(uid, "learningPaths");
        if (!path) {
          logger.warn(`Learning path not found: ${uid}`);
          continue;
        }

        const pathResult = await this.downloadLearningPath(path, courseDir, emit);
        result.files.push(...pathResult.files);
        result.modules += pathResult.modules;
        result.units += pathResult.units;
        succeeded++;
      } catch (error) {
        if (this.ctx.http.signal?.aborted) throw error;
        logger.error(`Failed to download ${uid}: ${describeError(error)}`, error);
      }
    }

    logger.info(
      `Course download complete. ${succeeded}/${pathUids.length} learning paths downloaded successfully.`,
    );
    if (succeeded === 0) {
      throw new DownloadError("empty", "No learning path of this course could be downloaded");
    }
    return result;
  }

  private createScraper(emit: ProgressListener): ModuleScraper {
    const turndown = createTurndownService(this.ctx.config.markdown);
    return new ModuleScraper({ ...this.ctx, onProgress: emit }, turndown);
  }

  /**
   * Download images, rewrite references and write the documents
   */
  private async finalize(
    root: CatalogEntity,
    contents: ModuleContent[],
    outputDir: string,
    emit: ProgressListener,
  ): Promise<DownloadResult> {
    const { config, http, logger, tracker } = this.ctx;

    const units = contents.reduce((sum, c) => sum + c.records.length, 0);
    if (units === 0) {
      throw new DownloadError("empty", `No unit content could be downloaded for ${root.uid}`);
    }

    let modules = contents;
    const images = contents.flatMap((content) => content.images);

    if (config.download.images && images.length > 0) {
      emit({ stage: "images", current: 0, total: images.length });

      const materializer = new ImageMaterializer(http, logger, {
        concurrency: config.download.maxConcurrentDownloads,
        tracker,
      });
      const mapping = await materializer.materialize(images, outputDir);

      modules = contents.map((content) => ({
        ...content,
        records: content.records.map((record) => ({
          ...record,
          html: rewriteHtmlReferences(record.html, mapping, IMAGES_SUBDIR),
          markdown: rewriteMarkdownReferences(record.markdown, mapping, IMAGES_SUBDIR),
        })),
      }));

      emit({ stage: "images", current: mapping.size, total: images.length });
    }

    emit({ stage: "write", current: 0, total: 1, item: documentName(root) });
    const files = await writeDocuments(root, modules, outputDir, {
      formats: this.ctx.formats,
      markdown: config.markdown,
    });
    for (const file of files) {
      tracker.addWrittenFile(file);
    }

    if (config.cleanup.deleteImages) {
      logger.debug("Cleaning up images folder...");
      await rm(join(outputDir, IMAGES_SUBDIR), { recursive: true, force: true });
    }

    emit({ stage: "write", current: 1, total: 1, item: documentName(root) });

    return {
      title: root.title || root.uid,
      outputDir,
      files,
      modules: modules.length,
      units,
    };
  }
}
