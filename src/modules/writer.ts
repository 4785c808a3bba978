/**
 * Writer Module
 * Renders downloaded content into standalone HTML and Markdown documents.
 * Works purely from the records it is given; no network access.
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "node:path";
import type {
  CatalogEntity,
  MarkdownConfig,
  ModuleContent,
  OutputFormat,
} from "../types";
import {
  compileHtmlTemplate,
  compileMarkdownTemplate,
  type DocumentTemplateContext,
} from "../templates";
import { slugify } from "../utils/slugify";

const EXTENSIONS: Record<OutputFormat, string> = {
  html: ".html",
  markdown: ".md",
};

/**
 * Hands out unique anchors, suffixing repeats with -2, -3, ...
 */
class AnchorRegistry {
  private counts = new Map<string, number>();

  next(title: string, fallback: string): string {
    const base = slugify(title) || slugify(fallback) || "section";
    const count = (this.counts.get(base) ?? 0) + 1;
    this.counts.set(base, count);
    return count === 1 ? base : `${base}-${count}`;
  }
}

/**
 * Output file name (without extension) for an entity
 */
export function documentName(entity: CatalogEntity): string {
  return slugify(entity.title) || slugify(entity.uid) || "download";
}

export function buildTemplateContext(
  root: CatalogEntity,
  modules: readonly ModuleContent[],
  date: Date = new Date(),
): DocumentTemplateContext {
  const anchors = new AnchorRegistry();

  return {
    title: root.title || root.uid,
    summary: root.summary,
    url: root.url,
    date: date.toISOString().split("T")[0],
    modules: modules.map(({ module, records }) => ({
      title: module.title || module.uid,
      summary: module.summary,
      url: module.url,
      anchor: anchors.next(module.title, module.uid),
      units: records.map((record) => ({
        title: record.unit.title || record.unit.uid,
        url: record.url,
        anchor: anchors.next(record.unit.title, record.unit.uid),
        html: record.html,
        markdown: record.markdown,
      })),
    })),
  };
}

export interface WriteOptions {
  formats: readonly OutputFormat[];
  markdown: MarkdownConfig;
}

/**
 * Write one document per requested format; returns the written paths
 */
export async function writeDocuments(
  root: CatalogEntity,
  modules: readonly ModuleContent[],
  outputDir: string,
  options: WriteOptions,
): Promise<string[]> {
  const context = buildTemplateContext(root, modules);
  const name = documentName(root);
  const written: string[] = [];

  await mkdir(outputDir, { recursive: true });

  for (const format of new Set(options.formats)) {
    const template =
      format === "html"
        ? compileHtmlTemplate()
        : compileMarkdownTemplate(options.markdown);

    const outputPath = join(outputDir, `${name}${EXTENSIONS[format]}`);
    await writeFile(outputPath, template(context), "utf-8");
    written.push(outputPath);
  }

  return written;
}
