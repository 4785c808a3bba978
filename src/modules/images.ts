/**
 * Image Materializer
 * Downloads the distinct image set once and points content at the local copies
 */

import { mkdir, stat, writeFile } from "fs/promises";
import { join, basename } from "node:path";
import { load } from "cheerio";
import type { CheerioAPI } from "cheerio";
import pLimit from "p-limit";
import type { ImageMapping, ImageRef } from "../types";
import type { HttpClient } from "../http/http-client";
import type { Logger } from "../utils/logger";
import type { Tracker } from "../utils/tracker";
import { imageFilename } from "../utils/image-filename";
import {
  buildImageNameIndex,
  findLocalImage,
  type ImageNameIndex,
} from "../utils/find-local-image";
import { imageSource, LAZY_SRC_ATTRIBUTES } from "./extractor";

export const IMAGES_SUBDIR = "images";

export interface ImageMaterializerOptions {
  concurrency: number;
  tracker?: Tracker;
}

export class ImageMaterializer {
  constructor(
    private readonly http: HttpClient,
    private readonly logger: Logger,
    private readonly options: ImageMaterializerOptions,
  ) {}

  /**
   * Download every distinct image into `<outputRoot>/images`.
   * Failed images are left out of the returned mapping.
   */
  async materialize(
    images: readonly ImageRef[],
    outputRoot: string,
  ): Promise<Map<string, string>> {
    const unique = new Map<string, ImageRef>();
    for (const image of images) {
      if (!unique.has(image.url)) unique.set(image.url, image);
    }

    const mapping = new Map<string, string>();
    if (unique.size === 0) {
      return mapping;
    }

    const imagesDir = join(outputRoot, IMAGES_SUBDIR);
    await mkdir(imagesDir, { recursive: true });

    this.logger.info(`Downloading ${unique.size} images...`);

    const limit = pLimit(this.options.concurrency);
    const refs = [...unique.values()];
    const paths = await Promise.all(
      refs.map((image) => limit(() => this.materializeOne(image, imagesDir))),
    );

    // Built after the pool completes, in first-seen order
    refs.forEach((image, index) => {
      const path = paths[index];
      if (path) mapping.set(image.url, path);
    });

    this.logger.info(`Downloaded ${mapping.size} images successfully`);
    return mapping;
  }

  private async materializeOne(
    image: ImageRef,
    imagesDir: string,
  ): Promise<string | null> {
    const { tracker } = this.options;
    const filepath = join(imagesDir, imageFilename(image.url));

    if (await isFile(filepath)) {
      tracker?.incrementImagesCached();
      return filepath;
    }

    try {
      const data = await this.http.fetchImage(image.url, image.referer);
      if (!data) {
        tracker?.trackImageFailure(image.url, "download-failed");
        return null;
      }

      await writeFile(filepath, data);
      tracker?.incrementImagesDownloaded();
      return filepath;
    } catch (error) {
      if (this.http.signal?.aborted) throw error;

      const details = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Error downloading ${image.url}: ${details}`);
      tracker?.trackImageFailure(image.url, "write-failed", details);
      return null;
    }
  }
}

async function isFile(path: string): Promise<boolean> {
  const info = await stat(path).catch(() => null);
  return info?.isFile() ?? false;
}

function localReference(localPath: string, imagesSubdir: string): string {
  const name = basename(localPath);
  return imagesSubdir ? `${imagesSubdir}/${name}` : name;
}

/**
 * Point every <img> in a parsed fragment at its local copy.
 * Returns the number of images rewritten.
 */
function rewriteImageElements(
  $: CheerioAPI,
  mapping: ImageMapping,
  nameIndex: ImageNameIndex,
  imagesSubdir: string,
): number {
  let rewritten = 0;

  $("img").each((_index, element) => {
    const localPath = findLocalImage(imageSource($, element), mapping, nameIndex);
    if (!localPath) return;

    const img = $(element);
    img.attr("src", localReference(localPath, imagesSubdir));
    for (const attribute of LAZY_SRC_ATTRIBUTES) {
      img.removeAttr(attribute);
    }
    rewritten++;
  });

  return rewritten;
}

/**
 * Point <img> elements at their local copies.
 * Unmatched images keep their remote source.
 */
export function rewriteHtmlReferences(
  html: string,
  mapping: ImageMapping,
  imagesSubdir: string = IMAGES_SUBDIR,
): string {
  if (!html || mapping.size === 0) return html;

  const $ = load(html, null, false);
  rewriteImageElements($, mapping, buildImageNameIndex(mapping), imagesSubdir);
  return $.html();
}

/**
 * Point Markdown image references (![alt](url)) at their local copies,
 * along with <img> tags inside HTML kept in the Markdown (tables)
 */
export function rewriteMarkdownReferences(
  markdown: string,
  mapping: ImageMapping,
  imagesSubdir: string = IMAGES_SUBDIR,
): string {
  if (!markdown || mapping.size === 0) return markdown;

  const nameIndex = buildImageNameIndex(mapping);

  return markdown
    .replace(/!\[([^\]]*)\]\(([^)]+)\)/g, (match, alt: string, url: string) => {
      const localPath = findLocalImage(url, mapping, nameIndex);
      return localPath
        ? `![${alt}](${localReference(localPath, imagesSubdir)})`
        : match;
    })
    .replace(/<img\b[^>]*>/gi, (tag) => {
      const $ = load(tag, null, false);
      return rewriteImageElements($, mapping, nameIndex, imagesSubdir) > 0
        ? $.html()
        : tag;
    });
}
