/**
 * Scraped content types
 */

import type { CatalogEntity } from "./catalog";

export interface ImageRef {
  url: string; // Absolute source URL (deduplication key)
  alt: string;
  width?: number;
  height?: number;
  originalSrc: string; // Reference as it appeared in markup (possibly relative)
  referer: string; // Page the image was found on
}

export interface ContentRecord {
  unit: CatalogEntity;
  url: string; // Resolved source URL
  html: string; // Cleaned main content markup
  markdown: string;
  text: string;
  images: ImageRef[];
}

export interface ModuleContent {
  module: CatalogEntity;
  records: ContentRecord[];
  images: ImageRef[];
}

/**
 * Absolute image URL -> local file path
 * Written once by the image materializer, read-only afterwards
 */
export type ImageMapping = ReadonlyMap<string, string>;
