/**
 * Image URL <-> local file correlation
 *
 * Matching policy, in order:
 * 1. Substring match in either direction between the reference and a mapped URL
 *    (covers relative references such as "media/diagram.png")
 * 2. Basename equality against the name index (local filename or URL filename)
 */

import { posix } from "node:path";
import type { ImageMapping } from "../types";

export type ImageNameIndex = ReadonlyMap<string, string>;

function urlBasename(value: string): string {
  return posix.basename(value.split(/[?#]/)[0]);
}

/**
 * Precompute basename -> local path lookups for a mapping
 */
export function buildImageNameIndex(mapping: ImageMapping): ImageNameIndex {
  const index = new Map<string, string>();

  for (const [url, localPath] of mapping) {
    index.set(posix.basename(localPath.replace(/\\/g, "/")), localPath);

    const name = urlBasename(url);
    if (name) {
      index.set(name, localPath);
    }
  }

  return index;
}

/**
 * Find the local path for an image reference, or undefined on a miss
 */
export function findLocalImage(
  src: string,
  mapping: ImageMapping,
  nameIndex: ImageNameIndex = buildImageNameIndex(mapping),
): string | undefined {
  if (!src) return undefined;

  for (const [url, localPath] of mapping) {
    if (url.includes(src) || src.includes(url)) {
      return localPath;
    }
  }

  const name = urlBasename(src);
  return name ? nameIndex.get(name) : undefined;
}
