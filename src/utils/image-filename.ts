import { createHash } from "node:crypto";
import { posix } from "node:path";

const DEFAULT_EXTENSION = ".png";
const MAX_EXTENSION_LENGTH = 5;

/**
 * Generate a deterministic local filename for an image URL
 *
 * The base name comes from the URL path, sanitized to [A-Za-z0-9_-],
 * followed by the first 8 hex characters of the URL's MD5 hash.
 *
 * @example
 * imageFilename("https://example.com/media/diagram.svg")
 * // "diagram_<hash>.svg"
 */
export function imageFilename(url: string): string {
  const pathname = safePathname(url);

  let extension = posix.extname(pathname);
  if (!extension || extension.length > MAX_EXTENSION_LENGTH) {
    extension = DEFAULT_EXTENSION;
  }

  const stem = posix.basename(pathname, posix.extname(pathname));
  const name = stem.replace(/[^A-Za-z0-9_-]/g, "");
  const hash = createHash("md5").update(url).digest("hex").slice(0, 8);

  return `${name || "image"}_${hash}${extension}`;
}

function safePathname(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url.split(/[?#]/)[0];
  }
}
