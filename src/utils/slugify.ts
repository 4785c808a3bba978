/**
 * Create a URL-friendly slug from text
 *
 * @example
 * slugify("Introducing Power Automate") // "introducing-power-automate"
 * slugify("  What's new?  ") // "what-s-new"
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}
