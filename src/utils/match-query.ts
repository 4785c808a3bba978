import type { CatalogEntity } from "../types";

function normalize(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]/g, "");
}

/**
 * Check if a catalog entity matches a search query
 *
 * 1. Case-insensitive substring of title, summary, UID or course number
 * 2. Same, with non-alphanumerics stripped from both sides ("PL200" matches "PL-200")
 */
export function matchesQuery(entity: CatalogEntity, query: string): boolean {
  const fields = [
    entity.title,
    entity.summary,
    entity.uid,
    entity.courseNumber,
  ].map((field) => field.toLowerCase());

  const needle = query.toLowerCase();
  if (fields.some((field) => field.includes(needle))) {
    return true;
  }

  const normalizedNeedle = normalize(needle);
  if (!normalizedNeedle) {
    return false;
  }
  return fields.some((field) => normalize(field).includes(normalizedNeedle));
}
