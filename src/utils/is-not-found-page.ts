/**
 * Phrases shown on the catalog site's "page not found" document.
 * These pages are often served with status 200.
 */
export const NOT_FOUND_MARKERS = [
  "404 - Page not found",
  "We couldn't find this page",
];

/**
 * Check whether fetched markup is a not-found page
 */
export function isNotFoundPage(html: string): boolean {
  const body = html.toLowerCase();
  return NOT_FOUND_MARKERS.some((marker) => body.includes(marker.toLowerCase()));
}
