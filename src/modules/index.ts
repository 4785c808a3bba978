/**
 * Pipeline modules export
 */

export { UnitResolver } from "./resolver";
export { ModuleScraper } from "./scraper";
export { ImageMaterializer } from "./images";
export { writeDocuments } from "./writer";
export { Downloader, DownloadError, targetFromUrl } from "./downloader";
export type { DownloadTarget, DownloadResult, BatchResult } from "./downloader";
export { stats } from "./stats";
