/**
 * Download context - flows through the entire pipeline
 * Each stage reads the collaborators it needs from here
 */

import type { Config } from "./config";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type { HttpClient } from "../http/http-client";
import type { CatalogClient } from "../catalog/client";

export type ProgressStage = "catalog" | "units" | "images" | "write";

export interface ProgressEvent {
  stage: ProgressStage;
  current: number;
  total: number;
  item?: string;
}

export type ProgressListener = (event: ProgressEvent) => void;

export type OutputFormat = "html" | "markdown";

export interface DownloadContext {
  config: Config;
  logger: Logger;
  tracker: Tracker;
  http: HttpClient;
  catalog: CatalogClient;
  formats: OutputFormat[];
  onProgress?: ProgressListener;
}
