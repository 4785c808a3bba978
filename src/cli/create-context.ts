/**
 * Builds the download context shared by CLI commands
 */

import { HttpClient } from "../http/http-client";
import { CatalogClient } from "../catalog/client";
import { Logger } from "../utils/logger";
import { Tracker } from "../utils/tracker";
import { loadConfig } from "../utils/load-config";
import type { Config, DownloadContext, OutputFormat } from "../types";

export interface ContextOptions {
  config?: string;
  verbose?: boolean;
  formats?: OutputFormat[];
  overrides?: (config: Config) => void;
  signal?: AbortSignal;
}

export async function createContext(
  options: ContextOptions,
): Promise<DownloadContext> {
  const { config, errors } = await loadConfig(options.config);
  options.overrides?.(config);

  const logger = new Logger(options.verbose ? "debug" : config.logging.level);
  const tracker = new Tracker();

  // Config files that failed to load are reported, defaults still apply
  for (const err of errors) {
    tracker.trackError(err.path, err.error, "resource");
    logger.warn(`Ignoring invalid config file: ${err.path}`);
  }

  const http = new HttpClient({
    timeout: config.api.timeout,
    retryAttempts: config.api.retryAttempts,
    retryDelay: config.api.retryDelay,
    userAgent: config.api.userAgent,
    logger,
    signal: options.signal,
  });

  return {
    config,
    logger,
    tracker,
    http,
    catalog: new CatalogClient(config.api, http, logger, tracker),
    formats: options.formats ?? ["html", "markdown"],
  };
}

/**
 * Parse a --format value ("html", "markdown", "md", "all" or a comma list)
 */
export function parseFormats(value: string): OutputFormat[] {
  const formats = new Set<OutputFormat>();

  for (const part of value.split(",").map((p) => p.trim().toLowerCase())) {
    if (part === "all") {
      formats.add("html").add("markdown");
    } else if (part === "html") {
      formats.add("html");
    } else if (part === "markdown" || part === "md") {
      formats.add("markdown");
    } else if (part) {
      throw new Error(`Unknown output format: ${part}`);
    }
  }

  if (formats.size === 0) {
    throw new Error("No output format given");
  }
  return [...formats];
}
