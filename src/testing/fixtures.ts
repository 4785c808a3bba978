/**
 * Shared test fixtures
 */

import type { CatalogEntity, Config } from "../types";
import type { FetchFn } from "../http/http-client";
import { HttpClient } from "../http/http-client";
import { CatalogClient } from "../catalog/client";
import { Logger } from "../utils/logger";
import { Tracker } from "../utils/tracker";
import type { DownloadContext } from "../types";

export const API_URL = "https://learn.example.com/api/catalog/";
export const SITE_URL = "https://learn.example.com";

export function testConfig(outputDir = "./downloads"): Config {
  return {
    api: {
      baseUrl: API_URL,
      locale: "en-us",
      userAgent: "test-agent",
      timeout: 1000,
      retryAttempts: 3,
      retryDelay: 0,
      unitBatchSize: 10,
    },
    download: { images: true, maxConcurrentDownloads: 2 },
    cleanup: { deleteImages: false },
    storage: { outputDir },
    markdown: {
      headingStyle: "atx",
      codeBlockStyle: "fenced",
      emphasis: "_",
      strong: "**",
      bulletMarker: "-",
      horizontalRule: "---",
      codeFence: "```",
    },
    logging: { level: "error" },
  };
}

export function testHttp(fetch: FetchFn, config = testConfig()): HttpClient {
  return new HttpClient({
    timeout: config.api.timeout,
    retryAttempts: config.api.retryAttempts,
    retryDelay: config.api.retryDelay,
    userAgent: config.api.userAgent,
    logger: new Logger("error"),
    fetch,
  });
}

export function testContext(fetch: FetchFn, outputDir: string): DownloadContext {
  const config = testConfig(outputDir);
  const logger = new Logger("error");
  const tracker = new Tracker();
  const http = testHttp(fetch, config);
  return {
    config,
    logger,
    tracker,
    http,
    catalog: new CatalogClient(config.api, http, logger, tracker),
    formats: ["html", "markdown"],
  };
}

export function entity(
  uid: string,
  overrides: Partial<CatalogEntity> = {},
): CatalogEntity {
  return {
    uid,
    type: "units",
    title: "",
    summary: "",
    url: "",
    durationInMinutes: 0,
    courseNumber: "",
    children: [],
    ...overrides,
  };
}

export function unitPage(title: string, body = ""): string {
  return `<!DOCTYPE html><html><head><title>${title}</title></head><body>
<header><nav>Site navigation</nav></header>
<main><div class="content"><h1>${title}</h1>${body}</div></main>
<footer>Footer</footer>
</body></html>`;
}

export const NOT_FOUND_PAGE = `<!DOCTYPE html><html><body><main>
<h1>404 - Page not found</h1><p>We couldn't find this page.</p>
</main></body></html>`;
