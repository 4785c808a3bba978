/**
 * HTTP Client
 * Shared retrying transport for catalog requests, page fetches and image downloads
 */

import { setTimeout as wait } from "node:timers/promises";
import { HttpError, isAbortError } from "./errors";
import type { Logger } from "../utils/logger";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface HttpClientOptions {
  timeout: number;
  retryAttempts: number;
  retryDelay: number;
  userAgent: string;
  logger: Logger;
  signal?: AbortSignal;
  fetch?: FetchFn;
  sleep?: SleepFn;
}

interface RequestOptions {
  headers?: Record<string, string>;
  // Speculative requests log retries at debug level only
  silent?: boolean;
}

export interface FetchPageOptions {
  silent?: boolean;
}

export class HttpClient {
  private readonly fetchFn: FetchFn;
  private readonly sleep: SleepFn;

  constructor(private readonly options: HttpClientOptions) {
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep =
      options.sleep ?? ((ms, signal) => wait(ms, undefined, { signal }));
  }

  get signal(): AbortSignal | undefined {
    return this.options.signal;
  }

  /**
   * Perform a GET with retry and exponential backoff.
   * Returns null on 404 without consuming further attempts.
   * Throws the last error once every attempt has failed.
   */
  async request<T>(
    url: string,
    read: (response: Response) => Promise<T>,
    options: RequestOptions = {},
  ): Promise<T | null> {
    const { retryAttempts, retryDelay, logger } = this.options;
    const log = (message: string) =>
      options.silent ? logger.debug(message) : logger.warn(message);

    for (let attempt = 0; ; attempt++) {
      this.options.signal?.throwIfAborted();

      try {
        const response = await this.fetchWithTimeout(url, options.headers);
        if (response.status === 404) {
          return null;
        }
        if (!response.ok) {
          throw new HttpError(response.status, url, response.statusText);
        }
        return await read(response);
      } catch (error) {
        if (this.options.signal?.aborted || attempt >= retryAttempts - 1) {
          throw error;
        }

        // Exponential backoff, doubled again when rate limited
        let delay = retryDelay * Math.pow(2, attempt);
        if (error instanceof HttpError && error.isRateLimited) {
          delay *= 2;
          log(`Rate limited (429). Waiting ${delay}ms...`);
        } else {
          log(
            `Retry ${attempt + 1}/${retryAttempts} for ${url} (waiting ${delay}ms)`,
          );
        }

        await this.sleep(delay, this.options.signal);
      }
    }
  }

  /**
   * Fetch and parse a JSON document. A 404 is an error here.
   */
  async getJson(url: string): Promise<unknown> {
    const body = await this.request(url, (response) => response.json(), {
      headers: { Accept: "application/json" },
    });
    if (body === null) {
      throw new HttpError(404, url, "Not Found");
    }
    return body;
  }

  /**
   * Fetch page markup. Returns an empty string on 404.
   * Silent mode also returns an empty string when retries run out;
   * otherwise the failure propagates.
   */
  async fetchPage(url: string, options: FetchPageOptions = {}): Promise<string> {
    const { logger } = this.options;
    const silent = options.silent ?? false;

    try {
      const html = await this.request(url, (response) => response.text(), {
        headers: { Accept: "text/html,application/xhtml+xml" },
        silent,
      });
      if (html === null) {
        if (!silent) logger.warn(`Failed to fetch ${url}: 404 Not Found`);
        return "";
      }
      return html;
    } catch (error) {
      if (!silent || this.options.signal?.aborted) {
        throw error;
      }
      logger.debug(`Failed to fetch ${url}: ${describeError(error)}`);
      return "";
    }
  }

  /**
   * Download image bytes. Returns null when the image is unavailable.
   */
  async fetchImage(url: string, referer?: string): Promise<Buffer | null> {
    const headers: Record<string, string> = {
      Accept: "image/avif,image/webp,image/apng,image/*,*/*;q=0.8",
    };
    if (referer) {
      headers.Referer = referer;
    }

    try {
      const data = await this.request(
        url,
        async (response) => Buffer.from(await response.arrayBuffer()),
        { headers },
      );
      if (data === null) {
        this.options.logger.warn(`Image not found: ${url}`);
      }
      return data;
    } catch (error) {
      if (this.options.signal?.aborted) {
        throw error;
      }
      this.options.logger.warn(
        `Failed to download image ${url}: ${describeError(error)}`,
      );
      return null;
    }
  }

  private async fetchWithTimeout(
    url: string,
    headers: Record<string, string> = {},
  ): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeout);
    const onAbort = () => controller.abort();
    this.options.signal?.addEventListener("abort", onAbort);

    try {
      return await this.fetchFn(url, {
        headers: { "User-Agent": this.options.userAgent, ...headers },
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeoutId);
      this.options.signal?.removeEventListener("abort", onAbort);
    }
  }
}

export function describeError(error: unknown): string {
  if (isAbortError(error)) return "request timed out";
  return error instanceof Error ? error.message : String(error);
}
