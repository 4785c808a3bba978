/**
 * HTTP error raised once a request has exhausted its retries
 */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
    statusText = "",
  ) {
    super(`HTTP ${status}${statusText ? `: ${statusText}` : ""} (${url})`);
    this.name = "HttpError";
  }

  get isRateLimited(): boolean {
    return this.status === 429;
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}
