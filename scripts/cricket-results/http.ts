import { setTimeout as delay } from "node:timers/promises";

import { errorMessage } from "../../lib/cricket/errors";
import type { RunContext } from "./types";
import { appendRunLog } from "./storage";

const MAX_RETRIES = 3;
const USER_AGENT = "Mozilla/5.0 (compatible; CricketResultsCollector/1.0)";

export type SourceErrorCode = "fetch_failed" | `http_error_${number}` | "bad_envelope";

export class SourceError extends Error {
  code: SourceErrorCode;
  url: string;

  constructor(code: SourceErrorCode, message: string, url: string) {
    super(message);
    this.name = "SourceError";
    this.code = code;
    this.url = url;
  }
}

export type FetchOptions = {
  accept?: string;
  retryDelayMs?: number;
};

/** Logs the URL with any credential query parameters masked. */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    for (const key of ["apikey", "api_token"]) {
      if (parsed.searchParams.has(key)) parsed.searchParams.set(key, "***");
    }
    return parsed.toString();
  } catch {
    return url;
  }
}

export async function fetchText(url: string, ctx: RunContext, options: FetchOptions = {}): Promise<string> {
  const retryDelayMs = options.retryDelayMs ?? 1000;
  const shownUrl = redactUrl(url);
  let attempt = 0;
  let lastError: unknown;

  while (attempt < MAX_RETRIES) {
    try {
      attempt += 1;
      appendRunLog(ctx, `Fetching ${shownUrl} (attempt ${attempt})`);
      const response = await fetch(url, {
        headers: {
          "User-Agent": USER_AGENT,
          Accept: options.accept ?? "application/json",
        },
      });

      if (!response.ok) {
        throw new SourceError(
          `http_error_${response.status}`,
          `HTTP ${response.status} ${response.statusText}`,
          shownUrl
        );
      }

      return await response.text();
    } catch (error) {
      lastError = error;
      appendRunLog(ctx, `Fetch failed for ${shownUrl}: ${errorMessage(error)}`);
      if (attempt < MAX_RETRIES && retryDelayMs > 0) {
        await delay(retryDelayMs * attempt);
      }
    }
  }

  throw lastError instanceof Error
    ? lastError
    : new SourceError("fetch_failed", `Failed to fetch ${shownUrl}`, shownUrl);
}

export async function fetchJson(url: string, ctx: RunContext, options: FetchOptions = {}): Promise<unknown> {
  const text = await fetchText(url, ctx, options);
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new SourceError("bad_envelope", `Invalid JSON from ${redactUrl(url)}: ${errorMessage(error)}`, redactUrl(url));
  }
}

export function fetchHtml(url: string, ctx: RunContext, options: FetchOptions = {}): Promise<string> {
  return fetchText(url, ctx, { ...options, accept: "text/html,application/xhtml+xml" });
}
