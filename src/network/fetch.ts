/**
 * Network fetch utilities with retry logic
 */

import { setTimeout as delay } from "node:timers/promises";
import type { FetchOptions } from "../config.js";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;
export type Sleep = (ms: number) => Promise<void>;

export type FetchResult =
  | { ok: true; status: number; body: Buffer }
  | { ok: false; error: Error };

/**
 * Anything that can turn a URL into document bytes
 */
export interface DocumentFetcher {
  fetch(url: string): Promise<FetchResult>;
}

export interface FetcherDeps {
  fetchImpl?: FetchLike;
  sleep?: Sleep;
}

export const defaultSleep: Sleep = async (ms) => {
  if (ms > 0) await delay(ms);
};

function buildRequestHeaders(userAgent: string): Record<string, string> {
  return {
    "User-Agent": userAgent,
    Accept: "application/xml,text/xml;q=0.9,text/html;q=0.8,*/*;q=0.7",
    "Accept-Language": "en-US,en;q=0.9",
    "Cache-Control": "no-cache",
    Pragma: "no-cache",
    Connection: "keep-alive",
  };
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * GET with a status-level retry inside each attempt and exponential
 * backoff between attempts. Never throws; exhaustion yields { ok: false }.
 */
export class Fetcher implements DocumentFetcher {
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleep;
  private readonly headers: Record<string, string>;

  constructor(
    private readonly options: FetchOptions,
    deps: FetcherDeps = {},
  ) {
    this.fetchImpl = deps.fetchImpl ?? ((url, init) => fetch(url, init));
    this.sleep = deps.sleep ?? defaultSleep;
    this.headers = buildRequestHeaders(options.userAgent);
  }

  async fetch(url: string): Promise<FetchResult> {
    const { maxAttempts, backoffMs } = this.options;
    let lastErr: unknown = new Error("No attempts made");

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        const res = await this.request(url);
        if (!res.ok) {
          throw new Error(`HTTP ${res.status}`);
        }
        const body = Buffer.from(await res.arrayBuffer());
        return { ok: true, status: res.status, body };
      } catch (err) {
        lastErr = err;
        const msg = err instanceof Error ? err.message : String(err);
        console.warn(`Attempt ${attempt + 1}/${maxAttempts} failed for ${url}: ${msg}`);
        if (attempt < maxAttempts - 1) await this.sleep(backoffMs * 2 ** attempt);
      }
    }
    return { ok: false, error: toError(lastErr) };
  }

  /**
   * One attempt: re-issues the GET while the status is retryable and the
   * status budget lasts, then hands back the last response.
   */
  private async request(url: string): Promise<Response> {
    const { timeoutMs, backoffMs, statusRetries, retryStatuses } = this.options;

    for (let retry = 0; ; retry++) {
      const res = await this.fetchImpl(url, {
        method: "GET",
        redirect: "follow",
        headers: this.headers,
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!retryStatuses.includes(res.status) || retry >= statusRetries) {
        return res;
      }
      await res.body?.cancel();
      await this.sleep(backoffMs * 2 ** retry);
    }
  }
}
