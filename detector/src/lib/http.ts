import { ProbeCookie, ProbeResult } from "../types";
import { Logger, silentLogger } from "./logger";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface FetchRuntimeConfig {
  timeoutMs: number;
  userAgent: string;
  fetch?: FetchLike;
}

export interface RequestOptions {
  logger?: Logger;
  signal?: AbortSignal;
}

export interface FetchedPage {
  response: Response;
  body: string;
}

export class ProbeFailure extends Error {
  constructor(
    readonly url: string,
    readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`${url}: ${reason}`, options);
    this.name = "ProbeFailure";
  }
}

export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  // undici reports "fetch failed" and keeps the socket/DNS error on `cause`.
  const cause = error.cause;
  if (cause instanceof Error && cause.message && cause.message !== error.message) {
    return `${error.message} (${cause.message})`;
  }
  return error.message;
}

/**
 * Runs one GET-style request and reads its body, both bounded by `runtime.timeoutMs`.
 * An aborted `signal` cancels the request the same way the timeout does.
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  runtime: FetchRuntimeConfig,
  signal?: AbortSignal
): Promise<FetchedPage> {
  const controller = new AbortController();
  const timeout = setTimeout(
    () => controller.abort(new Error(`request timed out after ${runtime.timeoutMs}ms`)),
    runtime.timeoutMs
  );
  const forwardAbort = (): void => controller.abort(signal?.reason);
  if (signal?.aborted) {
    forwardAbort();
  } else {
    signal?.addEventListener("abort", forwardAbort, { once: true });
  }

  const headers = new Headers(init.headers);
  if (!headers.has("user-agent")) {
    headers.set("user-agent", runtime.userAgent);
  }

  const doFetch = runtime.fetch ?? fetch;
  try {
    const response = await doFetch(url, {
      ...init,
      headers,
      redirect: "follow",
      signal: controller.signal
    });
    const body = await response.text();
    return { response, body };
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", forwardAbort);
  }
}

export function parseSetCookie(lines: string[]): ProbeCookie[] {
  const cookies: ProbeCookie[] = [];
  for (const line of lines) {
    const pair = line.split(";", 1)[0] ?? "";
    const idx = pair.indexOf("=");
    if (idx === -1) {
      continue;
    }
    const name = pair.slice(0, idx).trim();
    if (!name) {
      continue;
    }
    cookies.push({ name, value: pair.slice(idx + 1).trim() });
  }
  return cookies;
}

export async function probeUrl(
  url: string,
  runtime: FetchRuntimeConfig,
  options: RequestOptions = {}
): Promise<ProbeResult> {
  const logger = options.logger ?? silentLogger;
  logger.info("probe_request", { url });

  let page: FetchedPage;
  try {
    page = await fetchWithTimeout(url, { method: "GET" }, runtime, options.signal);
  } catch (error) {
    const reason = describeError(error);
    logger.warn("probe_failed", { url, reason });
    throw new ProbeFailure(url, reason, { cause: error });
  }

  const { response, body } = page;
  // Responses built in memory have no URL; treat them as unredirected.
  const finalUrl = response.url || url;
  logger.info("probe_response", { url, status: response.status, final_url: finalUrl });

  return {
    requestedUrl: url,
    finalUrl,
    status: response.status,
    headers: response.headers,
    cookies: parseSetCookie(response.headers.getSetCookie()),
    body
  };
}
