import { FatalError, HttpError } from "../errors.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpOptions {
  fetchImpl: FetchLike;
  timeoutMs: number;
  signal?: AbortSignal;
  /** Non-2xx statuses the caller handles itself (e.g. 304). */
  allowStatuses?: number[];
}

export function parseUrl(url: string): URL {
  try {
    return new URL(url);
  } catch (err) {
    throw new FatalError("MALFORMED_URL", `Malformed URL: ${url}`, { cause: err });
  }
}

/**
 * Abort when either the caller's signal or the per-call timer fires. The
 * timer's reason is a TimeoutError, which classifies as transient.
 */
function linkSignals(timeoutMs: number, outer?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const timer = AbortSignal.timeout(timeoutMs);
  const sources = outer ? [outer, timer] : [timer];
  const listeners: Array<() => void> = [];
  for (const source of sources) {
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const onAbort = () => controller.abort(source.reason);
    source.addEventListener("abort", onAbort, { once: true });
    listeners.push(() => source.removeEventListener("abort", onAbort));
  }
  return {
    signal: controller.signal,
    dispose: () => listeners.forEach((remove) => remove())
  };
}

/**
 * Issue one request with a timeout. The returned dispose must be called once
 * the body has been consumed; until then the timer still guards the stream.
 */
export async function httpRequest(
  url: string,
  init: RequestInit,
  options: HttpOptions
): Promise<{ response: Response; dispose: () => void }> {
  parseUrl(url);
  const { signal, dispose } = linkSignals(options.timeoutMs, options.signal);
  let response: Response;
  try {
    response = await options.fetchImpl(url, { ...init, signal });
  } catch (err) {
    dispose();
    throw err;
  }
  if (!response.ok && !(options.allowStatuses ?? []).includes(response.status)) {
    const detail = await readErrorBody(response);
    dispose();
    throw new HttpError(response.status, url, `${init.method ?? "GET"} ${url} failed with HTTP ${response.status}${detail ? `: ${detail}` : ""}`);
  }
  return { response, dispose };
}

export async function httpJson(url: string, init: RequestInit, options: HttpOptions): Promise<unknown> {
  const { response, dispose } = await httpRequest(url, init, options);
  try {
    if (response.status === 204) {
      return null;
    }
    const text = await response.text();
    return text ? JSON.parse(text) : null;
  } finally {
    dispose();
  }
}

async function readErrorBody(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text.slice(0, 200);
  } catch {
    return "";
  }
}
