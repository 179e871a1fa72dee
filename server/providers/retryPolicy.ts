import { isAbortError } from "../abort.js";
import { ProviderError } from "../generator/errors.js";

export const TRANSIENT_STATUS_CODES: ReadonlySet<number> = new Set([408, 500, 502, 503, 504]);
export const DEFAULT_BACKOFF_MS = 1_000;
export const MAX_BACKOFF_MS = 20_000;
export const MAX_RETRY_AFTER_MS = 60_000;
export const MAX_JITTER_MS = 250;

export function parseRetryAfterMs(value: string | null, now: number = Date.now()): number | null {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const seconds = Number(trimmed);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.floor(seconds * 1000);
  }

  const asDate = Date.parse(trimmed);
  if (!Number.isFinite(asDate)) {
    return null;
  }

  return Math.max(0, asDate - now);
}

/**
 * Delay before retry number `retryIndex` (1-based): the server's Retry-After when
 * given (capped), otherwise capped exponential backoff with jitter.
 */
export function resolveBackoffDelayMs(
  retryIndex: number,
  retryAfterMs: number | null,
  random: () => number = Math.random
): number {
  if (typeof retryAfterMs === "number") {
    return Math.min(MAX_RETRY_AFTER_MS, Math.max(0, retryAfterMs));
  }

  const exponential = Math.min(MAX_BACKOFF_MS, DEFAULT_BACKOFF_MS * 2 ** (retryIndex - 1));
  return exponential + Math.floor(random() * MAX_JITTER_MS);
}

export function isTransientProviderError(error: unknown): boolean {
  if (!(error instanceof ProviderError) || isAbortError(error.cause)) {
    return false;
  }

  if (error.statusCode !== null) {
    return TRANSIENT_STATUS_CODES.has(error.statusCode);
  }

  return error.transient;
}
