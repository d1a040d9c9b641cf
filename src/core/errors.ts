/**
 * Error taxonomy for acquisition.
 *
 * Transport and decode failures abort the current operation. Geometry
 * conversion failures stay contained to a single feature. A blocked safety
 * verdict is a refusal, not a fault, and carries the verdict so callers can
 * show its reasons.
 */
import type { SafetyVerdict } from './safety.js';

export class TransportError extends Error {
  readonly url: string;
  readonly status: number | null;
  readonly serverCode: number | null;

  constructor(
    url: string,
    message: string,
    options: { status?: number; serverCode?: number; cause?: unknown } = {}
  ) {
    super(`Network error fetching ${url}: ${message}`, { cause: options.cause });
    this.name = 'TransportError';
    this.url = url;
    this.status = options.status ?? null;
    this.serverCode = options.serverCode ?? null;
  }
}

export class DecodeError extends Error {
  readonly url: string;

  constructor(url: string, message: string, options: { cause?: unknown } = {}) {
    super(`Response from ${url} could not be decoded: ${message}`, {
      cause: options.cause,
    });
    this.name = 'DecodeError';
    this.url = url;
  }
}

export class GeometryConversionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GeometryConversionError';
  }
}

export class SafetyBlockedError extends Error {
  readonly verdict: SafetyVerdict;

  constructor(verdict: SafetyVerdict) {
    super(`Download blocked: ${verdict.reasons.join(' ')}`);
    this.name = 'SafetyBlockedError';
    this.verdict = verdict;
  }
}

export class DownloadCancelledError extends Error {
  constructor(stage: string) {
    super(`Cancelled during ${stage}`);
    this.name = 'DownloadCancelledError';
  }
}

/**
 * Throw if the caller's signal has fired. Checked at the top of every
 * network call and between batches.
 */
export function throwIfCancelled(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new DownloadCancelledError(stage);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
