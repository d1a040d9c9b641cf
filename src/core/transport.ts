/**
 * HTTP + JSON transport for ArcGIS REST endpoints.
 *
 * Every call is a GET with `f=json`. Failures surface as TransportError or
 * DecodeError, always naming the URL. Nothing is retried: a transient failure
 * goes back to the caller.
 */
import { Agent, type Dispatcher } from 'undici';
import type { z } from 'zod';
import { DEFAULT_DOWNLOAD_CONFIG, type DownloadConfig } from './config.js';
import { DecodeError, TransportError, errorMessage, throwIfCancelled } from './errors.js';
import { ArcGisErrorSchema } from './schemas.js';

// ============================================================================
// Types
// ============================================================================

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type QueryParams = Record<string, string>;

export interface TransportOptions {
  config?: DownloadConfig;
  signal?: AbortSignal;
  /** Defaults to the global fetch, resolved at call time */
  fetchFn?: FetchFn;
}

// ============================================================================
// TLS
// ============================================================================

let insecureAgent: Agent | null = null;

function dispatcherFor(config: DownloadConfig): Dispatcher | undefined {
  if (config.verifyTls) return undefined;
  if (!insecureAgent) {
    insecureAgent = new Agent({ connect: { rejectUnauthorized: false } });
  }
  return insecureAgent;
}

// ============================================================================
// URLs
// ============================================================================

export function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

export function buildUrl(url: string, params: QueryParams = {}): string {
  const search = new URLSearchParams({ f: 'json', ...params });
  return `${stripTrailingSlash(url)}?${search}`;
}

// ============================================================================
// Fetch
// ============================================================================

/**
 * Fetch and parse JSON. Does not validate the shape; see `fetchDecoded`.
 */
export async function fetchJson(
  url: string,
  params: QueryParams = {},
  options: TransportOptions = {}
): Promise<unknown> {
  const config = options.config ?? DEFAULT_DOWNLOAD_CONFIG;
  const fetchFn = options.fetchFn ?? globalThis.fetch;
  const fullUrl = buildUrl(url, params);

  throwIfCancelled(options.signal, `request to ${fullUrl}`);

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), config.timeoutMs);
  const onCallerAbort = (): void => controller.abort();
  options.signal?.addEventListener('abort', onCallerAbort, { once: true });

  const init: RequestInit & { dispatcher?: Dispatcher } = {
    signal: controller.signal,
    headers: {
      Accept: 'application/json',
      'User-Agent': config.userAgent,
    },
  };
  const dispatcher = dispatcherFor(config);
  if (dispatcher) {
    init.dispatcher = dispatcher;
  }

  let body: string;
  try {
    const res = await fetchFn(fullUrl, init);
    if (!res.ok) {
      throw new TransportError(fullUrl, `HTTP ${res.status}: ${await res.text()}`, {
        status: res.status,
      });
    }
    body = await res.text();
  } catch (err) {
    if (err instanceof TransportError) throw err;
    throwIfCancelled(options.signal, `request to ${fullUrl}`);
    if (controller.signal.aborted) {
      throw new TransportError(fullUrl, `timed out after ${config.timeoutMs}ms`, { cause: err });
    }
    throw new TransportError(fullUrl, errorMessage(err), { cause: err });
  } finally {
    clearTimeout(timeoutId);
    options.signal?.removeEventListener('abort', onCallerAbort);
  }

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (err) {
    throw new DecodeError(fullUrl, `not valid JSON (${errorMessage(err)})`, { cause: err });
  }

  const serverError = ArcGisErrorSchema.safeParse(data);
  if (serverError.success) {
    const { code, message, details } = serverError.data.error;
    const label = code !== undefined ? `server error ${code}` : 'server error';
    const detail = details.length ? ` (${details.join('; ')})` : '';
    throw new TransportError(fullUrl, `${label}: ${message}${detail}`, { serverCode: code });
  }

  return data;
}

/**
 * Fetch JSON and validate it against a schema.
 */
export async function fetchDecoded<S extends z.ZodTypeAny>(
  schema: S,
  url: string,
  params: QueryParams = {},
  options: TransportOptions = {}
): Promise<z.output<S>> {
  const data = await fetchJson(url, params, options);
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? ` at ${issue.path.join('.')}` : '';
    throw new DecodeError(buildUrl(url, params), `unexpected shape${where}: ${issue?.message ?? 'invalid'}`);
  }
  return parsed.data;
}
