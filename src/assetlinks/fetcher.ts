/**
 * applink-doctor — HTTP fetching for trust files.
 *
 * Redirects are never followed here: callers need to see them, because
 * Android refuses a trust file that is only reachable through one.
 */

import { err, ok, type Result } from '../types/index.js';

export interface HttpResponse {
  statusCode: number;
  /** Lower-cased header names. */
  headers: Record<string, string>;
  body: string;
  url: string;
}

export type HttpFailureKind = 'dns' | 'timeout' | 'tls' | 'aborted' | 'connection';

export interface HttpFailure {
  kind: HttpFailureKind;
  message: string;
  code?: string;
}

export interface HttpGetOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

export interface HttpFetcher {
  get(url: string, options: HttpGetOptions): Promise<Result<HttpResponse, HttpFailure>>;
}

const DNS_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_FAIL', 'EAI_NONAME', 'ENODATA']);
const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT']);
const TLS_CODE = /CERT|SSL|TLS|SELF_SIGNED|UNABLE_TO_VERIFY|ERR_TLS/;

function errorName(e: unknown): string | undefined {
  return typeof e === 'object' && e !== null && 'name' in e && typeof e.name === 'string' ? e.name : undefined;
}

/** Walk the `cause` chain for a system error code (undici wraps them). */
function errorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null) return undefined;
  if ('code' in e && typeof e.code === 'string') return e.code;
  if ('cause' in e) return errorCode(e.cause);
  return undefined;
}

function errorMessage(e: unknown): string {
  if (e instanceof Error) {
    const cause = e.cause instanceof Error ? `: ${e.cause.message}` : '';
    return `${e.message}${cause}`;
  }
  return String(e);
}

export function classifyFetchError(e: unknown, callerSignal?: AbortSignal): HttpFailure {
  const code = errorCode(e);
  const message = errorMessage(e);
  if (callerSignal?.aborted) return { kind: 'aborted', message: 'Request cancelled', code };
  if (errorName(e) === 'TimeoutError' || (code !== undefined && TIMEOUT_CODES.has(code))) {
    return { kind: 'timeout', message: 'Request timed out', code };
  }
  if (code !== undefined && DNS_CODES.has(code)) return { kind: 'dns', message, code };
  if (code !== undefined && TLS_CODE.test(code)) return { kind: 'tls', message, code };
  return { kind: 'connection', message, code };
}

interface LinkedSignal {
  signal: AbortSignal;
  /** Detach from the source signals; call once the request settles. */
  release(): void;
}

/** Abort when any source aborts. Listeners stay attached only until release(). */
export function linkSignals(signals: AbortSignal[]): LinkedSignal {
  const controller = new AbortController();
  const detach: (() => void)[] = [];
  for (const s of signals) {
    if (s.aborted) {
      controller.abort(s.reason);
      break;
    }
    const onAbort = () => controller.abort(s.reason);
    s.addEventListener('abort', onAbort, { once: true });
    detach.push(() => s.removeEventListener('abort', onAbort));
  }
  return {
    signal: controller.signal,
    release: () => {
      for (const d of detach) d();
    },
  };
}

/** HttpFetcher backed by Node's global fetch. */
export class FetchHttpClient implements HttpFetcher {
  constructor(private readonly userAgent = 'applink-doctor/1.0') {}

  async get(url: string, options: HttpGetOptions): Promise<Result<HttpResponse, HttpFailure>> {
    const timeout = AbortSignal.timeout(options.timeoutMs);
    const linked = options.signal ? linkSignals([options.signal, timeout]) : { signal: timeout, release: () => {} };
    const { signal } = linked;

    try {
      const res = await fetch(url, {
        method: 'GET',
        redirect: 'manual',
        headers: { Accept: 'application/json', 'User-Agent': this.userAgent, ...options.headers },
        signal,
      });
      const body = await res.text();
      const headers: Record<string, string> = {};
      res.headers.forEach((value, key) => { headers[key.toLowerCase()] = value; });
      return ok({ statusCode: res.status, headers, body, url });
    } catch (e) {
      return err(classifyFetchError(e, options.signal));
    } finally {
      linked.release();
    }
  }
}
