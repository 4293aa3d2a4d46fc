/**
 * applink-doctor — Trust file validation.
 *
 * Every transport and body outcome maps to exactly one TrustFileValidation;
 * validate() never rejects.
 */

import { fingerprintsForPackage, normalizeFingerprint } from '../analyzer/fingerprint.js';
import { HANDLE_ALL_URLS, type TrustFileStatus, type TrustFileValidation, type ValidationIssue } from '../types/index.js';
import type { HttpFailure, HttpFetcher, HttpResponse } from './fetcher.js';
import { parseAssetLinks } from './parse.js';

export interface ValidatorOptions {
  timeoutMs: number;
  maxRedirects: number;
  /** Treat a non-JSON Content-Type as a failed status instead of a warning. */
  strictContentType: boolean;
}

export interface ValidationExpectation {
  packageName: string;
  fingerprint?: string;
}

export interface ValidateOptions {
  signal?: AbortSignal;
  expect?: ValidationExpectation;
}

export const DEFAULT_VALIDATOR_OPTIONS: ValidatorOptions = {
  timeoutMs: 10_000,
  maxRedirects: 3,
  strictContentType: false,
};

export function assetLinksUrl(domain: string): string {
  return `https://${domain}/.well-known/assetlinks.json`;
}

const REDIRECT_CODES = new Set([301, 302, 303, 307, 308]);

function networkIssue(failure: HttpFailure, url: string): ValidationIssue {
  switch (failure.kind) {
    case 'dns':
      return { severity: 'error', code: 'DNS_FAILURE', message: `DNS lookup failed for ${new URL(url).hostname}`, details: failure.message };
    case 'timeout':
      return { severity: 'error', code: 'NETWORK_TIMEOUT', message: 'Request timed out', details: url };
    case 'tls':
      return { severity: 'error', code: 'SSL_ERROR', message: `TLS error: ${failure.message}`, details: failure.code };
    case 'aborted':
    case 'connection':
      return { severity: 'error', code: 'NETWORK_ERROR', message: `Network error: ${failure.message}`, details: failure.code };
  }
}

interface Outcome {
  status: TrustFileStatus;
  issues: ValidationIssue[];
  content?: TrustFileValidation['content'];
  rawBody?: string;
}

export class AssetLinksValidator {
  private readonly options: ValidatorOptions;

  constructor(
    private readonly fetcher: HttpFetcher,
    options: Partial<ValidatorOptions> = {},
  ) {
    this.options = { ...DEFAULT_VALIDATOR_OPTIONS, ...options };
  }

  async validate(domain: string, opts: ValidateOptions = {}): Promise<TrustFileValidation> {
    const url = assetLinksUrl(domain);
    const issues: ValidationIssue[] = [];
    let target = url;
    let hops = 0;

    for (;;) {
      const result = await this.fetcher.get(target, { timeoutMs: this.options.timeoutMs, signal: opts.signal });
      if (!result.ok) {
        return this.finish(domain, url, target, hops, {
          status: 'network_error',
          issues: [...issues, networkIssue(result.error, target)],
        });
      }

      const res = result.value;
      if (!REDIRECT_CODES.has(res.statusCode)) {
        return this.finish(domain, url, target, hops, this.classify(res, issues, opts.expect));
      }

      const next = resolveLocation(res.headers['location'], target);
      issues.push({
        severity: 'warning',
        code: 'REDIRECT_DETECTED',
        message: `Request was redirected (HTTP ${res.statusCode})`,
        details: `${target} → ${next ?? '(no valid Location header)'}`,
      });
      hops++;

      if (next === null) {
        return this.finish(domain, url, target, hops, { status: 'redirect', issues });
      }
      if (hops > this.options.maxRedirects) {
        issues.push({
          severity: 'error',
          code: 'NETWORK_ERROR',
          message: `Too many redirects (max ${this.options.maxRedirects})`,
        });
        return this.finish(domain, url, next, hops, { status: 'redirect', issues });
      }
      target = next;
    }
  }

  private classify(res: HttpResponse, issues: ValidationIssue[], expect?: ValidationExpectation): Outcome {
    if (res.statusCode === 404) {
      issues.push({ severity: 'error', code: 'FILE_NOT_FOUND', message: `assetlinks.json not found at ${res.url}` });
      return { status: 'not_found', issues };
    }
    if (res.statusCode < 200 || res.statusCode >= 300) {
      issues.push({ severity: 'error', code: 'HTTP_ERROR', message: `HTTP error: ${res.statusCode}`, details: res.url });
      return { status: 'network_error', issues, rawBody: res.body };
    }

    const contentType = res.headers['content-type'] ?? '';
    const wrongContentType = !/application\/json/i.test(contentType);
    if (wrongContentType) {
      issues.push({
        severity: 'warning',
        code: 'WRONG_CONTENT_TYPE',
        message: 'Content-Type is not application/json',
        details: `Received: ${contentType || '(none)'}`,
      });
    }

    const parsed = parseAssetLinks(res.body);
    issues.push(...parsed.issues);
    if (!parsed.ok) {
      return { status: 'invalid_json', issues, rawBody: res.body };
    }
    if (wrongContentType && this.options.strictContentType) {
      return { status: 'invalid_content_type', issues, rawBody: res.body };
    }

    if (expect) {
      const declared = fingerprintsForPackage(parsed.content, expect.packageName);
      if (declared.length === 0) {
        issues.push({
          severity: 'error',
          code: 'PACKAGE_NOT_DECLARED',
          message: `Package ${expect.packageName} is not declared with ${HANDLE_ALL_URLS}`,
        });
      } else if (expect.fingerprint !== undefined) {
        const wanted = normalizeFingerprint(expect.fingerprint);
        if (!declared.some(fp => normalizeFingerprint(fp) === wanted)) {
          issues.push({
            severity: 'error',
            code: 'FINGERPRINT_MISMATCH',
            message: `No declared fingerprint for ${expect.packageName} matches ${expect.fingerprint}`,
            details: `Declared: ${declared.join(', ')}`,
          });
          return { status: 'fingerprint_mismatch', issues, rawBody: res.body };
        }
      }
    }

    return { status: 'valid', issues, content: parsed.content, rawBody: res.body };
  }

  /**
   * A redirect anywhere in the chain makes the whole fetch a redirect; what
   * the final location returned is kept as underlyingStatus.
   */
  private finish(domain: string, url: string, finalUrl: string, hops: number, outcome: Outcome): TrustFileValidation {
    const status: TrustFileStatus = hops > 0 ? 'redirect' : outcome.status;
    return {
      domain,
      url,
      status,
      ...(hops > 0 && outcome.status !== 'redirect' ? { underlyingStatus: outcome.status } : {}),
      issues: outcome.issues,
      ...(status === 'valid' && outcome.content ? { content: outcome.content } : {}),
      ...(outcome.rawBody !== undefined ? { rawBody: outcome.rawBody } : {}),
      ...(hops > 0 ? { finalUrl } : {}),
    };
  }
}

function resolveLocation(location: string | undefined, base: string): string | null {
  if (!location) return null;
  try {
    return new URL(location, base).toString();
  } catch {
    return null;
  }
}
