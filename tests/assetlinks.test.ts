import { describe, it, expect } from 'vitest';
import { classifyFetchError, linkSignals, type HttpFetcher, type HttpFailure, type HttpGetOptions, type HttpResponse } from '../src/assetlinks/fetcher.js';
import { parseAssetLinks } from '../src/assetlinks/parse.js';
import { AssetLinksValidator, assetLinksUrl } from '../src/assetlinks/validate.js';
import { err, ok, type Result } from '../src/types/index.js';

const PKG = 'com.example.app';
const SHA = Array.from({ length: 32 }, () => 'AB').join(':');
const OTHER_SHA = Array.from({ length: 32 }, () => 'CD').join(':');

function statement(pkg = PKG, fps: string[] = [SHA]) {
  return {
    relation: ['delegate_permission/common.handle_all_urls'],
    target: { namespace: 'android_app', package_name: pkg, sha256_cert_fingerprints: fps },
  };
}

type Route = Result<Omit<HttpResponse, 'url'>, HttpFailure>;

/** In-process HttpFetcher serving canned responses by URL. */
class FakeFetcher implements HttpFetcher {
  readonly requests: { url: string; options: HttpGetOptions }[] = [];
  constructor(private readonly routes: Record<string, Route>) {}

  async get(url: string, options: HttpGetOptions): Promise<Result<HttpResponse, HttpFailure>> {
    this.requests.push({ url, options });
    const route = this.routes[url];
    if (!route) return ok({ statusCode: 404, headers: {}, body: 'Not Found', url });
    if (!route.ok) return route;
    return ok({ ...route.value, url });
  }
}

const JSON_HEADERS = { 'content-type': 'application/json' };
const json = (body: unknown, headers: Record<string, string> = JSON_HEADERS): Route =>
  ok({ statusCode: 200, headers, body: JSON.stringify(body) });

// ─── parseAssetLinks ─────────────────────────────────────────────────

describe('parseAssetLinks', () => {
  it('parses a valid statement without issues', () => {
    const result = parseAssetLinks(JSON.stringify([statement()]));
    expect(result.ok).toBe(true);
    expect(result.issues).toEqual([]);
    if (!result.ok) return;
    expect(result.content.statements).toEqual([{
      relation: ['delegate_permission/common.handle_all_urls'],
      target: { namespace: 'android_app', packageName: PKG, sha256CertFingerprints: [SHA] },
    }]);
  });

  it('rejects invalid JSON', () => {
    const result = parseAssetLinks('[{');
    expect(result.ok).toBe(false);
    expect(result.issues.map(i => i.code)).toEqual(['INVALID_JSON_SYNTAX']);
  });

  it('rejects a non-array document', () => {
    const result = parseAssetLinks(JSON.stringify(statement()));
    expect(result.ok).toBe(false);
    expect(result.issues).toEqual([{
      severity: 'error',
      code: 'INVALID_STRUCTURE',
      message: 'assetlinks.json must be a JSON array of statements',
      details: 'Top-level value is object',
    }]);
  });

  it('warns on an empty array', () => {
    const result = parseAssetLinks('[]');
    expect(result.ok).toBe(true);
    expect(result.issues.map(i => [i.severity, i.code])).toEqual([['warning', 'NO_STATEMENTS']]);
  });

  it('reports per-statement errors and drops unusable statements', () => {
    const result = parseAssetLinks(JSON.stringify([
      { target: statement().target },
      { relation: ['delegate_permission/common.handle_all_urls'], target: { ...statement().target, namespace: 'web' } },
      { relation: ['delegate_permission/common.handle_all_urls'], target: { namespace: 'android_app', sha256_cert_fingerprints: [SHA] } },
      statement(PKG, []),
      statement(),
    ]));
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.issues.map(i => i.code)).toEqual([
      'MULTIPLE_STATEMENTS',
      'MISSING_RELATION',
      'INVALID_NAMESPACE',
      'MISSING_PACKAGE_NAME',
      'MISSING_FINGERPRINT',
    ]);
    expect(result.issues[1].message).toBe("Statement 1: missing 'relation' field");
    expect(result.content.statements).toHaveLength(1);
  });

  it('flags odd fingerprints and multiple fingerprints without failing', () => {
    const result = parseAssetLinks(JSON.stringify([statement(PKG, ['AA:BB', SHA])]));
    expect(result.ok).toBe(true);
    expect(result.issues.map(i => [i.severity, i.code])).toEqual([
      ['warning', 'FINGERPRINT_FORMAT'],
      ['info', 'MULTIPLE_FINGERPRINTS'],
    ]);
  });

  it('keeps statements without handle_all_urls but warns', () => {
    const s = { ...statement(), relation: ['delegate_permission/common.get_login_creds'] };
    const result = parseAssetLinks(JSON.stringify([s]));
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.issues.map(i => i.code)).toEqual(['MISSING_HANDLE_ALL_URLS']);
    expect(result.content.statements).toHaveLength(1);
  });

  it('reports statements of the wrong shape', () => {
    const result = parseAssetLinks(JSON.stringify(['just a string', { relation: 'not-an-array', target: {} }]));
    expect(result.issues.filter(i => i.code === 'INVALID_STATEMENT')).toHaveLength(2);
  });
});

// ─── AssetLinksValidator ─────────────────────────────────────────────

describe('AssetLinksValidator', () => {
  const url = assetLinksUrl('example.com');

  it('builds the well-known URL', () => {
    expect(url).toBe('https://example.com/.well-known/assetlinks.json');
  });

  it('returns valid with content for a good file', async () => {
    const fetcher = new FakeFetcher({ [url]: json([statement()]) });
    const v = await new AssetLinksValidator(fetcher).validate('example.com');
    expect(v.status).toBe('valid');
    expect(v.url).toBe(url);
    expect(v.issues).toEqual([]);
    expect(v.content?.statements[0].target.packageName).toBe(PKG);
    expect(v.finalUrl).toBeUndefined();
  });

  it('passes the configured timeout to the fetcher', async () => {
    const fetcher = new FakeFetcher({ [url]: json([statement()]) });
    await new AssetLinksValidator(fetcher, { timeoutMs: 1234 }).validate('example.com');
    expect(fetcher.requests[0].options.timeoutMs).toBe(1234);
  });

  it('maps 404 to not_found', async () => {
    const v = await new AssetLinksValidator(new FakeFetcher({})).validate('example.com');
    expect(v.status).toBe('not_found');
    expect(v.issues.map(i => i.code)).toEqual(['FILE_NOT_FOUND']);
    expect(v.content).toBeUndefined();
  });

  it('maps other HTTP errors to network_error', async () => {
    const fetcher = new FakeFetcher({ [url]: ok({ statusCode: 503, headers: {}, body: 'busy' }) });
    const v = await new AssetLinksValidator(fetcher).validate('example.com');
    expect(v.status).toBe('network_error');
    expect(v.issues).toEqual([{ severity: 'error', code: 'HTTP_ERROR', message: 'HTTP error: 503', details: url }]);
  });

  it('maps transport failures to network_error with a specific code', async () => {
    const dns: HttpFailure = { kind: 'dns', message: 'getaddrinfo ENOTFOUND example.com', code: 'ENOTFOUND' };
    const fetcher = new FakeFetcher({ [url]: err(dns) });
    const v = await new AssetLinksValidator(fetcher).validate('example.com');
    expect(v.status).toBe('network_error');
    expect(v.issues.map(i => i.code)).toEqual(['DNS_FAILURE']);
  });

  it('maps timeouts to NETWORK_TIMEOUT', async () => {
    const timeout: HttpFailure = { kind: 'timeout', message: 'Request timed out' };
    const fetcher = new FakeFetcher({ [url]: err(timeout) });
    const v = await new AssetLinksValidator(fetcher).validate('example.com');
    expect(v.issues.map(i => i.code)).toEqual(['NETWORK_TIMEOUT']);
  });

  it('maps unparseable bodies to invalid_json without content', async () => {
    const fetcher = new FakeFetcher({ [url]: ok({ statusCode: 200, headers: JSON_HEADERS, body: '<html>' }) });
    const v = await new AssetLinksValidator(fetcher).validate('example.com');
    expect(v.status).toBe('invalid_json');
    expect(v.content).toBeUndefined();
    expect(v.rawBody).toBe('<html>');
  });

  it('warns on a wrong content type but stays valid by default', async () => {
    const fetcher = new FakeFetcher({ [url]: json([statement()], { 'content-type': 'text/plain' }) });
    const v = await new AssetLinksValidator(fetcher).validate('example.com');
    expect(v.status).toBe('valid');
    expect(v.issues.map(i => i.code)).toEqual(['WRONG_CONTENT_TYPE']);
  });

  it('fails on a wrong content type in strict mode', async () => {
    const fetcher = new FakeFetcher({ [url]: json([statement()], { 'content-type': 'text/html' }) });
    const v = await new AssetLinksValidator(fetcher, { strictContentType: true }).validate('example.com');
    expect(v.status).toBe('invalid_content_type');
    expect(v.content).toBeUndefined();
  });

  it('accepts JSON content types with parameters', async () => {
    const fetcher = new FakeFetcher({ [url]: json([statement()], { 'content-type': 'application/json; charset=utf-8' }) });
    const v = await new AssetLinksValidator(fetcher, { strictContentType: true }).validate('example.com');
    expect(v.status).toBe('valid');
  });

  it('reports a redirect even when the target serves a valid file', async () => {
    const target = 'https://www.example.com/.well-known/assetlinks.json';
    const fetcher = new FakeFetcher({
      [url]: ok({ statusCode: 301, headers: { location: target }, body: '' }),
      [target]: json([statement()]),
    });
    const v = await new AssetLinksValidator(fetcher).validate('example.com');
    expect(v.status).toBe('redirect');
    expect(v.underlyingStatus).toBe('valid');
    expect(v.finalUrl).toBe(target);
    expect(v.content).toBeUndefined();
    expect(v.issues.map(i => i.code)).toEqual(['REDIRECT_DETECTED']);
    expect(fetcher.requests.map(r => r.url)).toEqual([url, target]);
  });

  it('keeps the outcome at the final location of a redirect', async () => {
    const target = 'https://www.example.com/.well-known/assetlinks.json';
    const fetcher = new FakeFetcher({
      [url]: ok({ statusCode: 301, headers: { location: target }, body: '' }),
    });
    const v = await new AssetLinksValidator(fetcher).validate('example.com');
    expect(v.status).toBe('redirect');
    expect(v.underlyingStatus).toBe('not_found');
    expect(v.issues.map(i => i.code)).toEqual(['REDIRECT_DETECTED', 'FILE_NOT_FOUND']);
  });

  it('resolves relative Location headers', async () => {
    const fetcher = new FakeFetcher({
      [url]: ok({ statusCode: 302, headers: { location: '/assetlinks.json' }, body: '' }),
    });
    const v = await new AssetLinksValidator(fetcher).validate('example.com');
    expect(v.status).toBe('redirect');
    expect(fetcher.requests[1].url).toBe('https://example.com/assetlinks.json');
  });

  it('stops after maxRedirects', async () => {
    const hop = (n: number) => `https://example.com/hop${n}`;
    const fetcher = new FakeFetcher({
      [url]: ok({ statusCode: 302, headers: { location: hop(1) }, body: '' }),
      [hop(1)]: ok({ statusCode: 302, headers: { location: hop(2) }, body: '' }),
      [hop(2)]: ok({ statusCode: 302, headers: { location: hop(3) }, body: '' }),
    });
    const v = await new AssetLinksValidator(fetcher, { maxRedirects: 1 }).validate('example.com');
    expect(v.status).toBe('redirect');
    expect(fetcher.requests).toHaveLength(2);
    expect(v.issues.map(i => i.code)).toEqual(['REDIRECT_DETECTED', 'REDIRECT_DETECTED', 'NETWORK_ERROR']);
  });

  it('treats a redirect without Location as a redirect', async () => {
    const fetcher = new FakeFetcher({ [url]: ok({ statusCode: 307, headers: {}, body: '' }) });
    const v = await new AssetLinksValidator(fetcher).validate('example.com');
    expect(v.status).toBe('redirect');
    expect(v.underlyingStatus).toBeUndefined();
    expect(fetcher.requests).toHaveLength(1);
  });

  describe('with an expectation', () => {
    it('stays valid when package and fingerprint are declared', async () => {
      const fetcher = new FakeFetcher({ [url]: json([statement()]) });
      const v = await new AssetLinksValidator(fetcher).validate('example.com', {
        expect: { packageName: PKG, fingerprint: SHA.toLowerCase() },
      });
      expect(v.status).toBe('valid');
    });

    it('reports fingerprint_mismatch', async () => {
      const fetcher = new FakeFetcher({ [url]: json([statement()]) });
      const v = await new AssetLinksValidator(fetcher).validate('example.com', {
        expect: { packageName: PKG, fingerprint: OTHER_SHA },
      });
      expect(v.status).toBe('fingerprint_mismatch');
      expect(v.content).toBeUndefined();
      expect(v.issues.map(i => i.code)).toEqual(['FINGERPRINT_MISMATCH']);
    });

    it('reports an undeclared package', async () => {
      const fetcher = new FakeFetcher({ [url]: json([statement()]) });
      const v = await new AssetLinksValidator(fetcher).validate('example.com', {
        expect: { packageName: 'com.example.other' },
      });
      expect(v.status).toBe('valid');
      expect(v.issues.map(i => i.code)).toEqual(['PACKAGE_NOT_DECLARED']);
    });
  });
});

// ─── classifyFetchError ──────────────────────────────────────────────

describe('classifyFetchError', () => {
  const wrapped = (code: string) => new TypeError('fetch failed', { cause: Object.assign(new Error(code), { code }) });

  it('finds system error codes in the cause chain', () => {
    expect(classifyFetchError(wrapped('ENOTFOUND')).kind).toBe('dns');
    expect(classifyFetchError(wrapped('CERT_HAS_EXPIRED')).kind).toBe('tls');
    expect(classifyFetchError(wrapped('ECONNREFUSED')).kind).toBe('connection');
    expect(classifyFetchError(wrapped('UND_ERR_CONNECT_TIMEOUT')).kind).toBe('timeout');
  });

  it('recognizes AbortSignal.timeout', () => {
    const e = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    expect(classifyFetchError(e).kind).toBe('timeout');
  });

  it('reports cancellation by the caller', () => {
    const controller = new AbortController();
    controller.abort();
    expect(classifyFetchError(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }), controller.signal).kind).toBe('aborted');
  });
});

describe('linkSignals', () => {
  it('aborts when any source aborts', () => {
    const caller = new AbortController();
    const other = new AbortController();
    const linked = linkSignals([caller.signal, other.signal]);
    other.abort('stop');
    expect(linked.signal.aborted).toBe(true);
    expect(linked.signal.reason).toBe('stop');
    linked.release();
  });

  it('starts aborted when a source already is', () => {
    const caller = new AbortController();
    caller.abort();
    expect(linkSignals([caller.signal]).signal.aborted).toBe(true);
  });

  it('detaches from a long-lived caller signal on release', () => {
    const caller = new AbortController();
    const linked = linkSignals([caller.signal]);
    linked.release();
    caller.abort();
    expect(linked.signal.aborted).toBe(false);
  });
});
