/**
 * applink-doctor — assetlinks.json body parsing and statement checks.
 */

import { z } from 'zod';
import { isSha256Fingerprint } from '../analyzer/fingerprint.js';
import {
  ANDROID_APP_NAMESPACE,
  HANDLE_ALL_URLS,
  type AssetLinksContent,
  type TrustStatement,
  type ValidationIssue,
} from '../types/index.js';

const TargetSchema = z.object({
  namespace: z.string().optional(),
  package_name: z.string().optional(),
  sha256_cert_fingerprints: z.array(z.string()).optional(),
}).passthrough();

const StatementSchema = z.object({
  relation: z.array(z.string()).optional(),
  target: TargetSchema.optional(),
}).passthrough();

export type AssetLinksParseResult =
  | { ok: true; content: AssetLinksContent; issues: ValidationIssue[] }
  | { ok: false; issues: ValidationIssue[] };

export function parseAssetLinks(body: string): AssetLinksParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (e) {
    return {
      ok: false,
      issues: [{
        severity: 'error',
        code: 'INVALID_JSON_SYNTAX',
        message: 'Invalid JSON syntax',
        details: e instanceof Error ? e.message : String(e),
      }],
    };
  }

  if (!Array.isArray(raw)) {
    return {
      ok: false,
      issues: [{
        severity: 'error',
        code: 'INVALID_STRUCTURE',
        message: 'assetlinks.json must be a JSON array of statements',
        details: `Top-level value is ${raw === null ? 'null' : typeof raw}`,
      }],
    };
  }

  const issues: ValidationIssue[] = [];
  if (raw.length === 0) {
    issues.push({ severity: 'warning', code: 'NO_STATEMENTS', message: 'assetlinks.json contains no statements' });
  }
  if (raw.length > 1) {
    issues.push({ severity: 'info', code: 'MULTIPLE_STATEMENTS', message: `Found ${raw.length} statements in assetlinks.json` });
  }

  const statements: TrustStatement[] = [];
  raw.forEach((entry: unknown, index: number) => {
    const statement = checkStatement(entry, index + 1, issues);
    if (statement) statements.push(statement);
  });

  return { ok: true, content: { statements }, issues };
}

/** Validate one statement, appending issues. Returns null when unusable. */
function checkStatement(entry: unknown, n: number, issues: ValidationIssue[]): TrustStatement | null {
  const error = (code: ValidationIssue['code'], message: string, details?: string) => {
    issues.push({ severity: 'error', code, message: `Statement ${n}: ${message}`, details });
    return null;
  };

  const parsed = StatementSchema.safeParse(entry);
  if (!parsed.success) {
    return error(
      'INVALID_STATEMENT',
      'statement has an unexpected shape',
      parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '),
    );
  }

  const { relation, target } = parsed.data;
  if (!relation || relation.length === 0) return error('MISSING_RELATION', "missing 'relation' field");
  if (!target) return error('MISSING_TARGET', "missing 'target' field");
  if (target.namespace !== ANDROID_APP_NAMESPACE) {
    return error(
      'INVALID_NAMESPACE',
      `unexpected namespace "${target.namespace ?? ''}"`,
      `Expected "${ANDROID_APP_NAMESPACE}" for Android App Links`,
    );
  }

  const packageName = target.package_name?.trim();
  if (!packageName) return error('MISSING_PACKAGE_NAME', "target missing 'package_name' field");

  const fingerprints = target.sha256_cert_fingerprints ?? [];
  if (fingerprints.length === 0) {
    return error('MISSING_FINGERPRINT', "target missing 'sha256_cert_fingerprints'", `Package: ${packageName}`);
  }

  for (const fp of fingerprints) {
    if (!isSha256Fingerprint(fp)) {
      issues.push({
        severity: 'warning',
        code: 'FINGERPRINT_FORMAT',
        message: `Fingerprint format may be incorrect: ${fp}`,
        details: 'Expected 32 colon-separated hex bytes (XX:XX:...)',
      });
    }
  }
  if (fingerprints.length > 1) {
    issues.push({
      severity: 'info',
      code: 'MULTIPLE_FINGERPRINTS',
      message: `Package ${packageName} has ${fingerprints.length} fingerprints`,
    });
  }
  if (!relation.includes(HANDLE_ALL_URLS)) {
    issues.push({
      severity: 'warning',
      code: 'MISSING_HANDLE_ALL_URLS',
      message: `Statement ${n}: relation does not include ${HANDLE_ALL_URLS}`,
      details: 'App Links verification ignores this statement',
    });
  }

  return {
    relation,
    target: { namespace: target.namespace, packageName, sha256CertFingerprints: fingerprints },
  };
}
