/**
 * applink-doctor — Certificate fingerprint comparison.
 *
 * Joins what the device reports about the signing certificate with what the
 * domain's assetlinks.json declares for the package.
 */

import { HANDLE_ALL_URLS, type AssetLinksContent, type FingerprintComparison } from '../types/index.js';

/** "aa:bb:cc" → "AABBCC". Idempotent. */
export function normalizeFingerprint(fingerprint: string): string {
  return fingerprint.replace(/:/g, '').toUpperCase();
}

/** True for a SHA-256 fingerprint: 32 bytes of hex, colons optional. */
export function isSha256Fingerprint(fingerprint: string): boolean {
  return /^[0-9A-F]{64}$/.test(normalizeFingerprint(fingerprint));
}

/**
 * Fingerprints declared for a package by statements that delegate
 * handle_all_urls, in file order.
 */
export function fingerprintsForPackage(content: AssetLinksContent, packageName: string): string[] {
  return content.statements
    .filter(s => s.target.packageName === packageName && s.relation.includes(HANDLE_ALL_URLS))
    .flatMap(s => [...s.target.sha256CertFingerprints]);
}

/**
 * Compare the device fingerprint with the trust file. First match wins:
 * a missing trust file outranks every fingerprint verdict.
 */
export function compareFingerprints(
  localFingerprint: string | undefined,
  packageName: string,
  content: AssetLinksContent | undefined,
): FingerprintComparison {
  if (!content) return { kind: 'remote_unavailable' };
  if (!localFingerprint) return { kind: 'no_local_fingerprint' };

  const remote = fingerprintsForPackage(content, packageName);
  if (remote.length === 0) return { kind: 'no_remote_fingerprint' };

  const local = normalizeFingerprint(localFingerprint);
  if (remote.some(fp => normalizeFingerprint(fp) === local)) return { kind: 'match' };

  return { kind: 'mismatch', localFingerprint, remoteFingerprints: remote };
}
