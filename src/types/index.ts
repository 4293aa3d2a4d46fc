/**
 * applink-doctor — Core type definitions.
 *
 * Everything here is an immutable value built once per diagnostic run.
 */

// ─── Result ──────────────────────────────────────────────────────────

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });
export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

// ─── Device state ────────────────────────────────────────────────────

/** Android API level 31 moved domain verification to its own subsystem. */
export const MODERN_SDK_LEVEL = 31;

export type OsGeneration = 'legacy' | 'modern';

export type DomainVerificationState =
  | 'verified'        // modern "verified"
  | 'approved'        // legacy "always"
  | 'denied'          // legacy "never"
  | 'unverified'      // modern "none", legacy "ask"
  | 'legacy_failure'
  | 'unknown';

export function isSuccessfulState(state: DomainVerificationState): boolean {
  return state === 'verified' || state === 'approved';
}

export interface DomainRecord {
  readonly domain: string;
  readonly state: DomainVerificationState;
  readonly fingerprint?: string;
}

export interface AppLinkProfile {
  readonly packageName: string;
  readonly domains: readonly DomainRecord[];
}

export type DeviceState = 'online' | 'offline' | 'unauthorized' | 'unknown';
export type ConnectionType = 'usb' | 'wifi' | 'emulator';

export interface Device {
  serial: string;
  state: DeviceState;
  model: string;
  product?: string;
  connection: ConnectionType;
}

// ─── Logcat ──────────────────────────────────────────────────────────

export type LogLevel = 'verbose' | 'debug' | 'info' | 'warning' | 'error' | 'fatal' | 'unknown';

export type LinkEventKind = 'verification' | 'started' | 'resolved' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  tag: string;
  message: string;
  event?: { kind: LinkEventKind; description: string };
}

// ─── Trust file (assetlinks.json) ────────────────────────────────────

export const HANDLE_ALL_URLS = 'delegate_permission/common.handle_all_urls';
export const ANDROID_APP_NAMESPACE = 'android_app';

export type TrustFileStatus =
  | 'valid'
  | 'invalid_json'
  | 'not_found'
  | 'redirect'
  | 'network_error'
  | 'fingerprint_mismatch'
  | 'invalid_content_type';

export type IssueSeverity = 'error' | 'warning' | 'info';

export type IssueCode =
  // Errors
  | 'FILE_NOT_FOUND'
  | 'INVALID_JSON_SYNTAX'
  | 'INVALID_STRUCTURE'
  | 'INVALID_STATEMENT'
  | 'MISSING_RELATION'
  | 'MISSING_TARGET'
  | 'MISSING_PACKAGE_NAME'
  | 'MISSING_FINGERPRINT'
  | 'INVALID_NAMESPACE'
  | 'HTTP_ERROR'
  | 'NETWORK_TIMEOUT'
  | 'NETWORK_ERROR'
  | 'DNS_FAILURE'
  | 'SSL_ERROR'
  | 'FINGERPRINT_MISMATCH'
  | 'PACKAGE_NOT_DECLARED'
  // Warnings
  | 'REDIRECT_DETECTED'
  | 'WRONG_CONTENT_TYPE'
  | 'FINGERPRINT_FORMAT'
  | 'MISSING_HANDLE_ALL_URLS'
  | 'NO_STATEMENTS'
  // Info
  | 'MULTIPLE_STATEMENTS'
  | 'MULTIPLE_FINGERPRINTS';

export interface ValidationIssue {
  severity: IssueSeverity;
  code: IssueCode;
  message: string;
  details?: string;
}

export interface TrustTarget {
  readonly namespace: string;
  readonly packageName: string;
  readonly sha256CertFingerprints: readonly string[];
}

export interface TrustStatement {
  readonly relation: readonly string[];
  readonly target: TrustTarget;
}

export interface AssetLinksContent {
  readonly statements: readonly TrustStatement[];
}

export interface TrustFileValidation {
  readonly domain: string;
  readonly url: string;
  readonly status: TrustFileStatus;
  /** Outcome at the final location when status is 'redirect'. */
  readonly underlyingStatus?: TrustFileStatus;
  readonly issues: readonly ValidationIssue[];
  /** Only present when status is 'valid'. */
  readonly content?: AssetLinksContent;
  readonly rawBody?: string;
  /** Set when the request was redirected. */
  readonly finalUrl?: string;
}

// ─── Comparison & analysis ───────────────────────────────────────────

export type FingerprintComparison =
  | { kind: 'match' }
  | { kind: 'mismatch'; localFingerprint: string; remoteFingerprints: string[] }
  | { kind: 'no_local_fingerprint' }
  | { kind: 'remote_unavailable' }
  | { kind: 'no_remote_fingerprint' };

export type FailureReason =
  | 'ASSET_LINKS_MISSING'
  | 'ASSET_LINKS_INVALID_JSON'
  | 'ASSET_LINKS_NETWORK_ERROR'
  | 'ASSET_LINKS_REDIRECT'
  | 'ASSET_LINKS_INVALID_CONTENT_TYPE'
  | 'FINGERPRINT_MISMATCH'
  | 'PACKAGE_NOT_IN_ASSET_LINKS'
  | 'DNS_FAILURE'
  | 'UNKNOWN';

export interface FailureAnalysis {
  reasons: FailureReason[];
  suggestions: string[];
}

export interface DomainDiagnostic {
  readonly domain: string;
  readonly state: DomainVerificationState;
  readonly fingerprintComparison: FingerprintComparison;
  readonly trustStatus: TrustFileStatus;
  /** Outcome at the final location when trustStatus is 'redirect'. */
  readonly underlyingStatus?: TrustFileStatus;
  readonly trustIssues: readonly ValidationIssue[];
  readonly failureReasons: readonly FailureReason[];
  readonly suggestions: readonly string[];
}

export interface DiagnosticsReport {
  readonly packageName: string;
  readonly deviceId: string;
  readonly sdkLevel: number;
  readonly osGeneration: OsGeneration;
  readonly domains: readonly DomainDiagnostic[];
  readonly deviceFingerprint?: string;
  // Derived at assembly
  readonly domainCount: number;
  readonly verifiedCount: number;
  readonly failedCount: number;
  readonly hasIssues: boolean;
}
