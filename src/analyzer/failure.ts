/**
 * applink-doctor — Root-cause classification for a single domain.
 *
 * Rules are evaluated independently; a domain can carry several reasons at
 * once and adding a failing condition never removes an earlier reason. A
 * redirected trust file is judged on the redirect and on what the final
 * location returned.
 */

import { assetLinksUrl } from '../assetlinks/validate.js';
import {
  isSuccessfulState,
  type DomainVerificationState,
  type FailureAnalysis,
  type FailureReason,
  type FingerprintComparison,
  type TrustFileStatus,
  type ValidationIssue,
} from '../types/index.js';

export function analyzeFailure(
  state: DomainVerificationState,
  comparison: FingerprintComparison,
  trustStatus: TrustFileStatus,
  packageName: string,
  domain: string,
  trustIssues: readonly ValidationIssue[] = [],
  underlyingStatus?: TrustFileStatus,
): FailureAnalysis {
  const reasons: FailureReason[] = [];
  const suggestions: string[] = [];
  const url = assetLinksUrl(domain);
  const add = (reason: FailureReason, suggestion: string) => {
    if (reasons.includes(reason)) return;
    reasons.push(reason);
    suggestions.push(suggestion);
  };

  const statuses = trustStatus === 'redirect' && underlyingStatus ? [trustStatus, underlyingStatus] : [trustStatus];
  for (const status of statuses) {
    switch (status) {
      case 'not_found':
        add('ASSET_LINKS_MISSING',
          `Publish assetlinks.json at ${url} with the package name and SHA-256 fingerprint of ${packageName}.`);
        break;
      case 'invalid_json':
        add('ASSET_LINKS_INVALID_JSON',
          `Fix the JSON syntax of ${url}; the file must be a JSON array of statements.`);
        break;
      case 'network_error':
        if (trustIssues.some(i => i.code === 'DNS_FAILURE')) {
          add('DNS_FAILURE',
            `${domain} does not resolve. Check the DNS records for the domain.`);
        } else {
          add('ASSET_LINKS_NETWORK_ERROR',
            `Check that ${domain} is reachable over HTTPS with a valid certificate and that the host serves ${url}.`);
        }
        break;
      case 'redirect':
        add('ASSET_LINKS_REDIRECT',
          `Serve ${url} directly with a 200 response; Android does not follow redirects for assetlinks.json.`);
        break;
      case 'invalid_content_type':
        add('ASSET_LINKS_INVALID_CONTENT_TYPE',
          `Serve ${url} with "Content-Type: application/json".`);
        break;
      case 'fingerprint_mismatch':
      case 'valid':
        break;
    }
  }

  if (comparison.kind === 'mismatch' || statuses.includes('fingerprint_mismatch')) {
    const local = comparison.kind === 'mismatch' ? `: ${comparison.localFingerprint}` : '';
    add('FINGERPRINT_MISMATCH',
      `Update sha256_cert_fingerprints in ${url} to the app signing certificate${local}, or re-sign the app with a declared certificate.`);
  }
  if (comparison.kind === 'no_remote_fingerprint') {
    add('PACKAGE_NOT_IN_ASSET_LINKS',
      `Add a statement for ${packageName} with relation delegate_permission/common.handle_all_urls to ${url}.`);
  }

  if (reasons.length === 0 && !isSuccessfulState(state)) {
    add('UNKNOWN',
      `Verification failed for an unknown reason. Run 'adb shell pm verify-app-links --re-verify ${packageName}' and check logcat for details.`);
  }

  return { reasons, suggestions };
}
