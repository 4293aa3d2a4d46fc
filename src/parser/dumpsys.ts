/**
 * applink-doctor — Parser for `dumpsys package domain-preferred-apps` (API ≤ 30).
 *
 * Example output:
 *
 *   App linkages for user 0:
 *   Package: com.example.app
 *     Domains: example.com www.example.com
 *     Status: always : 200000001
 *
 * Records are tied to a package by adjacency only. The dump never carries
 * signing certificates, so DomainRecord.fingerprint is always absent.
 */

import type { AppLinkProfile, DomainVerificationState } from '../types/index.js';

interface PendingPackage {
  packageName: string;
  domains: string[];
  state?: DomainVerificationState;
}

export function parseLegacyStatus(status: string): DomainVerificationState {
  const token = status.trim().toLowerCase().match(/^[a-z-]+/)?.[0] ?? '';
  switch (token) {
    case 'always': return 'approved';
    case 'never': return 'denied';
    case 'ask':
    case 'always-ask':
    case 'undefined':
    case '':
      return 'unverified';
    default:
      return 'legacy_failure';
  }
}

export function parseDumpsys(output: string): AppLinkProfile[] {
  const profiles: AppLinkProfile[] = [];
  let pending: PendingPackage | null = null;

  const flush = () => {
    if (!pending) return;
    const state = pending.state ?? 'unverified';
    profiles.push({
      packageName: pending.packageName,
      domains: pending.domains.map(domain => ({ domain, state })),
    });
    pending = null;
  };

  for (const line of output.split(/\r?\n/)) {
    const trimmed = line.trim();

    if (trimmed.startsWith('Package:')) {
      flush();
      const packageName = trimmed.slice('Package:'.length).trim();
      if (packageName) pending = { packageName, domains: [] };
    } else if (pending && trimmed.startsWith('Domains:')) {
      pending.domains = trimmed.slice('Domains:'.length).trim().split(/\s+/).filter(Boolean);
    } else if (pending && trimmed.startsWith('Status:')) {
      pending.state = parseLegacyStatus(trimmed.slice('Status:'.length));
      flush();
    }
  }
  flush();

  return profiles;
}
