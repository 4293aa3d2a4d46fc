/**
 * applink-doctor — Parser for `pm get-app-links` (API 31+).
 *
 * Example output:
 *
 *   com.example.app:
 *     ID: 01234567-89ab-cdef-0123-456789abcdef
 *     Signatures: [AA:BB:CC:...]
 *     Domain verification state:
 *       example.com: verified
 *       www.example.com: none
 */

import type { AppLinkProfile, DomainRecord, DomainVerificationState } from '../types/index.js';

const PACKAGE_LINE = /^[a-zA-Z][a-zA-Z0-9_]*(\.[a-zA-Z][a-zA-Z0-9_]*)+:$/;
const DOMAIN_SECTION = 'Domain verification state:';

interface PackageBlock {
  packageName: string;
  signature?: string;
  domains: { domain: string; state: DomainVerificationState }[];
}

export function parseModernState(token: string): DomainVerificationState {
  switch (token.trim().toLowerCase()) {
    case 'verified': return 'verified';
    case 'none': return 'unverified';
    case 'legacy_failure': return 'legacy_failure';
    default: return 'unknown';
  }
}

/**
 * Parse `pm get-app-links` output into one profile per package, in input order.
 * Packages without domains still produce a profile. Unrecognised text yields [].
 */
export function parseGetAppLinks(output: string): AppLinkProfile[] {
  const blocks: PackageBlock[] = [];
  let current: PackageBlock | null = null;
  let inDomainSection = false;

  for (const line of output.split(/\r?\n/)) {
    const trimmed = line.trim();

    if (PACKAGE_LINE.test(trimmed)) {
      current = { packageName: trimmed.slice(0, -1), domains: [] };
      blocks.push(current);
      inDomainSection = false;
      continue;
    }
    if (!current) continue;

    if (trimmed.startsWith('Signatures:')) {
      current.signature = parseSignatures(trimmed);
      inDomainSection = false;
    } else if (trimmed === DOMAIN_SECTION) {
      inDomainSection = true;
    } else if (isMetadataLine(trimmed)) {
      inDomainSection = false;
    } else if (inDomainSection) {
      const entry = parseDomainLine(trimmed);
      if (entry) current.domains.push(entry);
    }
  }

  return blocks.map(toProfile);
}

function toProfile(block: PackageBlock): AppLinkProfile {
  const domains: DomainRecord[] = block.domains.map(d =>
    block.signature !== undefined ? { ...d, fingerprint: block.signature } : { ...d },
  );
  return { packageName: block.packageName, domains };
}

function isMetadataLine(trimmed: string): boolean {
  return trimmed === ''
    || trimmed.startsWith('ID:')
    || trimmed.startsWith('Signatures:')
    || trimmed.startsWith('User ');
}

/** "Signatures: [AA:BB, CC:DD]" → "AA:BB" (first signer) */
function parseSignatures(trimmed: string): string | undefined {
  const value = trimmed.slice('Signatures:'.length).trim().replace(/^\[/, '').replace(/\]$/, '');
  const first = value.split(',')[0]?.trim();
  return first ? first : undefined;
}

function parseDomainLine(trimmed: string): { domain: string; state: DomainVerificationState } | null {
  const colon = trimmed.lastIndexOf(':');
  if (colon <= 0) return null;
  const domain = trimmed.slice(0, colon).trim();
  if (domain === '' || domain.includes(' ')) return null;
  return { domain, state: parseModernState(trimmed.slice(colon + 1)) };
}
