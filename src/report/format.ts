/**
 * applink-doctor — Terminal formatting.
 * Color tokens, tables, and renderers for reports, trust file checks,
 * device lists and logcat entries.
 */

import chalk from 'chalk';
import type { AppLinksListing } from '../diagnostics/engine.js';
import type {
  Device,
  DiagnosticsReport,
  DomainDiagnostic,
  DomainVerificationState,
  FingerprintComparison,
  IssueSeverity,
  LogEntry,
  TrustFileStatus,
  TrustFileValidation,
  ValidationIssue,
} from '../types/index.js';

// ─── Color tokens ────────────────────────────────────────────────────

export const C = {
  dim:      chalk.dim,
  bold:     chalk.bold,
  green:    chalk.green,
  red:      chalk.red,
  cyan:     chalk.hex('#2dd4a7'),
  magenta:  chalk.magenta,
  white:    chalk.white,
  gray:     chalk.gray,
  yellow:   chalk.yellow,
  blue:     chalk.blue,

  accent:   chalk.hex('#2dd4a7'),
  success:  chalk.green,
  warn:     chalk.yellow,
  error:    chalk.red,
  info:     chalk.blue,
};

// ─── String helpers ──────────────────────────────────────────────────

/** Strip ANSI escape codes from a string */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/[\u001b\u009b][[()#;?]*(?:[0-9]{1,4}(?:;[0-9]{0,4})*)?[0-9A-ORZcf-nqry=><]/g, '');
}

/** Truncate string to max width with ellipsis */
export function trunc(s: string, max: number): string {
  if (s.length <= max) return s;
  return s.slice(0, max - 1) + '…';
}

// ─── Table formatter ─────────────────────────────────────────────────

export interface Column {
  header: string;
  width: number;
  align?: 'left' | 'right';
}

export function formatTable(columns: Column[], rows: string[][]): string[] {
  const lines: string[] = [];

  const headerLine = columns.map(c =>
    c.align === 'right' ? c.header.padStart(c.width) : c.header.padEnd(c.width)
  ).join('  ');
  lines.push(C.dim(headerLine));
  lines.push(C.dim(columns.map(c => '─'.repeat(c.width)).join('  ')));

  for (const row of rows) {
    const cells = columns.map((c, i) => {
      const val = trunc(row[i] ?? '', c.width);
      return c.align === 'right' ? val.padStart(c.width) : val.padEnd(c.width);
    });
    lines.push(cells.join('  ').trimEnd());
  }

  return lines;
}

// ─── Labels ──────────────────────────────────────────────────────────

export function stateText(state: DomainVerificationState): string {
  switch (state) {
    case 'verified':
    case 'approved':
      return C.green(state);
    case 'denied':
    case 'legacy_failure':
      return C.red(state);
    case 'unverified':
    case 'unknown':
      return C.yellow(state);
  }
}

export function trustStatusText(status: TrustFileStatus): string {
  return status === 'valid' ? C.green(status) : C.red(status);
}

export function comparisonText(comparison: FingerprintComparison): string {
  switch (comparison.kind) {
    case 'match': return C.green('match');
    case 'mismatch': return C.red('mismatch');
    case 'no_local_fingerprint': return C.gray('no device fingerprint');
    case 'remote_unavailable': return C.gray('trust file unavailable');
    case 'no_remote_fingerprint': return C.red('package not declared');
  }
}

function severityColor(severity: IssueSeverity): (s: string) => string {
  if (severity === 'error') return C.error;
  if (severity === 'warning') return C.warn;
  return C.info;
}

export function formatIssue(issue: ValidationIssue): string {
  const head = severityColor(issue.severity)(`[${issue.severity}]`);
  const details = issue.details ? C.dim(` (${issue.details})`) : '';
  return `${head} ${issue.code}: ${issue.message}${details}`;
}

function field(label: string, value: string, indent = '  '): string {
  return `${indent}${C.dim(label.padEnd(13))} ${value}`;
}

// ─── Diagnostics report ──────────────────────────────────────────────

function formatDomain(d: DomainDiagnostic): string[] {
  const ok = d.failureReasons.length === 0;
  const lines: string[] = [];
  lines.push(`  ${ok ? C.green('✓') : C.red('✗')} ${C.bold(d.domain)}`);
  lines.push(field('State:', stateText(d.state), '      '));
  const trust = d.underlyingStatus
    ? `${trustStatusText(d.trustStatus)} ${C.dim('→')} ${trustStatusText(d.underlyingStatus)}`
    : trustStatusText(d.trustStatus);
  lines.push(field('Trust file:', trust, '      '));
  lines.push(field('Fingerprint:', comparisonText(d.fingerprintComparison), '      '));

  if (d.fingerprintComparison.kind === 'mismatch') {
    lines.push(field('Declared:', d.fingerprintComparison.remoteFingerprints.join(', '), '      '));
  }
  for (const issue of d.trustIssues) {
    lines.push(`      ${formatIssue(issue)}`);
  }
  d.failureReasons.forEach((reason, i) => {
    lines.push(`      ${C.red(reason)}`);
    const suggestion = d.suggestions[i];
    if (suggestion) lines.push(`        ${C.accent('→')} ${suggestion}`);
  });
  return lines;
}

export function formatReport(report: DiagnosticsReport): string {
  const lines: string[] = [];
  lines.push(C.bold('App Links Diagnostics'));
  lines.push('');
  lines.push(field('Package:', report.packageName));
  lines.push(field('Device:', `${report.deviceId} (API ${report.sdkLevel}, ${report.osGeneration})`));
  lines.push(field('Fingerprint:', report.deviceFingerprint ?? C.gray('(not reported)')));
  lines.push(field('Domains:', `${report.verifiedCount}/${report.domainCount} verified`));
  lines.push('');

  if (report.domainCount === 0) {
    lines.push(C.yellow('  No domains declared for this package.'));
  }
  for (const d of report.domains) {
    lines.push(...formatDomain(d));
    lines.push('');
  }

  const withIssues = report.domains.filter(d => d.failureReasons.length > 0).length;
  lines.push(report.hasIssues
    ? C.red(`✗ ${withIssues} domain(s) with issues`)
    : C.green('✓ No issues found'));
  return lines.join('\n');
}

// ─── Trust file validation ───────────────────────────────────────────

export function formatValidation(v: TrustFileValidation): string {
  const lines: string[] = [];
  lines.push(C.bold(v.url));
  lines.push(field('Status:', trustStatusText(v.status)));
  if (v.finalUrl) lines.push(field('Final URL:', v.finalUrl));
  if (v.underlyingStatus) lines.push(field('Final status:', trustStatusText(v.underlyingStatus)));

  if (v.content) {
    lines.push(field('Statements:', String(v.content.statements.length)));
    for (const s of v.content.statements) {
      lines.push(`    ${C.accent(s.target.packageName)}`);
      for (const fp of s.target.sha256CertFingerprints) {
        lines.push(`      ${C.dim(fp)}`);
      }
    }
  }

  if (v.issues.length === 0) {
    lines.push(C.green('  ✓ No issues found'));
  } else {
    lines.push(field('Issues:', String(v.issues.length)));
    for (const issue of v.issues) lines.push(`    ${formatIssue(issue)}`);
  }
  return lines.join('\n');
}

// ─── Devices & app links ─────────────────────────────────────────────

export function formatDevices(devices: Device[]): string {
  if (devices.length === 0) return C.yellow('No devices attached');
  const rows = devices.map(d => [d.serial, d.state, d.model, d.connection]);
  return formatTable(
    [
      { header: 'SERIAL', width: 24 },
      { header: 'STATE', width: 12 },
      { header: 'MODEL', width: 20 },
      { header: 'CONNECTION', width: 10 },
    ],
    rows,
  ).join('\n');
}

export function formatProfiles(listing: AppLinksListing): string {
  const lines: string[] = [];
  lines.push(C.dim(`API ${listing.sdkLevel} (${listing.osGeneration})`));
  if (listing.profiles.length === 0) {
    lines.push(C.yellow('No app links found'));
    return lines.join('\n');
  }
  for (const p of listing.profiles) {
    lines.push('');
    lines.push(C.bold(p.packageName));
    if (p.domains.length === 0) lines.push(C.gray('  (no domains)'));
    for (const d of p.domains) {
      lines.push(`  ${d.domain.padEnd(32)} ${stateText(d.state)}`);
    }
  }
  return lines.join('\n');
}

// ─── Logcat ──────────────────────────────────────────────────────────

const LEVEL_LETTER: Record<LogEntry['level'], string> = {
  verbose: 'V',
  debug: 'D',
  info: 'I',
  warning: 'W',
  error: 'E',
  fatal: 'F',
  unknown: '-',
};

export function formatLogEntry(entry: LogEntry): string {
  const time = entry.timestamp ? C.dim(entry.timestamp) + ' ' : '';
  if (entry.event) {
    const color = entry.event.kind === 'error' ? C.error : C.accent;
    return `${time}${color(`[${entry.event.kind}]`)} ${entry.event.description}`;
  }
  const letter = LEVEL_LETTER[entry.level];
  const level = entry.level === 'error' || entry.level === 'fatal' ? C.error(letter) : C.dim(letter);
  return `${time}${level} ${entry.tag ? `${entry.tag}: ` : ''}${entry.message}`;
}
