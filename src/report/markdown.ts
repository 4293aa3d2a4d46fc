/**
 * applink-doctor — Markdown export of a diagnostics report.
 */

import type { DiagnosticsReport, FingerprintComparison } from '../types/index.js';

function comparisonLabel(c: FingerprintComparison): string {
  switch (c.kind) {
    case 'match': return 'match';
    case 'mismatch': return 'mismatch';
    case 'no_local_fingerprint': return 'no device fingerprint';
    case 'remote_unavailable': return 'trust file unavailable';
    case 'no_remote_fingerprint': return 'package not declared';
  }
}

export function formatReportMarkdown(report: DiagnosticsReport): string {
  const lines: string[] = [];

  // ── Header ──
  lines.push(`# App Links Diagnostics — ${report.packageName}`);
  lines.push('');
  lines.push(`> Device: ${report.deviceId} | API ${report.sdkLevel} (${report.osGeneration})  `);
  lines.push(`> Device fingerprint: ${report.deviceFingerprint ? `\`${report.deviceFingerprint}\`` : 'not reported'}`);
  lines.push('');

  // ── Summary ──
  lines.push('## Summary');
  lines.push('');
  lines.push('| Metric | Count |');
  lines.push('|--------|-------|');
  lines.push(`| Domains | ${report.domainCount} |`);
  lines.push(`| Verified | ${report.verifiedCount} |`);
  lines.push(`| Failed | ${report.failedCount} |`);
  lines.push('');

  if (report.domainCount === 0) {
    lines.push('No domains are declared for this package.');
    lines.push('');
    return lines.join('\n');
  }

  // ── Domains ──
  lines.push('## Domains');
  lines.push('');
  lines.push('| Domain | State | Trust file | Fingerprint | Reasons |');
  lines.push('|--------|-------|------------|-------------|---------|');
  for (const d of report.domains) {
    const reasons = d.failureReasons.length > 0 ? d.failureReasons.join(', ') : '—';
    const trust = d.underlyingStatus ? `${d.trustStatus} → ${d.underlyingStatus}` : d.trustStatus;
    lines.push(`| ${d.domain} | ${d.state} | ${trust} | ${comparisonLabel(d.fingerprintComparison)} | ${reasons} |`);
  }
  lines.push('');

  // ── Remediation ──
  const failing = report.domains.filter(d => d.failureReasons.length > 0 || d.trustIssues.length > 0);
  if (failing.length > 0) {
    lines.push('## Remediation');
    lines.push('');
    for (const d of failing) {
      lines.push(`### ${d.domain}`);
      lines.push('');
      d.failureReasons.forEach((reason, i) => {
        lines.push(`- **${reason}**: ${d.suggestions[i] ?? ''}`);
      });
      if (d.trustIssues.length > 0) {
        if (d.failureReasons.length > 0) lines.push('');
        lines.push('Trust file issues:');
        lines.push('');
        for (const issue of d.trustIssues) {
          lines.push(`- \`${issue.code}\` (${issue.severity}): ${issue.message}`);
        }
      }
      lines.push('');
    }
  }

  return lines.join('\n');
}
