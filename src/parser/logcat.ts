/**
 * applink-doctor — Parser for `logcat -v time` lines.
 *
 *   01-15 12:34:56.789 I/IntentFilterIntentOp( 1234): Verifying IntentFilter. verificationId:3 scheme:"https" hosts:"example.com"
 *   01-15 12:34:57.012 D/DomainVerification( 1234): Verification for example.com returned 1 (verified)
 */

import type { LinkEventKind, LogEntry, LogLevel } from '../types/index.js';

const LOGCAT_TIME = /^(\d{2}-\d{2}\s+\d{2}:\d{2}:\d{2}\.\d+)\s+([VDIWEF])\/(.+?)\s*\(\s*\d+\):\s*(.*)$/;
const DAT = /dat=(\S+)/;
const MAX_DESCRIPTION = 120;

const LEVELS: Record<string, LogLevel> = {
  V: 'verbose', D: 'debug', I: 'info', W: 'warning', E: 'error', F: 'fatal',
};

const VERIFICATION_TAGS = new Set(['IntentFilterIntentOp', 'DomainVerification', 'SingleTaskInstance']);

function classify(tag: string, message: string): LogEntry['event'] {
  const short = message.trim().slice(0, MAX_DESCRIPTION);
  let kind: LinkEventKind | null = null;

  if (/error|exception|fail/i.test(message)) kind = 'error';
  else if (VERIFICATION_TAGS.has(tag) || /verif/i.test(message)) kind = 'verification';
  else if (tag === 'ActivityTaskManager' && message.includes('START')) kind = 'started';
  else if (tag === 'IntentResolver' && message.includes('Resolv')) kind = 'resolved';

  if (!kind) return undefined;
  const dat = message.match(DAT);
  return { kind, description: dat ? `${kind}: ${dat[1]}` : short };
}

/** Returns null for blank lines and logcat buffer separators. */
export function parseLogcatLine(line: string): LogEntry | null {
  if (!line.trim() || line.startsWith('---')) return null;

  const m = line.match(LOGCAT_TIME);
  if (!m) {
    return { timestamp: '', level: 'unknown', tag: '', message: line.trim() };
  }

  const [, timestamp, levelChar, tag, message] = m;
  const entry: LogEntry = {
    timestamp,
    level: LEVELS[levelChar] ?? 'unknown',
    tag,
    message,
  };
  const event = classify(tag, message);
  if (event) entry.event = event;
  return entry;
}
