/**
 * applink-doctor — `am start` commands for opening a URI on a device.
 *
 * Firing a VIEW intent shows which app the system actually resolves a link
 * to, which is the end-to-end check after verification.
 */

import { shellQuote } from './shell.js';

export const ACTION_VIEW = 'android.intent.action.VIEW';

export const INTENT_FLAG_NAMES = ['new-task', 'clear-top', 'single-top', 'clear-task'] as const;

export type IntentFlag = (typeof INTENT_FLAG_NAMES)[number];

const INTENT_FLAGS: Record<IntentFlag, string> = {
  'new-task': '--activity-new-task',
  'clear-top': '--activity-clear-top',
  'single-top': '--activity-single-top',
  'clear-task': '--activity-clear-task',
};

export function isIntentFlag(name: string): name is IntentFlag {
  return INTENT_FLAG_NAMES.some(f => f === name);
}

export interface IntentConfig {
  uri: string;
  /** Defaults to android.intent.action.VIEW. */
  action?: string;
  flags?: readonly IntentFlag[];
  /** Restrict resolution to one package. */
  packageName?: string;
}

/**
 * Build the shell command, e.g.
 * `am start -a android.intent.action.VIEW -d 'https://example.com/x' --activity-new-task -p com.example.app`.
 * Callers validate action and package name first; the URI is always quoted.
 */
export function intentCommand(config: IntentConfig): string {
  const parts = ['am', 'start', '-a', config.action ?? ACTION_VIEW, '-d', shellQuote(config.uri)];
  for (const flag of new Set(config.flags ?? [])) parts.push(INTENT_FLAGS[flag]);
  if (config.packageName) parts.push('-p', config.packageName);
  return parts.join(' ');
}
