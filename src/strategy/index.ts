/**
 * applink-doctor — Command strategy selection.
 *
 * Android 12 (API 31) replaced the package-dump based link preferences with
 * the domain verification service. This is the only place that branches on
 * the API level; everything downstream consumes the returned strategy.
 */

import { MODERN_SDK_LEVEL, type OsGeneration } from '../types/index.js';

export { APPLICATION_ID_PATTERN, INTENT_ACTION_PATTERN, URI_PATTERN, isApplicationId, shellQuote } from './shell.js';
export { ACTION_VIEW, INTENT_FLAG_NAMES, intentCommand, isIntentFlag, type IntentConfig, type IntentFlag } from './intent.js';

/** Package names reach these commands unquoted; callers check them with isApplicationId. */
export interface CommandStrategy {
  readonly generation: OsGeneration;
  /** Shell command listing app links, optionally filtered to one package. */
  listLinksCommand(packageFilter?: string): string;
  /** Shell command that resets or re-runs verification for a package. */
  reverifyCommand(packageName: string): string;
  /** logcat filter expression selecting verification-related tags. */
  verificationLogFilter(): string;
}

const legacyStrategy: CommandStrategy = {
  generation: 'legacy',
  listLinksCommand(packageFilter) {
    return packageFilter
      ? `dumpsys package domain-preferred-apps | grep -A 5 ${packageFilter}`
      : 'dumpsys package domain-preferred-apps';
  },
  reverifyCommand(packageName) {
    return `pm set-app-links --package ${packageName} 0 all`;
  },
  verificationLogFilter() {
    return 'IntentFilterIntentOp:V SingleTaskInstance:V *:S';
  },
};

const modernStrategy: CommandStrategy = {
  generation: 'modern',
  listLinksCommand(packageFilter) {
    return packageFilter ? `pm get-app-links ${packageFilter}` : 'pm get-app-links';
  },
  reverifyCommand(packageName) {
    return `pm verify-app-links --re-verify ${packageName}`;
  },
  verificationLogFilter() {
    return 'IntentFilterIntentOp:V DomainVerification:V *:S';
  },
};

export function osGenerationFor(apiLevel: number): OsGeneration {
  return apiLevel >= MODERN_SDK_LEVEL ? 'modern' : 'legacy';
}

export function selectStrategy(apiLevel: number): CommandStrategy {
  return osGenerationFor(apiLevel) === 'modern' ? modernStrategy : legacyStrategy;
}
