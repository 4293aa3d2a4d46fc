/**
 * applink-doctor
 *
 * Library entry point. Re-exports the diagnostics engine, its collaborators,
 * parsers, analyzers, report renderers and types.
 *
 * Usage:
 *   import { createEngine, resolveConfig } from 'applink-doctor';
 *   import { parseGetAppLinks, compareFingerprints } from 'applink-doctor';
 *   import type { DiagnosticsReport, DomainDiagnostic } from 'applink-doctor';
 */

export * from './types/index.js';
export * from './parser/index.js';
export * from './analyzer/index.js';
export * from './assetlinks/index.js';
export * from './adb/index.js';
export * from './diagnostics/index.js';
export { selectStrategy, osGenerationFor, type CommandStrategy } from './strategy/index.js';
export { createEngine } from './diagnostics/create.js';
export {
  resolveConfig,
  setConfigValue,
  parseConfigValues,
  loadProjectConfig,
  loadGlobalConfig,
  DEFAULT_CONFIG,
  CONFIG_KEYS,
  ENV_VARS,
} from './config/index.js';
export type { AppConfig, ConfigKey, ConfigSource, ResolvedConfig, ResolveOptions, SavedConfig } from './config/index.js';
export { formatReport, formatReportMarkdown, formatValidation, formatDevices, formatProfiles, formatLogEntry, stripAnsi } from './report/index.js';
export { createServer, startStdioServer } from './mcp/index.js';
export { VERSION } from './version.js';
