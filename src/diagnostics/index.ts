/**
 * applink-doctor — Diagnostics orchestration, public API.
 */

export { DiagnosticsEngine, buildReport } from './engine.js';
export type { AnalyzeOptions, AppLinksListing, CallOptions, DiagnosticsPhase, LogStreamOptions } from './engine.js';
export { DiagnosticsError, type DiagnosticsErrorKind } from './errors.js';
