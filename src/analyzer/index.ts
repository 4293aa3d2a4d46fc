/**
 * applink-doctor — Analyzers
 */

export { compareFingerprints, fingerprintsForPackage, isSha256Fingerprint, normalizeFingerprint } from './fingerprint.js';
export { analyzeFailure } from './failure.js';
