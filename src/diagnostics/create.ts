/**
 * applink-doctor — Wire a DiagnosticsEngine from resolved configuration.
 */

import { AdbExecutor } from '../adb/executor.js';
import { FetchHttpClient } from '../assetlinks/fetcher.js';
import { AssetLinksValidator } from '../assetlinks/validate.js';
import type { AppConfig } from '../config/index.js';
import { VERSION } from '../version.js';
import { DiagnosticsEngine } from './engine.js';

export function createEngine(config: AppConfig): DiagnosticsEngine {
  const device = new AdbExecutor(config.adbPath, config.commandTimeoutMs);
  const validator = new AssetLinksValidator(new FetchHttpClient(`applink-doctor/${VERSION}`), {
    timeoutMs: config.httpTimeoutMs,
    maxRedirects: config.maxRedirects,
    strictContentType: config.strictContentType,
  });
  return new DiagnosticsEngine(device, validator);
}
