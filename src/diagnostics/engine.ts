/**
 * applink-doctor — Diagnostics engine.
 *
 * A run moves through resolving_os_level → querying_device →
 * locating_package → analyzing_domains → assembled. Failures in the first
 * three phases end the run with a DiagnosticsError; anything that goes wrong
 * for a single domain is folded into that domain's diagnostic instead.
 */

import { AdbError, type DeviceChannel } from '../adb/executor.js';
import { analyzeFailure } from '../analyzer/failure.js';
import { compareFingerprints } from '../analyzer/fingerprint.js';
import type { AssetLinksValidator, ValidationExpectation } from '../assetlinks/validate.js';
import { parseDeviceList, parseLogcatLine, parserFor } from '../parser/index.js';
import {
  INTENT_ACTION_PATTERN,
  URI_PATTERN,
  intentCommand,
  isApplicationId,
  selectStrategy,
  type CommandStrategy,
  type IntentConfig,
} from '../strategy/index.js';
import {
  err,
  isSuccessfulState,
  ok,
  type AppLinkProfile,
  type Device,
  type DiagnosticsReport,
  type DomainDiagnostic,
  type DomainRecord,
  type LogEntry,
  type OsGeneration,
  type Result,
  type TrustFileValidation,
} from '../types/index.js';
import { DiagnosticsError } from './errors.js';

// ─── Options ─────────────────────────────────────────────────────────

export type DiagnosticsPhase =
  | 'resolving_os_level'
  | 'querying_device'
  | 'locating_package'
  | 'analyzing_domains'
  | 'assembled';

export interface AnalyzeOptions {
  signal?: AbortSignal;
  onProgress?: (phase: DiagnosticsPhase, detail: string) => void;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface LogStreamOptions extends CallOptions {
  /** Only yield entries classified as an app-link event. */
  eventsOnly?: boolean;
}

export interface AppLinksListing {
  sdkLevel: number;
  osGeneration: OsGeneration;
  profiles: AppLinkProfile[];
}

interface ResolvedStrategy {
  sdkLevel: number;
  strategy: CommandStrategy;
}

// ─── Engine ──────────────────────────────────────────────────────────

export class DiagnosticsEngine {
  constructor(
    private readonly device: DeviceChannel,
    private readonly validator: AssetLinksValidator,
  ) {}

  async listDevices(options: CallOptions = {}): Promise<Result<Device[], DiagnosticsError>> {
    const result = await this.device.run(['devices', '-l'], { signal: options.signal });
    if (!result.ok) return err(this.deviceFailure('adb devices -l', result.error));
    return ok(parseDeviceList(result.value));
  }

  async getSdkLevel(deviceId: string, options: CallOptions = {}): Promise<Result<number, DiagnosticsError>> {
    const command = 'getprop ro.build.version.sdk';
    const result = await this.device.runOnDevice(deviceId, command, { signal: options.signal });
    if (!result.ok) return err(this.deviceFailure(command, result.error));

    // adb may print daemon start-up notices ahead of the value.
    const raw = lastLine(result.value);
    if (!/^\d+$/.test(raw)) return err(DiagnosticsError.sdkLevelUnparseable(result.value));
    return ok(Number.parseInt(raw, 10));
  }

  async getAppLinks(
    deviceId: string,
    packageFilter?: string,
    options: CallOptions = {},
  ): Promise<Result<AppLinksListing, DiagnosticsError>> {
    if (packageFilter !== undefined && !isApplicationId(packageFilter)) {
      return err(DiagnosticsError.invalidPackageName(packageFilter));
    }
    const resolved = await this.resolveStrategy(deviceId, options.signal);
    if (!resolved.ok) return resolved;
    const { sdkLevel, strategy } = resolved.value;

    const profiles = await this.queryProfiles(deviceId, strategy, packageFilter, options.signal);
    if (!profiles.ok) return profiles;
    return ok({ sdkLevel, osGeneration: strategy.generation, profiles: profiles.value });
  }

  /** Ask the device to run domain verification again. Returns the command output. */
  async forceReverify(
    deviceId: string,
    packageName: string,
    options: CallOptions = {},
  ): Promise<Result<string, DiagnosticsError>> {
    if (!isApplicationId(packageName)) return err(DiagnosticsError.invalidPackageName(packageName));
    const resolved = await this.resolveStrategy(deviceId, options.signal);
    if (!resolved.ok) return resolved;

    const command = resolved.value.strategy.reverifyCommand(packageName);
    const result = await this.device.runOnDevice(deviceId, command, { signal: options.signal });
    if (!result.ok) return err(this.deviceFailure(command, result.error));
    return ok(result.value);
  }

  /** Live verification-related logcat entries. Ends when the signal aborts. */
  async *streamVerificationLogs(deviceId: string, options: LogStreamOptions = {}): AsyncIterable<LogEntry> {
    const resolved = await this.resolveStrategy(deviceId, options.signal);
    if (!resolved.ok) throw resolved.error;

    const command = `logcat -v time ${resolved.value.strategy.verificationLogFilter()}`;
    for await (const line of this.streamLines(deviceId, command, options.signal)) {
      const entry = parseLogcatLine(line);
      if (!entry) continue;
      if (options.eventsOnly && !entry.event) continue;
      yield entry;
    }
  }

  /**
   * Open a URI on the device with `am start` and stream the command output,
   * showing which activity the system resolves the link to.
   */
  async *fireIntent(deviceId: string, config: IntentConfig, options: CallOptions = {}): AsyncIterable<string> {
    const invalid = checkIntent(config);
    if (invalid) throw invalid;
    yield* this.streamLines(deviceId, intentCommand(config), options.signal);
  }

  validateDomain(domain: string, expect?: ValidationExpectation, options: CallOptions = {}): Promise<TrustFileValidation> {
    return this.validator.validate(domain, { signal: options.signal, expect });
  }

  async analyzeVerification(
    deviceId: string,
    packageName: string,
    options: AnalyzeOptions = {},
  ): Promise<Result<DiagnosticsReport, DiagnosticsError>> {
    const { signal } = options;
    const progress = options.onProgress ?? (() => {});
    if (!isApplicationId(packageName)) return err(DiagnosticsError.invalidPackageName(packageName));

    progress('resolving_os_level', `Reading SDK level of ${deviceId}`);
    const resolved = await this.resolveStrategy(deviceId, signal);
    if (!resolved.ok) return resolved;
    const { sdkLevel, strategy } = resolved.value;

    progress('querying_device', `API ${sdkLevel} (${strategy.generation}): ${strategy.listLinksCommand(packageName)}`);
    const profiles = await this.queryProfiles(deviceId, strategy, packageName, signal);
    if (!profiles.ok) return profiles;

    progress('locating_package', `Looking for ${packageName} in ${profiles.value.length} profile(s)`);
    const profile = profiles.value.find(p => p.packageName === packageName);
    if (!profile) return err(DiagnosticsError.packageNotFound(packageName));
    const deviceFingerprint = profile.domains[0]?.fingerprint;

    progress('analyzing_domains', `Checking ${profile.domains.length} domain(s)`);
    const domains = await Promise.all(
      profile.domains.map(record => this.diagnoseDomain(record, packageName, deviceFingerprint, signal)),
    );
    if (signal?.aborted) return err(DiagnosticsError.cancelled());

    const report = buildReport({
      packageName,
      deviceId,
      sdkLevel,
      osGeneration: strategy.generation,
      domains,
      deviceFingerprint,
    });
    progress('assembled', `${report.verifiedCount}/${report.domainCount} domain(s) verified`);
    return ok(report);
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private async resolveStrategy(deviceId: string, signal?: AbortSignal): Promise<Result<ResolvedStrategy, DiagnosticsError>> {
    const level = await this.getSdkLevel(deviceId, { signal });
    if (!level.ok) return level;
    return ok({ sdkLevel: level.value, strategy: selectStrategy(level.value) });
  }

  private async queryProfiles(
    deviceId: string,
    strategy: CommandStrategy,
    packageFilter: string | undefined,
    signal?: AbortSignal,
  ): Promise<Result<AppLinkProfile[], DiagnosticsError>> {
    const command = strategy.listLinksCommand(packageFilter);
    const result = await this.device.runOnDevice(deviceId, command, { signal });
    if (!result.ok) {
      // The legacy filter pipes through grep, which exits 1 when nothing matches.
      const noMatch = strategy.generation === 'legacy' && packageFilter !== undefined
        && result.error.kind === 'exit' && result.error.exitCode === 1 && !result.error.output?.trim();
      if (!noMatch) return err(this.deviceFailure(command, result.error));
      return ok([]);
    }
    return ok(parserFor(strategy.generation)(result.value));
  }

  private async diagnoseDomain(
    record: DomainRecord,
    packageName: string,
    deviceFingerprint: string | undefined,
    signal?: AbortSignal,
  ): Promise<DomainDiagnostic> {
    const validation = await this.validator.validate(record.domain, { signal });
    const comparison = compareFingerprints(deviceFingerprint, packageName, validation.content);
    const analysis = analyzeFailure(
      record.state,
      comparison,
      validation.status,
      packageName,
      record.domain,
      validation.issues,
      validation.underlyingStatus,
    );
    return {
      domain: record.domain,
      state: record.state,
      fingerprintComparison: comparison,
      trustStatus: validation.status,
      ...(validation.underlyingStatus ? { underlyingStatus: validation.underlyingStatus } : {}),
      trustIssues: validation.issues,
      failureReasons: analysis.reasons,
      suggestions: analysis.suggestions,
    };
  }

  private async *streamLines(deviceId: string, command: string, signal?: AbortSignal): AsyncIterable<string> {
    try {
      yield* this.device.streamOnDevice(deviceId, command, { signal });
    } catch (e) {
      if (e instanceof AdbError) throw this.deviceFailure(command, e);
      throw e;
    }
  }

  private deviceFailure(command: string, error: AdbError): DiagnosticsError {
    if (error.kind === 'aborted') return DiagnosticsError.cancelled();
    return DiagnosticsError.commandFailed(command, error);
  }
}

function lastLine(output: string): string {
  const lines = output.split(/\r?\n/).map(l => l.trim()).filter(l => l.length > 0);
  return lines[lines.length - 1] ?? '';
}

function checkIntent(config: IntentConfig): DiagnosticsError | null {
  if (!URI_PATTERN.test(config.uri)) {
    return DiagnosticsError.invalidArgument(`Invalid URI: "${config.uri}" (expected scheme:rest without whitespace)`);
  }
  if (config.action !== undefined && !INTENT_ACTION_PATTERN.test(config.action)) {
    return DiagnosticsError.invalidArgument(`Invalid intent action: "${config.action}"`);
  }
  if (config.packageName !== undefined && !isApplicationId(config.packageName)) {
    return DiagnosticsError.invalidPackageName(config.packageName);
  }
  return null;
}

// ─── Report assembly ─────────────────────────────────────────────────

export function buildReport(input: {
  packageName: string;
  deviceId: string;
  sdkLevel: number;
  osGeneration: OsGeneration;
  domains: DomainDiagnostic[];
  deviceFingerprint?: string;
}): DiagnosticsReport {
  const verifiedCount = input.domains.filter(d => isSuccessfulState(d.state)).length;
  return {
    packageName: input.packageName,
    deviceId: input.deviceId,
    sdkLevel: input.sdkLevel,
    osGeneration: input.osGeneration,
    domains: input.domains,
    ...(input.deviceFingerprint !== undefined ? { deviceFingerprint: input.deviceFingerprint } : {}),
    domainCount: input.domains.length,
    verifiedCount,
    failedCount: input.domains.length - verifiedCount,
    hasIssues: input.domains.some(d => d.failureReasons.length > 0),
  };
}
