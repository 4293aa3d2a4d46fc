/**
 * applink-doctor — Configuration resolution.
 *
 * Resolution order (highest to lowest priority), applied per key:
 *   1. Explicit CLI flags (never persisted)
 *   2. APPLINK_DOCTOR_* env vars
 *   3. Project config: .applink-doctor/config.json
 *   4. Global config: ~/.config/applink-doctor/config.json
 *   5. Built-in defaults
 *
 * Unreadable or invalid config files are ignored.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { err, ok, type Result } from '../types/index.js';

// ─── Types ───────────────────────────────────────────────────────────

export interface AppConfig {
  /** adb binary; a bare name is looked up on PATH. */
  adbPath: string;
  httpTimeoutMs: number;
  commandTimeoutMs: number;
  maxRedirects: number;
  strictContentType: boolean;
}

export type ConfigKey = keyof AppConfig;
export type ConfigSource = 'flag' | 'env' | 'project' | 'global' | 'default';

export interface ResolvedConfig {
  config: AppConfig;
  sources: Record<ConfigKey, ConfigSource>;
}

export interface ConfigLocation {
  /** Project root holding .applink-doctor/. */
  root: string;
  /** Home directory for the global config. Defaults to os.homedir(). */
  home?: string;
}

export interface ResolveOptions extends ConfigLocation {
  flags?: Partial<AppConfig>;
  env?: NodeJS.ProcessEnv;
}

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'adbPath',
  'httpTimeoutMs',
  'commandTimeoutMs',
  'maxRedirects',
  'strictContentType',
];

export const DEFAULT_CONFIG: AppConfig = {
  adbPath: 'adb',
  httpTimeoutMs: 10_000,
  commandTimeoutMs: 30_000,
  maxRedirects: 3,
  strictContentType: false,
};

export const ENV_VARS: Record<ConfigKey, string> = {
  adbPath: 'APPLINK_DOCTOR_ADB_PATH',
  httpTimeoutMs: 'APPLINK_DOCTOR_HTTP_TIMEOUT_MS',
  commandTimeoutMs: 'APPLINK_DOCTOR_COMMAND_TIMEOUT_MS',
  maxRedirects: 'APPLINK_DOCTOR_MAX_REDIRECTS',
  strictContentType: 'APPLINK_DOCTOR_STRICT_CONTENT_TYPE',
};

const CONFIG_DIR = '.applink-doctor';
const CONFIG_FILE = 'config.json';

// ─── Schemas ─────────────────────────────────────────────────────────

/** Shape of a saved config file. */
const SavedConfigSchema = z.object({
  adbPath: z.string().min(1).optional(),
  httpTimeoutMs: z.number().int().positive().optional(),
  commandTimeoutMs: z.number().int().positive().optional(),
  maxRedirects: z.number().int().min(0).optional(),
  strictContentType: z.boolean().optional(),
});

export type SavedConfig = z.infer<typeof SavedConfigSchema>;

/** Same keys, read from strings (env vars, flags, `config set`). */
const TextConfigSchema = z.object({
  adbPath: z.string().min(1).optional(),
  httpTimeoutMs: z.coerce.number().int().positive().optional(),
  commandTimeoutMs: z.coerce.number().int().positive().optional(),
  maxRedirects: z.coerce.number().int().min(0).optional(),
  strictContentType: z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform(v => v === 'true' || v === '1' || v === 'yes')
    .optional(),
});

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some(k => k === key);
}

/** Parse string-valued settings into typed config values. */
export function parseConfigValues(values: Partial<Record<ConfigKey, string>>): Result<SavedConfig, string> {
  const parsed = TextConfigSchema.safeParse(values);
  if (parsed.success) return ok(parsed.data);
  return err(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
}

function single(key: ConfigKey, raw: string): Partial<Record<ConfigKey, string>> {
  const values: Partial<Record<ConfigKey, string>> = {};
  values[key] = raw;
  return values;
}

// ─── Config file paths ───────────────────────────────────────────────

export function projectConfigPath(root: string): string {
  return join(root, CONFIG_DIR, CONFIG_FILE);
}

export function globalConfigPath(home: string = homedir()): string {
  return join(home, '.config', 'applink-doctor', CONFIG_FILE);
}

// ─── Read/write helpers ──────────────────────────────────────────────

function readJsonFile(path: string): SavedConfig | null {
  if (!existsSync(path)) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch {
    return null;
  }
  const parsed = SavedConfigSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function writeJsonFile(path: string, data: SavedConfig): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(data, null, 2) + '\n');
}

// ─── Unified resolution ──────────────────────────────────────────────

/** Env vars with invalid values are skipped individually. */
function readEnv(env: NodeJS.ProcessEnv): SavedConfig {
  const result: SavedConfig = {};
  for (const key of CONFIG_KEYS) {
    const raw = env[ENV_VARS[key]];
    if (raw === undefined || raw === '') continue;
    const parsed = parseConfigValues(single(key, raw));
    if (parsed.ok) Object.assign(result, parsed.value);
  }
  return result;
}

type Layer = [ConfigSource, SavedConfig];

function pick<T>(layers: Layer[], get: (layer: SavedConfig) => T | undefined, fallback: T): { value: T; source: ConfigSource } {
  for (const [source, layer] of layers) {
    const value = get(layer);
    if (value !== undefined) return { value, source };
  }
  return { value: fallback, source: 'default' };
}

export function resolveConfig(options: ResolveOptions): ResolvedConfig {
  const layers: Layer[] = [
    ['flag', options.flags ?? {}],
    ['env', readEnv(options.env ?? process.env)],
    ['project', readJsonFile(projectConfigPath(options.root)) ?? {}],
    ['global', readJsonFile(globalConfigPath(options.home)) ?? {}],
  ];

  const adbPath = pick(layers, l => l.adbPath, DEFAULT_CONFIG.adbPath);
  const httpTimeoutMs = pick(layers, l => l.httpTimeoutMs, DEFAULT_CONFIG.httpTimeoutMs);
  const commandTimeoutMs = pick(layers, l => l.commandTimeoutMs, DEFAULT_CONFIG.commandTimeoutMs);
  const maxRedirects = pick(layers, l => l.maxRedirects, DEFAULT_CONFIG.maxRedirects);
  const strictContentType = pick(layers, l => l.strictContentType, DEFAULT_CONFIG.strictContentType);

  return {
    config: {
      adbPath: adbPath.value,
      httpTimeoutMs: httpTimeoutMs.value,
      commandTimeoutMs: commandTimeoutMs.value,
      maxRedirects: maxRedirects.value,
      strictContentType: strictContentType.value,
    },
    sources: {
      adbPath: adbPath.source,
      httpTimeoutMs: httpTimeoutMs.source,
      commandTimeoutMs: commandTimeoutMs.source,
      maxRedirects: maxRedirects.source,
      strictContentType: strictContentType.source,
    },
  };
}

// ─── Save/load for `applink-doctor config` ───────────────────────────

export function loadProjectConfig(root: string): SavedConfig | null {
  return readJsonFile(projectConfigPath(root));
}

export function loadGlobalConfig(home?: string): SavedConfig | null {
  return readJsonFile(globalConfigPath(home));
}

/**
 * Persist one key to the project (or global) config file, keeping the
 * other keys. Returns the path written.
 */
export function setConfigValue(
  location: ConfigLocation & { global?: boolean },
  key: string,
  rawValue: string,
): Result<string, string> {
  if (!isConfigKey(key)) {
    return err(`Unknown config key "${key}". Valid keys: ${CONFIG_KEYS.join(', ')}`);
  }
  const parsed = parseConfigValues(single(key, rawValue));
  if (!parsed.ok) return parsed;

  const path = location.global ? globalConfigPath(location.home) : projectConfigPath(location.root);
  const current = readJsonFile(path) ?? {};
  writeJsonFile(path, { ...current, ...parsed.value });
  return ok(path);
}

/** Human-readable label for where a value came from. */
export function describeSource(key: ConfigKey, source: ConfigSource): string {
  switch (source) {
    case 'flag': return 'CLI flag';
    case 'env': return `${ENV_VARS[key]} env var`;
    case 'project': return `${CONFIG_DIR}/${CONFIG_FILE}`;
    case 'global': return `~/.config/applink-doctor/${CONFIG_FILE}`;
    case 'default': return 'default';
  }
}
