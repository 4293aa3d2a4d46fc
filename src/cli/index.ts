#!/usr/bin/env node

/**
 * applink-doctor CLI
 *
 * Usage:
 *   applink-doctor devices                       List attached devices
 *   applink-doctor links <device> [package]      Show app links reported by a device
 *   applink-doctor diagnose <device> <package>   Diagnose App Links verification
 *   applink-doctor validate <domain>             Check a domain's assetlinks.json
 *   applink-doctor reverify <device> <package>   Re-run domain verification
 *   applink-doctor logs <device>                 Stream verification logcat
 *   applink-doctor open <device> <uri>           Open a URI with an intent
 *   applink-doctor config <action>               Show or set configuration
 *   applink-doctor mcp                           Start the MCP server (stdio)
 */

import { Command } from 'commander';
import { writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import gradient from 'gradient-string';
import {
  CONFIG_KEYS,
  describeSource,
  parseConfigValues,
  resolveConfig,
  setConfigValue,
  type ResolvedConfig,
} from '../config/index.js';
import { createEngine } from '../diagnostics/create.js';
import type { DiagnosticsEngine } from '../diagnostics/engine.js';
import { startStdioServer } from '../mcp/index.js';
import {
  C,
  formatDevices,
  formatLogEntry,
  formatProfiles,
  formatReport,
  formatReportMarkdown,
  formatValidation,
  stripAnsi,
} from '../report/index.js';
import { INTENT_FLAG_NAMES, isIntentFlag, type IntentFlag } from '../strategy/index.js';
import { VERSION } from '../version.js';

const program = new Command();

const ASCII_LOGO = `
  ▄▀█ █▀█ █▀█ █   █ █▄ █ █▄▀   █▀▄ █▀█ █▀▀ ▀█▀ █▀█ █▀█
  █▀█ █▀▀ █▀▀ █▄▄ █ █ ▀█ █ █   █▄▀ █▄█ █▄▄  █  █▄█ █▀▄
`;

interface GlobalOpts {
  adb?: string;
  httpTimeout?: string;
  commandTimeout?: string;
  maxRedirects?: string;
  strictContentType?: boolean;
}

program
  .name('applink-doctor')
  .description('Diagnose Android App Links verification: device state, assetlinks.json and certificate fingerprints.')
  .version(VERSION)
  .option('--adb <path>', 'adb binary to use')
  .option('--http-timeout <ms>', 'Timeout for each assetlinks.json request')
  .option('--command-timeout <ms>', 'Timeout for each adb command')
  .option('--max-redirects <n>', 'Redirects to follow before giving up')
  .option('--strict-content-type', 'Treat a non-JSON Content-Type as a failure')
  .addHelpText('before', gradient(['#3ddc84', '#00d4ff'])(ASCII_LOGO));

// ─── devices ─────────────────────────────────────────────────────────

program
  .command('devices')
  .description('List devices attached to adb')
  .option('--json', 'Output JSON')
  .action(async (opts: { json?: boolean }) => {
    const result = await engine().listDevices();
    if (!result.ok) fail(result.error.message);
    console.log(opts.json ? JSON.stringify(result.value, null, 2) : formatDevices(result.value));
  });

// ─── links ───────────────────────────────────────────────────────────

program
  .command('links')
  .description('Show app link domains and verification state reported by the device')
  .argument('<device>', 'adb serial of the device')
  .argument('[package]', 'Only show this package')
  .option('--json', 'Output JSON')
  .action(async (device: string, pkg: string | undefined, opts: { json?: boolean }) => {
    const result = await engine().getAppLinks(device, pkg);
    if (!result.ok) fail(result.error.message);
    console.log(opts.json ? JSON.stringify(result.value, null, 2) : formatProfiles(result.value));
  });

// ─── diagnose ────────────────────────────────────────────────────────

program
  .command('diagnose')
  .description('Diagnose App Links verification for a package on a device')
  .argument('<device>', 'adb serial of the device')
  .argument('<package>', 'Android application id')
  .option('--json', 'Output the report as JSON')
  .option('--markdown', 'Output the report as Markdown')
  .option('-o, --output <file>', 'Write the report to a file')
  .option('-v, --verbose', 'Print each diagnostic phase to stderr')
  .option('--fail-on-issues', 'Exit with code 2 when any domain has failure reasons (for CI gates)')
  .action(async (device: string, pkg: string, opts: {
    json?: boolean; markdown?: boolean; output?: string; verbose?: boolean; failOnIssues?: boolean;
  }) => {
    const signal = interruptSignal();
    const result = await engine().analyzeVerification(device, pkg, {
      signal,
      onProgress: opts.verbose
        ? (phase, detail) => console.error(C.dim(`[${phase}] ${detail}`))
        : undefined,
    });
    if (!result.ok) fail(result.error.message);

    const report = result.value;
    const text = opts.json
      ? JSON.stringify(report, null, 2)
      : opts.markdown ? formatReportMarkdown(report) : formatReport(report);

    if (opts.output) {
      const outFile = resolve(opts.output);
      writeFileSync(outFile, stripAnsi(text) + '\n');
      console.error(`✓ Wrote report to ${outFile}`);
    } else {
      console.log(text);
    }

    if (opts.failOnIssues && report.hasIssues) process.exit(2);
  });

// ─── validate ────────────────────────────────────────────────────────

program
  .command('validate')
  .description('Fetch and validate https://<domain>/.well-known/assetlinks.json')
  .argument('<domain>', 'Host name, e.g. example.com')
  .option('-p, --package <name>', 'Check that this package is declared')
  .option('-f, --fingerprint <sha256>', 'Check that this certificate fingerprint is declared (requires --package)')
  .option('--json', 'Output JSON')
  .action(async (domain: string, opts: { package?: string; fingerprint?: string; json?: boolean }) => {
    if (opts.fingerprint && !opts.package) fail('--fingerprint requires --package');
    const expect = opts.package ? { packageName: opts.package, fingerprint: opts.fingerprint } : undefined;

    const validation = await engine().validateDomain(domain, expect, { signal: interruptSignal() });
    console.log(opts.json ? JSON.stringify(validation, null, 2) : formatValidation(validation));
    process.exit(validation.status === 'valid' ? 0 : 2);
  });

// ─── reverify ────────────────────────────────────────────────────────

program
  .command('reverify')
  .description('Ask the device to re-run domain verification for a package')
  .argument('<device>', 'adb serial of the device')
  .argument('<package>', 'Android application id')
  .action(async (device: string, pkg: string) => {
    const result = await engine().forceReverify(device, pkg);
    if (!result.ok) fail(result.error.message);
    const output = result.value.trim();
    if (output) console.log(output);
    console.error(C.green(`✓ Re-verification requested for ${pkg}`));
    console.error(C.dim(`  Run: applink-doctor diagnose ${device} ${pkg}`));
  });

// ─── logs ────────────────────────────────────────────────────────────

program
  .command('logs')
  .description('Stream verification-related logcat output (Ctrl-C to stop)')
  .argument('<device>', 'adb serial of the device')
  .option('-e, --events-only', 'Only show recognized app link events')
  .action(async (device: string, opts: { eventsOnly?: boolean }) => {
    const signal = interruptSignal();
    try {
      for await (const entry of engine().streamVerificationLogs(device, { signal, eventsOnly: opts.eventsOnly })) {
        console.log(formatLogEntry(entry));
      }
    } catch (e) {
      fail(e instanceof Error ? e.message : String(e));
    }
  });

// ─── open ────────────────────────────────────────────────────────────

program
  .command('open')
  .description('Open a URI on the device with an intent and show how it resolved')
  .argument('<device>', 'adb serial of the device')
  .argument('<uri>', 'URI to open, e.g. https://example.com/item/1')
  .option('-a, --action <action>', 'Intent action (default android.intent.action.VIEW)')
  .option('--flag <name...>', `Activity launch flags: ${INTENT_FLAG_NAMES.join(', ')}`)
  .option('-p, --package <name>', 'Only resolve to this package')
  .action(async (device: string, uri: string, opts: { action?: string; flag?: string[]; package?: string }) => {
    const flags: IntentFlag[] = [];
    for (const name of opts.flag ?? []) {
      if (!isIntentFlag(name)) fail(`Unknown flag: ${name}. Use: ${INTENT_FLAG_NAMES.join(', ')}`);
      flags.push(name);
    }
    try {
      const lines = engine().fireIntent(device, { uri, action: opts.action, flags, packageName: opts.package });
      for await (const line of lines) console.log(line);
    } catch (e) {
      fail(e instanceof Error ? e.message : String(e));
    }
  });

// ─── config ──────────────────────────────────────────────────────────

program
  .command('config')
  .description('Show resolved configuration or persist a setting')
  .argument('<action>', 'Action: show, set')
  .argument('[key]', `Config key: ${CONFIG_KEYS.join(', ')}`)
  .argument('[value]', 'Value to set')
  .option('--global', 'Use global config (~/.config/applink-doctor/) instead of project')
  .action((action: string, key: string | undefined, value: string | undefined, opts: { global?: boolean }) => {
    const root = resolve('.');

    switch (action) {
      case 'show': {
        const { config, sources } = loadConfig();
        for (const k of CONFIG_KEYS) {
          console.log(`${k.padEnd(18)} ${String(config[k]).padEnd(12)} ${C.dim(describeSource(k, sources[k]))}`);
        }
        break;
      }

      case 'set': {
        if (!key || value === undefined) {
          console.error('Usage: applink-doctor config set <key> <value> [--global]');
          console.error(`Keys: ${CONFIG_KEYS.join(', ')}`);
          process.exit(1);
        }
        const saved = setConfigValue({ root, global: opts.global }, key, value);
        if (!saved.ok) fail(saved.error);
        console.error(C.green(`✓ Saved ${key} to ${saved.value}`));
        break;
      }

      default:
        fail(`Unknown action: ${action}. Use: show, set`);
    }
  });

// ─── mcp ─────────────────────────────────────────────────────────────

program
  .command('mcp')
  .description('Start the applink-doctor MCP server (stdio transport)')
  .action(async () => {
    await startStdioServer(engine());
  });

await program.parseAsync();

// ─── Helpers ─────────────────────────────────────────────────────────

function loadConfig(): ResolvedConfig {
  const g = program.opts<GlobalOpts>();
  const flags = parseConfigValues({
    adbPath: g.adb,
    httpTimeoutMs: g.httpTimeout,
    commandTimeoutMs: g.commandTimeout,
    maxRedirects: g.maxRedirects,
    strictContentType: g.strictContentType ? 'true' : undefined,
  });
  if (!flags.ok) fail(`Invalid option: ${flags.error}`);
  return resolveConfig({ root: resolve('.'), flags: flags.value });
}

function engine(): DiagnosticsEngine {
  return createEngine(loadConfig().config);
}

/** Aborts when the user presses Ctrl-C. */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());
  return controller.signal;
}

function fail(message: string): never {
  console.error(C.red(`✗ ${message}`));
  process.exit(1);
}
