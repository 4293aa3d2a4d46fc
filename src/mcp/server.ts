/**
 * applink-doctor MCP Server — Model Context Protocol integration.
 *
 * Tools:
 *   applinks_devices  — Attached devices
 *   applinks_list     — App links and verification state reported by a device
 *   applinks_diagnose — Full diagnostics report for one package
 *   applinks_validate — Fetch and validate a domain's assetlinks.json
 *   applinks_reverify — Ask the device to re-run domain verification
 *   applinks_open     — Open a URI on the device and report how it resolved
 *
 * Transport: stdio (see index.ts); tests connect through InMemoryTransport.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { DiagnosticsEngine } from '../diagnostics/engine.js';
import { DiagnosticsError } from '../diagnostics/errors.js';
import { APPLICATION_ID_PATTERN, INTENT_ACTION_PATTERN, INTENT_FLAG_NAMES, URI_PATTERN } from '../strategy/index.js';
import { VERSION } from '../version.js';

type ToolResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

function json(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

function failure(error: DiagnosticsError): ToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify({ error: error.kind, message: error.message }, null, 2) }],
    isError: true,
  };
}

const deviceArg = z.string().min(1).describe('adb serial of the target device (see applinks_devices)');
const packageArg = z.string()
  .regex(APPLICATION_ID_PATTERN, 'Must be an Android application id')
  .describe('Android application id, e.g. com.example.app');

// ─── Server setup ────────────────────────────────────────────────────

export function createServer(engine: DiagnosticsEngine): McpServer {
  const server = new McpServer({
    name: 'applink-doctor',
    version: VERSION,
  });

  // ── Tool: applinks_devices ──
  server.tool(
    'applinks_devices',
    'List devices attached to adb with their connection state and model',
    {},
    async () => {
      const result = await engine.listDevices();
      return result.ok ? json(result.value) : failure(result.error);
    },
  );

  // ── Tool: applinks_list ──
  server.tool(
    'applinks_list',
    'List app link domains and their verification state as reported by the device, optionally for one package',
    { device: deviceArg, package: packageArg.optional() },
    async ({ device, package: pkg }) => {
      const result = await engine.getAppLinks(device, pkg);
      return result.ok ? json(result.value) : failure(result.error);
    },
  );

  // ── Tool: applinks_diagnose ──
  server.tool(
    'applinks_diagnose',
    'Diagnose why App Links verification fails for a package: checks every declared domain\'s assetlinks.json, '
      + 'compares certificate fingerprints and returns failure reasons with suggested fixes',
    { device: deviceArg, package: packageArg },
    async ({ device, package: pkg }) => {
      const result = await engine.analyzeVerification(device, pkg);
      return result.ok ? json(result.value) : failure(result.error);
    },
  );

  // ── Tool: applinks_validate ──
  server.tool(
    'applinks_validate',
    'Fetch https://<domain>/.well-known/assetlinks.json and validate it, optionally checking that a package '
      + 'and certificate fingerprint are declared',
    {
      domain: z.string().min(1).describe('Host name, e.g. example.com'),
      package: packageArg.optional(),
      fingerprint: z.string().optional().describe('Expected SHA-256 certificate fingerprint (requires package)'),
    },
    async ({ domain, package: pkg, fingerprint }) => {
      const expect = pkg ? { packageName: pkg, fingerprint } : undefined;
      const { rawBody: _rawBody, ...validation } = await engine.validateDomain(domain, expect);
      return json(validation);
    },
  );

  // ── Tool: applinks_reverify ──
  server.tool(
    'applinks_reverify',
    'Ask the device to re-run domain verification for a package (the command matches the device\'s Android version)',
    { device: deviceArg, package: packageArg },
    async ({ device, package: pkg }) => {
      const result = await engine.forceReverify(device, pkg);
      return result.ok ? json({ package: pkg, output: result.value.trim() }) : failure(result.error);
    },
  );

  // ── Tool: applinks_open ──
  server.tool(
    'applinks_open',
    'Open a URI on the device with an intent (am start) and return the output, showing which activity '
      + 'the system resolved the link to',
    {
      device: deviceArg,
      uri: z.string().regex(URI_PATTERN, 'Must be a URI with a scheme').describe('URI to open, e.g. https://example.com/item/1'),
      action: z.string().regex(INTENT_ACTION_PATTERN).optional().describe('Intent action (default android.intent.action.VIEW)'),
      flags: z.array(z.enum(INTENT_FLAG_NAMES)).optional().describe('Activity launch flags'),
      package: packageArg.optional().describe('Only resolve to this package'),
    },
    async ({ device, uri, action, flags, package: pkg }) => {
      const output: string[] = [];
      try {
        for await (const line of engine.fireIntent(device, { uri, action, flags, packageName: pkg })) {
          output.push(line);
        }
      } catch (e) {
        if (e instanceof DiagnosticsError) return failure(e);
        throw e;
      }
      return json({ uri, output });
    },
  );

  return server;
}
