/**
 * MCP server integration: server and client linked in memory over a
 * diagnostics engine backed by fake device and HTTP channels.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { z } from 'zod';
import { AdbError, type DeviceChannel } from '../src/adb/executor.js';
import type { HttpFailure, HttpFetcher, HttpResponse } from '../src/assetlinks/fetcher.js';
import { AssetLinksValidator, assetLinksUrl } from '../src/assetlinks/validate.js';
import { DiagnosticsEngine } from '../src/diagnostics/engine.js';
import { createServer } from '../src/mcp/server.js';
import { err, ok, type Result } from '../src/types/index.js';

const PKG = 'com.example.app';

const DUMP = [
  `${PKG}:`,
  '  ID: 01234567-89ab-cdef-0123-456789abcdef',
  '  Signatures: [AA:BB:CC]',
  '  Domain verification state:',
  '    example.com: verified',
].join('\n');

const DEVICE_OUTPUT: Record<string, string> = {
  'devices -l': 'List of devices attached\nemulator-5554  device product:sdk model:Pixel_7 transport_id:1\n',
  'getprop ro.build.version.sdk': '34',
  [`pm get-app-links ${PKG}`]: DUMP,
  'pm get-app-links': DUMP,
  [`pm verify-app-links --re-verify ${PKG}`]: '\n',
};

const commands: string[] = [];

const fakeDevice: DeviceChannel = {
  async run(args) {
    return lookup(args.join(' '));
  },
  async runOnDevice(_deviceId, command) {
    commands.push(command);
    return lookup(command);
  },
  async *streamOnDevice(_deviceId, command) {
    commands.push(command);
    yield 'Starting: Intent { act=android.intent.action.VIEW dat=https://example.com/... }';
  },
};

function lookup(command: string): Result<string, AdbError> {
  const output = DEVICE_OUTPUT[command];
  return output === undefined ? err(new AdbError('exit', `unexpected: ${command}`, '', 1)) : ok(output);
}

const body = JSON.stringify([{
  relation: ['delegate_permission/common.handle_all_urls'],
  target: { namespace: 'android_app', package_name: PKG, sha256_cert_fingerprints: ['AA:BB:CC'] },
}]);

const fakeFetcher: HttpFetcher = {
  async get(url): Promise<Result<HttpResponse, HttpFailure>> {
    if (url === assetLinksUrl('example.com')) {
      return ok({ statusCode: 200, headers: { 'content-type': 'application/json' }, body, url });
    }
    return ok({ statusCode: 404, headers: {}, body: '', url });
  },
};

const ToolResultSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })),
  isError: z.boolean().optional(),
});

function parseResult(result: unknown): { data: unknown; isError: boolean } {
  const parsed = ToolResultSchema.parse(result);
  return { data: JSON.parse(parsed.content[0].text), isError: parsed.isError ?? false };
}

describe('MCP server', () => {
  let client: Client;

  beforeEach(async () => {
    commands.length = 0;
    const engine = new DiagnosticsEngine(fakeDevice, new AssetLinksValidator(fakeFetcher));
    const server = createServer(engine);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

    await server.connect(serverTransport);
    client = new Client({ name: 'test-client', version: '1.0.0' });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
  });

  it('registers six tools', async () => {
    const result = await client.listTools();
    expect(result.tools.map(t => t.name).sort()).toEqual([
      'applinks_devices',
      'applinks_diagnose',
      'applinks_list',
      'applinks_open',
      'applinks_reverify',
      'applinks_validate',
    ]);
  });

  it('applinks_devices lists attached devices', async () => {
    const { data } = parseResult(await client.callTool({ name: 'applinks_devices', arguments: {} }));
    expect(data).toEqual([
      { serial: 'emulator-5554', state: 'online', model: 'Pixel_7', product: 'sdk', connection: 'emulator' },
    ]);
  });

  it('applinks_list returns the device listing', async () => {
    const { data } = parseResult(await client.callTool({ name: 'applinks_list', arguments: { device: 'emulator-5554' } }));
    expect(data).toEqual({
      sdkLevel: 34,
      osGeneration: 'modern',
      profiles: [{ packageName: PKG, domains: [{ domain: 'example.com', state: 'verified', fingerprint: 'AA:BB:CC' }] }],
    });
  });

  it('applinks_diagnose returns a clean report', async () => {
    const { data, isError } = parseResult(await client.callTool({
      name: 'applinks_diagnose',
      arguments: { device: 'emulator-5554', package: PKG },
    }));
    expect(isError).toBe(false);
    expect(data).toMatchObject({
      packageName: PKG,
      sdkLevel: 34,
      deviceFingerprint: 'AA:BB:CC',
      domainCount: 1,
      verifiedCount: 1,
      hasIssues: false,
    });
  });

  it('applinks_diagnose reports engine errors as tool errors', async () => {
    const { data, isError } = parseResult(await client.callTool({
      name: 'applinks_diagnose',
      arguments: { device: 'emulator-5554', package: 'com.example.other' },
    }));
    expect(isError).toBe(true);
    expect(data).toEqual({
      error: 'PackageNotFound',
      message: 'Package com.example.other has no app links on this device',
    });
  });

  it('applinks_validate omits the raw body', async () => {
    const { data } = parseResult(await client.callTool({
      name: 'applinks_validate',
      arguments: { domain: 'example.com', package: PKG, fingerprint: 'aabbcc' },
    }));
    expect(data).toMatchObject({ domain: 'example.com', status: 'valid' });
    expect(data).not.toHaveProperty('rawBody');
  });

  it('applinks_reverify returns the trimmed command output', async () => {
    const { data } = parseResult(await client.callTool({
      name: 'applinks_reverify',
      arguments: { device: 'emulator-5554', package: PKG },
    }));
    expect(data).toEqual({ package: PKG, output: '' });
  });

  it('applinks_reverify rejects a package name that is not an application id', async () => {
    const rejected = await client
      .callTool({ name: 'applinks_reverify', arguments: { device: 'emulator-5554', package: 'com.x; reboot' } })
      .then(result => ToolResultSchema.parse(result).isError === true, () => true);
    expect(rejected).toBe(true);
    expect(commands).toEqual([]);
  });

  it('applinks_open fires a VIEW intent and returns the output', async () => {
    const { data, isError } = parseResult(await client.callTool({
      name: 'applinks_open',
      arguments: { device: 'emulator-5554', uri: 'https://example.com/item/1', flags: ['new-task'], package: PKG },
    }));
    expect(isError).toBe(false);
    expect(data).toEqual({
      uri: 'https://example.com/item/1',
      output: ['Starting: Intent { act=android.intent.action.VIEW dat=https://example.com/... }'],
    });
    expect(commands).toEqual([
      `am start -a android.intent.action.VIEW -d 'https://example.com/item/1' --activity-new-task -p ${PKG}`,
    ]);
  });
});
