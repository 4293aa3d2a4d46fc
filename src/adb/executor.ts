/**
 * applink-doctor — adb command execution.
 *
 * One-shot commands go through execFile (combined stdout/stderr, bounded by a
 * timeout); live output such as logcat is streamed line by line from spawn.
 * Finding or installing the adb binary is not handled here: the path comes
 * from configuration.
 */

import { execFile, spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import { err, ok, type Result } from '../types/index.js';

export type AdbErrorKind = 'not_found' | 'exit' | 'timeout' | 'aborted' | 'spawn';

export class AdbError extends Error {
  constructor(
    readonly kind: AdbErrorKind,
    message: string,
    readonly output?: string,
    readonly exitCode?: number,
  ) {
    super(message);
    this.name = 'AdbError';
  }
}

export interface RunOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/** The narrow channel the diagnostics engine talks to a device through. */
export interface DeviceChannel {
  /** Run a raw adb invocation, e.g. ['devices', '-l']. */
  run(args: string[], options?: RunOptions): Promise<Result<string, AdbError>>;
  /** Run a shell command on one device. */
  runOnDevice(deviceId: string, command: string, options?: RunOptions): Promise<Result<string, AdbError>>;
  /** Stream a long-running shell command's output as lines. */
  streamOnDevice(deviceId: string, command: string, options?: { signal?: AbortSignal }): AsyncIterable<string>;
}

const MAX_BUFFER = 16 * 1024 * 1024;

export class AdbExecutor implements DeviceChannel {
  constructor(
    private readonly adbPath: string,
    private readonly defaultTimeoutMs: number,
  ) {}

  run(args: string[], options: RunOptions = {}): Promise<Result<string, AdbError>> {
    const display = `adb ${args.join(' ')}`;
    return new Promise(resolvePromise => {
      execFile(
        this.adbPath,
        args,
        {
          encoding: 'utf-8',
          timeout: options.timeoutMs ?? this.defaultTimeoutMs,
          maxBuffer: MAX_BUFFER,
          signal: options.signal,
        },
        (error, stdout, stderr) => {
          const output = stdout + stderr;
          if (!error) {
            resolvePromise(ok(output));
            return;
          }
          if (error.name === 'AbortError') {
            resolvePromise(err(new AdbError('aborted', `Cancelled: ${display}`, output)));
          } else if (error.code === 'ENOENT') {
            resolvePromise(err(new AdbError('not_found', `adb binary not found at "${this.adbPath}"`)));
          } else if (error.killed) {
            resolvePromise(err(new AdbError('timeout', `Timed out: ${display}`, output)));
          } else if (typeof error.code === 'number') {
            resolvePromise(err(new AdbError(
              'exit',
              `Command failed with exit code ${error.code}: ${display}${output.trim() ? `\n${output.trim()}` : ''}`,
              output,
              error.code,
            )));
          } else {
            resolvePromise(err(new AdbError('spawn', `Failed to run ${display}: ${error.message}`, output)));
          }
        },
      );
    });
  }

  runOnDevice(deviceId: string, command: string, options?: RunOptions): Promise<Result<string, AdbError>> {
    return this.run(['-s', deviceId, 'shell', command], options);
  }

  async *streamOnDevice(deviceId: string, command: string, options: { signal?: AbortSignal } = {}): AsyncIterable<string> {
    const child = spawn(this.adbPath, ['-s', deviceId, 'shell', command], {
      stdio: ['ignore', 'pipe', 'pipe'],
      signal: options.signal,
    });

    const failure: { error?: Error } = {};
    let stderr = '';
    child.stderr.setEncoding('utf-8');
    child.stderr.on('data', (chunk: string) => { stderr += chunk; });
    const exited = new Promise<number | null>(resolveExit => {
      child.on('error', e => {
        failure.error = e;
        resolveExit(null);
      });
      child.on('close', code => resolveExit(code));
    });

    const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });
    try {
      for await (const line of lines) {
        yield line;
      }
    } finally {
      lines.close();
      if (child.exitCode === null) child.kill();
    }

    const code = await exited;
    if (options.signal?.aborted) return;
    if (failure.error) {
      throw new AdbError('spawn', `Failed to stream "${command}": ${failure.error.message}`);
    }
    if (code !== 0 && code !== null) {
      throw new AdbError('exit', `Stream command failed with exit code ${code}: ${command}`, stderr, code);
    }
  }
}
