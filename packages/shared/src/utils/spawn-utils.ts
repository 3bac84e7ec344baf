import type { SpawnOptions } from 'node:child_process';

import { spawn } from 'node:child_process';

/**
 * Result of a spawn operation
 */
export interface SpawnResult {
  /** stdout decoded as UTF-8 */
  stdout: string;
  /** Raw stdout bytes, for binary output such as rendered images */
  stdoutBuffer: Buffer;
  stderr: string;
  code: number;
}

/**
 * Extended spawn options with output capture control
 */
export interface SpawnAsyncOptions extends SpawnOptions {
  /**
   * Whether to capture stdout (default: true)
   */
  captureStdout?: boolean;

  /**
   * Whether to capture stderr (default: true)
   */
  captureStderr?: boolean;
}

/**
 * Execute a command asynchronously and collect its output.
 *
 * @example
 * ```typescript
 * const { stdout } = await spawnAsync('pdfinfo', ['paper.pdf']);
 * const { stdoutBuffer } = await spawnAsync('magick', ['in.pdf[0]', 'png:-']);
 * ```
 */
export function spawnAsync(
  command: string,
  args: string[],
  options: SpawnAsyncOptions = {},
): Promise<SpawnResult> {
  const {
    captureStdout = true,
    captureStderr = true,
    ...spawnOptions
  } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, spawnOptions);

    const stdoutChunks: Buffer[] = [];
    let stderr = '';

    if (captureStdout && proc.stdout) {
      proc.stdout.on('data', (data: Buffer | string) => {
        stdoutChunks.push(typeof data === 'string' ? Buffer.from(data) : data);
      });
    }

    if (captureStderr && proc.stderr) {
      proc.stderr.on('data', (data: Buffer | string) => {
        stderr += data.toString();
      });
    }

    proc.on('close', (code) => {
      const stdoutBuffer = Buffer.concat(stdoutChunks);
      resolve({
        stdout: stdoutBuffer.toString('utf8'),
        stdoutBuffer,
        stderr,
        code: code ?? 0,
      });
    });

    proc.on('error', reject);
  });
}
