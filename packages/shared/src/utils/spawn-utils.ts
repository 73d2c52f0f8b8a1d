import type { SpawnOptions } from 'node:child_process';

import { spawn } from 'node:child_process';

/**
 * Result of a spawn operation
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;
  code: number;
}

/**
 * Spawn options with a wall-clock limit
 */
export interface SpawnAsyncOptions extends SpawnOptions {
  /**
   * Kill the process and reject after this many milliseconds (default: none)
   */
  timeoutMs?: number;
}

/**
 * Error raised when a spawned command exceeds its time limit
 */
export class SpawnTimeoutError extends Error {
  constructor(
    public readonly command: string,
    public readonly timeoutMs: number,
  ) {
    super(`Command "${command}" timed out after ${timeoutMs}ms`);
    this.name = 'SpawnTimeoutError';
  }
}

/**
 * Execute a command and collect its output.
 *
 * Resolves with the exit code instead of rejecting on non-zero exits; callers
 * decide what a failure means. Rejects when the command cannot be started or
 * runs past `timeoutMs`.
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('magick', ['-version'], { timeoutMs: 5000 });
 * if (result.code !== 0) throw new Error(result.stderr);
 * ```
 */
export function spawnAsync(
  command: string,
  args: string[],
  options: SpawnAsyncOptions = {},
): Promise<SpawnResult> {
  const { timeoutMs, ...spawnOptions } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let settled = false;

    const timer =
      timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            settled = true;
            proc.kill('SIGKILL');
            reject(new SpawnTimeoutError(command, timeoutMs));
          }, timeoutMs);

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('close', (code: number | null) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      resolve({ stdout, stderr, code: code ?? 0 });
    });

    proc.on('error', (error: Error) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      reject(error);
    });
  });
}
