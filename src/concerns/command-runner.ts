/**
 * CommandRunner
 *
 * Runs an external tool to completion and hands back its captured output.
 * The child is killed with SIGKILL as soon as the signal aborts; a missing
 * executable rejects with the spawn error (code ENOENT).
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import { DeadlineExceededError } from '../errors.js';

export interface CommandOptions {
  signal?: AbortSignal;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options?: CommandOptions): Promise<CommandOutput>;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new DeadlineExceededError('Command aborted');
}

export class SpawnCommandRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandOutput> {
    const { signal } = options;

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }

      let stdout = '';
      let stderr = '';
      let settled = false;

      const spawnOptions: SpawnOptions = {
        shell: false,
        stdio: ['ignore', 'pipe', 'pipe']
      };
      if (options.cwd) spawnOptions.cwd = options.cwd;
      if (options.env) spawnOptions.env = options.env;

      const proc = spawn(command, [...args], spawnOptions);

      const onAbort = (): void => {
        if (settled) return;
        settled = true;
        proc.kill('SIGKILL');
        reject(signal ? abortReason(signal) : new DeadlineExceededError('Command aborted'));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      proc.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('close', (code) => {
        signal?.removeEventListener('abort', onAbort);
        if (settled) return;
        settled = true;
        resolve({
          stdout,
          stderr: stderr.trim(),
          exitCode: code ?? 1
        });
      });

      proc.on('error', (error) => {
        signal?.removeEventListener('abort', onAbort);
        if (settled) return;
        settled = true;
        reject(error);
      });
    });
  }
}

export function createCommandRunner(): CommandRunner {
  return new SpawnCommandRunner();
}
