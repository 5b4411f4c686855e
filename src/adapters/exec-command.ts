/**
 * Shell command execution.
 */

import { spawn } from 'child_process';
import type { Readable } from 'stream';
import type { ExecResult } from '../types/context.js';

/**
 * Exit code reported when the command could not be launched.
 */
export const LAUNCH_FAILURE_EXIT_CODE = -1;

/**
 * Exit code reported when the process was terminated by a signal.
 */
export const SIGNAL_EXIT_CODE = -2;

/**
 * The part of a child process execCommand listens to.
 */
export interface SpawnedProcess {
  stdout: Readable | null;
  once(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'close', listener: (code: number | null) => void): unknown;
}

export type ProcessSpawner = (command: string) => SpawnedProcess;

/**
 * Run through the system shell; stdout is captured, stderr passes through.
 */
export const shellSpawner: ProcessSpawner = (command) =>
  spawn(command, { shell: true, stdio: ['ignore', 'pipe', 'inherit'] });

/**
 * Execute a shell command and capture its standard output.
 * Never rejects: a launch failure resolves to empty output and exit code -1,
 * a process killed by a signal to its captured output and exit code -2.
 *
 * @param command - Shell command line
 * @param spawner - Process factory (defaults to the system shell)
 * @returns Captured output and exit code
 */
export function execCommand(
  command: string,
  spawner: ProcessSpawner = shellSpawner
): Promise<ExecResult> {
  return new Promise((resolvePromise) => {
    const launchFailed = (error: unknown): void => {
      console.warn(`[ExecCommand] Failed to launch '${command}':`, error);
      resolvePromise({ output: '', exitCode: LAUNCH_FAILURE_EXIT_CODE });
    };

    let child: SpawnedProcess;
    try {
      child = spawner(command);
    } catch (error) {
      launchFailed(error);
      return;
    }

    let output = '';
    child.stdout?.setEncoding('utf8');
    child.stdout?.on('data', (chunk: string) => {
      output += chunk;
    });

    child.once('error', launchFailed);
    child.once('close', (code) => {
      resolvePromise({ output, exitCode: code ?? SIGNAL_EXIT_CODE });
    });
  });
}
