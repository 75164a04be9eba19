/**
 * Child process helpers shared by the docker and git clients.
 * Both are injected so tests can stand in for the real binaries.
 */

import { execFile, spawn } from 'child_process';
import { promisify } from 'util';
import type { Readable } from 'stream';

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string | undefined>;
}

export type CommandRunner = (
  file: string,
  args: string[],
  options?: RunOptions
) => Promise<CommandResult>;

/**
 * The subset of ChildProcess the log streamer relies on
 */
export interface SpawnedProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'close', listener: (code: number | null) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
}

export type ProcessSpawner = (file: string, args: string[], options: RunOptions) => SpawnedProcess;

export const runCommand: CommandRunner = async (file, args, options = {}) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    cwd: options.cwd,
    env: { ...process.env, ...options.env },
    encoding: 'utf8',
    maxBuffer: 16 * 1024 * 1024,
  });
  return { stdout, stderr };
};

export const spawnProcess: ProcessSpawner = (file, args, options) =>
  spawn(file, args, {
    cwd: options.cwd,
    env: { ...process.env, ...options.env },
    stdio: ['ignore', 'pipe', 'pipe'],
  });
