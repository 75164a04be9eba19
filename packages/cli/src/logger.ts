/**
 * Debug log for envswitch.
 *
 * One file, `.envswitch/debug.log` in the project or the home directory,
 * appended to by every command and rotated to `debug.log.old` past 5MB.
 * `envswitch debug-log` reads it back.
 */

import * as fs from 'fs';
import * as path from 'path';
import { homedir } from 'os';
import { DEBUG_LOG_OVERRIDE } from './config';
import { EnvSwitchError } from './errors';

const ENVSWITCH_DIR = '.envswitch';
const DEBUG_LOG_FILE = 'debug.log';
const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB

export type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG' | 'CMD';

export interface CommandLogger {
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
  debug: (message: string, data?: unknown) => void;
  command: (cmd: string, args?: Record<string, unknown>) => void;
}

/** What a failed command was working on when it failed */
export interface FailureContext {
  environment?: string;
  composeProject?: string;
}

let logFilePath: string | null = null;
let sessionStarted = false;

export function getLogPath(): string {
  if (logFilePath) {
    return logFilePath;
  }
  if (DEBUG_LOG_OVERRIDE) {
    logFilePath = path.resolve(DEBUG_LOG_OVERRIDE);
    return logFilePath;
  }

  const localDir = path.join(process.cwd(), ENVSWITCH_DIR);
  const homeDir = path.join(homedir(), ENVSWITCH_DIR);
  if (!fs.existsSync(localDir) && !fs.existsSync(homeDir)) {
    fs.mkdirSync(homeDir, { recursive: true });
  }
  logFilePath = path.join(fs.existsSync(localDir) ? localDir : homeDir, DEBUG_LOG_FILE);
  return logFilePath;
}

function append(text: string): void {
  try {
    fs.appendFileSync(getLogPath(), text);
  } catch {
    // The debug log never interrupts a command
  }
}

function rotate(logPath: string): void {
  try {
    if (fs.existsSync(logPath) && fs.statSync(logPath).size > MAX_LOG_SIZE) {
      fs.rmSync(`${logPath}.old`, { force: true });
      fs.renameSync(logPath, `${logPath}.old`);
    }
  } catch {
    // Keep appending to the oversized file
  }
}

function startSession(): void {
  if (sessionStarted) return;
  sessionStarted = true;

  rotate(getLogPath());
  const rule = '='.repeat(80);
  append(`\n${rule}\n[${new Date().toISOString()}] envswitch ${process.argv.slice(2).join(' ')}\n${rule}\n`);
}

function describeError(error: Error): string[] {
  const title = error instanceof EnvSwitchError ? `${error.name} [${error.code}]` : error.name;
  const frames = (error.stack ?? '')
    .split('\n')
    .slice(1)
    .map((frame) => frame.trim())
    .filter((frame) => frame !== '');
  return [`${title}: ${error.message}`, ...frames.map((frame) => `  ${frame}`)];
}

function describeData(data: unknown): string[] {
  if (data instanceof Error) {
    return describeError(data);
  }
  if (typeof data !== 'object' || data === null) {
    return [`Data: ${String(data)}`];
  }
  try {
    return `Data: ${JSON.stringify(data, null, 2)}`.split('\n');
  } catch {
    return ['Data: [Could not serialize]'];
  }
}

export function formatEntry(level: LogLevel, message: string, data?: unknown): string {
  const lines = [`[${new Date().toISOString()}] [${level}] ${message}`];
  if (data !== undefined) {
    lines.push(...describeData(data).map((line) => `  ${line}`));
  }
  return lines.join('\n') + '\n';
}

function write(level: LogLevel, message: string, data?: unknown): void {
  startSession();
  append(formatEntry(level, message, data));
}

/**
 * Record a command that ended in an error, with the environment and
 * compose project it was acting on.
 */
export function logFailure(command: string, error: unknown, context: FailureContext = {}): void {
  const scope = [
    context.environment && `environment=${context.environment}`,
    context.composeProject && `composeProject=${context.composeProject}`,
  ]
    .filter((part): part is string => Boolean(part))
    .join(' ');
  const heading = scope ? `[${command}] failed (${scope})` : `[${command}] failed`;
  write('ERROR', heading, error instanceof Error ? error : String(error));
}

export function scopedLogger(commandName: string): CommandLogger {
  const at = (level: LogLevel) => (message: string, data?: unknown) =>
    write(level, `[${commandName}] ${message}`, data);
  return {
    info: at('INFO'),
    warn: at('WARN'),
    error: at('ERROR'),
    debug: at('DEBUG'),
    command: (cmd, args) => write('CMD', `[${commandName}] Executing: ${cmd}`, args),
  };
}

/**
 * A logger that discards everything; for library callers and tests
 */
export const silentLogger: CommandLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
  command: () => undefined,
};
