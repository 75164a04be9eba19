/**
 * Container engine client
 * Wraps `docker compose` up/down/logs and `docker ps/inspect/stats/exec`.
 */

import { createInterface } from 'readline';
import { z } from 'zod';
import { CONFIG_FILES_LABEL, PROJECT_LABEL, SERVICE_LABEL } from '@envswitch/blueprint';
import { ComposeFailure, describeProcessError } from '../errors';
import { silentLogger, type CommandLogger } from '../logger';
import {
  runCommand,
  spawnProcess,
  type CommandResult,
  type CommandRunner,
  type ProcessSpawner,
} from './command-runner';

export interface ContainerSummary {
  id: string;
  name: string;
  project: string;
  service: string;
  state: string;
  configFiles: string[];
}

export interface ContainerUsage {
  id: string;
  name: string;
  cpuPercent: number;
  memoryUsage: string;
  memoryBytes: number;
  memoryPercent: number;
}

/** Any container, labelled or not, as `docker ps -a` names it */
export interface NamedContainer {
  id: string;
  name: string;
}

export interface ComposeTarget {
  project: string;
  files: string[];
  cwd: string;
  env?: Record<string, string | undefined>;
}

export interface LogOptions {
  service?: string;
  follow: boolean;
  tail?: number;
  signal?: AbortSignal;
}

export interface ContainerEngine {
  checkAvailable(): Promise<void>;
  up(target: ComposeTarget): Promise<void>;
  down(target: ComposeTarget): Promise<void>;
  /** Running containers that carry a compose project label */
  listContainers(): Promise<ContainerSummary[]>;
  /** Every container on the host in any state, labels or not */
  listNamed(): Promise<NamedContainer[]>;
  remove(containerIds: string[]): Promise<void>;
  stats(containerIds: string[]): Promise<ContainerUsage[]>;
  exec(containerId: string, command: string[]): Promise<boolean>;
  logs(target: ComposeTarget, options: LogOptions): AsyncIterable<string>;
}

// =============================================================================
// Output parsing
// =============================================================================

const inspectSchema = z.array(
  z.object({
    Id: z.string(),
    Name: z.string(),
    State: z.object({ Status: z.string() }),
    Config: z.object({ Labels: z.record(z.string()).nullable() }),
  })
);

const statsLineSchema = z.object({
  ID: z.string(),
  Name: z.string(),
  CPUPerc: z.string(),
  MemUsage: z.string(),
  MemPerc: z.string(),
});

const BYTE_UNITS: Record<string, number> = {
  b: 1,
  kb: 1000,
  kib: 1024,
  mb: 1000 ** 2,
  mib: 1024 ** 2,
  gb: 1000 ** 3,
  gib: 1024 ** 3,
  tb: 1000 ** 4,
  tib: 1024 ** 4,
};

export function parsePercent(value: string): number {
  const parsed = Number.parseFloat(value.replace('%', ''));
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Parse sizes as docker prints them: "24.1MiB", "512kB", "0B"
 */
export function parseByteSize(value: string): number {
  const match = value.trim().match(/^([\d.]+)\s*([a-z]*)$/i);
  if (!match) {
    return 0;
  }
  const amount = Number.parseFloat(match[1]);
  const multiplier = BYTE_UNITS[(match[2] || 'b').toLowerCase()] ?? 1;
  return Math.round(amount * multiplier);
}

export function parseInspectOutput(output: string): ContainerSummary[] {
  const containers = inspectSchema.parse(JSON.parse(output));
  const summaries: ContainerSummary[] = [];

  for (const container of containers) {
    const labels = container.Config.Labels ?? {};
    const project = labels[PROJECT_LABEL];
    if (!project) continue;

    const configFiles = labels[CONFIG_FILES_LABEL];
    summaries.push({
      id: container.Id,
      name: container.Name.replace(/^\//, ''),
      project,
      service: labels[SERVICE_LABEL] ?? '',
      state: container.State.Status,
      configFiles: configFiles ? configFiles.split(',').filter(Boolean) : [],
    });
  }

  return summaries;
}

export function parseStatsOutput(output: string): ContainerUsage[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line) => {
      const stats = statsLineSchema.parse(JSON.parse(line));
      const [used] = stats.MemUsage.split('/');
      return {
        id: stats.ID,
        name: stats.Name,
        cpuPercent: parsePercent(stats.CPUPerc),
        memoryUsage: stats.MemUsage,
        memoryBytes: parseByteSize(used ?? ''),
        memoryPercent: parsePercent(stats.MemPerc),
      };
    });
}

export function parseNamedOutput(output: string): NamedContainer[] {
  return output
    .split('\n')
    .map((line) => line.trim().split('\t'))
    .filter((fields): fields is [string, string] => fields.length === 2 && fields[0] !== '' && fields[1] !== '')
    .map(([id, name]) => ({ id, name }));
}

function stdoutOf(error: unknown): string {
  return typeof error === 'object' && error !== null && 'stdout' in error && typeof error.stdout === 'string'
    ? error.stdout
    : '';
}

export function buildComposeArgs(target: Pick<ComposeTarget, 'project' | 'files'>): string[] {
  return ['compose', '-p', target.project, ...target.files.flatMap((file) => ['-f', file])];
}

// =============================================================================
// Docker CLI implementation
// =============================================================================

export interface DockerEngineOptions {
  run?: CommandRunner;
  spawn?: ProcessSpawner;
  logger?: CommandLogger;
}

export class DockerComposeEngine implements ContainerEngine {
  private readonly run: CommandRunner;
  private readonly spawn: ProcessSpawner;
  private readonly logger: CommandLogger;

  constructor(options: DockerEngineOptions = {}) {
    this.run = options.run ?? runCommand;
    this.spawn = options.spawn ?? spawnProcess;
    this.logger = options.logger ?? silentLogger;
  }

  async checkAvailable(): Promise<void> {
    try {
      await this.run('docker', ['compose', 'version']);
    } catch (error) {
      throw new ComposeFailure(
        `Docker Compose is not available (use 'docker compose', not 'docker-compose'): ${describeProcessError(error)}`
      );
    }
  }

  async up(target: ComposeTarget): Promise<void> {
    const args = [...buildComposeArgs(target), 'up', '-d', '--build', '--remove-orphans'];
    await this.compose(target, args);
  }

  async down(target: ComposeTarget): Promise<void> {
    const args = [...buildComposeArgs(target), 'down', '--remove-orphans'];
    await this.compose(target, args);
  }

  async listContainers(): Promise<ContainerSummary[]> {
    const { stdout } = await this.query(['ps', '-q', '--filter', `label=${PROJECT_LABEL}`]);
    const ids = stdout.split('\n').map((id) => id.trim()).filter(Boolean);
    if (ids.length === 0) {
      return [];
    }

    // A container removed after `ps` makes inspect exit non-zero; the rest are still printed
    const args = ['inspect', ...ids];
    this.logger.command(`docker ${args.join(' ')}`);
    let output: string;
    try {
      output = (await this.run('docker', args)).stdout;
    } catch (error) {
      const diagnostic = describeProcessError(error);
      if (!/no such (object|container)/i.test(diagnostic)) {
        throw new ComposeFailure(diagnostic);
      }
      this.logger.debug('containers vanished before inspect', diagnostic);
      output = stdoutOf(error).trim() || '[]';
    }
    return parseInspectOutput(output);
  }

  async listNamed(): Promise<NamedContainer[]> {
    const { stdout } = await this.query(['ps', '-a', '--format', '{{.ID}}\t{{.Names}}']);
    return parseNamedOutput(stdout);
  }

  async remove(containerIds: string[]): Promise<void> {
    if (containerIds.length === 0) {
      return;
    }
    await this.query(['rm', '-f', ...containerIds]);
  }

  async stats(containerIds: string[]): Promise<ContainerUsage[]> {
    if (containerIds.length === 0) {
      return [];
    }
    const { stdout } = await this.query([
      'stats',
      '--no-stream',
      '--format',
      '{{json .}}',
      ...containerIds,
    ]);
    return parseStatsOutput(stdout);
  }

  async exec(containerId: string, command: string[]): Promise<boolean> {
    this.logger.command(`docker exec ${containerId} ${command.join(' ')}`);
    try {
      await this.run('docker', ['exec', containerId, ...command]);
      return true;
    } catch (error) {
      this.logger.debug(`exec failed in ${containerId}`, describeProcessError(error));
      return false;
    }
  }

  async *logs(target: ComposeTarget, options: LogOptions): AsyncGenerator<string> {
    const args = [...buildComposeArgs(target), 'logs', '--no-color'];
    if (options.tail !== undefined) args.push('--tail', String(options.tail));
    if (options.follow) args.push('--follow');
    if (options.service) args.push(options.service);

    this.logger.command(`docker ${args.join(' ')}`);
    const child = this.spawn('docker', args, { cwd: target.cwd, env: target.env });

    let stderr = '';
    child.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    const exited = new Promise<number | null>((resolve) => {
      child.once('close', (code) => resolve(code));
      child.once('error', (error) => {
        stderr += error.message;
        resolve(-1);
      });
    });

    const stop = () => {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill('SIGTERM');
      }
    };
    options.signal?.addEventListener('abort', stop, { once: true });

    try {
      if (child.stdout) {
        const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });
        try {
          for await (const line of lines) {
            yield line;
          }
        } finally {
          lines.close();
        }
      }

      const code = await exited;
      if (code !== 0 && !options.signal?.aborted) {
        throw new ComposeFailure(stderr.trim() || `docker compose logs exited with code ${code}`);
      }
    } finally {
      options.signal?.removeEventListener('abort', stop);
      stop();
    }
  }

  private async compose(target: ComposeTarget, args: string[]): Promise<void> {
    this.logger.command(`docker ${args.join(' ')}`, { cwd: target.cwd, env: target.env });
    try {
      const { stderr } = await this.run('docker', args, { cwd: target.cwd, env: target.env });
      if (stderr.trim()) {
        this.logger.debug('compose output', stderr.trim());
      }
    } catch (error) {
      const diagnostic = describeProcessError(error);
      this.logger.error(`docker ${args.join(' ')} failed`, diagnostic);
      throw new ComposeFailure(diagnostic);
    }
  }

  private async query(args: string[]): Promise<CommandResult> {
    this.logger.command(`docker ${args.join(' ')}`);
    try {
      return await this.run('docker', args);
    } catch (error) {
      throw new ComposeFailure(describeProcessError(error));
    }
  }
}
