/**
 * Environment Switcher
 *
 * Translates an environment name (plus debug flag) into a container
 * lifecycle transition and answers status/health/log queries about the
 * active environment.
 *
 * Nothing is cached between calls: the active environment is always read
 * back from the container engine. Every switch routes through "stop
 * everything managed" first, so the state graph is a star around
 * `none-active`.
 */

import { existsSync } from 'fs';
import * as path from 'path';
import {
  ENVIRONMENT_NAMES,
  getComposeFile,
  isDebugOverlay,
  isEnvironmentName,
  resolveEnvironment,
  type Environment,
  type EnvironmentName,
  type ProjectSettings,
} from '@envswitch/blueprint';
import {
  BranchCheckoutFailure,
  ComposeFailure,
  InvalidEnvironmentName,
  NoActiveEnvironment,
  describeProcessError,
} from '../errors';
import { silentLogger, type CommandLogger } from '../logger';
import { READY_TIMEOUT_MS, WATCH_INTERVAL_MS } from '../config';
import type { ComposeTarget, ContainerEngine, ContainerSummary } from './engine.service';
import type { VersionControl } from './git.service';
import { detectDockerHost, type HealthStatus, type HttpProber } from './health.service';
import { WorktreeManager, type WorktreeOutcome } from './worktree.service';

export type EnvironmentState = `${EnvironmentName}-active` | 'none-active';

export interface SwitcherDependencies {
  project: ProjectSettings;
  engine: ContainerEngine;
  git: VersionControl;
  prober: HttpProber;
  worktrees?: WorktreeManager;
  resolveHost?: () => Promise<string>;
  fileExists?: (file: string) => boolean;
  logger?: CommandLogger;
  watchIntervalMs?: number;
  readyTimeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface SwitchResult {
  environment: Environment;
  /** Environments taken down before starting the target */
  stopped: EnvironmentName[];
  /** Non-fatal problems; the switch went ahead regardless */
  warnings: BranchCheckoutFailure[];
  worktree: WorktreeOutcome | null;
  /** Whether a container reported running before the readiness timeout */
  ready: boolean;
}

export interface ActiveEnvironment {
  name: EnvironmentName;
  debug: boolean;
  composeProject: string;
  basePort: number;
}

export interface ContainerStatus {
  id: string;
  name: string;
  service: string;
  state: string;
  cpuPercent: number | null;
  memoryUsage: string | null;
  memoryPercent: number | null;
}

export interface EnvironmentSnapshot {
  active: ActiveEnvironment | null;
  /** More than one entry means the single-active invariant was broken outside envswitch */
  running: EnvironmentName[];
  containers: ContainerStatus[];
}

export interface ServiceHealth {
  status: HealthStatus;
  port: number | null;
  detail: string;
}

export interface HealthReport {
  environment: EnvironmentName | null;
  debug: boolean;
  services: Record<string, ServiceHealth>;
}

export interface LogLine {
  /** Container that wrote the line, when compose prefixed one */
  source: string | null;
  message: string;
  raw: string;
}

export interface LogQuery {
  service?: string;
  follow: boolean;
  tail?: number;
  signal?: AbortSignal;
}

export interface StopResult {
  stopped: EnvironmentName[];
  /** Names of leftover containers removed after stopping everything */
  removed: string[];
}

export function parseLogLine(raw: string): LogLine {
  const match = raw.match(/^(\S+)\s+\|\s?(.*)$/);
  if (!match) {
    return { source: null, message: raw, raw };
  }
  return { source: match[1], message: match[2], raw };
}

export function stateOf(snapshot: Pick<EnvironmentSnapshot, 'active'>): EnvironmentState {
  return snapshot.active ? `${snapshot.active.name}-active` : 'none-active';
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class EnvironmentSwitcher {
  private readonly project: ProjectSettings;
  private readonly engine: ContainerEngine;
  private readonly git: VersionControl;
  private readonly prober: HttpProber;
  private readonly worktrees: WorktreeManager;
  private readonly resolveHost: () => Promise<string>;
  private readonly fileExists: (file: string) => boolean;
  private readonly logger: CommandLogger;
  private readonly watchIntervalMs: number;
  private readonly readyTimeoutMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(deps: SwitcherDependencies) {
    this.project = deps.project;
    this.engine = deps.engine;
    this.git = deps.git;
    this.prober = deps.prober;
    this.logger = deps.logger ?? silentLogger;
    this.worktrees =
      deps.worktrees ?? new WorktreeManager({ root: deps.project.root, git: deps.git, logger: this.logger });
    this.resolveHost = deps.resolveHost ?? (() => detectDockerHost());
    this.fileExists = deps.fileExists ?? existsSync;
    this.watchIntervalMs = deps.watchIntervalMs ?? WATCH_INTERVAL_MS;
    this.readyTimeoutMs = deps.readyTimeoutMs ?? READY_TIMEOUT_MS;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  // ===========================================================================
  // Transitions
  // ===========================================================================

  async switch(target: string, options: { debug?: boolean } = {}): Promise<SwitchResult> {
    if (!isEnvironmentName(target)) {
      throw new InvalidEnvironmentName(target);
    }
    const debug = options.debug ?? false;
    const environment = resolveEnvironment(this.project, target, debug);

    await this.engine.checkAvailable();

    // With worktrees the branch lives in its own directory; the main checkout stays put
    const worktreeDir = debug && this.project.worktreeSupport ? environment.sourceDir : null;

    const warnings: BranchCheckoutFailure[] = [];
    if (environment.branch && !worktreeDir) {
      try {
        await this.git.checkout(environment.branch);
      } catch (error) {
        const failure =
          error instanceof BranchCheckoutFailure
            ? error
            : new BranchCheckoutFailure(environment.branch, describeProcessError(error));
        this.logger.warn(failure.message);
        warnings.push(failure);
      }
    }

    let worktree: WorktreeOutcome | null = null;
    if (environment.branch && worktreeDir) {
      worktree = await this.worktrees.ensureReady(worktreeDir, environment.branch);
    }

    const { stopped } = await this.stop();

    const missing = environment.composeFiles.filter((file) => !this.fileExists(this.resolvePath(file)));
    if (missing.length > 0) {
      throw new ComposeFailure(`Compose file not found: ${missing.join(', ')}`);
    }

    const composeTarget = this.startTarget(environment);
    this.logger.info(`Starting ${environment.name}${debug ? ' (debug)' : ''}`, composeTarget);
    try {
      await this.engine.up(composeTarget);
    } catch (error) {
      await this.discardPartialStart(composeTarget, error);
      throw error;
    }

    const ready = await this.waitForContainers(environment.composeProject);
    if (!ready) {
      this.logger.warn(`${environment.composeProject} had no running container after ${this.readyTimeoutMs}ms`);
    }

    return { environment, stopped, warnings, worktree, ready };
  }

  /**
   * Stop one environment, or every managed one. Stopping a stopped
   * environment is a no-op.
   */
  async stop(target?: string): Promise<StopResult> {
    let only: EnvironmentName | undefined;
    if (target !== undefined) {
      if (!isEnvironmentName(target)) {
        throw new InvalidEnvironmentName(target);
      }
      only = target;
    }

    const groups = await this.inspect();
    const names: readonly EnvironmentName[] = only ? [only] : ENVIRONMENT_NAMES;
    const stopped: EnvironmentName[] = [];

    for (const name of names) {
      if (!groups.get(name)?.length) continue;
      this.logger.info(`Stopping ${name}`);
      await this.engine.down(this.stopTarget(name));
      stopped.push(name);
    }

    const removed = only ? [] : await this.removeLeftovers();
    return { stopped, removed };
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  async status(): Promise<EnvironmentSnapshot> {
    const groups = await this.inspect();
    const running = ENVIRONMENT_NAMES.filter((name) => groups.get(name)?.length);
    const active = this.activeFrom(groups);

    if (!active) {
      return { active: null, running, containers: [] };
    }

    const containers = groups.get(active.name) ?? [];
    const usage = await this.engine.stats(containers.map((c) => c.id));
    const usageByName = new Map(usage.map((u) => [u.name, u]));

    return {
      active,
      running,
      containers: containers.map((container) => {
        const stats = usageByName.get(container.name);
        return {
          id: container.id,
          name: container.name,
          service: container.service,
          state: container.state,
          cpuPercent: stats?.cpuPercent ?? null,
          memoryUsage: stats?.memoryUsage ?? null,
          memoryPercent: stats?.memoryPercent ?? null,
        };
      }),
    };
  }

  async health(): Promise<HealthReport> {
    const groups = await this.inspect();
    const active = this.activeFrom(groups);

    if (!active) {
      const services = Object.fromEntries(
        this.project.services.map((service): [string, ServiceHealth] => [
          service.name,
          { status: 'not-running', port: null, detail: 'no environment is running' },
        ])
      );
      return { environment: null, debug: false, services };
    }

    const environment = resolveEnvironment(this.project, active.name, active.debug);
    // One snapshot of container state for every probe
    const containers = (groups.get(active.name) ?? []).filter((c) => c.state === 'running');
    const host = await this.resolveHost();

    const results = await Promise.all(
      environment.services.map(async (service): Promise<[string, ServiceHealth]> => {
        const container = containers.find((c) => c.service === service.name);
        if (!container) {
          return [service.name, { status: 'not-running', port: service.port, detail: 'container not running' }];
        }

        if (service.probe.type === 'http') {
          const url = `http://${host}:${service.port}${service.probe.path}`;
          const result = await this.prober.probe(url);
          return [service.name, { status: result.status, port: service.port, detail: result.detail }];
        }

        const command = service.probe.command.join(' ');
        const ok = await this.engine.exec(container.id, service.probe.command);
        return [
          service.name,
          {
            status: ok ? 'healthy' : 'unhealthy',
            port: service.port,
            detail: ok ? `${command} succeeded` : `${command} failed`,
          },
        ];
      })
    );

    return { environment: active.name, debug: active.debug, services: Object.fromEntries(results) };
  }

  /**
   * Lazy log stream of the active environment. Each call re-reads from the
   * engine; with `follow` it ends only on abort or when iteration stops.
   */
  async *logs(query: LogQuery): AsyncGenerator<LogLine> {
    const active = this.activeFrom(await this.inspect());
    if (!active) {
      throw new NoActiveEnvironment();
    }

    const environment = resolveEnvironment(this.project, active.name, active.debug);
    const composeTarget: ComposeTarget = {
      project: environment.composeProject,
      files: environment.composeFiles.filter((file) => this.fileExists(this.resolvePath(file))),
      cwd: this.project.root,
    };

    for await (const raw of this.engine.logs(composeTarget, query)) {
      yield parseLogLine(raw);
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async inspect(): Promise<Map<EnvironmentName, ContainerSummary[]>> {
    const containers = await this.engine.listContainers();
    const groups = new Map<EnvironmentName, ContainerSummary[]>();

    for (const name of ENVIRONMENT_NAMES) {
      const project = resolveEnvironment(this.project, name, false).composeProject;
      const owned = containers.filter((c) => c.project === project);
      if (owned.length > 0) {
        groups.set(name, owned);
      }
    }

    return groups;
  }

  private activeFrom(groups: Map<EnvironmentName, ContainerSummary[]>): ActiveEnvironment | null {
    for (const name of ENVIRONMENT_NAMES) {
      const containers = groups.get(name);
      if (!containers?.length) continue;

      const environment = resolveEnvironment(this.project, name, false);
      return {
        name,
        debug: containers.some((c) => c.configFiles.some((file) => isDebugOverlay(name, file))),
        composeProject: environment.composeProject,
        basePort: environment.basePort,
      };
    }
    return null;
  }

  private resolvePath(file: string): string {
    return path.resolve(this.project.root, file);
  }

  private startTarget(environment: Environment): ComposeTarget {
    return {
      project: environment.composeProject,
      files: environment.composeFiles,
      cwd: this.project.root,
      env: {
        COMPOSE_PROJECT_NAME: environment.composeProject,
        ENVIRONMENT: environment.name,
        SOURCE_DIR: environment.sourceDir ?? undefined,
      },
    };
  }

  private stopTarget(name: EnvironmentName): ComposeTarget {
    const file = getComposeFile(name);
    return {
      project: resolveEnvironment(this.project, name, false).composeProject,
      files: this.fileExists(this.resolvePath(file)) ? [file] : [],
      cwd: this.project.root,
    };
  }

  /**
   * A failed `up` can leave some containers running; take them down so the
   * environment is not reported as active.
   */
  private async discardPartialStart(target: ComposeTarget, cause: unknown): Promise<void> {
    this.logger.error(`Failed to start ${target.project}`, describeProcessError(cause));
    try {
      await this.engine.down(target);
    } catch (cleanupError) {
      this.logger.warn(`Cleanup of ${target.project} failed`, describeProcessError(cleanupError));
    }
  }

  /**
   * Containers named after the project that compose no longer tracks,
   * e.g. ones started by hand or left behind by a renamed service.
   */
  private async removeLeftovers(): Promise<string[]> {
    const prefixes = [
      this.project.containerPrefix,
      ...ENVIRONMENT_NAMES.flatMap((name) => {
        const project = resolveEnvironment(this.project, name, false).composeProject;
        return [`${project}-`, `${project}_`];
      }),
    ];
    const leftovers = (await this.engine.listNamed()).filter((c) =>
      prefixes.some((prefix) => c.name.startsWith(prefix))
    );
    if (leftovers.length === 0) {
      return [];
    }

    const names = leftovers.map((c) => c.name);
    this.logger.warn('Removing leftover containers', names);
    await this.engine.remove(leftovers.map((c) => c.id));
    return names;
  }

  private async waitForContainers(project: string): Promise<boolean> {
    let waited = 0;
    for (;;) {
      const containers = await this.engine.listContainers();
      if (containers.some((c) => c.project === project && c.state === 'running')) {
        return true;
      }
      if (waited >= this.readyTimeoutMs) {
        return false;
      }
      await this.sleep(this.watchIntervalMs);
      waited += this.watchIntervalMs;
    }
  }
}
