/**
 * Health probing
 *
 * HTTP probes are a single GET with a fixed timeout and no retry.
 * A refused connection or a timeout is `unreachable`, a non-2xx answer
 * is `unhealthy`. Probes never throw.
 */

import { existsSync } from 'fs';
import { DOCKER_HOST_OVERRIDE, FALLBACK_DOCKER_HOST, PROBE_TIMEOUT_MS } from '../config';
import { runCommand, type CommandRunner } from './command-runner';

export type HealthStatus = 'healthy' | 'unhealthy' | 'unreachable' | 'not-running';

export interface ProbeResult {
  status: Exclude<HealthStatus, 'not-running'>;
  detail: string;
}

export interface HttpProber {
  probe(url: string): Promise<ProbeResult>;
}

export type FetchLike = (
  url: string,
  init: { method: 'GET'; signal: AbortSignal }
) => Promise<{ ok: boolean; status: number }>;

function describeFetchError(error: unknown): string {
  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
      return 'Timeout';
    }
    const cause: unknown = error.cause;
    if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
      return cause.code === 'ECONNREFUSED' ? 'Connection refused' : cause.code;
    }
    return error.message;
  }
  return String(error);
}

export class FetchProber implements HttpProber {
  private readonly timeoutMs: number;
  private readonly fetch: FetchLike;

  constructor(options: { timeoutMs?: number; fetch?: FetchLike } = {}) {
    this.timeoutMs = options.timeoutMs ?? PROBE_TIMEOUT_MS;
    this.fetch = options.fetch ?? fetch;
  }

  async probe(url: string): Promise<ProbeResult> {
    try {
      const response = await this.fetch(url, {
        method: 'GET',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return response.ok
        ? { status: 'healthy', detail: `HTTP ${response.status}` }
        : { status: 'unhealthy', detail: `HTTP ${response.status}` };
    } catch (error) {
      return { status: 'unreachable', detail: describeFetchError(error) };
    }
  }
}

/**
 * Host the published ports are reachable on.
 *
 * Inside a dev container the ports are published on the Docker host,
 * which is the default gateway of the container network.
 */
export async function detectDockerHost(
  options: {
    override?: string | null;
    isInContainer?: () => boolean;
    run?: CommandRunner;
  } = {}
): Promise<string> {
  const override = options.override === undefined ? DOCKER_HOST_OVERRIDE : options.override;
  if (override) {
    return override;
  }

  const isInContainer = options.isInContainer ?? (() => existsSync('/.dockerenv'));
  if (!isInContainer()) {
    return 'localhost';
  }

  const run = options.run ?? runCommand;
  try {
    const { stdout } = await run('ip', ['route', 'show', 'default']);
    const match = stdout.match(/default via (\S+)/);
    return match ? match[1] : FALLBACK_DOCKER_HOST;
  } catch {
    return FALLBACK_DOCKER_HOST;
  }
}
