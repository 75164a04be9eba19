// =============================================================================
// RUNTIME CONFIGURATION
// Read once from the environment. None of these are required.
// =============================================================================

export function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

// Interval between readiness polls after `compose up` (ms)
export const WATCH_INTERVAL_MS = readInt(process.env.ENVSWITCH_WATCH_INTERVAL, 2000);

// Probe host override; otherwise detected (localhost or the container gateway)
export const DOCKER_HOST_OVERRIDE = process.env.ENVSWITCH_DOCKER_HOST?.trim() || null;

// Debug log path override
export const DEBUG_LOG_OVERRIDE = process.env.ENVSWITCH_DEBUG_LOG?.trim() || null;

// =============================================================================
// FIXED CONSTANTS
// =============================================================================

// How long a switch waits for the first container to report running
export const READY_TIMEOUT_MS = 60000;

// HTTP health probe: GET, 2s timeout, no retry
export const PROBE_TIMEOUT_MS = 2000;

// Gateway used when running inside a container and `ip route` gives nothing
export const FALLBACK_DOCKER_HOST = '172.17.0.1';
