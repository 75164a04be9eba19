/**
 * Centralized naming utilities for compose projects and files.
 *
 * Every compose project, file path and port should go through these
 * functions so the switcher, status and health checks agree on names.
 */

import type { EnvironmentName } from './schema';

export const COMPOSE_DIR = 'docker';

/** Compose label holding the project name */
export const PROJECT_LABEL = 'com.docker.compose.project';
/** Compose label holding the service name */
export const SERVICE_LABEL = 'com.docker.compose.service';
/** Compose label holding the comma-separated config files used for `up` */
export const CONFIG_FILES_LABEL = 'com.docker.compose.project.config_files';

/**
 * Get the compose project name.
 * Pattern: ${prefix without trailing _}-${env}
 */
export function getComposeProjectName(containerPrefix: string, env: EnvironmentName): string {
  const base = containerPrefix.replace(/_+$/, '');
  return `${base}-${env}`;
}

/**
 * Get the base compose file.
 * Pattern: docker/docker-compose.${env}.yml
 */
export function getComposeFile(env: EnvironmentName): string {
  return `${COMPOSE_DIR}/docker-compose.${env}.yml`;
}

/**
 * Get the debug overlay compose file.
 * Pattern: docker/docker-compose.${env}-debug.yml
 */
export function getDebugOverlayFile(env: EnvironmentName): string {
  return `${COMPOSE_DIR}/docker-compose.${env}-debug.yml`;
}

export function getComposeFiles(env: EnvironmentName, debug: boolean): string[] {
  return debug ? [getComposeFile(env), getDebugOverlayFile(env)] : [getComposeFile(env)];
}

/**
 * Whether a path (absolute or relative, as recorded by compose) is the
 * debug overlay of the given environment.
 */
export function isDebugOverlay(env: EnvironmentName, file: string): boolean {
  const normalized = file.replace(/\\/g, '/');
  const overlay = getDebugOverlayFile(env);
  return normalized === overlay || normalized.endsWith(`/${overlay}`);
}

export function getServicePort(basePort: number, portOffset: number): number {
  return basePort + portOffset;
}

/**
 * Strip anything a container prefix can't carry.
 * Compose project names must be lowercase alphanumerics, dashes and underscores.
 */
export function sanitizePrefix(name: string): string {
  const cleaned = name
    .toLowerCase()
    .replace(/[^a-z0-9_-]/g, '-')
    .replace(/^[-_]+/, '');
  return `${cleaned || 'project'}_`;
}
