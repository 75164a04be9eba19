/**
 * Static environment table and resolution against a project
 */

import {
  ENVIRONMENT_NAMES,
  type Environment,
  type EnvironmentDefinition,
  type EnvironmentName,
  type ProjectSettings,
  type ServiceDefinition,
} from './schema';
import { getComposeFiles, getComposeProjectName, getServicePort } from './naming';

export const ENVIRONMENTS: Record<EnvironmentName, EnvironmentDefinition> = {
  prod: { name: 'prod', label: 'Production', branch: 'main', basePort: 7500 },
  staging: { name: 'staging', label: 'Staging', branch: 'develop', basePort: 7600 },
  local: { name: 'local', label: 'Local development', branch: null, basePort: 7700 },
};

export const DEFAULT_SERVICES: ServiceDefinition[] = [
  { name: 'frontend', portOffset: 0, probe: { type: 'http', path: '/' } },
  { name: 'backend', portOffset: 10, probe: { type: 'http', path: '/health' } },
  { name: 'redis', portOffset: 30, probe: { type: 'exec', command: ['redis-cli', 'ping'] } },
];

export function isEnvironmentName(value: string): value is EnvironmentName {
  return ENVIRONMENT_NAMES.some((name) => name === value);
}

/**
 * Git Flow mapping: main/master run as prod, develop as staging,
 * everything else (feature/*, hotfix/*, ...) as local.
 */
export function getEnvironmentForBranch(branch: string | null): EnvironmentName {
  switch (branch) {
    case 'main':
    case 'master':
      return 'prod';
    case 'develop':
      return 'staging';
    default:
      return 'local';
  }
}

function getSourceDir(project: ProjectSettings, name: EnvironmentName, debug: boolean): string | null {
  if (!debug) {
    return null;
  }
  if (name !== 'local' && project.worktreeSupport) {
    return project.worktreeDirs[name];
  }
  return '.';
}

/**
 * Derive the environment record for one invocation.
 */
export function resolveEnvironment(
  project: ProjectSettings,
  name: EnvironmentName,
  debug: boolean
): Environment {
  const definition = ENVIRONMENTS[name];

  return {
    ...definition,
    debug,
    composeProject: getComposeProjectName(project.containerPrefix, name),
    composeFiles: getComposeFiles(name, debug),
    sourceDir: getSourceDir(project, name, debug),
    services: project.services.map((service) => ({
      ...service,
      port: getServicePort(definition.basePort, service.portOffset),
    })),
  };
}
