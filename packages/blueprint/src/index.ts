/**
 * @envswitch/blueprint
 * Project configuration, environment table and naming for envswitch
 */

// Schema types
export type {
  EnvironmentName,
  EnvironmentDefinition,
  Environment,
  HttpProbeConfig,
  ExecProbeConfig,
  ProbeConfig,
  ServiceDefinition,
  ResolvedService,
  ContainerConfigFile,
  ProjectSettings,
  ValidationError,
  ValidationResult,
} from './schema';

export { ENVIRONMENT_NAMES } from './schema';

// Environments
export {
  ENVIRONMENTS,
  DEFAULT_SERVICES,
  isEnvironmentName,
  getEnvironmentForBranch,
  resolveEnvironment,
} from './environments';

// Parser
export {
  CONFIG_FILENAME,
  findConfigFile,
  readConfigFile,
  validateConfig,
  resolveProjectSettings,
} from './parser';

// Naming
export {
  COMPOSE_DIR,
  PROJECT_LABEL,
  SERVICE_LABEL,
  CONFIG_FILES_LABEL,
  getComposeProjectName,
  getComposeFile,
  getDebugOverlayFile,
  getComposeFiles,
  isDebugOverlay,
  getServicePort,
  sanitizePrefix,
} from './naming';
