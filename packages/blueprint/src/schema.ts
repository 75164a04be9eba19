/**
 * envswitch Blueprint Schema
 * TypeScript types for .container-config.json and the environment table
 */

// =============================================================================
// Environments
// =============================================================================

export const ENVIRONMENT_NAMES = ['prod', 'staging', 'local'] as const;

export type EnvironmentName = (typeof ENVIRONMENT_NAMES)[number];

/**
 * Static description of a named environment. Never persisted.
 */
export interface EnvironmentDefinition {
  name: EnvironmentName;
  label: string;
  /** Branch checked out before activation; null keeps the current branch */
  branch: string | null;
  basePort: number;
}

/**
 * An environment resolved against a project for one invocation
 */
export interface Environment extends EnvironmentDefinition {
  debug: boolean;
  composeProject: string;
  composeFiles: string[];
  /** Directory mounted into the containers in debug mode */
  sourceDir: string | null;
  services: ResolvedService[];
}

// =============================================================================
// Services & Probes
// =============================================================================

export interface HttpProbeConfig {
  type: 'http';
  path: string;
}

export interface ExecProbeConfig {
  type: 'exec';
  command: string[];
}

export type ProbeConfig = HttpProbeConfig | ExecProbeConfig;

export interface ServiceDefinition {
  /** Compose service name */
  name: string;
  portOffset: number;
  probe: ProbeConfig;
}

export interface ResolvedService extends ServiceDefinition {
  port: number;
}

// =============================================================================
// Project Configuration
// =============================================================================

/**
 * On-disk shape of .container-config.json
 */
export interface ContainerConfigFile {
  project?: {
    name?: string;
    container_prefix?: string;
    worktree_support?: boolean;
    worktree_dirs?: {
      prod?: string;
      staging?: string;
    };
  };
  services?: Array<{
    name: string;
    port_offset: number;
    probe: ProbeConfig;
  }>;
}

/**
 * Project settings with every default applied
 */
export interface ProjectSettings {
  name: string;
  root: string;
  containerPrefix: string;
  worktreeSupport: boolean;
  worktreeDirs: {
    prod: string;
    staging: string;
  };
  services: ServiceDefinition[];
}

// =============================================================================
// Validation
// =============================================================================

export interface ValidationError {
  path: string;
  message: string;
}

export type ValidationResult =
  | { valid: true; config: ContainerConfigFile; errors: [] }
  | { valid: false; errors: ValidationError[] };
