/**
 * envswitch Blueprint Parser
 * Reads and validates .container-config.json
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import type {
  ContainerConfigFile,
  ProjectSettings,
  ValidationError,
  ValidationResult,
} from './schema';
import { DEFAULT_SERVICES } from './environments';
import { sanitizePrefix } from './naming';

export const CONFIG_FILENAME = '.container-config.json';

const probeSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('http'),
    path: z.string().startsWith('/', { message: 'path must start with /' }),
  }),
  z.object({
    type: z.literal('exec'),
    command: z.array(z.string().min(1)).min(1),
  }),
]);

const serviceSchema = z.object({
  name: z
    .string()
    .regex(/^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/, 'name must be a valid compose service name'),
  port_offset: z.number().int().min(0).max(99),
  probe: probeSchema,
});

const configSchema = z.object({
  project: z
    .object({
      name: z.string().min(1).optional(),
      container_prefix: z
        .string()
        .regex(
          /^[a-z0-9][a-z0-9_-]*$/,
          'container_prefix must be lowercase alphanumeric with dashes or underscores'
        )
        .optional(),
      worktree_support: z.boolean().optional(),
      worktree_dirs: z
        .object({
          prod: z.string().min(1).optional(),
          staging: z.string().min(1).optional(),
        })
        .optional(),
    })
    .optional(),
  services: z
    .array(serviceSchema)
    .min(1)
    .refine((list) => new Set(list.map((s) => s.name)).size === list.length, {
      message: 'service names must be unique',
    })
    .optional(),
});

/**
 * Find the config file in the given directory
 */
export function findConfigFile(dir: string): string | null {
  const filepath = resolve(dir, CONFIG_FILENAME);
  return existsSync(filepath) ? filepath : null;
}

/**
 * Read the raw JSON of a config file
 */
export function readConfigFile(configPath: string): unknown {
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  const content = readFileSync(configPath, 'utf-8');

  try {
    return JSON.parse(content);
  } catch (err) {
    throw new Error(`Invalid JSON in config file: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Validate parsed JSON against the config schema
 */
export function validateConfig(raw: unknown): ValidationResult {
  const result = configSchema.safeParse(raw);

  if (result.success) {
    const config: ContainerConfigFile = result.data;
    return { valid: true, config, errors: [] };
  }

  const errors: ValidationError[] = result.error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));

  return { valid: false, errors };
}

/**
 * Apply defaults to a (possibly missing) config file
 */
export function resolveProjectSettings(
  config: ContainerConfigFile | null,
  options: { root: string; detectedName: string }
): ProjectSettings {
  const project = config?.project;
  const name = project?.name ?? options.detectedName;

  return {
    name,
    root: options.root,
    containerPrefix: project?.container_prefix ?? sanitizePrefix(name),
    worktreeSupport: project?.worktree_support ?? false,
    worktreeDirs: {
      prod: project?.worktree_dirs?.prod ?? `../${name}-production`,
      staging: project?.worktree_dirs?.staging ?? `../${name}-staging`,
    },
    services: config?.services
      ? config.services.map((service) => ({
          name: service.name,
          portOffset: service.port_offset,
          probe: service.probe,
        }))
      : DEFAULT_SERVICES,
  };
}
