/**
 * Config templates for `envswitch init`
 */

import { sanitizePrefix, type ContainerConfigFile } from '@envswitch/blueprint';

export const TEMPLATE_NAMES = ['default', 'fullstack', 'simple', 'microservices'] as const;
export type TemplateName = (typeof TEMPLATE_NAMES)[number];

export interface TemplateInfo {
  name: TemplateName;
  description: string;
}

export const TEMPLATES: TemplateInfo[] = [
  { name: 'default', description: 'Frontend, backend and redis (the built-in service set)' },
  { name: 'fullstack', description: 'Default services plus a postgres database and worktree support' },
  { name: 'simple', description: 'A single web service' },
  { name: 'microservices', description: 'Gateway, two API services, worker health endpoint and redis' },
];

export function isTemplateName(value: string): value is TemplateName {
  return TEMPLATE_NAMES.some((name) => name === value);
}

/**
 * Build the `.container-config.json` content for a template
 */
export function generateConfig(template: TemplateName, projectName: string): ContainerConfigFile {
  const project: NonNullable<ContainerConfigFile['project']> = {
    name: projectName,
    container_prefix: sanitizePrefix(projectName),
    worktree_support: false,
  };

  switch (template) {
    case 'default':
      return {
        project,
        services: [
          { name: 'frontend', port_offset: 0, probe: { type: 'http', path: '/' } },
          { name: 'backend', port_offset: 10, probe: { type: 'http', path: '/health' } },
          { name: 'redis', port_offset: 30, probe: { type: 'exec', command: ['redis-cli', 'ping'] } },
        ],
      };

    case 'fullstack':
      return {
        project: {
          ...project,
          worktree_support: true,
          worktree_dirs: {
            prod: `../${projectName}-production`,
            staging: `../${projectName}-staging`,
          },
        },
        services: [
          { name: 'frontend', port_offset: 0, probe: { type: 'http', path: '/' } },
          { name: 'backend', port_offset: 10, probe: { type: 'http', path: '/health' } },
          { name: 'postgres', port_offset: 20, probe: { type: 'exec', command: ['pg_isready', '-U', 'postgres'] } },
          { name: 'redis', port_offset: 30, probe: { type: 'exec', command: ['redis-cli', 'ping'] } },
        ],
      };

    case 'simple':
      return {
        project,
        services: [{ name: 'web', port_offset: 0, probe: { type: 'http', path: '/' } }],
      };

    case 'microservices':
      return {
        project,
        services: [
          { name: 'gateway', port_offset: 0, probe: { type: 'http', path: '/health' } },
          { name: 'users', port_offset: 10, probe: { type: 'http', path: '/health' } },
          { name: 'orders', port_offset: 11, probe: { type: 'http', path: '/health' } },
          { name: 'worker', port_offset: 20, probe: { type: 'http', path: '/healthz' } },
          { name: 'redis', port_offset: 30, probe: { type: 'exec', command: ['redis-cli', 'ping'] } },
        ],
      };
  }
}

export function renderConfig(template: TemplateName, projectName: string): string {
  return JSON.stringify(generateConfig(template, projectName), null, 2) + '\n';
}
