import { describe, it, expect } from 'vitest';
import { validateConfig } from '@envswitch/blueprint';
import { TEMPLATE_NAMES, generateConfig, isTemplateName, renderConfig } from '../templates';

describe('templates', () => {
  it.each(TEMPLATE_NAMES)('should produce a valid config for %s', (template) => {
    const result = validateConfig(JSON.parse(renderConfig(template, 'shop')));

    expect(result.valid).toBe(true);
  });

  it('should substitute the project name', () => {
    const config = generateConfig('default', 'Web Shop');

    expect(config.project?.name).toBe('Web Shop');
    expect(config.project?.container_prefix).toBe('web-shop_');
  });

  it('should enable worktrees for fullstack', () => {
    const config = generateConfig('fullstack', 'shop');

    expect(config.project?.worktree_support).toBe(true);
    expect(config.project?.worktree_dirs).toEqual({ prod: '../shop-production', staging: '../shop-staging' });
    expect(config.services?.map((s) => s.name)).toEqual(['frontend', 'backend', 'postgres', 'redis']);
  });

  it('should keep a single service for simple', () => {
    expect(generateConfig('simple', 'shop').services).toEqual([
      { name: 'web', port_offset: 0, probe: { type: 'http', path: '/' } },
    ]);
  });

  it('should end the rendered file with a newline', () => {
    expect(renderConfig('simple', 'shop').endsWith('}\n')).toBe(true);
  });

  it('should recognise template names', () => {
    expect(isTemplateName('microservices')).toBe(true);
    expect(isTemplateName('k8s')).toBe(false);
  });
});
