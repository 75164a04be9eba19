import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '../errors';
import { loadProject } from '../services/project.service';

describe('loadProject', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'envswitch-project-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  const git = (topLevel: string | null) => ({ topLevel: async () => topLevel });

  it('should detect defaults from the repository name when there is no config', async () => {
    const project = await loadProject(tempDir, git('/src/Web Shop'));

    expect(project.configPath).toBeNull();
    expect(project.settings.name).toBe('Web Shop');
    expect(project.settings.containerPrefix).toBe('web-shop_');
    expect(project.settings.root).toBe(tempDir);
    expect(project.settings.services.map((s) => s.name)).toEqual(['frontend', 'backend', 'redis']);
  });

  it('should fall back to the directory name outside a repository', async () => {
    const project = await loadProject(tempDir, git(null));

    expect(project.settings.name).toBe(path.basename(tempDir));
  });

  it('should apply the config file', async () => {
    const configPath = path.join(tempDir, '.container-config.json');
    fs.writeFileSync(
      configPath,
      JSON.stringify({
        project: { name: 'shop', container_prefix: 'acme_', worktree_support: true },
        services: [{ name: 'web', port_offset: 5, probe: { type: 'http', path: '/ping' } }],
      })
    );

    const project = await loadProject(tempDir, git('/src/ignored'));

    expect(project.configPath).toBe(configPath);
    expect(project.settings).toEqual({
      name: 'shop',
      root: tempDir,
      containerPrefix: 'acme_',
      worktreeSupport: true,
      worktreeDirs: { prod: '../shop-production', staging: '../shop-staging' },
      services: [{ name: 'web', portOffset: 5, probe: { type: 'http', path: '/ping' } }],
    });
  });

  it('should list every problem of an invalid config', async () => {
    fs.writeFileSync(
      path.join(tempDir, '.container-config.json'),
      JSON.stringify({
        project: { worktree_support: 'yes' },
        services: [{ name: 'web', port_offset: 5, probe: { type: 'http', path: 'ping' } }],
      })
    );

    const error = await loadProject(tempDir, git(null)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError && error.problems).toEqual([
      'project.worktree_support: Expected boolean, received string',
      'services.0.probe.path: path must start with /',
    ]);
  });

  it('should report unreadable JSON as a config error', async () => {
    fs.writeFileSync(path.join(tempDir, '.container-config.json'), '{ "project": ');

    await expect(loadProject(tempDir, git(null))).rejects.toBeInstanceOf(ConfigError);
  });
});
