/**
 * Project loading: .container-config.json with auto-detected fallbacks
 */

import * as path from 'path';
import {
  findConfigFile,
  readConfigFile,
  resolveProjectSettings,
  validateConfig,
  type ProjectSettings,
} from '@envswitch/blueprint';
import { ConfigError } from '../errors';
import type { VersionControl } from './git.service';

export interface LoadedProject {
  settings: ProjectSettings;
  /** null when settings were auto-detected */
  configPath: string | null;
}

export async function loadProject(cwd: string, git: Pick<VersionControl, 'topLevel'>): Promise<LoadedProject> {
  const topLevel = await git.topLevel();
  const detectedName = path.basename(topLevel ?? cwd);
  const configPath = findConfigFile(cwd);

  if (!configPath) {
    return {
      settings: resolveProjectSettings(null, { root: cwd, detectedName }),
      configPath: null,
    };
  }

  let raw: unknown;
  try {
    raw = readConfigFile(configPath);
  } catch (error) {
    throw new ConfigError(configPath, [error instanceof Error ? error.message : String(error)]);
  }

  const result = validateConfig(raw);
  if (!result.valid) {
    throw new ConfigError(
      configPath,
      result.errors.map((e) => `${e.path}: ${e.message}`)
    );
  }

  return {
    settings: resolveProjectSettings(result.config, { root: cwd, detectedName }),
    configPath,
  };
}
