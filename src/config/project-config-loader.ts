// src/config/project-config-loader.ts

import * as fs from 'fs/promises';
import * as path from 'path';
import * as YAML from 'yaml';
import type { ProjectConfig } from './schema.js';
import { Logger } from '../utils/logger.js';

// Cache to avoid repeated disk IO per run
const configCache = new Map<string, ProjectConfig>();

const LOG_LEVELS: ReadonlyArray<ProjectConfig['logLevel']> = ['debug', 'info', 'warn', 'error'];

interface RawProjectConfig {
  engine?: { type?: unknown; binary?: unknown };
  artifactsDir?: unknown;
  logLevel?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function asLogLevel(value: unknown): ProjectConfig['logLevel'] | undefined {
  return LOG_LEVELS.find((level) => level === value);
}

/**
 * Loads project-level settings from .testbed/config.yml.
 * Missing file or keys fall back to defaults; TESTBED_ENGINE and
 * TESTBED_LOG_LEVEL override whatever the file says.
 */
export class ProjectConfigLoader {
  constructor(
    private repoPath: string,
    private env: NodeJS.ProcessEnv = process.env
  ) {}

  async load(): Promise<ProjectConfig> {
    const cacheKey = this.repoPath;
    const cached = configCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const configPath = path.join(this.repoPath, '.testbed', 'config.yml');

    let rawConfig: RawProjectConfig | undefined;

    try {
      const content = await fs.readFile(configPath, 'utf-8');
      const parsed: unknown = YAML.parse(content);
      if (isRecord(parsed)) {
        rawConfig = {
          engine: isRecord(parsed.engine) ? parsed.engine : undefined,
          artifactsDir: parsed.artifactsDir,
          logLevel: parsed.logLevel,
        };
      }
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        Logger.debug('No config.yml found, using defaults');
      } else {
        Logger.warn(`Failed to parse config.yml: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    const config = this.buildConfigWithDefaults(rawConfig);
    configCache.set(cacheKey, config);

    return config;
  }

  private buildConfigWithDefaults(rawConfig?: RawProjectConfig): ProjectConfig {
    const engineOverride = asString(this.env.TESTBED_ENGINE);
    const levelOverride = asLogLevel(this.env.TESTBED_LOG_LEVEL?.toLowerCase());

    return {
      engine: {
        type: asString(rawConfig?.engine?.type) ?? 'docker-cli',
        binary: engineOverride ?? asString(rawConfig?.engine?.binary) ?? 'docker',
      },
      artifactsDir: this.resolvePath(asString(rawConfig?.artifactsDir) ?? '.testbed/artifacts'),
      logLevel: levelOverride ?? asLogLevel(rawConfig?.logLevel) ?? 'info',
    };
  }

  /**
   * Resolves a path relative to the repository root
   */
  private resolvePath(relativePath: string): string {
    if (path.isAbsolute(relativePath)) {
      return relativePath;
    }
    return path.resolve(this.repoPath, relativePath);
  }

  /**
   * Clears the configuration cache (useful for testing)
   */
  static clearCache(): void {
    configCache.clear();
  }
}
