// src/config/job-loader.ts

import * as fs from 'fs/promises';
import * as path from 'path';
import * as YAML from 'yaml';
import { z } from 'zod';
import type { InstallConfig, JobDefinition, JobMetadata, PortMapping, ServiceSpec } from './schema.js';
import { ConfigurationError } from '../utils/errors.js';
import { DEFAULT_ABORT_EXIT_CODE } from '../core/test-runner.js';

export const DEFAULT_UPGRADE_COMMAND = 'python -m pip install --upgrade pip';
export const DEFAULT_INSTALL_COMMAND = 'pip install -U ".{{extrasSuffix}}"';
export const DEFAULT_TIMEOUT_MINUTES = 15;

// Lookup order for a job name
const JOB_EXTENSIONS = ['.yml', '.yaml'];

export interface JobLoadResult {
  definition: JobDefinition;
  metadata: JobMetadata;
}

/**
 * `mqtt-broker` → `MQTT_BROKER_URL`
 */
export function defaultEnvVarName(serviceName: string): string {
  return `${serviceName.toUpperCase().replace(/[^A-Z0-9]/g, '_')}_URL`;
}

/**
 * `"1883:1883"` or `"1883"` (host port allocated by the engine).
 */
export function parsePortMapping(value: string): PortMapping {
  const [first, second] = value.split(':');
  if (second === undefined) {
    return { hostPort: 0, containerPort: Number(first) };
  }
  return { hostPort: Number(first), containerPort: Number(second) };
}

const port = z.number().int().max(65535);

const portMappingSchema = z.object({
  hostPort: port.min(0),
  containerPort: port.min(1),
});

const portSchema = z.union([
  z
    .string()
    .regex(/^\d+(:\d+)?$/, 'Port must be "host:container" or "container"')
    .transform(parsePortMapping)
    .pipe(portMappingSchema),
  z.number().transform((containerPort) => ({ hostPort: 0, containerPort })).pipe(portMappingSchema),
  z
    .object({ host: z.number().default(0), container: z.number() })
    .transform(({ host, container }) => ({ hostPort: host, containerPort: container }))
    .pipe(portMappingSchema),
]);

const envValue = z.union([z.string(), z.number(), z.boolean()]).transform(String);
const envSchema = z.record(z.string(), envValue).default({});

const readinessSchema = z
  .object({
    strategy: z.enum(['probe', 'grace']).default('probe'),
    gracePeriodMs: z.number().int().min(0).default(2000),
    timeoutMs: z.number().int().positive().default(30000),
  })
  .default({});

const serviceSchema = z
  .object({
    name: z.string().regex(/^[A-Za-z0-9][A-Za-z0-9_.-]*$/, 'Service name must be a valid network alias'),
    image: z.string().min(1),
    ports: z.array(portSchema).default([]),
    connection: z
      .object({
        scheme: z.string().regex(/^[a-z][a-z0-9+.-]*$/i, 'Invalid URL scheme').default('tcp'),
        envVar: z.string().optional(),
      })
      .default({}),
    env: envSchema,
    readiness: readinessSchema,
  })
  .transform(
    (service): ServiceSpec => ({
      ...service,
      connection: {
        scheme: service.connection.scheme,
        envVar: service.connection.envVar ?? defaultEnvVarName(service.name),
      },
    })
  );

const installSchema = z
  .object({
    // null skips the upgrade step
    upgradeCommand: z.string().nullable().default(DEFAULT_UPGRADE_COMMAND),
    installCommand: z.string().min(1).default(DEFAULT_INSTALL_COMMAND),
    extras: z.array(z.string().min(1)).default([]),
  })
  .default({})
  .transform(
    (install): InstallConfig => ({
      upgradeCommand: install.upgradeCommand ?? undefined,
      installCommand: install.installCommand,
      extras: install.extras,
    })
  );

export const jobDefinitionSchema = z.object({
  name: z.string().min(1),
  environment: z.object({
    image: z.string().min(1),
    workdir: z.string().startsWith('/', 'workdir must be an absolute path').default('/workspace'),
  }),
  services: z.array(serviceSchema).default([]),
  install: installSchema,
  test: z.object({
    command: z.string().min(1),
    env: envSchema,
    coverage: z.object({ path: z.string().min(1) }).optional(),
  }),
  timeoutMinutes: z.number().positive().default(DEFAULT_TIMEOUT_MINUTES),
  settings: z
    .object({
      strictEnv: z.boolean().default(false),
      abortExitCode: z.number().int().min(1).max(255).default(DEFAULT_ABORT_EXIT_CODE),
    })
    .default({}),
});

/**
 * Parse and default a raw job document. Throws ConfigurationError listing
 * every schema issue.
 */
export function parseJobDefinition(raw: unknown, source: string = 'job definition'): JobDefinition {
  const result = jobDefinitionSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new ConfigurationError(`Invalid ${source}:\n${issues}`);
  }
  return result.data;
}

export class JobLoader {
  constructor(private repoPath: string) {}

  getJobsDir(): string {
    return path.join(this.repoPath, '.testbed', 'jobs');
  }

  /**
   * Load `<name>.yml`, or `<name>.yaml` when there is none.
   */
  async loadJob(jobName: string): Promise<JobLoadResult> {
    for (const extension of JOB_EXTENSIONS) {
      try {
        return await this.loadFile(path.join(this.getJobsDir(), `${jobName}${extension}`));
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
          throw error;
        }
      }
    }
    throw new ConfigurationError(`Job not found: ${jobName}`);
  }

  async loadJobFromPath(filePath: string): Promise<JobLoadResult> {
    try {
      return await this.loadFile(path.resolve(filePath));
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new ConfigurationError(`Job file not found: ${filePath}`);
      }
      throw error;
    }
  }

  async listJobs(): Promise<string[]> {
    try {
      const files = await fs.readdir(this.getJobsDir());
      const names = files
        .filter(f => JOB_EXTENSIONS.some((extension) => f.endsWith(extension)))
        .map(f => path.parse(f).name);
      return [...new Set(names)].sort();
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }

  private async loadFile(filePath: string): Promise<JobLoadResult> {
    const content = await fs.readFile(filePath, 'utf-8');

    let raw: unknown;
    try {
      raw = YAML.parse(content);
    } catch (error) {
      throw new ConfigurationError(
        `Failed to parse YAML in ${path.basename(filePath)}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const definition = parseJobDefinition(raw, path.basename(filePath));
    const metadata: JobMetadata = {
      sourcePath: filePath,
      loadedAt: new Date().toISOString(),
    };

    return { definition, metadata };
  }
}
