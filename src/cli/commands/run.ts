// src/cli/commands/run.ts

import * as path from 'path';
import type { JobDefinition } from '../../config/schema.js';
import { JobLoader } from '../../config/job-loader.js';
import { ProjectConfigLoader } from '../../config/project-config-loader.js';
import { JobValidator } from '../../validators/job-validator.js';
import { JobRunner } from '../../core/job-runner.js';
import { JobAbortController } from '../../core/abort-controller.js';
import { ContainerEngineRegistry } from '../../core/container-engine-registry.js';
import type { ContainerEngine } from '../../core/types/container-engine.js';
import { EXIT_CODES } from '../../core/result-reporter.js';
import { Logger } from '../../utils/logger.js';

export interface RunOptions {
  versionTag: string;
  checkout?: string;
  timeoutMinutes?: number;
  strictEnv?: boolean;
  quiet?: boolean;
  /** Defaults to the engine configured in .testbed/config.yml */
  engine?: ContainerEngine;
}

/**
 * Apply CLI flag overrides on top of the loaded definition.
 */
export function applyRunOverrides(definition: JobDefinition, options: RunOptions): JobDefinition {
  return {
    ...definition,
    timeoutMinutes: options.timeoutMinutes ?? definition.timeoutMinutes,
    settings: {
      ...definition.settings,
      strictEnv: options.strictEnv ?? definition.settings.strictEnv,
    },
  };
}

/**
 * Returns the process exit code for the run.
 */
export async function runCommand(
  repoPath: string,
  jobName: string,
  options: RunOptions
): Promise<number> {
  const loader = new JobLoader(repoPath);
  const { definition: loaded } = await loader.loadJob(jobName);
  const definition = applyRunOverrides(loaded, options);

  const isValid = await JobValidator.validateAndReport(definition, repoPath);
  if (!isValid) {
    return EXIT_CODES.setupFailure;
  }

  const projectConfig = await new ProjectConfigLoader(repoPath).load();
  const engine = options.engine ?? ContainerEngineRegistry.getEngine(projectConfig.engine.type);

  const abortController = new JobAbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    Logger.warn(`Received ${signal}, aborting job and tearing down...`);
    abortController.abort('interrupted');
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const runner = new JobRunner(engine, {
      repoPath,
      artifactsDir: projectConfig.artifactsDir,
      quiet: options.quiet,
    });

    const outcome = await runner.run(
      definition,
      { versionTag: options.versionTag },
      {
        workspacePath: path.resolve(repoPath, options.checkout ?? '.'),
        abortController,
      }
    );

    if (options.quiet) {
      console.log(`${outcome.status.reason}: ${outcome.status.message}`);
    }

    return outcome.status.exitCode;
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
  }
}
