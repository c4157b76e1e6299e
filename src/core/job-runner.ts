// src/core/job-runner.ts

import { v4 as uuidv4 } from 'uuid';
import type {
  ExitStatus,
  JobDefinition,
  JobInput,
  JobResult,
  JobRunRecord,
  StageExecution,
  StageName
} from '../config/schema.js';
import type { ContainerEngine } from './types/container-engine.js';
import { JobAbortController, JobAbortError } from './abort-controller.js';
import { ResourceScope } from './resource-scope.js';
import { EnvironmentProvisioner, resolveImageReference } from './environment-provisioner.js';
import { ServiceManager, type ServiceManagerDependencies } from './service-manager.js';
import { buildEnvironmentVariables } from './env-builder.js';
import { DependencyInstaller } from './dependency-installer.js';
import { BoundedTestRunner } from './test-runner.js';
import { ResultReporter } from './result-reporter.js';
import { JobStateManager } from './state-manager.js';
import { ErrorFactory } from '../utils/error-factory.js';
import { JobLogger } from '../utils/job-logger.js';
import { Logger } from '../utils/logger.js';

const STAGE_ORDER: StageName[] = ['provision', 'services', 'install', 'test', 'report'];

export interface JobRunnerOptions {
  repoPath: string;
  artifactsDir: string;
  quiet?: boolean;
  serviceDependencies?: ServiceManagerDependencies;
  stateManager?: JobStateManager;
}

export interface JobRunOptions {
  /** Host checkout mounted into the environment */
  workspacePath: string;
  runId?: string;
  /** Supply one to abort from outside (SIGINT) */
  abortController?: JobAbortController;
}

export interface JobRunOutcome {
  runId: string;
  status: ExitStatus;
  result?: JobResult;
  record: JobRunRecord;
}

interface RunContext {
  record: JobRunRecord;
  logger: JobLogger;
  abortController: JobAbortController;
}

/**
 * Runs one job: provision → services → install → test → report.
 *
 * Every resource a stage acquires is registered in a ResourceScope and released
 * newest-first once the test stage ends or any stage fails, whichever comes first.
 */
export class JobRunner {
  private stateManager: JobStateManager;

  constructor(
    private readonly engine: ContainerEngine,
    private readonly options: JobRunnerOptions
  ) {
    this.stateManager = options.stateManager ?? new JobStateManager(options.repoPath);
  }

  async run(definition: JobDefinition, input: JobInput, runOptions: JobRunOptions): Promise<JobRunOutcome> {
    const runId = runOptions.runId ?? uuidv4();
    const abortController = runOptions.abortController ?? new JobAbortController();
    const scope = new ResourceScope();
    const logger = new JobLogger(this.options.repoPath, definition.name, runId, this.options.quiet);
    const timeoutMs = definition.timeoutMinutes * 60_000;
    const startedAt = Date.now();

    const record: JobRunRecord = {
      runId,
      jobName: definition.name,
      versionTag: input.versionTag,
      startedAt: new Date(startedAt).toISOString(),
      status: 'running',
      stages: [],
      artifacts: { logPath: logger.getLogPath() },
      teardown: [],
    };
    const context: RunContext = { record, logger, abortController };
    const reporter = new ResultReporter({
      runId,
      artifactsDir: this.options.artifactsDir,
      abortExitCode: definition.settings.abortExitCode,
      quiet: this.options.quiet,
    });

    logger.jobStart(definition.name, runId, input.versionTag);
    await this.persist(record);

    let result: JobResult | undefined;
    let failure: { stage: StageName; error: unknown } | undefined;
    let currentStage: StageName = 'provision';

    abortController.armDeadline(timeoutMs);
    try {
      currentStage = 'provision';
      const environment = await this.runStage(context, 'provision', async () => {
        // Fail fast on a bad tag, before the engine is touched
        resolveImageReference(definition.environment.image, input.versionTag);
        const provisioner = new EnvironmentProvisioner(this.engine, definition.environment);
        const env = await provisioner.provision(input.versionTag, {
          runId,
          workspacePath: runOptions.workspacePath,
          scope,
          abortController,
        });
        logger.log(`Environment: ${env.imageReference}`);
        return env;
      });

      currentStage = 'services';
      const envVars = await this.runStage(context, 'services', async () => {
        const serviceManager = new ServiceManager(this.engine, this.options.serviceDependencies);
        const connections = await serviceManager.startServices(definition.services, {
          runId,
          environment,
          scope,
          abortController,
        });
        for (const connection of connections.values()) {
          logger.log(`Service ${connection.serviceName} ready at ${connection.url}`);
        }
        return buildEnvironmentVariables(connections.values(), definition.test.env, {
          strict: definition.settings.strictEnv,
        });
      });

      currentStage = 'install';
      await this.runStage(context, 'install', async () => {
        const installer = new DependencyInstaller(this.engine, definition.install);
        await installer.install(environment, environment.workdir, definition.install.extras, {
          abortController,
          onOutput: (chunk) => logger.output(chunk),
        });
      });

      currentStage = 'test';
      const testResult = await this.runStage(context, 'test', () => {
        const runner = new BoundedTestRunner(this.engine);
        return runner.run(
          environment,
          definition.test.command,
          envVars,
          abortController.remainingMs() ?? timeoutMs,
          {
            abortController,
            abortExitCode: definition.settings.abortExitCode,
            coveragePath: definition.test.coverage?.path,
            onOutput: (chunk) => logger.output(chunk),
          }
        );
      });
      result = testResult;
      this.markTestStage(record, testResult);
    } catch (error) {
      // Whatever a killed setup command reported, the run was aborted
      const abortReason = abortController.reason;
      failure = {
        stage: currentStage,
        error: abortReason && !(error instanceof JobAbortError) ? new JobAbortError(abortReason) : error,
      };
    } finally {
      abortController.disarmDeadline();
      record.teardown = await scope.releaseAll();
    }

    let status: ExitStatus;
    if (result) {
      const testResult = result;
      try {
        const reported = await this.runStage(context, 'report', () => reporter.report(testResult), false);
        status = reported.status;
        record.artifacts.testLogPath = reported.artifacts.testLogPath;
        record.artifacts.coveragePath = reported.artifacts.coveragePath;
      } catch (error) {
        logger.error(`Could not write job artifacts: ${error instanceof Error ? error.message : String(error)}`);
        status = reporter.reportSetupFailure('report', error);
      }
    } else {
      status = reporter.reportSetupFailure(failure?.stage ?? currentStage, failure?.error);
      this.markSkippedStages(context);
    }

    record.exitStatus = status;
    record.status = status.success ? 'passed' : status.reason === 'RunnerAbort' ? 'aborted' : 'failed';
    record.finishedAt = new Date().toISOString();
    if (result) {
      record.result = {
        exitCode: result.exitCode,
        rawExitCode: result.rawExitCode,
        timedOut: result.timedOut,
        abortReason: result.abortReason,
        durationMs: result.durationMs,
      };
    }

    logger.jobComplete(status.reason, (Date.now() - startedAt) / 1000);
    await logger.close();
    await this.persist(record);

    return { runId, status, result, record };
  }

  private async runStage<T>(
    context: RunContext,
    stageName: StageName,
    fn: () => Promise<T>,
    checkAbort: boolean = true
  ): Promise<T> {
    if (checkAbort) {
      context.abortController.throwIfAborted();
    }

    const execution: StageExecution = {
      stageName,
      status: 'running',
      startTime: new Date().toISOString(),
    };
    context.record.stages.push(execution);
    context.logger.stageStart(stageName);
    const startedAt = Date.now();

    try {
      const value = await fn();
      execution.status = 'success';
      execution.endTime = new Date().toISOString();
      execution.duration = (Date.now() - startedAt) / 1000;
      context.logger.stageComplete(stageName, execution.duration);
      return value;
    } catch (error) {
      execution.status = 'failed';
      execution.endTime = new Date().toISOString();
      execution.duration = (Date.now() - startedAt) / 1000;
      execution.error = ErrorFactory.createStageError(error);
      context.logger.stageFailed(stageName, execution.error.message);
      if (execution.error.suggestion) {
        context.logger.log(`   💡 ${execution.error.suggestion}`);
      }
      throw error;
    }
  }

  /**
   * The test stage itself completed; reflect the command's outcome on it.
   */
  private markTestStage(record: JobRunRecord, result: JobResult): void {
    const stage = record.stages.find((s) => s.stageName === 'test');
    if (!stage || (result.exitCode === 0 && !result.abortReason)) return;

    stage.status = 'failed';
    stage.error = {
      message: result.abortReason
        ? `Test command aborted (${result.abortReason})`
        : `Test command exited with code ${result.exitCode}`,
      kind: result.abortReason ? 'RunnerAbort' : 'TestFailure',
      timestamp: new Date().toISOString(),
    };
  }

  private markSkippedStages({ record, logger }: RunContext): void {
    const seen = new Set(record.stages.map((s) => s.stageName));
    const now = new Date().toISOString();
    for (const stageName of STAGE_ORDER) {
      if (!seen.has(stageName)) {
        record.stages.push({ stageName, status: 'skipped', startTime: now });
        logger.stageSkipped(stageName, 'an earlier stage failed');
      }
    }
  }

  private async persist(record: JobRunRecord): Promise<void> {
    try {
      await this.stateManager.saveRun(record);
    } catch (error) {
      Logger.warn(`Failed to save run state: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
