// src/core/result-reporter.ts

import * as fs from 'fs/promises';
import * as path from 'path';
import chalk from 'chalk';
import type { ExitStatus, JobResult, StageName } from '../config/schema.js';
import { JobAbortError } from './abort-controller.js';
import { JobError } from '../utils/errors.js';
import { DEFAULT_ABORT_EXIT_CODE } from './test-runner.js';

export const EXIT_CODES = {
  passed: 0,
  testFailure: 1,
  setupFailure: 2,
} as const;

export interface ReportedArtifacts {
  testLogPath: string;
  coveragePath?: string;
}

export interface ReporterOptions {
  runId: string;
  artifactsDir: string;
  abortExitCode?: number;
  /** Suppress the console summary */
  quiet?: boolean;
}

/**
 * Map a test result to the job's exit status. Pure.
 */
export function classifyResult(result: JobResult, abortExitCode: number = DEFAULT_ABORT_EXIT_CODE): ExitStatus {
  if (result.timedOut || result.abortReason) {
    const why = result.timedOut ? 'timed out' : 'was interrupted';
    return {
      success: false,
      reason: 'RunnerAbort',
      exitCode: abortExitCode,
      message: `Job aborted: test command ${why} after ${formatDuration(result.durationMs)}`,
    };
  }

  if (result.exitCode === 0) {
    return {
      success: true,
      reason: 'Passed',
      exitCode: EXIT_CODES.passed,
      message: `Tests passed in ${formatDuration(result.durationMs)}`,
    };
  }

  return {
    success: false,
    reason: 'TestFailure',
    exitCode: EXIT_CODES.testFailure,
    message: `Tests failed with exit code ${result.exitCode}`,
  };
}

function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Surfaces the outcome of a job run. Logs and coverage are written whatever
 * the outcome.
 */
export class ResultReporter {
  private readonly runDir: string;
  private readonly abortExitCode: number;

  constructor(private readonly options: ReporterOptions) {
    this.runDir = path.join(options.artifactsDir, options.runId);
    this.abortExitCode = options.abortExitCode ?? DEFAULT_ABORT_EXIT_CODE;
  }

  async report(result: JobResult): Promise<{ status: ExitStatus; artifacts: ReportedArtifacts }> {
    const status = classifyResult(result, this.abortExitCode);
    const artifacts = await this.writeArtifacts(result);
    this.printSummary(status, artifacts);
    return { status, artifacts };
  }

  /**
   * Status for a failure raised before the test command ran. Job aborts
   * (deadline or interrupt during setup) keep their RunnerAbort meaning.
   */
  reportSetupFailure(stage: StageName, error: unknown): ExitStatus {
    let status: ExitStatus;

    if (error instanceof JobAbortError) {
      status = {
        success: false,
        reason: 'RunnerAbort',
        exitCode: this.abortExitCode,
        message: `Job aborted during ${stage}: ${error.message}`,
      };
    } else {
      const message = error instanceof Error ? error.message : String(error);
      const kind = error instanceof JobError ? `${error.name}{${error.kind}}` : 'Error';
      status = {
        success: false,
        reason: 'SetupFailure',
        exitCode: EXIT_CODES.setupFailure,
        message: `${stage} failed: ${kind}: ${message}`,
      };
    }

    this.printSummary(status);
    return status;
  }

  private async writeArtifacts(result: JobResult): Promise<ReportedArtifacts> {
    await fs.mkdir(this.runDir, { recursive: true });

    const testLogPath = path.join(this.runDir, 'test.log');
    await fs.writeFile(testLogPath, result.logs);

    let coveragePath: string | undefined;
    if (result.coverageArtifact) {
      coveragePath = path.join(this.runDir, path.basename(result.coverageArtifact.path));
      await fs.writeFile(coveragePath, result.coverageArtifact.data);
    }

    return { testLogPath, coveragePath };
  }

  private printSummary(status: ExitStatus, artifacts?: ReportedArtifacts): void {
    if (this.options.quiet) return;

    const colour = status.success ? chalk.green : status.reason === 'RunnerAbort' ? chalk.yellow : chalk.red;
    console.log('\n' + colour.bold(`${status.success ? '✅' : '❌'} ${status.reason}`) + ` ${status.message}`);

    if (artifacts) {
      console.log(chalk.dim(`   Test log: ${artifacts.testLogPath}`));
      if (artifacts.coveragePath) {
        console.log(chalk.dim(`   Coverage: ${artifacts.coveragePath}`));
      }
    }
    console.log(chalk.dim(`   Exit code: ${status.exitCode}`));
  }
}
