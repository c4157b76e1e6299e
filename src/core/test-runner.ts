// src/core/test-runner.ts

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type {
  CoverageArtifact,
  EnvironmentVariableSet,
  ExecutionEnvironment,
  JobResult
} from '../config/schema.js';
import type { ContainerEngine, ExecResult } from './types/container-engine.js';
import { JobAbortController, JobAbortError } from './abort-controller.js';
import { environmentHandle } from './environment-provisioner.js';
import { Logger } from '../utils/logger.js';

/** Same convention as GNU timeout(1) */
export const DEFAULT_ABORT_EXIT_CODE = 124;

export interface TestRunOptions {
  abortController?: JobAbortController;
  abortExitCode?: number;
  /** Coverage file relative to the checkout, read after the command ends */
  coveragePath?: string;
  onOutput?: (chunk: Buffer) => void;
}

/**
 * Exit code a shell would report for a process killed by `signal`.
 */
export function signalExitCode(signal: NodeJS.Signals): number {
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal);
  return 128 + (entry?.[1] ?? 0);
}

/**
 * Runs the test command under a hard wall-clock ceiling.
 *
 * On expiry the abort controller kills the process and the result carries
 * timedOut = true with the reserved abort exit code instead of whatever the
 * process reported.
 */
export class BoundedTestRunner {
  constructor(private readonly engine: ContainerEngine) {}

  async run(
    environment: ExecutionEnvironment,
    testCommand: string,
    envVars: EnvironmentVariableSet,
    timeoutMs: number,
    options: TestRunOptions = {}
  ): Promise<JobResult> {
    const controller = options.abortController ?? new JobAbortController();
    const abortExitCode = options.abortExitCode ?? DEFAULT_ABORT_EXIT_CODE;
    const chunks: Buffer[] = [];
    const startedAt = Date.now();

    const timer = setTimeout(() => controller.abort('timeout'), timeoutMs);
    timer.unref?.();

    let execResult: ExecResult | undefined;
    try {
      if (!controller.aborted) {
        execResult = await this.engine.exec(
          environmentHandle(environment),
          {
            command: testCommand,
            env: envVars,
            workdir: environment.workdir,
            onOutput: (chunk) => {
              chunks.push(chunk);
              options.onOutput?.(chunk);
            }
          },
          controller
        );
      }
    } catch (error) {
      if (!(error instanceof JobAbortError)) {
        throw error;
      }
    } finally {
      clearTimeout(timer);
    }

    const coverageArtifact = options.coveragePath
      ? await this.readCoverage(environment.workspacePath, options.coveragePath)
      : undefined;

    const abortReason = controller.reason;
    const rawExitCode = execResult?.exitCode ?? null;

    let exitCode: number;
    if (abortReason) {
      exitCode = abortExitCode;
    } else if (rawExitCode !== null) {
      exitCode = rawExitCode;
    } else if (execResult?.signal) {
      exitCode = signalExitCode(execResult.signal);
    } else {
      exitCode = abortExitCode;
    }

    return Object.freeze({
      exitCode,
      rawExitCode,
      timedOut: abortReason === 'timeout',
      abortReason,
      logs: execResult?.output ?? Buffer.concat(chunks),
      coverageArtifact,
      durationMs: Date.now() - startedAt
    });
  }

  private async readCoverage(
    workspacePath: string,
    coveragePath: string
  ): Promise<CoverageArtifact | undefined> {
    const fullPath = path.resolve(workspacePath, coveragePath);
    try {
      const data = await fs.readFile(fullPath);
      return Object.freeze({ path: fullPath, data });
    } catch (error) {
      // Coverage never decides the outcome of a finished command
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        Logger.warn(`No coverage data at ${coveragePath}`);
      } else {
        Logger.warn(
          `Could not read coverage data at ${coveragePath}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
      return undefined;
    }
  }
}
