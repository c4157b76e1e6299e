// src/core/dependency-installer.ts

import type { ExecutionEnvironment, InstallConfig } from '../config/schema.js';
import type { ContainerEngine } from './types/container-engine.js';
import { JobAbortController } from './abort-controller.js';
import { environmentHandle } from './environment-provisioner.js';
import { InstallError, type InstallErrorKind } from '../utils/errors.js';
import { buildInstallContext, interpolateTemplate } from '../utils/template-interpolator.js';
import { Logger } from '../utils/logger.js';

const NETWORK_FAILURE_PATTERNS = [
  /temporary failure in name resolution/i,
  /name or service not known/i,
  /network is unreachable/i,
  /connection (?:refused|reset|timed out)/i,
  /newconnectionerror/i,
  /max retries exceeded/i,
  /read timed out/i,
  /could not fetch url/i,
];

const RESOLUTION_FAILURE_PATTERNS = [
  /resolutionimpossible/i,
  /could not find a version that satisfies/i,
  /no matching distribution found/i,
  /conflicting dependencies/i,
  /unsatisfiable/i,
];

export interface InstallResult {
  commands: string[];
  output: Buffer;
  durationMs: number;
}

export interface InstallOptions {
  abortController?: JobAbortController;
  onOutput?: (chunk: Buffer) => void;
}

/**
 * Network errors win over resolution errors: an offline resolver also reports
 * "no matching distribution".
 */
export function classifyInstallFailure(output: string): InstallErrorKind {
  if (NETWORK_FAILURE_PATTERNS.some((pattern) => pattern.test(output))) {
    return 'NetworkFailure';
  }
  if (RESOLUTION_FAILURE_PATTERNS.some((pattern) => pattern.test(output))) {
    return 'ResolutionFailed';
  }
  return 'CommandFailed';
}

/**
 * Installs the package under test, with its extras, inside the environment.
 * Runs once per environment; failures are not retried.
 */
export class DependencyInstaller {
  private completed = new Map<string, InstallResult>();

  constructor(
    private readonly engine: ContainerEngine,
    private readonly config: InstallConfig
  ) {}

  buildCommands(packageSource: string, extras: string[]): string[] {
    const context = buildInstallContext(extras, packageSource);
    const commands: string[] = [];
    if (this.config.upgradeCommand) {
      commands.push(interpolateTemplate(this.config.upgradeCommand, context));
    }
    commands.push(interpolateTemplate(this.config.installCommand, context));
    return commands;
  }

  async install(
    environment: ExecutionEnvironment,
    packageSource: string,
    extras: string[],
    options: InstallOptions = {}
  ): Promise<InstallResult> {
    const previous = this.completed.get(environment.containerId);
    if (previous) {
      Logger.debug('Dependencies already installed in this environment');
      return previous;
    }

    const handle = environmentHandle(environment);
    const commands = this.buildCommands(packageSource, extras);
    const outputs: Buffer[] = [];
    const startedAt = Date.now();

    for (const command of commands) {
      options.abortController?.throwIfAborted();
      Logger.debug(`Install: ${command}`);

      const result = await this.engine.exec(
        handle,
        { command, env: {}, workdir: packageSource, onOutput: options.onOutput },
        options.abortController
      );
      outputs.push(result.output);

      // Killed by the job deadline or an interrupt
      options.abortController?.throwIfAborted();

      if (result.exitCode !== 0) {
        const text = result.output.toString('utf-8');
        const kind = classifyInstallFailure(text);
        throw new InstallError(
          kind,
          `'${command}' exited with code ${result.exitCode ?? result.signal}`,
          text.slice(-2000)
        );
      }
    }

    const installResult: InstallResult = {
      commands,
      output: Buffer.concat(outputs),
      durationMs: Date.now() - startedAt,
    };
    this.completed.set(environment.containerId, installResult);
    return installResult;
  }
}
