// src/core/engines/docker-cli-engine.ts

import { spawn, type ChildProcess } from 'child_process';
import type {
  ContainerEngine,
  ContainerHandle,
  ContainerStartOptions,
  ExecRequest,
  ExecResult,
  PortBinding,
  ValidationResult
} from '../types/container-engine.js';
import { JobAbortController, JobAbortError } from '../abort-controller.js';
import { Logger } from '../../utils/logger.js';

interface CliResult {
  stdout: string;
  stderr: string;
  output: Buffer;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  durationMs: number;
}

interface CliOptions {
  timeout?: number;
  abortController?: JobAbortController;
  onOutput?: (chunk: Buffer) => void;
}

/**
 * Docker CLI Engine
 *
 * Drives containers by spawning the `docker` binary. Any CLI with the same
 * surface works too (`podman`), so the binary is a constructor argument.
 */
export class DockerCliEngine implements ContainerEngine {
  readonly type = 'docker-cli';
  readonly name: string;

  constructor(private readonly binary: string = 'docker') {
    this.name = `${binary} CLI`;
  }

  async validate(): Promise<ValidationResult> {
    try {
      const result = await this.runCli(['version', '--format', '{{.Server.Version}}'], { timeout: 5000 });
      if (result.exitCode !== 0) {
        return {
          valid: false,
          errors: [`${this.binary} daemon not reachable: ${result.stderr.trim() || '(no output)'}`],
          warnings: [`Start the ${this.binary} daemon and check that your user may access it`]
        };
      }
      return { valid: true, errors: [], warnings: [] };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return {
        valid: false,
        errors: [`${this.binary} CLI not found or not working: ${message}`],
        warnings: [`Install ${this.binary} or set engine.binary in .testbed/config.yml`]
      };
    }
  }

  async pullImage(image: string, abortController?: JobAbortController): Promise<void> {
    await this.runChecked(['pull', image], { abortController });
  }

  async createNetwork(name: string): Promise<void> {
    await this.runChecked(['network', 'create', '--label', 'testbed=1', name]);
  }

  async removeNetwork(name: string): Promise<void> {
    await this.runChecked(['network', 'rm', name]);
  }

  async startContainer(
    options: ContainerStartOptions,
    abortController?: JobAbortController
  ): Promise<ContainerHandle> {
    const args = this.buildRunArgs(options);
    const result = await this.runChecked(args, { abortController });
    const id = result.stdout.trim().split('\n').pop() ?? '';
    if (!id) {
      throw new Error(`${this.binary} run returned no container id for ${options.name}`);
    }

    const handle: ContainerHandle = { id, name: options.name, ports: [] };
    try {
      handle.ports = await this.resolvePorts(id, options);
    } catch (error) {
      // The container exists; remove it before reporting the failure
      await this.stopContainer(handle).catch((stopError: unknown) => {
        Logger.warn(`Failed to remove ${options.name} after port lookup error: ${String(stopError)}`);
      });
      throw error;
    }
    return handle;
  }

  async stopContainer(handle: ContainerHandle): Promise<void> {
    await this.runChecked(['rm', '--force', '--volumes', handle.id]);
  }

  async exec(
    handle: ContainerHandle,
    request: ExecRequest,
    abortController?: JobAbortController
  ): Promise<ExecResult> {
    const args = ['exec'];
    for (const [key, value] of Object.entries(request.env)) {
      args.push('--env', `${key}=${value}`);
    }
    if (request.workdir) {
      args.push('--workdir', request.workdir);
    }
    args.push(handle.id, 'sh', '-c', request.command);

    const result = await this.runCli(args, {
      abortController,
      onOutput: request.onOutput
    });

    return {
      exitCode: result.exitCode,
      signal: result.signal,
      output: result.output,
      durationMs: result.durationMs
    };
  }

  buildRunArgs(options: ContainerStartOptions): string[] {
    const args: string[] = ['run', '--detach', '--name', options.name];

    if (options.network) {
      args.push('--network', options.network);
      const aliases = options.networkAliases ?? [options.name];
      for (const alias of aliases) {
        args.push('--network-alias', alias);
      }
    }

    for (const mapping of options.ports ?? []) {
      args.push(
        '--publish',
        mapping.hostPort > 0
          ? `${mapping.hostPort}:${mapping.containerPort}`
          : String(mapping.containerPort)
      );
    }

    for (const [key, value] of Object.entries(options.env ?? {})) {
      args.push('--env', `${key}=${value}`);
    }

    for (const mount of options.mounts ?? []) {
      args.push('--volume', `${mount.host}:${mount.container}${mount.readonly ? ':ro' : ''}`);
    }

    if (options.workdir) {
      args.push('--workdir', options.workdir);
    }

    for (const [key, value] of Object.entries(options.labels ?? {})) {
      args.push('--label', `${key}=${value}`);
    }

    args.push(options.image);
    if (options.command) {
      args.push(...options.command);
    }

    return args;
  }

  private async resolvePorts(id: string, options: ContainerStartOptions): Promise<PortBinding[]> {
    const bindings: PortBinding[] = [];
    for (const mapping of options.ports ?? []) {
      if (mapping.hostPort > 0) {
        bindings.push({ containerPort: mapping.containerPort, hostPort: mapping.hostPort });
        continue;
      }
      const result = await this.runChecked(['port', id, `${mapping.containerPort}/tcp`]);
      bindings.push({
        containerPort: mapping.containerPort,
        hostPort: parsePublishedPort(result.stdout)
      });
    }
    return bindings;
  }

  private async runChecked(args: string[], options: CliOptions = {}): Promise<CliResult> {
    const result = await this.runCli(args, options);
    // Killed by the controller
    const abortReason = options.abortController?.reason;
    if (abortReason) {
      throw new JobAbortError(abortReason);
    }
    if (result.exitCode !== 0) {
      throw new Error(
        `${this.binary} ${args[0]} exited with code ${result.exitCode ?? result.signal}. ` +
        `stderr: ${result.stderr.trim() || '(empty)'}`
      );
    }
    return result;
  }

  private runCli(args: string[], options: CliOptions): Promise<CliResult> {
    if (options.abortController?.aborted) {
      return Promise.reject(new JobAbortError(options.abortController.reason ?? 'interrupted'));
    }

    Logger.debug(`${this.binary} ${args.join(' ')}`);

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let child: ChildProcess | null = null;
      const startTime = Date.now();

      const timer = options.timeout
        ? setTimeout(() => {
            timedOut = true;
            child?.kill('SIGKILL');
          }, options.timeout)
        : undefined;

      try {
        child = spawn(this.binary, args, {
          stdio: ['ignore', 'pipe', 'pipe'],
          shell: false
        });

        if (options.abortController) {
          options.abortController.registerProcess(child);
        }

        child.stdout?.on('data', (data: Buffer) => {
          chunks.push(data);
          stdout += data.toString();
          options.onOutput?.(data);
        });

        child.stderr?.on('data', (data: Buffer) => {
          chunks.push(data);
          stderr += data.toString();
          options.onOutput?.(data);
        });

        child.on('exit', (code, signal) => {
          if (timer) clearTimeout(timer);

          if (timedOut) {
            reject(new Error(`${this.binary} ${args[0]} timed out after ${options.timeout}ms`));
            return;
          }

          resolve({
            stdout,
            stderr,
            output: Buffer.concat(chunks),
            exitCode: code,
            signal,
            durationMs: Date.now() - startTime
          });
        });

        child.on('error', (err) => {
          if (timer) clearTimeout(timer);
          reject(new Error(`Failed to spawn ${this.binary}: ${err.message}`));
        });
      } catch (err) {
        if (timer) clearTimeout(timer);
        reject(err);
      }
    });
  }
}

/**
 * Parse `docker port` output ("0.0.0.0:49153\n[::]:49153") into the host port.
 */
export function parsePublishedPort(output: string): number {
  const firstLine = output.trim().split('\n')[0] ?? '';
  const port = Number.parseInt(firstLine.slice(firstLine.lastIndexOf(':') + 1), 10);
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Could not read published port from: ${output.trim() || '(empty)'}`);
  }
  return port;
}
