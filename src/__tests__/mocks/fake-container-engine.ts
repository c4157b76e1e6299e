import type {
  ContainerEngine,
  ContainerHandle,
  ContainerStartOptions,
  ExecRequest,
  ExecResult,
  ValidationResult
} from '../../core/types/container-engine.js';
import { JobAbortController, JobAbortError } from '../../core/abort-controller.js';
import type { ExecutionEnvironment } from '../../config/schema.js';

export interface FakeExecResponse {
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
  output?: string;
  /** Never finish on its own; resolves as killed once the controller aborts */
  hang?: boolean;
  /** Launch failure (binary missing, daemon gone) */
  error?: Error;
}

export interface FakeEngineConfig {
  pullError?: Error;
  networkError?: Error;
  /** Start failures keyed by image */
  startErrors?: Record<string, Error>;
  /** Pull never finishes on its own; fails like a killed CLI once aborted */
  hangingPull?: boolean;
  /** Images whose start hangs the same way */
  hangingStarts?: string[];
  /** Called once a hanging operation is waiting */
  onHang?: (operation: string) => void;
  /** Stop failures keyed by container name */
  stopErrors?: Record<string, Error>;
  /** Host port handed out for container-only mappings */
  dynamicPortBase?: number;
  exec?: (request: ExecRequest) => FakeExecResponse;
  validation?: ValidationResult;
}

/**
 * In-process container engine. Records every call and tracks which
 * containers and networks are live so tests can assert teardown.
 */
export class FakeContainerEngine implements ContainerEngine {
  readonly type = 'fake';
  readonly name = 'fake engine';

  readonly pulls: string[] = [];
  readonly starts: ContainerStartOptions[] = [];
  readonly stops: ContainerHandle[] = [];
  readonly execs: ExecRequest[] = [];
  readonly networksCreated: string[] = [];
  readonly networksRemoved: string[] = [];
  /** Releases in call order, e.g. 'stop testbed-run-1-env' */
  readonly events: string[] = [];

  readonly running = new Map<string, ContainerHandle>();
  readonly networks = new Set<string>();

  private nextId = 1;
  private nextDynamicPort: number;

  constructor(private config: FakeEngineConfig = {}) {
    this.nextDynamicPort = config.dynamicPortBase ?? 49152;
  }

  configure(config: Partial<FakeEngineConfig>): void {
    this.config = { ...this.config, ...config };
  }

  async validate(): Promise<ValidationResult> {
    return this.config.validation ?? { valid: true, errors: [], warnings: [] };
  }

  async pullImage(image: string, abortController?: JobAbortController): Promise<void> {
    this.pulls.push(image);
    if (this.config.pullError) {
      throw this.config.pullError;
    }
    if (this.config.hangingPull) {
      await this.hangUntilAbort('pull', abortController);
    }
  }

  async createNetwork(name: string): Promise<void> {
    if (this.config.networkError) {
      throw this.config.networkError;
    }
    this.networksCreated.push(name);
    this.networks.add(name);
    this.events.push(`create network ${name}`);
  }

  async removeNetwork(name: string): Promise<void> {
    this.networksRemoved.push(name);
    this.networks.delete(name);
    this.events.push(`remove network ${name}`);
  }

  async startContainer(
    options: ContainerStartOptions,
    abortController?: JobAbortController
  ): Promise<ContainerHandle> {
    this.starts.push(options);
    const error = this.config.startErrors?.[options.image];
    if (error) {
      throw error;
    }
    if (this.config.hangingStarts?.includes(options.image)) {
      await this.hangUntilAbort('run', abortController);
    }

    const handle: ContainerHandle = {
      id: `container-${this.nextId++}`,
      name: options.name,
      ports: (options.ports ?? []).map((mapping) => ({
        containerPort: mapping.containerPort,
        hostPort: mapping.hostPort === 0 ? this.nextDynamicPort++ : mapping.hostPort,
      })),
    };
    this.running.set(handle.id, handle);
    this.events.push(`start ${options.name}`);
    return handle;
  }

  async stopContainer(handle: ContainerHandle): Promise<void> {
    this.stops.push(handle);
    this.events.push(`stop ${handle.name}`);
    const error = this.config.stopErrors?.[handle.name];
    if (error) {
      throw error;
    }
    this.running.delete(handle.id);
  }

  async exec(
    handle: ContainerHandle,
    request: ExecRequest,
    abortController?: JobAbortController
  ): Promise<ExecResult> {
    if (abortController?.aborted) {
      throw new JobAbortError(abortController.reason ?? 'interrupted');
    }
    if (!this.running.has(handle.id)) {
      throw new Error(`No such container: ${handle.id}`);
    }

    this.execs.push(request);
    const response = this.config.exec?.(request) ?? {};
    if (response.error) {
      throw response.error;
    }

    const output = Buffer.from(response.output ?? '');
    if (output.length > 0) {
      request.onOutput?.(output);
    }

    if (response.hang) {
      return new Promise((resolve) => {
        const finish = () =>
          resolve({ exitCode: null, signal: 'SIGTERM', output, durationMs: 0 });
        if (!abortController) return;
        if (abortController.aborted) {
          finish();
        } else {
          abortController.once('abort', finish);
        }
      });
    }

    return {
      exitCode: response.exitCode === undefined ? 0 : response.exitCode,
      signal: response.signal ?? null,
      output,
      durationMs: 1,
    };
  }

  /** Service containers started successfully */
  get serviceStarts(): ContainerStartOptions[] {
    return this.starts.filter(
      (s) =>
        s.labels?.['testbed.role'] === 'service' &&
        !this.config.startErrors?.[s.image] &&
        !this.config.hangingStarts?.includes(s.image)
    );
  }

  /**
   * Rejects the way a CLI killed mid-command does: a plain exit error
   * that knows nothing about the abort.
   */
  private hangUntilAbort(operation: string, abortController?: JobAbortController): Promise<never> {
    return new Promise<never>((_resolve, reject) => {
      const fail = () => reject(new Error(`docker ${operation} exited with code SIGTERM. stderr: (empty)`));
      if (!abortController) return;
      if (abortController.aborted) {
        fail();
        return;
      }
      abortController.once('abort', fail);
      this.config.onHang?.(operation);
    });
  }

  get serviceStops(): ContainerHandle[] {
    const serviceNames = new Set(this.starts
      .filter((s) => s.labels?.['testbed.role'] === 'service')
      .map((s) => s.name));
    return this.stops.filter((h) => serviceNames.has(h.name));
  }
}

/**
 * Start a sandbox container on the fake engine and describe it the way the
 * provisioner would.
 */
export async function startFakeEnvironment(
  engine: FakeContainerEngine,
  workspacePath: string = '/src/pkg'
): Promise<ExecutionEnvironment> {
  const handle = await engine.startContainer({
    image: 'python:3.11',
    name: 'testbed-run-1-env',
    labels: { 'testbed.role': 'environment' },
  });
  return Object.freeze({
    versionTag: '3.11',
    imageReference: 'python:3.11',
    containerId: handle.id,
    containerName: handle.name,
    networkName: 'testbed-run-1',
    workdir: '/workspace',
    workspacePath,
  });
}
