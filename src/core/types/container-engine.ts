// src/core/types/container-engine.ts

import type { JobAbortController } from '../abort-controller.js';
import type { PortMapping } from '../../config/schema.js';

/**
 * Container Engine Abstraction
 *
 * Everything the job stages need from a container runtime, so the orchestrator
 * can be driven by the docker CLI in production and by an in-process fake in tests.
 */
export interface ContainerEngine {
  /** Unique identifier for this engine type (e.g., 'docker-cli') */
  readonly type: string;

  /** Human-readable name */
  readonly name: string;

  /**
   * Check that the engine is installed and reachable.
   */
  validate(): Promise<ValidationResult>;

  pullImage(image: string, abortController?: JobAbortController): Promise<void>;

  createNetwork(name: string): Promise<void>;

  removeNetwork(name: string): Promise<void>;

  /**
   * Start a detached container. Resolves once the engine reports it running;
   * readiness of whatever runs inside is the caller's concern.
   *
   * @throws Error if the image cannot be started or a port cannot be published
   */
  startContainer(
    options: ContainerStartOptions,
    abortController?: JobAbortController
  ): Promise<ContainerHandle>;

  /**
   * Stop and remove a container. Must be safe to call on a container that already exited.
   */
  stopContainer(handle: ContainerHandle): Promise<void>;

  /**
   * Run a shell command inside a running container.
   * Resolves with the exit status even when the command fails; rejects only
   * when the command could not be launched at all.
   */
  exec(
    handle: ContainerHandle,
    request: ExecRequest,
    abortController?: JobAbortController
  ): Promise<ExecResult>;
}

export interface ContainerStartOptions {
  image: string;
  /** Container name; also used as network alias when aliases are omitted */
  name: string;
  network?: string;
  networkAliases?: string[];
  ports?: PortMapping[];
  env?: Record<string, string>;
  mounts?: Array<{
    host: string;
    container: string;
    readonly?: boolean;
  }>;
  workdir?: string;
  command?: string[];
  labels?: Record<string, string>;
}

export interface PortBinding {
  containerPort: number;
  hostPort: number;
}

export interface ContainerHandle {
  id: string;
  name: string;
  /** Host ports actually published, with dynamic allocations resolved */
  ports: PortBinding[];
}

export interface ExecRequest {
  command: string;
  env: Readonly<Record<string, string>>;
  workdir?: string;
  /** Called with every chunk of combined stdout/stderr */
  onOutput?: (chunk: Buffer) => void;
}

export interface ExecResult {
  /** null when the process was terminated by a signal */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  output: Buffer;
  durationMs: number;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}
