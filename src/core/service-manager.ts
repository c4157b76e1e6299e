// src/core/service-manager.ts

import type { ConnectionInfo, ExecutionEnvironment, ServiceSpec } from '../config/schema.js';
import type { ContainerEngine, ContainerHandle } from './types/container-engine.js';
import { JobAbortController, JobAbortError } from './abort-controller.js';
import { ResourceScope } from './resource-scope.js';
import { RetryHandler } from './retry-handler.js';
import {
  type HostPortChecker,
  ListenPortChecker,
  type ReadinessProbe,
  TcpReadinessProbe
} from './readiness-probe.js';
import { ServiceStartError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

const PORT_CONFLICT_PATTERN = /port is already allocated|address already in use/i;
const PROBE_HOST = '127.0.0.1';

export interface ServiceStartContext {
  runId: string;
  environment: ExecutionEnvironment;
  scope: ResourceScope;
  abortController?: JobAbortController;
}

export interface ServiceManagerDependencies {
  portChecker?: HostPortChecker;
  probe?: ReadinessProbe;
  retryHandler?: RetryHandler;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Starts the auxiliary services a test suite needs and hands back how to reach them.
 *
 * Services start concurrently. Each started container's stop is registered in
 * the job scope before readiness is awaited, so any failure past that point
 * (a sibling failing to start, a readiness timeout, a later stage crashing)
 * still stops it.
 */
export class ServiceManager {
  private portChecker: HostPortChecker;
  private probe: ReadinessProbe;
  private retryHandler: RetryHandler;
  private sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly engine: ContainerEngine,
    deps: ServiceManagerDependencies = {}
  ) {
    this.portChecker = deps.portChecker ?? new ListenPortChecker();
    this.probe = deps.probe ?? new TcpReadinessProbe();
    this.sleep = deps.sleep ?? ((ms) => new Promise(resolve => setTimeout(resolve, ms)));
    this.retryHandler = deps.retryHandler ?? new RetryHandler(this.sleep);
  }

  async startServices(
    specs: ServiceSpec[],
    context: ServiceStartContext
  ): Promise<Map<string, ConnectionInfo>> {
    const connections = new Map<string, ConnectionInfo>();
    if (specs.length === 0) {
      return connections;
    }

    await this.checkHostPorts(specs);
    context.abortController?.throwIfAborted();

    const started = await Promise.allSettled(
      specs.map((spec) => this.startOne(spec, context))
    );

    const failure = started.find(
      (outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected'
    );
    if (failure) {
      throw failure.reason;
    }

    const handles = started.map((outcome) =>
      outcome.status === 'fulfilled' ? outcome.value : undefined
    );

    const readiness = await Promise.allSettled(
      specs.map((spec, index) => {
        const handle = handles[index];
        return handle ? this.waitUntilReady(spec, handle, context) : Promise.resolve();
      })
    );
    const notReady = readiness.find(
      (outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected'
    );
    if (notReady) {
      throw notReady.reason;
    }

    specs.forEach((spec, index) => {
      const handle = handles[index];
      if (handle) {
        connections.set(spec.name, buildConnectionInfo(spec, handle));
      }
    });

    return connections;
  }

  /**
   * Duplicate host ports within the job, or ports another process already holds.
   */
  private async checkHostPorts(specs: ServiceSpec[]): Promise<void> {
    const owners = new Map<number, string>();

    for (const spec of specs) {
      for (const mapping of spec.ports) {
        if (mapping.hostPort === 0) continue;

        const owner = owners.get(mapping.hostPort);
        if (owner) {
          throw new ServiceStartError(
            'PortConflict',
            spec.name,
            `Host port ${mapping.hostPort} is also claimed by service '${owner}'`
          );
        }
        owners.set(mapping.hostPort, spec.name);

        if (await this.portChecker.isInUse(mapping.hostPort)) {
          throw new ServiceStartError(
            'PortConflict',
            spec.name,
            `Host port ${mapping.hostPort} is already bound on this host`
          );
        }
      }
    }
  }

  private async startOne(spec: ServiceSpec, context: ServiceStartContext): Promise<ContainerHandle> {
    const containerName = `testbed-${context.runId}-${spec.name}`;
    Logger.debug(`Starting service ${spec.name} (${spec.image})`);

    let handle: ContainerHandle;
    try {
      handle = await this.engine.startContainer(
        {
          image: spec.image,
          name: containerName,
          network: context.environment.networkName,
          networkAliases: [spec.name],
          ports: spec.ports,
          env: spec.env,
          labels: { 'testbed.run': context.runId, 'testbed.role': 'service' }
        },
        context.abortController
      );
    } catch (error) {
      if (error instanceof JobAbortError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ServiceStartError(
        PORT_CONFLICT_PATTERN.test(message) ? 'PortConflict' : 'StartFailed',
        spec.name,
        message
      );
    }

    context.scope.register(`service ${spec.name}`, () => this.engine.stopContainer(handle));
    return handle;
  }

  private async waitUntilReady(
    spec: ServiceSpec,
    handle: ContainerHandle,
    context: ServiceStartContext
  ): Promise<void> {
    const { readiness } = spec;
    const probePort = handle.ports[0]?.hostPort;

    if (readiness.strategy === 'grace' || probePort === undefined) {
      if (readiness.gracePeriodMs > 0) {
        Logger.debug(`Waiting ${readiness.gracePeriodMs}ms for ${spec.name}`);
        await this.sleep(readiness.gracePeriodMs);
      }
      context.abortController?.throwIfAborted();
      return;
    }

    try {
      await this.retryHandler.executeWithRetry(
        () => {
          context.abortController?.throwIfAborted();
          return this.probe.check(PROBE_HOST, probePort);
        },
        {
          backoff: 'exponential',
          initialDelay: 100,
          maxDelay: 2000,
          timeoutMs: readiness.timeoutMs
        },
        (retry) => {
          Logger.debug(
            `${spec.name} not ready yet (attempt ${retry.attemptNumber + 1}), ` +
            `retrying in ${RetryHandler.formatDelay(retry.delays[retry.delays.length - 1] ?? 0)}`
          );
        },
        (error) => !(error instanceof JobAbortError)
      );
    } catch (error) {
      if (error instanceof JobAbortError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ServiceStartError(
        'StartupTimeout',
        spec.name,
        `Not ready on port ${probePort} within ${readiness.timeoutMs}ms: ${message}`
      );
    }
  }
}

export function buildConnectionInfo(spec: ServiceSpec, handle: ContainerHandle): ConnectionInfo {
  const containerPort = spec.ports[0]?.containerPort;
  if (containerPort === undefined) {
    throw new ServiceStartError('StartFailed', spec.name, 'Service declares no ports');
  }
  const binding = handle.ports.find((p) => p.containerPort === containerPort);

  return Object.freeze({
    serviceName: spec.name,
    host: spec.name,
    port: containerPort,
    hostPort: binding?.hostPort,
    url: `${spec.connection.scheme}://${spec.name}:${containerPort}`,
    envVar: spec.connection.envVar
  });
}
