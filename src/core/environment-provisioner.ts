// src/core/environment-provisioner.ts

import * as path from 'path';
import type { EnvironmentConfig, ExecutionEnvironment } from '../config/schema.js';
import type { ContainerEngine, ContainerHandle } from './types/container-engine.js';
import { JobAbortController, JobAbortError } from './abort-controller.js';
import { ResourceScope } from './resource-scope.js';
import { ProvisionError } from '../utils/errors.js';
import { interpolateTemplate } from '../utils/template-interpolator.js';
import { Logger } from '../utils/logger.js';

const VERSION_TAG_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/;

// [registry[:port]/]name[/name...]:tag, names lower-case
const IMAGE_REFERENCE_PATTERN =
  /^(?:[A-Za-z0-9.-]+(?::\d+)?\/)?[a-z0-9]+(?:[._-]+[a-z0-9]+)*(?:\/[a-z0-9]+(?:[._-]+[a-z0-9]+)*)*:[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/;

/** Keeps the sandbox alive so stages can exec into it */
const KEEP_ALIVE_COMMAND = ['sleep', 'infinity'];

export interface ProvisionContext {
  runId: string;
  workspacePath: string;               // Host checkout mounted into the sandbox
  scope: ResourceScope;
  abortController?: JobAbortController;
}

export function isValidVersionTag(versionTag: string): boolean {
  return VERSION_TAG_PATTERN.test(versionTag);
}

/**
 * Compose the environment image from its template, e.g. `python:{{versionTag}}` + `3.11`.
 *
 * @throws ProvisionError InvalidVersionTag when the tag or the composed reference is malformed
 */
export function resolveImageReference(template: string, versionTag: string): string {
  if (!versionTag || versionTag.trim() === '') {
    throw new ProvisionError('InvalidVersionTag', 'Version tag is required');
  }
  if (!isValidVersionTag(versionTag)) {
    throw new ProvisionError(
      'InvalidVersionTag',
      `Invalid version tag '${versionTag}': use letters, digits, '_', '.' or '-' (max 128 chars)`
    );
  }
  if (!template.includes('{{versionTag}}')) {
    throw new ProvisionError(
      'InvalidVersionTag',
      `Image template '${template}' has no {{versionTag}} placeholder`
    );
  }

  const reference = interpolateTemplate(template, { versionTag });
  if (!IMAGE_REFERENCE_PATTERN.test(reference)) {
    throw new ProvisionError(
      'InvalidVersionTag',
      `'${reference}' is not a valid image reference`
    );
  }
  return reference;
}

export function environmentHandle(environment: ExecutionEnvironment): ContainerHandle {
  return { id: environment.containerId, name: environment.containerName, ports: [] };
}

/**
 * Resolves a version tag to a running sandbox container on a private network.
 * One instance serves one job run.
 */
export class EnvironmentProvisioner {
  private environment: ExecutionEnvironment | undefined;

  constructor(
    private readonly engine: ContainerEngine,
    private readonly config: EnvironmentConfig
  ) {}

  async provision(versionTag: string, context: ProvisionContext): Promise<ExecutionEnvironment> {
    if (this.environment) {
      throw new Error('Execution environment already provisioned for this run');
    }

    const imageReference = resolveImageReference(this.config.image, versionTag);
    const networkName = `testbed-${context.runId}`;
    const containerName = `testbed-${context.runId}-env`;

    Logger.debug(`Provisioning ${imageReference}`);

    try {
      await this.engine.pullImage(imageReference, context.abortController);
    } catch (error) {
      throw this.unavailable(`Cannot pull ${imageReference}`, error);
    }

    try {
      await this.engine.createNetwork(networkName);
    } catch (error) {
      throw this.unavailable(`Cannot create network ${networkName}`, error);
    }
    context.scope.register(`network ${networkName}`, () => this.engine.removeNetwork(networkName));

    let containerId: string;
    try {
      const handle = await this.engine.startContainer(
        {
          image: imageReference,
          name: containerName,
          network: networkName,
          mounts: [{ host: path.resolve(context.workspacePath), container: this.config.workdir }],
          workdir: this.config.workdir,
          command: KEEP_ALIVE_COMMAND,
          labels: { 'testbed.run': context.runId, 'testbed.role': 'environment' }
        },
        context.abortController
      );
      context.scope.register(`environment ${containerName}`, () => this.engine.stopContainer(handle));
      containerId = handle.id;
    } catch (error) {
      throw this.unavailable(`Cannot start ${imageReference}`, error);
    }

    this.environment = Object.freeze({
      versionTag,
      imageReference,
      containerId,
      containerName,
      networkName,
      workdir: this.config.workdir,
      workspacePath: path.resolve(context.workspacePath)
    });

    return this.environment;
  }

  private unavailable(prefix: string, error: unknown): Error {
    if (error instanceof JobAbortError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ProvisionError('EnvironmentUnavailable', `${prefix}: ${message}`);
  }
}
