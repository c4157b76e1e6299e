// src/utils/errors.ts

import type { StageName } from '../config/schema.js';

/**
 * Base class for failures raised by a job stage before the test command runs.
 * These are fatal: the job halts and tears down without running tests.
 */
export class JobError extends Error {
  constructor(
    public readonly stage: StageName,
    public readonly kind: string,
    message: string
  ) {
    super(message);
    this.name = 'JobError';
  }
}

export type ProvisionErrorKind = 'InvalidVersionTag' | 'EnvironmentUnavailable';

export class ProvisionError extends JobError {
  constructor(public readonly kind: ProvisionErrorKind, message: string) {
    super('provision', kind, message);
    this.name = 'ProvisionError';
  }
}

export type ServiceStartErrorKind = 'PortConflict' | 'StartupTimeout' | 'StartFailed';

export class ServiceStartError extends JobError {
  constructor(
    public readonly kind: ServiceStartErrorKind,
    public readonly serviceName: string,
    message: string
  ) {
    super('services', kind, `[${serviceName}] ${message}`);
    this.name = 'ServiceStartError';
  }
}

export type InstallErrorKind = 'ResolutionFailed' | 'NetworkFailure' | 'CommandFailed';

export class InstallError extends JobError {
  constructor(
    public readonly kind: InstallErrorKind,
    message: string,
    public readonly output?: string
  ) {
    super('install', kind, message);
    this.name = 'InstallError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
