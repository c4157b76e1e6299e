// src/validators/types.ts

import type { JobDefinition } from '../config/schema.js';
import type { ContainerEngine } from '../core/types/container-engine.js';

/** Errors block a run; warnings are printed and the job still runs */
export type ValidationSeverity = 'error' | 'warning';

/**
 * One finding against a job definition. `field` is a dotted path into the
 * job file, e.g. `services.mqtt-broker.ports`.
 */
export interface ValidationError {
  field: string;
  message: string;
  severity: ValidationSeverity;
}

/**
 * 0 checks the job's own shape, 1 checks how its parts combine,
 * 2 checks the host (engine reachability).
 */
export type ValidatorPriority = 0 | 1 | 2;

export interface ValidationContext {
  definition: JobDefinition;
  repoPath: string;
  /** Checked for availability when present */
  engine?: ContainerEngine;
  /** Validators append here */
  errors: ValidationError[];
  /** Stops the validators that would run after the current one */
  skipRemainingValidators?: boolean;
}

export interface Validator {
  readonly name: string;
  readonly priority: ValidatorPriority;

  shouldRun(context: ValidationContext): boolean;

  validate(context: ValidationContext): Promise<void>;
}
