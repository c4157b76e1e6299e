// src/validators/job-validator.ts

import type { JobDefinition } from '../config/schema.js';
import type { ContainerEngine } from '../core/types/container-engine.js';
import type { ValidationError } from './types.js';
import { ValidationOrchestrator } from './validation-orchestrator.js';

export type { ValidationError } from './types.js';

export class JobValidator {
  private orchestrator = new ValidationOrchestrator();

  async validate(
    definition: JobDefinition,
    repoPath: string,
    engine?: ContainerEngine
  ): Promise<ValidationError[]> {
    return this.orchestrator.validate(definition, repoPath, engine);
  }

  /**
   * Validate and print the findings. Returns false when any error was found;
   * warnings alone do not block a run.
   */
  static async validateAndReport(
    definition: JobDefinition,
    repoPath: string,
    engine?: ContainerEngine
  ): Promise<boolean> {
    const validator = new JobValidator();
    const errors = await validator.validate(definition, repoPath, engine);

    if (errors.length === 0) {
      return true;
    }

    const hasErrors = errors.some(e => e.severity === 'error');
    const hasWarnings = errors.some(e => e.severity === 'warning');

    console.log('\n📋 Job Validation Results:\n');

    for (const error of errors) {
      const icon = error.severity === 'error' ? '❌' : '⚠️';
      console.log(`${icon} ${error.field}: ${error.message}`);
    }

    if (hasErrors) {
      console.log('\n❌ Job validation failed. Fix errors before running.\n');
      return false;
    }

    if (hasWarnings) {
      console.log('\n⚠️  Job has warnings but can still run.\n');
    }

    return true;
  }
}
