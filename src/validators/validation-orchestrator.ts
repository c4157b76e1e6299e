// src/validators/validation-orchestrator.ts

import type { JobDefinition } from '../config/schema.js';
import type { ContainerEngine } from '../core/types/container-engine.js';
import type { ValidationError, ValidationContext, Validator } from './types.js';

import { StructureValidator } from './structure-validator.js';
import { ServiceValidator } from './service-validator.js';
import { EnvironmentValidator } from './environment-validator.js';
import { EngineValidator } from './engine-validator.js';

/**
 * Runs the job validators lowest priority number first. Registration order
 * is kept among validators of equal priority.
 */
export class ValidationOrchestrator {
  private validators: Validator[] = [];

  constructor() {
    this.register(new StructureValidator());
    this.register(new ServiceValidator());
    this.register(new EnvironmentValidator());
    this.register(new EngineValidator());
  }

  register(validator: Validator): void {
    this.validators = [...this.validators, validator].sort((a, b) => a.priority - b.priority);
  }

  /**
   * Findings from every validator that chose to run. The engine, when given,
   * is asked whether it is reachable.
   */
  async validate(
    definition: JobDefinition,
    repoPath: string,
    engine?: ContainerEngine
  ): Promise<ValidationError[]> {
    const context: ValidationContext = { definition, repoPath, engine, errors: [] };

    for (const validator of this.validators) {
      if (context.skipRemainingValidators) break;
      if (!validator.shouldRun(context)) continue;

      await validator.validate(context);
    }

    return context.errors;
  }
}
