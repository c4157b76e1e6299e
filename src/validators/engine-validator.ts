// src/validators/engine-validator.ts

import type { Validator, ValidationContext } from './types.js';

/**
 * Checks that the container engine answers. Only runs when an engine is supplied.
 */
export class EngineValidator implements Validator {
  readonly name = 'engine';
  readonly priority = 2 as const;

  shouldRun(context: ValidationContext): boolean {
    return context.engine !== undefined;
  }

  async validate(context: ValidationContext): Promise<void> {
    const { engine, errors } = context;
    if (!engine) return;

    try {
      const validation = await engine.validate();

      for (const error of validation.errors) {
        errors.push({
          field: 'engine',
          message: `${engine.name}: ${error}`,
          severity: 'error',
        });
      }

      for (const warning of validation.warnings) {
        errors.push({
          field: 'engine',
          message: warning,
          severity: 'warning',
        });
      }
    } catch (error) {
      errors.push({
        field: 'engine',
        message: `Engine validation failed: ${error instanceof Error ? error.message : String(error)}`,
        severity: 'error',
      });
    }
  }
}
