// src/validators/environment-validator.ts

import type { Validator, ValidationContext } from './types.js';
import { findCollisions } from '../core/env-builder.js';

/**
 * Validates the variables handed to the test process: a service variable and a
 * static test.env entry with the same name shadow each other.
 */
export class EnvironmentValidator implements Validator {
  readonly name = 'environment';
  readonly priority = 1 as const;

  shouldRun(): boolean {
    return true; // Always runs
  }

  async validate(context: ValidationContext): Promise<void> {
    const { definition, errors } = context;

    const entries = [
      ...definition.services.map((service) => ({
        name: service.connection.envVar,
        source: `service '${service.name}'`,
      })),
      ...Object.keys(definition.test.env).map((name) => ({ name, source: 'test.env' })),
    ];

    const severity = definition.settings.strictEnv ? 'error' : 'warning';
    for (const collision of findCollisions(entries)) {
      errors.push({
        field: `test.env.${collision.name}`,
        message: `${collision.name} is set by ${collision.sources.join(' and ')}` +
          (severity === 'warning' ? '; the last one wins' : ''),
        severity,
      });
    }
  }
}
