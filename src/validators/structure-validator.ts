// src/validators/structure-validator.ts

import type { Validator, ValidationContext } from './types.js';
import { listPlaceholders } from '../utils/template-interpolator.js';

const INSTALL_PLACEHOLDERS = new Set(['extras', 'extrasSuffix', 'workdir']);

/**
 * Validates basic job structure: name, environment image template, install and
 * test commands, timeout.
 */
export class StructureValidator implements Validator {
  readonly name = 'structure';
  readonly priority = 0 as const;

  shouldRun(): boolean {
    return true; // Always runs
  }

  async validate(context: ValidationContext): Promise<void> {
    const { definition, errors } = context;

    if (!definition.name || definition.name.trim() === '') {
      errors.push({
        field: 'name',
        message: 'Job name is required',
        severity: 'error',
      });
    }

    if (!definition.environment.image.includes('{{versionTag}}')) {
      errors.push({
        field: 'environment.image',
        message: `Image template must contain {{versionTag}}: ${definition.environment.image}`,
        severity: 'error',
      });
    }

    for (const placeholder of listPlaceholders(definition.install.installCommand)) {
      if (!INSTALL_PLACEHOLDERS.has(placeholder)) {
        errors.push({
          field: 'install.installCommand',
          message: `Unknown placeholder {{${placeholder}}}. Available: ${[...INSTALL_PLACEHOLDERS].join(', ')}`,
          severity: 'warning',
        });
      }
    }

    if (definition.install.extras.length > 0 && !/\{\{extras(Suffix)?\}\}/.test(definition.install.installCommand)) {
      errors.push({
        field: 'install.extras',
        message: 'Extras are declared but installCommand uses neither {{extras}} nor {{extrasSuffix}}',
        severity: 'warning',
      });
    }

    if (definition.test.command.trim() === '') {
      errors.push({
        field: 'test.command',
        message: 'Test command is required',
        severity: 'error',
      });
    }

    if (definition.timeoutMinutes <= 0) {
      errors.push({
        field: 'timeoutMinutes',
        message: 'timeoutMinutes must be positive',
        severity: 'error',
      });
    } else if (definition.timeoutMinutes > 120) {
      errors.push({
        field: 'timeoutMinutes',
        message: `timeoutMinutes is ${definition.timeoutMinutes}; a hung suite will hold the runner that long`,
        severity: 'warning',
      });
    }

    if ([0, 1, 2].includes(definition.settings.abortExitCode)) {
      errors.push({
        field: 'settings.abortExitCode',
        message: `abortExitCode ${definition.settings.abortExitCode} is indistinguishable from a normal result`,
        severity: 'error',
      });
    }
  }
}
