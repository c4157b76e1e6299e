// src/validators/service-validator.ts

import type { Validator, ValidationContext } from './types.js';

const ENV_VAR_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Validates service declarations: unique names, ports, connection variables.
 */
export class ServiceValidator implements Validator {
  readonly name = 'services';
  readonly priority = 0 as const;

  shouldRun(context: ValidationContext): boolean {
    return context.definition.services.length > 0;
  }

  async validate(context: ValidationContext): Promise<void> {
    const { definition, errors } = context;
    const names = new Set<string>();
    const hostPorts = new Map<number, string>();

    for (const service of definition.services) {
      const field = `services.${service.name}`;

      if (names.has(service.name)) {
        errors.push({
          field,
          message: `Duplicate service name: ${service.name}`,
          severity: 'error',
        });
      }
      names.add(service.name);

      if (service.ports.length === 0) {
        errors.push({
          field: `${field}.ports`,
          message: 'No ports declared; the connection URL needs a container port',
          severity: 'error',
        });
      }

      for (const mapping of service.ports) {
        if (mapping.hostPort === 0) continue;

        const owner = hostPorts.get(mapping.hostPort);
        if (owner) {
          errors.push({
            field: `${field}.ports`,
            message: `Host port ${mapping.hostPort} is also published by ${owner}`,
            severity: 'error',
          });
        } else {
          hostPorts.set(mapping.hostPort, service.name);
        }

        if (mapping.hostPort < 1024) {
          errors.push({
            field: `${field}.ports`,
            message: `Host port ${mapping.hostPort} is privileged and may need root to publish`,
            severity: 'warning',
          });
        }
      }

      if (!ENV_VAR_NAME.test(service.connection.envVar)) {
        errors.push({
          field: `${field}.connection.envVar`,
          message: `Invalid environment variable name: ${service.connection.envVar}`,
          severity: 'error',
        });
      }

      if (service.readiness.strategy === 'grace' && service.readiness.gracePeriodMs === 0) {
        errors.push({
          field: `${field}.readiness`,
          message: 'Grace strategy with gracePeriodMs 0 does not wait for the service at all',
          severity: 'warning',
        });
      }
    }
  }
}
