// src/core/env-builder.ts

import type { ConnectionInfo, EnvironmentVariableSet } from '../config/schema.js';
import { ConfigurationError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export interface EnvironmentBuildOptions {
  /** Raise instead of warning when two sources write the same variable */
  strict?: boolean;
}

export interface EnvironmentCollision {
  name: string;
  sources: string[];
}

/**
 * Assemble the variables the test process sees: one per service connection,
 * then the job's static variables. Later writes win unless `strict` is set.
 * The returned set is frozen.
 */
export function buildEnvironmentVariables(
  connections: Iterable<ConnectionInfo>,
  staticEnv: Record<string, string> = {},
  options: EnvironmentBuildOptions = {}
): EnvironmentVariableSet {
  const entries: Array<{ name: string; value: string; source: string }> = [];

  for (const connection of connections) {
    entries.push({
      name: connection.envVar,
      value: connection.url,
      source: `service '${connection.serviceName}'`,
    });
  }
  for (const [name, value] of Object.entries(staticEnv)) {
    entries.push({ name, value, source: 'test.env' });
  }

  const collisions = findCollisions(entries);
  if (collisions.length > 0) {
    const summary = collisions
      .map((c) => `${c.name} (${c.sources.join(', ')})`)
      .join('; ');
    if (options.strict) {
      throw new ConfigurationError(`Environment variable collision: ${summary}`);
    }
    Logger.warn(`Environment variable collision, last value wins: ${summary}`);
  }

  const variables: Record<string, string> = {};
  for (const entry of entries) {
    variables[entry.name] = entry.value;
  }
  return Object.freeze(variables);
}

export function findCollisions(
  entries: Array<{ name: string; source: string }>
): EnvironmentCollision[] {
  const sourcesByName = new Map<string, string[]>();
  for (const entry of entries) {
    const sources = sourcesByName.get(entry.name) ?? [];
    sources.push(entry.source);
    sourcesByName.set(entry.name, sources);
  }

  return Array.from(sourcesByName.entries())
    .filter(([, sources]) => sources.length > 1)
    .map(([name, sources]) => ({ name, sources }));
}
