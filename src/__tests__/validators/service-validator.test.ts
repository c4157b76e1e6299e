import { describe, it, expect, beforeEach } from 'vitest';
import { ServiceValidator } from '../../validators/service-validator.js';
import type { ValidationContext } from '../../validators/types.js';
import type { JobDefinition, ServiceSpec } from '../../config/schema.js';
import { minimalJob, pythonTestsJob } from '../fixtures/job-definitions.js';

function service(overrides: Partial<ServiceSpec> = {}): ServiceSpec {
  return {
    name: 'cache',
    image: 'redis:7',
    ports: [{ hostPort: 6379, containerPort: 6379 }],
    connection: { scheme: 'redis', envVar: 'CACHE_URL' },
    env: {},
    readiness: { strategy: 'probe', gracePeriodMs: 2000, timeoutMs: 30000 },
    ...overrides,
  };
}

describe('ServiceValidator', () => {
  let validator: ServiceValidator;

  beforeEach(() => {
    validator = new ServiceValidator();
  });

  async function validate(services: ServiceSpec[]): Promise<ValidationContext['errors']> {
    const definition: JobDefinition = { ...minimalJob(), services };
    const context: ValidationContext = { definition, repoPath: '/repo', errors: [] };
    await validator.validate(context);
    return context.errors;
  }

  it('should only run when services are declared', () => {
    const context = (definition: JobDefinition): ValidationContext => ({ definition, repoPath: '/repo', errors: [] });
    expect(validator.shouldRun(context(minimalJob()))).toBe(false);
    expect(validator.shouldRun(context(pythonTestsJob()))).toBe(true);
  });

  it('should accept distinct services', async () => {
    const errors = await validate([
      service(),
      service({ name: 'db', ports: [{ hostPort: 0, containerPort: 5432 }], connection: { scheme: 'postgresql', envVar: 'DB_URL' } }),
    ]);
    expect(errors).toEqual([]);
  });

  it('should reject duplicate names', async () => {
    const errors = await validate([service(), service({ ports: [{ hostPort: 6380, containerPort: 6379 }] })]);
    expect(errors).toEqual([{ field: 'services.cache', message: 'Duplicate service name: cache', severity: 'error' }]);
  });

  it('should require a port', async () => {
    const errors = await validate([service({ ports: [] })]);
    expect(errors.map((e) => [e.field, e.severity])).toEqual([['services.cache.ports', 'error']]);
  });

  it('should reject two services publishing the same host port', async () => {
    const errors = await validate([
      service(),
      service({ name: 'replica', connection: { scheme: 'redis', envVar: 'REPLICA_URL' } }),
    ]);
    expect(errors).toEqual([{
      field: 'services.replica.ports',
      message: 'Host port 6379 is also published by cache',
      severity: 'error',
    }]);
  });

  it('should warn about privileged host ports', async () => {
    const errors = await validate([service({ ports: [{ hostPort: 80, containerPort: 80 }] })]);
    expect(errors).toEqual([{
      field: 'services.cache.ports',
      message: 'Host port 80 is privileged and may need root to publish',
      severity: 'warning',
    }]);
  });

  it('should reject an invalid variable name', async () => {
    const errors = await validate([service({ connection: { scheme: 'redis', envVar: '1CACHE-URL' } })]);
    expect(errors).toEqual([{
      field: 'services.cache.connection.envVar',
      message: 'Invalid environment variable name: 1CACHE-URL',
      severity: 'error',
    }]);
  });

  it('should warn about a grace strategy that never waits', async () => {
    const errors = await validate([service({ readiness: { strategy: 'grace', gracePeriodMs: 0, timeoutMs: 30000 } })]);
    expect(errors.map((e) => [e.field, e.severity])).toEqual([['services.cache.readiness', 'warning']]);
  });
});
