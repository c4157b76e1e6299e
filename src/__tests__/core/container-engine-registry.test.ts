import { describe, it, expect, beforeEach } from 'vitest';
import { ContainerEngineRegistry } from '../../core/container-engine-registry.js';
import { DockerCliEngine } from '../../core/engines/docker-cli-engine.js';
import { FakeContainerEngine } from '../mocks/fake-container-engine.js';

describe('ContainerEngineRegistry', () => {
  beforeEach(() => {
    ContainerEngineRegistry.clear();
  });

  it('should return a registered engine by type', () => {
    const engine = new FakeContainerEngine();
    ContainerEngineRegistry.register(engine);

    expect(ContainerEngineRegistry.getEngine('fake')).toBe(engine);
    expect(ContainerEngineRegistry.hasEngine('fake')).toBe(true);
  });

  it('should refuse a second engine of the same type', () => {
    ContainerEngineRegistry.register(new DockerCliEngine('docker'));

    expect(() => ContainerEngineRegistry.register(new DockerCliEngine('podman'))).toThrow(
      "Container engine 'docker-cli' is already registered. Cannot register duplicate engine types."
    );
  });

  it('should list available types when a lookup fails', () => {
    ContainerEngineRegistry.register(new FakeContainerEngine());

    expect(() => ContainerEngineRegistry.getEngine('docker-cli')).toThrow(
      "Container engine 'docker-cli' not found. Available engines: fake"
    );
  });

  it('should say none when nothing is registered', () => {
    expect(ContainerEngineRegistry.getAvailableTypes()).toEqual([]);
    expect(() => ContainerEngineRegistry.getEngine('docker-cli')).toThrow('Available engines: none');
  });
});
