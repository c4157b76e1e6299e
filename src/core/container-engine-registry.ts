// src/core/container-engine-registry.ts

import type { ContainerEngine } from './types/container-engine.js';

/**
 * Registry for container engine implementations.
 *
 * Engines are registered when the CLI starts (see src/cli/program.ts) and looked
 * up by the type named in .testbed/config.yml.
 *
 * @example
 * ```typescript
 * ContainerEngineRegistry.register(new DockerCliEngine('docker'));
 * const engine = ContainerEngineRegistry.getEngine('docker-cli');
 * ```
 */
export class ContainerEngineRegistry {
  private static engines = new Map<string, ContainerEngine>();

  /**
   * @throws Error if an engine with the same type is already registered
   */
  static register(engine: ContainerEngine): void {
    if (this.engines.has(engine.type)) {
      throw new Error(
        `Container engine '${engine.type}' is already registered. ` +
        `Cannot register duplicate engine types.`
      );
    }

    this.engines.set(engine.type, engine);
  }

  /**
   * @throws Error if no engine is registered with the given type
   */
  static getEngine(type: string): ContainerEngine {
    const engine = this.engines.get(type);

    if (!engine) {
      const available = this.getAvailableTypes();
      throw new Error(
        `Container engine '${type}' not found. ` +
        `Available engines: ${available.length > 0 ? available.join(', ') : 'none'}`
      );
    }

    return engine;
  }

  static getAvailableTypes(): string[] {
    return Array.from(this.engines.keys());
  }

  static hasEngine(type: string): boolean {
    return this.engines.has(type);
  }

  /**
   * @internal Test helper.
   */
  static clear(): void {
    this.engines.clear();
  }
}
