// src/core/resource-scope.ts

import type { TeardownEntry } from '../config/schema.js';
import { Logger } from '../utils/logger.js';

interface Registration {
  label: string;
  release: () => Promise<void>;
}

/**
 * Stack of acquired resources for one job run.
 *
 * Stages register a release as soon as a resource exists, before doing anything
 * else with it. releaseAll() runs every release exactly once, newest first, and
 * keeps going when one fails.
 */
export class ResourceScope {
  private registrations: Registration[] = [];
  private released = false;

  register(label: string, release: () => Promise<void>): void {
    if (this.released) {
      throw new Error(`Cannot register '${label}': scope already released`);
    }
    this.registrations.push({ label, release });
  }

  get size(): number {
    return this.registrations.length;
  }

  /**
   * Labels in acquisition order.
   */
  labels(): string[] {
    return this.registrations.map((r) => r.label);
  }

  async releaseAll(): Promise<TeardownEntry[]> {
    if (this.released) {
      return [];
    }
    this.released = true;

    const report: TeardownEntry[] = [];
    while (this.registrations.length > 0) {
      const registration = this.registrations.pop();
      if (!registration) break;

      try {
        await registration.release();
        report.push({ label: registration.label, status: 'released' });
        Logger.debug(`Released ${registration.label}`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        report.push({ label: registration.label, status: 'failed', error: message });
        Logger.warn(`Failed to release ${registration.label}: ${message}`);
      }
    }

    return report;
  }
}
