// src/core/state-manager.ts

import * as fs from 'fs/promises';
import * as path from 'path';
import type { JobRunRecord } from '../config/schema.js';

export class JobStateManager {
  private stateDir: string;

  constructor(repoPath: string) {
    this.stateDir = path.join(repoPath, '.testbed', 'state', 'runs');
  }

  async saveRun(record: JobRunRecord): Promise<void> {
    await fs.mkdir(this.stateDir, { recursive: true });

    const filepath = path.join(this.stateDir, `${record.runId}.json`);
    await fs.writeFile(filepath, JSON.stringify(record, null, 2), 'utf-8');
  }

  async loadRun(runId: string): Promise<JobRunRecord | null> {
    const filepath = path.join(this.stateDir, `${runId}.json`);

    try {
      const content = await fs.readFile(filepath, 'utf-8');
      const parsed: JobRunRecord = JSON.parse(content);
      return parsed;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  /**
   * Most recent run by start time, or null when none was recorded.
   */
  async getLatestRun(): Promise<JobRunRecord | null> {
    const runs = await this.getAllRuns();
    return runs[0] ?? null;
  }

  async getAllRuns(): Promise<JobRunRecord[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.stateDir);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const runs = await Promise.all(
      files
        .filter((f) => f.endsWith('.json'))
        .map((file) => this.loadRun(path.parse(file).name))
    );

    const validRuns = runs.filter((r): r is JobRunRecord => r !== null);
    validRuns.sort(
      (a, b) => new Date(b.startedAt).getTime() - new Date(a.startedAt).getTime()
    );

    return validRuns;
  }
}
