import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { JobStateManager } from '../../core/state-manager.js';
import type { JobRunRecord } from '../../config/schema.js';
import { createTempDir, cleanupTempDir } from '../setup.js';

function record(runId: string, startedAt: string, overrides: Partial<JobRunRecord> = {}): JobRunRecord {
  return {
    runId,
    jobName: 'python-tests',
    versionTag: '3.11',
    startedAt,
    status: 'passed',
    stages: [],
    artifacts: {},
    teardown: [],
    ...overrides,
  };
}

describe('JobStateManager', () => {
  let tempDir: string;
  let stateManager: JobStateManager;

  beforeEach(async () => {
    tempDir = await createTempDir('state-manager-test-');
    stateManager = new JobStateManager(tempDir);
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  describe('saveRun', () => {
    it('should write the record as JSON under .testbed/state/runs', async () => {
      await stateManager.saveRun(record('run-1', '2026-01-01T10:00:00.000Z'));

      const content = await fs.readFile(path.join(tempDir, '.testbed', 'state', 'runs', 'run-1.json'), 'utf-8');
      expect(JSON.parse(content).jobName).toBe('python-tests');
    });

    it('should overwrite an earlier save of the same run', async () => {
      await stateManager.saveRun(record('run-1', '2026-01-01T10:00:00.000Z', { status: 'running' }));
      await stateManager.saveRun(record('run-1', '2026-01-01T10:00:00.000Z', { status: 'failed' }));

      const loaded = await stateManager.loadRun('run-1');
      expect(loaded?.status).toBe('failed');
    });
  });

  describe('loadRun', () => {
    it('should round-trip teardown entries', async () => {
      const saved = record('run-1', '2026-01-01T10:00:00.000Z', {
        teardown: [
          { label: 'service mqtt-broker', status: 'failed', error: 'container not found' },
          { label: 'network testbed-run-1', status: 'released' },
        ],
      });
      await stateManager.saveRun(saved);

      expect(await stateManager.loadRun('run-1')).toEqual(saved);
    });

    it('should return null for an unknown run', async () => {
      expect(await stateManager.loadRun('missing')).toBeNull();
    });

    it('should fail on a corrupt record', async () => {
      const dir = path.join(tempDir, '.testbed', 'state', 'runs');
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(path.join(dir, 'bad.json'), '{ not json', 'utf-8');

      await expect(stateManager.loadRun('bad')).rejects.toThrow(SyntaxError);
    });
  });

  describe('getAllRuns', () => {
    it('should return an empty list before any run', async () => {
      expect(await stateManager.getAllRuns()).toEqual([]);
      expect(await stateManager.getLatestRun()).toBeNull();
    });

    it('should order runs newest first', async () => {
      await stateManager.saveRun(record('older', '2026-01-01T10:00:00.000Z'));
      await stateManager.saveRun(record('newest', '2026-01-03T10:00:00.000Z'));
      await stateManager.saveRun(record('middle', '2026-01-02T10:00:00.000Z'));

      const runs = await stateManager.getAllRuns();
      expect(runs.map((r) => r.runId)).toEqual(['newest', 'middle', 'older']);
      expect((await stateManager.getLatestRun())?.runId).toBe('newest');
    });

    it('should ignore files that are not records', async () => {
      await stateManager.saveRun(record('run-1', '2026-01-01T10:00:00.000Z'));
      await fs.writeFile(path.join(tempDir, '.testbed', 'state', 'runs', 'README'), 'notes', 'utf-8');

      expect(await stateManager.getAllRuns()).toHaveLength(1);
    });
  });
});
