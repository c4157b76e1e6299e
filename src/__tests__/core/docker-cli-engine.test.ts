// src/__tests__/core/docker-cli-engine.test.ts

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';
import { DockerCliEngine, parsePublishedPort } from '../../core/engines/docker-cli-engine.js';
import { JobAbortController, JobAbortError } from '../../core/abort-controller.js';

// Mock child_process
const mockSpawn = vi.fn();
vi.mock('child_process', () => ({
  spawn: (...args: unknown[]) => mockSpawn(...args)
}));

interface ScriptedRun {
  stdout?: string;
  stderr?: string;
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
  error?: Error;
}

/**
 * Each spawned CLI invocation plays the next scripted run.
 */
function script(...runs: ScriptedRun[]): void {
  mockSpawn.mockImplementation(() => {
    const mockProcess = createMockProcess();
    const run = runs.shift() ?? {};

    queueMicrotask(() => {
      if (run.error) {
        mockProcess.emit('error', run.error);
        return;
      }
      if (run.stdout) mockProcess.stdout.emit('data', Buffer.from(run.stdout));
      if (run.stderr) mockProcess.stderr.emit('data', Buffer.from(run.stderr));
      mockProcess.emit('exit', run.exitCode === undefined ? 0 : run.exitCode, run.signal ?? null);
    });

    return mockProcess;
  });
}

function spawnedArgs(call: number): unknown {
  return mockSpawn.mock.calls[call]?.[1];
}

describe('DockerCliEngine', () => {
  let engine: DockerCliEngine;

  beforeEach(() => {
    engine = new DockerCliEngine();
    mockSpawn.mockReset();
  });

  describe('Basic Properties', () => {
    it('should have correct type identifier', () => {
      expect(engine.type).toBe('docker-cli');
    });

    it('should name itself after the binary', () => {
      expect(new DockerCliEngine('podman').name).toBe('podman CLI');
    });
  });

  describe('validate()', () => {
    it('should return valid when the daemon answers', async () => {
      script({ stdout: '24.0.7\n' });

      const result = await engine.validate();

      expect(result).toEqual({ valid: true, errors: [], warnings: [] });
      expect(mockSpawn).toHaveBeenCalledWith(
        'docker',
        ['version', '--format', '{{.Server.Version}}'],
        expect.any(Object)
      );
    });

    it('should report an unreachable daemon', async () => {
      script({ exitCode: 1, stderr: 'Cannot connect to the Docker daemon\n' });

      const result = await engine.validate();

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(['docker daemon not reachable: Cannot connect to the Docker daemon']);
    });

    it('should report a missing binary', async () => {
      script({ error: new Error('spawn docker ENOENT') });

      const result = await engine.validate();

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        'docker CLI not found or not working: Failed to spawn docker: spawn docker ENOENT'
      ]);
      expect(result.warnings).toEqual(['Install docker or set engine.binary in .testbed/config.yml']);
    });
  });

  describe('buildRunArgs()', () => {
    it('should translate every start option', () => {
      const args = engine.buildRunArgs({
        image: 'eclipse-mosquitto:1.6',
        name: 'testbed-run-1-mqtt-broker',
        network: 'testbed-run-1',
        networkAliases: ['mqtt-broker'],
        ports: [{ hostPort: 1883, containerPort: 1883 }, { hostPort: 0, containerPort: 9001 }],
        env: { LOG_LEVEL: 'debug' },
        mounts: [{ host: '/src/pkg', container: '/workspace', readonly: true }],
        workdir: '/workspace',
        labels: { 'testbed.run': 'run-1' },
        command: ['sleep', 'infinity']
      });

      expect(args).toEqual([
        'run', '--detach', '--name', 'testbed-run-1-mqtt-broker',
        '--network', 'testbed-run-1',
        '--network-alias', 'mqtt-broker',
        '--publish', '1883:1883',
        '--publish', '9001',
        '--env', 'LOG_LEVEL=debug',
        '--volume', '/src/pkg:/workspace:ro',
        '--workdir', '/workspace',
        '--label', 'testbed.run=run-1',
        'eclipse-mosquitto:1.6',
        'sleep', 'infinity'
      ]);
    });

    it('should alias the container by its name when no aliases are given', () => {
      const args = engine.buildRunArgs({ image: 'redis:7', name: 'cache', network: 'net' });

      expect(args).toEqual(['run', '--detach', '--name', 'cache', '--network', 'net', '--network-alias', 'cache', 'redis:7']);
    });
  });

  describe('startContainer()', () => {
    it('should keep fixed host ports without asking the engine', async () => {
      script({ stdout: 'abc123\n' });

      const handle = await engine.startContainer({
        image: 'redis:7',
        name: 'cache',
        ports: [{ hostPort: 6379, containerPort: 6379 }]
      });

      expect(handle).toEqual({ id: 'abc123', name: 'cache', ports: [{ containerPort: 6379, hostPort: 6379 }] });
      expect(mockSpawn).toHaveBeenCalledTimes(1);
    });

    it('should look up dynamically published ports', async () => {
      script({ stdout: 'abc123\n' }, { stdout: '0.0.0.0:49153\n[::]:49153\n' });

      const handle = await engine.startContainer({
        image: 'redis:7',
        name: 'cache',
        ports: [{ hostPort: 0, containerPort: 6379 }]
      });

      expect(handle.ports).toEqual([{ containerPort: 6379, hostPort: 49153 }]);
      expect(spawnedArgs(1)).toEqual(['port', 'abc123', '6379/tcp']);
    });

    it('should remove the container when the port lookup fails', async () => {
      script({ stdout: 'abc123\n' }, { exitCode: 1, stderr: 'no public port' }, {});

      await expect(engine.startContainer({
        image: 'redis:7',
        name: 'cache',
        ports: [{ hostPort: 0, containerPort: 6379 }]
      })).rejects.toThrow('docker port exited with code 1. stderr: no public port');

      expect(spawnedArgs(2)).toEqual(['rm', '--force', '--volumes', 'abc123']);
    });

    it('should surface the CLI error when the image cannot start', async () => {
      script({ exitCode: 125, stderr: 'Bind for 0.0.0.0:1883 failed: port is already allocated\n' });

      await expect(engine.startContainer({ image: 'eclipse-mosquitto:1.6', name: 'broker' }))
        .rejects.toThrow('docker run exited with code 125. stderr: Bind for 0.0.0.0:1883 failed: port is already allocated');
    });
  });

  describe('pullImage()', () => {
    it('should fail with the CLI stderr', async () => {
      script({ exitCode: 1, stderr: 'manifest unknown\n' });

      await expect(engine.pullImage('python:9.99')).rejects.toThrow(
        'docker pull exited with code 1. stderr: manifest unknown'
      );
      expect(spawnedArgs(0)).toEqual(['pull', 'python:9.99']);
    });

    it('should fail with the abort reason when the pull is killed', async () => {
      const controller = new JobAbortController();
      const mockProcess = createMockProcess();
      mockSpawn.mockReturnValue(mockProcess);

      const pending = engine.pullImage('python:3.11', controller);
      controller.abort('interrupted');
      mockProcess.emit('exit', null, 'SIGTERM');

      const error = await pending.catch((e: unknown) => e);
      expect(mockProcess.kill).toHaveBeenCalledWith('SIGTERM');
      expect(error).toBeInstanceOf(JobAbortError);
      expect(error).toMatchObject({ reason: 'interrupted', message: 'Job interrupted' });
    });
  });

  describe('startContainer() on abort', () => {
    it('should fail with the abort reason when the deadline kills docker run', async () => {
      const controller = new JobAbortController();
      const mockProcess = createMockProcess();
      mockSpawn.mockReturnValue(mockProcess);

      const pending = engine.startContainer({ image: 'eclipse-mosquitto:1.6', name: 'broker' }, controller);
      controller.abort('timeout');
      mockProcess.emit('exit', 137, null);

      await expect(pending).rejects.toMatchObject({ reason: 'timeout', message: 'Job timed out' });
      expect(mockSpawn).toHaveBeenCalledTimes(1);
    });
  });

  describe('exec()', () => {
    const handle = { id: 'abc123', name: 'env', ports: [] };

    it('should pass variables and workdir before the command', async () => {
      script({ stdout: 'ok\n' });

      await engine.exec(handle, {
        command: 'pytest -sv',
        env: { MQTT_BROKER_URL: 'mqtt://mqtt-broker:1883' },
        workdir: '/workspace'
      });

      expect(spawnedArgs(0)).toEqual([
        'exec',
        '--env', 'MQTT_BROKER_URL=mqtt://mqtt-broker:1883',
        '--workdir', '/workspace',
        'abc123', 'sh', '-c', 'pytest -sv'
      ]);
    });

    it('should resolve with a failing exit code and the combined output', async () => {
      script({ stdout: 'collected 3 items\n', stderr: 'E   AssertionError\n', exitCode: 1 });
      const onOutput = vi.fn();

      const result = await engine.exec(handle, { command: 'pytest', env: {}, onOutput });

      expect(result.exitCode).toBe(1);
      expect(result.signal).toBeNull();
      expect(result.output.toString()).toBe('collected 3 items\nE   AssertionError\n');
      expect(onOutput).toHaveBeenCalledTimes(2);
    });

    it('should report a killed command by signal', async () => {
      script({ exitCode: null, signal: 'SIGTERM' });

      const result = await engine.exec(handle, { command: 'pytest', env: {} });

      expect(result.exitCode).toBeNull();
      expect(result.signal).toBe('SIGTERM');
    });

    it('should not spawn once the job is aborted', async () => {
      const controller = new JobAbortController();
      controller.abort('timeout');

      await expect(engine.exec(handle, { command: 'pytest', env: {} }, controller))
        .rejects.toBeInstanceOf(JobAbortError);
      expect(mockSpawn).not.toHaveBeenCalled();
    });

    it('should kill the running command on abort', async () => {
      const controller = new JobAbortController();
      const mockProcess = createMockProcess();
      mockSpawn.mockReturnValue(mockProcess);

      const pending = engine.exec(handle, { command: 'pytest', env: {} }, controller);
      controller.abort('interrupted');
      mockProcess.emit('exit', null, 'SIGTERM');

      const result = await pending;
      expect(mockProcess.kill).toHaveBeenCalledWith('SIGTERM');
      expect(result.signal).toBe('SIGTERM');
    });
  });
});

describe('parsePublishedPort', () => {
  it('should read the first binding', () => {
    expect(parsePublishedPort('0.0.0.0:49153\n[::]:49153\n')).toBe(49153);
  });

  it('should read an IPv6-only binding', () => {
    expect(parsePublishedPort('[::]:32768')).toBe(32768);
  });

  it('should reject empty output', () => {
    expect(() => parsePublishedPort('\n')).toThrow('Could not read published port from: (empty)');
  });
});

function createMockProcess() {
  const emitter = new EventEmitter();
  const stdoutEmitter = new EventEmitter();
  const stderrEmitter = new EventEmitter();

  const mockProcess = Object.assign(emitter, {
    stdout: stdoutEmitter,
    stderr: stderrEmitter,
    kill: vi.fn(() => true),
    killed: false
  });

  return mockProcess;
}
