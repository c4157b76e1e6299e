import { describe, it, expect, afterEach } from 'vitest';
import * as net from 'net';
import { ListenPortChecker, TcpReadinessProbe } from '../../core/readiness-probe.js';

function listen(): Promise<{ server: net.Server; port: number }> {
  return new Promise((resolve, reject) => {
    const server = net.createServer((socket) => socket.end());
    server.once('error', reject);
    server.listen({ port: 0, host: '127.0.0.1' }, () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Expected a TCP address'));
        return;
      }
      resolve({ server, port: address.port });
    });
  });
}

function close(server: net.Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

describe('TcpReadinessProbe', () => {
  const servers: net.Server[] = [];

  afterEach(async () => {
    await Promise.all(servers.splice(0).filter((s) => s.listening).map(close));
  });

  it('should resolve once the port accepts connections', async () => {
    const { server, port } = await listen();
    servers.push(server);

    await expect(new TcpReadinessProbe().check('127.0.0.1', port)).resolves.toBeUndefined();
  });

  it('should reject when nothing listens', async () => {
    const { server, port } = await listen();
    await close(server);

    await expect(new TcpReadinessProbe().check('127.0.0.1', port)).rejects.toThrow(/ECONNREFUSED/);
  });
});

describe('ListenPortChecker', () => {
  it('should report a port held by another listener', async () => {
    const { server, port } = await listen();
    try {
      expect(await new ListenPortChecker('127.0.0.1').isInUse(port)).toBe(true);
    } finally {
      await close(server);
    }
  });

  it('should report a free port', async () => {
    const { server, port } = await listen();
    await close(server);

    expect(await new ListenPortChecker('127.0.0.1').isInUse(port)).toBe(false);
  });
});
