// src/core/readiness-probe.ts

import * as net from 'net';

/**
 * Single readiness check against a published port. Rejects when the service
 * does not accept the connection.
 */
export interface ReadinessProbe {
  check(host: string, port: number): Promise<void>;
}

/**
 * Succeeds once the port accepts a TCP connection.
 */
export class TcpReadinessProbe implements ReadinessProbe {
  constructor(private readonly connectTimeoutMs: number = 1000) {}

  check(host: string, port: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port });

      const fail = (error: Error) => {
        socket.destroy();
        reject(error);
      };

      socket.setTimeout(this.connectTimeoutMs, () => {
        fail(new Error(`Connection to ${host}:${port} timed out`));
      });
      socket.once('error', fail);
      socket.once('connect', () => {
        socket.end();
        resolve();
      });
    });
  }
}

/**
 * Tells whether a host port is already taken before a service tries to publish on it.
 */
export interface HostPortChecker {
  isInUse(port: number): Promise<boolean>;
}

/**
 * Binds a throwaway listener; EADDRINUSE means another process owns the port.
 */
export class ListenPortChecker implements HostPortChecker {
  constructor(private readonly host: string = '0.0.0.0') {}

  isInUse(port: number): Promise<boolean> {
    return new Promise((resolve, reject) => {
      const server = net.createServer();
      server.unref();
      server.once('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
          resolve(true);
        } else if (error.code === 'EACCES') {
          // Privileged port: the engine daemon may still bind it
          resolve(false);
        } else {
          reject(error);
        }
      });
      server.listen({ port, host: this.host }, () => {
        server.close(() => resolve(false));
      });
    });
  }
}
