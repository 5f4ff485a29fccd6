import { createServer, type AddressInfo, type Server, type Socket } from 'node:net';

import { type ChannelEndpoint, type Logger, formatEndpoint } from '@kernelkit/core';

export interface SocketListenerOptions {
  endpoint: ChannelEndpoint;
  logger: Logger;
}

/**
 * A listener bound to one channel endpoint. `start()` resolves once the
 * socket is listening; each connection is handed to `handleConnection`.
 */
export abstract class SocketListener {
  protected readonly endpoint: ChannelEndpoint;
  protected readonly logger: Logger;
  private readonly sockets = new Set<Socket>();
  private server: Server | null = null;

  protected constructor(options: SocketListenerOptions) {
    this.endpoint = options.endpoint;
    this.logger = options.logger;
  }

  protected abstract handleConnection(socket: Socket): void;

  public async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const server = createServer((socket) => {
      this.sockets.add(socket);
      socket.on('error', (error) => {
        this.logger.debug({ err: error.message }, 'client connection error');
      });
      socket.once('close', () => {
        this.sockets.delete(socket);
      });
      this.handleConnection(socket);
    });
    this.server = server;

    const endpoint = this.endpoint;
    try {
      await new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        const onListening = () => {
          server.removeListener('error', reject);
          resolve();
        };
        if (endpoint.kind === 'ipc') {
          server.listen(endpoint.path, onListening);
        } else {
          server.listen(endpoint.port, endpoint.host, onListening);
        }
      });
    } catch (error) {
      this.server = null;
      throw error;
    }

    this.logger.debug({ endpoint: formatEndpoint(this.endpoint) }, 'listening');
  }

  public async close(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();

    if (!this.server) {
      return;
    }

    const server = this.server;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  public address(): AddressInfo | string | null {
    return this.server?.address() ?? null;
  }
}
