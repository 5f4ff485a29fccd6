import { type Socket } from 'node:net';

import { type HeartbeatListener } from '@kernelkit/core';

import { SocketListener, type SocketListenerOptions } from './socketListener';

/**
 * Echoes every chunk back to its sender.
 */
export class SocketHeartbeatListener extends SocketListener implements HeartbeatListener {
  public constructor(options: SocketListenerOptions) {
    super(options);
  }

  protected handleConnection(socket: Socket): void {
    socket.on('data', (chunk) => {
      socket.write(chunk);
    });
  }
}
