import { type Socket } from 'node:net';
import { createInterface } from 'node:readline';

import { z } from 'zod';
import {
  type ExecuteResult,
  type ExecutionEngine,
  type KernelIdentity,
  type ShellListener
} from '@kernelkit/core';

import { SocketListener, type SocketListenerOptions } from './socketListener';

const envelopeSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  type: z.string(),
  content: z.unknown().optional()
});

const executeContentSchema = z.object({
  code: z.string(),
  silent: z.boolean().optional()
});

type MessageId = string | number | null;

export interface ShellReply {
  id: MessageId;
  type: string;
  content: Record<string, unknown>;
}

export interface SocketShellListenerOptions extends SocketListenerOptions {
  engine: ExecutionEngine;
  identity: KernelIdentity;
}

/**
 * Newline-delimited JSON request/reply loop in front of the execution engine.
 * Requests on one connection are answered in the order they arrived.
 */
export class SocketShellListener extends SocketListener implements ShellListener {
  private readonly engine: ExecutionEngine;
  private readonly identity: KernelIdentity;
  private executionCount = 0;

  public constructor(options: SocketShellListenerOptions) {
    super(options);
    this.engine = options.engine;
    this.identity = options.identity;
  }

  protected handleConnection(socket: Socket): void {
    const lines = createInterface({ input: socket, crlfDelay: Infinity });
    let pending = Promise.resolve();

    lines.on('line', (line) => {
      if (!line.trim()) return;
      pending = pending
        .then(async () => {
          const reply = await this.handleLine(line);
          if (!socket.destroyed) {
            socket.write(`${JSON.stringify(reply)}\n`);
          }
        })
        .catch((error: unknown) => {
          this.logger.error({ err: error instanceof Error ? error.message : String(error) }, 'failed to answer shell request');
        });
    });
  }

  public async handleLine(line: string): Promise<ShellReply> {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      return errorReply(null, 'MalformedMessage', 'request is not valid JSON');
    }

    const envelope = envelopeSchema.safeParse(raw);
    if (!envelope.success) {
      return errorReply(null, 'MalformedMessage', 'request must be an object with a string "type"');
    }

    const { id = null, type, content } = envelope.data;
    switch (type) {
      case 'kernel_info_request':
        return this.kernelInfo(id);
      case 'execute_request':
        return this.execute(id, content);
      default:
        this.logger.debug({ type }, 'unknown shell message type');
        return errorReply(id, 'UnknownMessageType', `unsupported message type "${type}"`);
    }
  }

  private kernelInfo(id: MessageId): ShellReply {
    return {
      id,
      type: 'kernel_info_reply',
      content: {
        status: 'ok',
        implementation: this.identity.kernelName,
        implementation_version: this.identity.kernelVersion,
        language_info: { name: this.identity.languageName },
        banner: this.identity.description
      }
    };
  }

  private async execute(id: MessageId, content: unknown): Promise<ShellReply> {
    const parsed = executeContentSchema.safeParse(content);
    if (!parsed.success) {
      return errorReply(id, 'MalformedMessage', 'execute_request requires a string "code"');
    }

    const { code, silent = false } = parsed.data;
    if (!silent) {
      this.executionCount += 1;
    }

    let result: ExecuteResult;
    try {
      result = await this.engine.execute({ code, silent });
    } catch (error) {
      result = {
        status: 'error',
        errorName: error instanceof Error ? error.name : 'Error',
        errorValue: error instanceof Error ? error.message : String(error)
      };
    }

    if (result.status === 'error') {
      return {
        id,
        type: 'execute_reply',
        content: {
          status: 'error',
          execution_count: this.executionCount,
          ename: result.errorName,
          evalue: result.errorValue
        }
      };
    }

    return {
      id,
      type: 'execute_reply',
      content: { status: 'ok', execution_count: this.executionCount, output: result.output }
    };
  }
}

function errorReply(id: MessageId, ename: string, evalue: string): ShellReply {
  return { id, type: 'error', content: { status: 'error', ename, evalue } };
}
