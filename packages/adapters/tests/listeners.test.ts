import { connect } from 'node:net';
import { createInterface } from 'node:readline';

import { afterEach, describe, expect, it } from 'vitest';
import { createTestIdentity, portOf } from '@kernelkit/testing';

import {
  FakeExecutionEngine,
  FakeLogger,
  SocketHeartbeatListener,
  SocketShellListener,
  type SocketListener
} from '../src/index';

const started: SocketListener[] = [];

afterEach(async () => {
  await Promise.all(started.splice(0).map((listener) => listener.close()));
});

async function startListener<T extends SocketListener>(listener: T): Promise<T> {
  await listener.start();
  started.push(listener);
  return listener;
}

function createShell(engine = new FakeExecutionEngine()) {
  return new SocketShellListener({
    endpoint: { kind: 'tcp', host: '127.0.0.1', port: 0 },
    logger: new FakeLogger(),
    engine,
    identity: createTestIdentity()
  });
}

/** Sends each line and collects as many reply lines. */
async function exchangeLines(port: number, lines: string[]): Promise<unknown[]> {
  const socket = connect(port, '127.0.0.1');
  const replies: unknown[] = [];
  const reader = createInterface({ input: socket });

  const done = new Promise<void>((resolve, reject) => {
    socket.once('error', reject);
    reader.on('line', (line) => {
      replies.push(JSON.parse(line));
      if (replies.length === lines.length) {
        resolve();
      }
    });
  });

  socket.write(lines.map((line) => `${line}\n`).join(''));
  await done;
  reader.close();
  socket.destroy();
  return replies;
}

describe('SocketHeartbeatListener', () => {
  it('echoes whatever it receives', async () => {
    const heartbeat = await startListener(new SocketHeartbeatListener({
      endpoint: { kind: 'tcp', host: '127.0.0.1', port: 0 },
      logger: new FakeLogger()
    }));

    const socket = connect(portOf(heartbeat.address()), '127.0.0.1');
    const echoed = await new Promise<string>((resolve, reject) => {
      socket.once('error', reject);
      socket.once('data', (chunk) => resolve(chunk.toString('utf8')));
      socket.write('ping');
    });
    socket.destroy();

    expect(echoed).toBe('ping');
  });

  it('rejects start when the port is taken and can be retried', async () => {
    const first = await startListener(new SocketHeartbeatListener({
      endpoint: { kind: 'tcp', host: '127.0.0.1', port: 0 },
      logger: new FakeLogger()
    }));
    const second = new SocketHeartbeatListener({
      endpoint: { kind: 'tcp', host: '127.0.0.1', port: portOf(first.address()) },
      logger: new FakeLogger()
    });

    await expect(second.start()).rejects.toMatchObject({ code: 'EADDRINUSE' });
    expect(second.address()).toBeNull();
  });

  it('closes cleanly when it never started', async () => {
    const heartbeat = new SocketHeartbeatListener({
      endpoint: { kind: 'tcp', host: '127.0.0.1', port: 0 },
      logger: new FakeLogger()
    });

    await expect(heartbeat.close()).resolves.toBeUndefined();
  });
});

describe('SocketShellListener', () => {
  it('describes the kernel in kernel_info_reply', async () => {
    const reply = await createShell().handleLine('{"id":1,"type":"kernel_info_request"}');

    expect(reply).toEqual({
      id: 1,
      type: 'kernel_info_reply',
      content: {
        status: 'ok',
        implementation: 'demo',
        implementation_version: '1.2.3',
        language_info: { name: 'demo' },
        banner: 'Demo kernel for tests'
      }
    });
  });

  it('counts only non-silent executions', async () => {
    const engine = new FakeExecutionEngine();
    const shell = createShell(engine);

    const first = await shell.handleLine(JSON.stringify({ id: 'a', type: 'execute_request', content: { code: 'x' } }));
    const silent = await shell.handleLine(JSON.stringify({ id: 'b', type: 'execute_request', content: { code: 'y', silent: true } }));
    const second = await shell.handleLine(JSON.stringify({ id: 'c', type: 'execute_request', content: { code: 'z' } }));

    expect(first.content).toEqual({ status: 'ok', execution_count: 1, output: 'x' });
    expect(silent.content).toEqual({ status: 'ok', execution_count: 1, output: 'y' });
    expect(second.content).toEqual({ status: 'ok', execution_count: 2, output: 'z' });
    expect(engine.requests).toEqual([
      { code: 'x', silent: false },
      { code: 'y', silent: true },
      { code: 'z', silent: false }
    ]);
  });

  it('reports engine errors and thrown exceptions as error replies', async () => {
    const engine = new FakeExecutionEngine({
      respond: (request) => {
        if (request.code === 'throw') {
          throw new TypeError('engine exploded');
        }
        return { status: 'error', errorName: 'NameError', errorValue: 'x is not defined' };
      }
    });
    const shell = createShell(engine);

    const failed = await shell.handleLine('{"id":1,"type":"execute_request","content":{"code":"x"}}');
    const thrown = await shell.handleLine('{"id":2,"type":"execute_request","content":{"code":"throw"}}');

    expect(failed).toEqual({
      id: 1,
      type: 'execute_reply',
      content: { status: 'error', execution_count: 1, ename: 'NameError', evalue: 'x is not defined' }
    });
    expect(thrown.content).toEqual({ status: 'error', execution_count: 2, ename: 'TypeError', evalue: 'engine exploded' });
  });

  it('answers malformed and unknown messages with error replies', async () => {
    const shell = createShell();

    expect(await shell.handleLine('not json')).toEqual({
      id: null,
      type: 'error',
      content: { status: 'error', ename: 'MalformedMessage', evalue: 'request is not valid JSON' }
    });
    expect(await shell.handleLine('{"id":3}')).toEqual({
      id: null,
      type: 'error',
      content: { status: 'error', ename: 'MalformedMessage', evalue: 'request must be an object with a string "type"' }
    });
    expect(await shell.handleLine('{"id":4,"type":"execute_request","content":{}}')).toEqual({
      id: 4,
      type: 'error',
      content: { status: 'error', ename: 'MalformedMessage', evalue: 'execute_request requires a string "code"' }
    });
    expect(await shell.handleLine('{"id":5,"type":"comm_open"}')).toEqual({
      id: 5,
      type: 'error',
      content: { status: 'error', ename: 'UnknownMessageType', evalue: 'unsupported message type "comm_open"' }
    });
  });

  it('replies over the socket in request order', async () => {
    const shell = await startListener(createShell());

    const replies = await exchangeLines(portOf(shell.address()), [
      '{"id":1,"type":"execute_request","content":{"code":"first"}}',
      '{"id":2,"type":"kernel_info_request"}'
    ]);

    expect(replies).toEqual([
      { id: 1, type: 'execute_reply', content: { status: 'ok', execution_count: 1, output: 'first' } },
      expect.objectContaining({ id: 2, type: 'kernel_info_reply' })
    ]);
  });
});
