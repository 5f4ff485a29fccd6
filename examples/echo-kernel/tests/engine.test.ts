import { describe, expect, it } from 'vitest';
import { FakeLogger } from '@kernelkit/testing';

import { EchoEngine } from '../src/engine';

describe('EchoEngine', () => {
  it('returns the cell source unchanged', async () => {
    const engine = new EchoEngine(new FakeLogger());

    expect(await engine.execute({ code: 'hello\nworld' })).toEqual({ status: 'ok', output: 'hello\nworld' });
  });

  it('upper-cases the cell under %upper', async () => {
    const engine = new EchoEngine(new FakeLogger());

    expect(await engine.execute({ code: '%upper\nshout this' })).toEqual({ status: 'ok', output: 'SHOUT THIS' });
  });

  it('rejects unknown magics', async () => {
    const engine = new EchoEngine(new FakeLogger());

    expect(await engine.execute({ code: '%time\n1' })).toEqual({
      status: 'error',
      errorName: 'UnknownMagic',
      errorValue: 'unknown magic %time'
    });
  });
});
