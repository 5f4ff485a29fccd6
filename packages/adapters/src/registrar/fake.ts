import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import {
  KERNELSPEC_DEFAULTS,
  type KernelSpecRegistrar,
  type KernelSpecRegistration
} from '@kernelkit/core';

export interface FakeRegistrarCall extends KernelSpecRegistration {
  /** `kernel.json` as it existed while the registrar ran. */
  specJson: string;
}

export class FakeKernelSpecRegistrar implements KernelSpecRegistrar {
  public readonly calls: FakeRegistrarCall[] = [];
  public exitCode = 0;
  /** When set, `register` rejects with it (the tool could not be run). */
  public failure: Error | null = null;

  public async register(registration: KernelSpecRegistration): Promise<number> {
    const specJson = await readFile(join(registration.specDir, KERNELSPEC_DEFAULTS.SPEC_FILE_NAME), 'utf8');
    this.calls.push({ ...registration, specJson });
    if (this.failure) {
      throw this.failure;
    }
    return this.exitCode;
  }
}
