import { spawn } from 'node:child_process';

import {
  KERNELSPEC_DEFAULTS,
  type KernelSpecRegistrar,
  type KernelSpecRegistration
} from '@kernelkit/core';

export interface JupyterKernelSpecRegistrarOptions {
  /** Command providing `kernelspec install`; must be on PATH unless absolute. */
  command?: string;
  /** Install into the per-user kernel directory. */
  user?: boolean;
  /** Install under an explicit prefix (e.g. a virtualenv). */
  prefix?: string;
  /** Overwrite an existing kernel spec of the same name. */
  replace?: boolean;
}

/**
 * Registers kernel specs through `jupyter kernelspec install`. The tool's own
 * output goes straight to this process's stdio.
 */
export class JupyterKernelSpecRegistrar implements KernelSpecRegistrar {
  private readonly options: JupyterKernelSpecRegistrarOptions;

  public constructor(options: JupyterKernelSpecRegistrarOptions = {}) {
    this.options = options;
  }

  public buildArgs(registration: KernelSpecRegistration): string[] {
    const args = ['kernelspec', 'install', registration.specDir, `--name=${registration.kernelName}`];
    if (this.options.user) {
      args.push('--user');
    }
    if (this.options.prefix !== undefined) {
      args.push('--prefix', this.options.prefix);
    }
    if (this.options.replace) {
      args.push('--replace');
    }
    return args;
  }

  public register(registration: KernelSpecRegistration): Promise<number> {
    const command = this.options.command ?? KERNELSPEC_DEFAULTS.HOST_COMMAND;
    const args = this.buildArgs(registration);

    return new Promise<number>((resolve, reject) => {
      const child = spawn(command, args, { stdio: 'inherit' });
      child.once('error', reject);
      child.once('close', (code, signal) => {
        if (code !== null) {
          resolve(code);
          return;
        }
        reject(new Error(`${command} terminated by signal ${signal ?? 'unknown'}`));
      });
    });
  }
}
