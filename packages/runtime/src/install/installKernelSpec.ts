import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import {
  type InstallMode,
  type KernelIdentity,
  type KernelSpecDescriptor,
  type KernelSpecRegistrar,
  type LogLevel,
  EXIT_STATUS,
  HostRegistrationFailedError,
  KERNELSPEC_DEFAULTS,
  developModeNotice,
  serializeKernelSpec,
  synthesizeKernelSpec
} from '@kernelkit/core';

export interface InstallKernelSpecInput {
  identity: KernelIdentity;
  mode: InstallMode;
  logLevel?: LogLevel | undefined;
  cwd: string;
  registrar: KernelSpecRegistrar;
  /** Receives user-facing notices, such as the development-mode warning. */
  notify?: ((message: string) => void) | undefined;
}

/**
 * Writes the kernel spec to a transient directory and hands it to the host's
 * registration tool. The directory is removed whether or not registration
 * succeeds.
 */
export async function installKernelSpec(input: InstallKernelSpecInput): Promise<KernelSpecDescriptor> {
  const { identity, mode, cwd, registrar } = input;
  const descriptor = synthesizeKernelSpec(identity, { mode, logLevel: input.logLevel, cwd });

  if (mode === 'develop') {
    input.notify?.(developModeNotice(identity, cwd));
  }

  const specDir = await mkdtemp(join(tmpdir(), `${identity.kernelName}-kernelspec-`));
  const specFile = join(specDir, KERNELSPEC_DEFAULTS.SPEC_FILE_NAME);
  try {
    await writeFile(specFile, serializeKernelSpec(descriptor), 'utf8');

    let exitCode: number;
    try {
      exitCode = await registrar.register({ kernelName: identity.kernelName, specDir });
    } catch (error) {
      throw new HostRegistrationFailedError(identity.kernelName, null, { cause: error });
    }

    if (exitCode !== EXIT_STATUS.SUCCESS) {
      throw new HostRegistrationFailedError(identity.kernelName, exitCode);
    }
    return descriptor;
  } finally {
    await rm(specFile, { force: true });
    await rm(specDir, { recursive: true, force: true });
  }
}
