import type { InstallOptions } from '../config/types';
import { KERNELSPEC_DEFAULTS } from '../config/defaults';
import type { KernelIdentity } from '../contracts/identity';
import type { KernelSpecDescriptor, KernelSpecFile } from '../contracts/kernelspec';
import { resolveInstallLogLevel } from './logLevel';

/**
 * Builds the registry entry for `identity`.
 *
 * Development specs re-run the kernel's npm script inside `cwd`, so edits to
 * the working tree take effect on the next launch. Installed specs call the
 * kernel's executable by name and carry no path.
 */
export function synthesizeKernelSpec(identity: KernelIdentity, options: InstallOptions): KernelSpecDescriptor {
  const logLevel = resolveInstallLogLevel(options.mode, options.logLevel);
  const kernelArgs = ['kernel', '--log-level', logLevel, KERNELSPEC_DEFAULTS.CONNECTION_FILE_PLACEHOLDER];

  if (options.mode === 'develop') {
    return Object.freeze({
      displayName: identity.kernelName,
      languageName: identity.languageName,
      argv: Object.freeze([
        'npm', 'run', '--silent',
        '--prefix', options.cwd,
        identity.developScript,
        '--',
        ...kernelArgs
      ])
    });
  }

  return Object.freeze({
    displayName: identity.displayName,
    languageName: identity.languageName,
    argv: Object.freeze([identity.executable, ...kernelArgs])
  });
}

export function serializeKernelSpec(descriptor: KernelSpecDescriptor): string {
  const file: KernelSpecFile = {
    argv: [...descriptor.argv],
    display_name: descriptor.displayName,
    language: descriptor.languageName
  };
  return JSON.stringify(file, null, 2);
}

export function developModeNotice(identity: KernelIdentity, cwd: string): string {
  return [
    `NOTE: Installing a kernel spec which references ${cwd}.`,
    `      Any changes made in this directory will affect the operation of the ${identity.friendlyName} kernel,`,
    '      and the kernel will stop launching if the directory is moved or removed.',
    `      If this was not what you intended, run '${identity.executable} install' without the '--develop' option.`
  ].join('\n');
}
