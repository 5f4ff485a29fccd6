export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * `develop` specs re-run the kernel from the working tree on every launch;
 * `installed` specs invoke the published executable by name.
 */
export type InstallMode = 'develop' | 'installed';

export interface InstallOptions {
  mode: InstallMode;
  /** Explicit verbosity; when omitted the mode's default applies. */
  logLevel?: LogLevel | undefined;
  /** Directory a development spec points at. */
  cwd: string;
}
