/**
 * Default constants for kernelkit
 */

export const CORE_VERSION = '0.3.0' as const;

/**
 * Kernel spec / host registry
 */
export const KERNELSPEC_DEFAULTS = {
  /** Token the host replaces with the connection file path at spawn time */
  CONNECTION_FILE_PLACEHOLDER: '{connection_file}' as const,

  /** File name the host registration tool expects inside the spec directory */
  SPEC_FILE_NAME: 'kernel.json' as const,

  /** Command providing the host's `kernelspec install` subcommand */
  HOST_COMMAND: 'jupyter' as const,

  /** npm script re-invoked by development-mode kernel specs */
  DEVELOP_SCRIPT: 'start' as const,
};

/**
 * Logging Configuration
 */
export const LOGGING_DEFAULTS = {
  /** Level written into development-mode kernel specs */
  DEVELOP_LEVEL: 'info' as const,

  /** Level written into installed-mode kernel specs */
  INSTALLED_LEVEL: 'error' as const,

  /** Level used by `kernel` when no --log-level is given */
  KERNEL_LEVEL: 'error' as const,

  /** Whether the built-in logger pretty-prints (opt-in, output goes to the host's log) */
  PRETTY_PRINT: process.env.KERNELKIT_LOG_PRETTY === 'true',
};

/**
 * Process exit statuses returned by the command surface
 */
export const EXIT_STATUS = {
  SUCCESS: 0,
  FAILURE: 1,
  /** The host registration tool ran and reported failure, or could not be spawned */
  HOST_TOOL_FAILED: 2,
} as const;

export type ExitStatus = (typeof EXIT_STATUS)[keyof typeof EXIT_STATUS];
