import { Command, CommanderError, InvalidArgumentError } from 'commander';
import pc from 'picocolors';

import {
  type KernelIdentity,
  type KernelSpecRegistrar,
  type LogLevel,
  CORE_VERSION,
  EXIT_STATUS,
  HostRegistrationFailedError,
  LOGGING_DEFAULTS,
  parseLogLevel
} from '@kernelkit/core';
import { JupyterKernelSpecRegistrar } from '@kernelkit/adapters';
import {
  type ConfigureServices,
  type KernelSession,
  installKernelSpec,
  runKernel
} from '@kernelkit/runtime';

export interface KernelApplicationOptions {
  /** Defaults to `jupyter kernelspec install`. */
  registrar?: KernelSpecRegistrar | undefined;
  /** Directory development specs point at. Defaults to the process's working directory. */
  cwd?: string | undefined;
  stdout?: ((text: string) => void) | undefined;
  stderr?: ((text: string) => void) | undefined;
  /**
   * Resolves when a running kernel should shut down. Defaults to the first
   * SIGINT or SIGTERM the process receives.
   */
  waitForTermination?: ((session: KernelSession) => Promise<unknown>) | undefined;
  /** Ends the process once `run` has a status. Defaults to `process.exit`. */
  exit?: ((status: number) => void) | undefined;
}

export interface KernelApplication {
  /** A fresh command tree. `execute` builds one per invocation. */
  createProgram(): Command;
  /** Runs one invocation and resolves with its process exit status. */
  execute(argv: readonly string[]): Promise<number>;
  /** Runs one invocation, then ends the process with its exit status. */
  run(argv: readonly string[]): Promise<void>;
}

interface InstallCommandOptions {
  develop?: boolean;
  logLevel?: LogLevel;
}

interface KernelCommandOptions {
  logLevel?: LogLevel;
}

/**
 * Builds the `install` / `kernel` command surface for a kernel.
 *
 * ```ts
 * const app = createKernelApplication(identity, (services) => {
 *   services.addSingleton('engine', () => new EchoEngine());
 * });
 * await app.run(process.argv.slice(2));
 * ```
 */
export function createKernelApplication(
  identity: KernelIdentity,
  configure: ConfigureServices,
  options: KernelApplicationOptions = {}
): KernelApplication {
  const stdout = options.stdout ?? ((text: string) => { process.stdout.write(text); });
  const stderr = options.stderr ?? ((text: string) => { process.stderr.write(text); });
  const waitForTermination = options.waitForTermination ?? waitForTerminationSignal;
  const exit = options.exit ?? ((status: number) => process.exit(status));

  const createProgram = (): Command => {
    const program = new Command()
      .name(identity.executable)
      .description(identity.description)
      .exitOverride()
      .configureOutput({ writeOut: stdout, writeErr: stderr })
      .version(
        `Language kernel: ${identity.kernelVersion}\nkernelkit core: ${CORE_VERSION}`,
        '--version',
        'Show version information'
      );

    program
      .command('install')
      .description(`Installs the ${identity.kernelName} kernel into Jupyter.`)
      .option('--develop', 'Installs a kernel spec that runs against this working directory. Useful for development only.')
      .option(
        '-l, --log-level <level>',
        'Level of logging messages to emit. Defaults to info in development mode, error otherwise.',
        parseLogLevelOption
      )
      .action(async (opts: InstallCommandOptions) => {
        await installKernelSpec({
          identity,
          mode: opts.develop ? 'develop' : 'installed',
          logLevel: opts.logLevel,
          cwd: options.cwd ?? process.cwd(),
          registrar: options.registrar ?? new JupyterKernelSpecRegistrar(),
          notify: (notice) => stderr(`${pc.yellow(notice)}\n`)
        });
      });

    program
      .command('kernel')
      .description(`Runs the ${identity.kernelName} kernel. Typically only run by a Jupyter client.`)
      .argument('<connection-file>', 'Connection file used to connect to a Jupyter client.')
      .option(
        '-l, --log-level <level>',
        `Level of logging messages to emit. Defaults to ${LOGGING_DEFAULTS.KERNEL_LEVEL}.`,
        parseLogLevelOption
      )
      .action(async (connectionFile: string, opts: KernelCommandOptions) => {
        const session = await runKernel({
          identity,
          connectionFile,
          logLevel: opts.logLevel ?? LOGGING_DEFAULTS.KERNEL_LEVEL,
          configure
        });
        await waitForTermination(session);
        await session.stop();
      });

    return program;
  };

  const execute = async (argv: readonly string[]): Promise<number> => {
    try {
      await createProgram().parseAsync([...argv], { from: 'user' });
      return EXIT_STATUS.SUCCESS;
    } catch (error) {
      // commander has already written its own message
      if (error instanceof CommanderError) {
        return error.exitCode;
      }
      stderr(`${error instanceof Error ? error.message : String(error)}\n`);
      return error instanceof HostRegistrationFailedError ? EXIT_STATUS.HOST_TOOL_FAILED : EXIT_STATUS.FAILURE;
    }
  };

  return {
    createProgram,
    execute,
    async run(argv: readonly string[]): Promise<void> {
      exit(await execute(argv));
    }
  };
}

function parseLogLevelOption(value: string): LogLevel {
  try {
    return parseLogLevel(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

function waitForTerminationSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}
