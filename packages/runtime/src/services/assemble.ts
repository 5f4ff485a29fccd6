import {
  type ConnectionDescriptor,
  type ExecutionEngine,
  type HeartbeatListener,
  type KernelIdentity,
  type Logger,
  type LogLevel,
  type RuntimeContext,
  type ShellListener,
  LOGGING_DEFAULTS,
  MissingExecutionEngineError,
  createRuntimeContext,
  resolveChannelEndpoint
} from '@kernelkit/core';
import { PinoLogger, SocketHeartbeatListener, SocketShellListener } from '@kernelkit/adapters';

import { ServiceRegistry, type ServiceProvider } from './registry';

export type ConfigureServices = (registry: ServiceRegistry) => void;

/**
 * Every service a kernel instance runs, constructed but not yet started.
 */
export interface ServiceGraph {
  readonly context: RuntimeContext;
  readonly logger: Logger;
  readonly engine: ExecutionEngine;
  readonly heartbeat: HeartbeatListener;
  readonly shell: ShellListener;
  /** Resolves the collaborator services registered through `addService`. */
  readonly provider: ServiceProvider;
}

export interface AssembleServicesInput {
  identity: KernelIdentity;
  connection: ConnectionDescriptor;
  logLevel: LogLevel;
  configure?: ConfigureServices | undefined;
}

export function registerBuiltinServices(registry: ServiceRegistry): void {
  registry
    .addSingleton('logger', ({ context }) => new PinoLogger({
      name: context.identity.kernelName,
      prettyPrint: LOGGING_DEFAULTS.PRETTY_PRINT
    }))
    .addSingleton('heartbeat', ({ context, resolve }) => new SocketHeartbeatListener({
      endpoint: resolveChannelEndpoint(context.connection, 'heartbeat'),
      logger: resolve('logger').child({ service: 'heartbeat' })
    }))
    .addSingleton('shell', ({ context, resolve }) => new SocketShellListener({
      endpoint: resolveChannelEndpoint(context.connection, 'shell'),
      logger: resolve('logger').child({ service: 'shell' }),
      engine: resolve('engine'),
      identity: context.identity
    }));
}

/**
 * Builds the service graph for one kernel instance. The embedding kernel's
 * registrations run after the built-ins and replace them by capability name.
 * Every registered service is constructed here, so a failing factory
 * surfaces before any socket is bound.
 */
export function assembleServices(input: AssembleServicesInput): ServiceGraph {
  const context = createRuntimeContext(input.identity, input.connection);

  const registry = new ServiceRegistry();
  registerBuiltinServices(registry);
  input.configure?.(registry);
  registry.seal();

  if (!registry.has('engine')) {
    throw new MissingExecutionEngineError();
  }

  const provider = registry.createProvider(context, input.logLevel);

  const logger = provider.resolve('logger');
  logger.setLevel(input.logLevel);

  const replaced = registry.replacedCapabilities();
  if (replaced.length > 0) {
    logger.debug({ capabilities: replaced }, 'built-in services replaced');
  }

  const engine = provider.resolve('engine');
  const heartbeat = provider.resolve('heartbeat');
  const shell = provider.resolve('shell');
  provider.resolveServices();

  logger.debug({ capabilities: registry.capabilities() }, 'services assembled');

  return { context, logger, engine, heartbeat, shell, provider };
}
