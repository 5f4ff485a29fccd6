import { type KernelIdentity, type LogLevel, StartupFailedError, loadConnectionFile } from '@kernelkit/core';

import { StartupSequencer, type SequencerState, type SequencerTransition } from '../lifecycle/sequencer';
import { closeResources, collectLifecycleResources, resourcesStartedBefore } from '../resources/lifecycle';
import { assembleServices, type ConfigureServices, type ServiceGraph } from '../services/assemble';

export interface RunKernelInput {
  identity: KernelIdentity;
  connectionFile: string;
  logLevel: LogLevel;
  configure?: ConfigureServices | undefined;
  onTransition?: ((transition: SequencerTransition) => void) | undefined;
}

export interface KernelSession {
  readonly graph: ServiceGraph;
  readonly state: SequencerState;
  stop(): Promise<void>;
}

/**
 * Loads the connection file, assembles the services and starts them.
 * Resolves once every service is running. When a service fails to start,
 * the ones started before it are closed and the failure is rethrown.
 */
export async function runKernel(input: RunKernelInput): Promise<KernelSession> {
  const connection = await loadConnectionFile(input.connectionFile);
  const graph = assembleServices({
    identity: input.identity,
    connection,
    logLevel: input.logLevel,
    configure: input.configure
  });

  const sequencer = new StartupSequencer({ onTransition: input.onTransition });
  try {
    await sequencer.start(graph);
  } catch (error) {
    if (error instanceof StartupFailedError) {
      await releaseStartedServices(graph, error);
    }
    throw error;
  }
  graph.logger.info({ connectionFile: input.connectionFile }, 'kernel running');

  return {
    graph,
    get state() {
      return sequencer.state;
    },
    stop: () => sequencer.stop(graph)
  };
}

async function releaseStartedServices(graph: ServiceGraph, failure: StartupFailedError): Promise<void> {
  const started = resourcesStartedBefore(collectLifecycleResources(graph), failure.serviceName);
  graph.logger.error(
    { service: failure.serviceName, closing: started.map((entry) => entry.name) },
    'kernel failed to start'
  );
  try {
    await closeResources(started);
  } catch (error) {
    graph.logger.warn(
      { err: error instanceof Error ? error.message : String(error) },
      'failed to close services after a failed start'
    );
  }
}
