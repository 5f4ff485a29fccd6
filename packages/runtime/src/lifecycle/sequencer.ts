import { EXIT_STATUS, type ExitStatus, type Logger } from '@kernelkit/core';

import { closeResources, collectLifecycleResources, startResource } from '../resources/lifecycle';
import type { ServiceGraph } from '../services/assemble';

export type SequencerState =
  | 'constructed'
  | 'engine-starting'
  | 'engine-ready'
  | 'listeners-starting'
  | 'running'
  | 'stopped'
  | 'faulted';

export interface SequencerTransition {
  from: SequencerState;
  to: SequencerState;
}

export interface StartupSequencerOptions {
  /** Defaults to the logger of the graph being started. */
  logger?: Logger | undefined;
  onTransition?: ((transition: SequencerTransition) => void) | undefined;
}

/**
 * Starts a service graph in dependency order: the engine first, then the
 * heartbeat listener, then the shell listener. Each start is awaited before
 * the next begins. A failed start leaves already started services running.
 */
export class StartupSequencer {
  private current: SequencerState = 'constructed';
  private logger: Logger | null;
  private readonly onTransition: ((transition: SequencerTransition) => void) | undefined;

  public constructor(options: StartupSequencerOptions = {}) {
    this.logger = options.logger ?? null;
    this.onTransition = options.onTransition;
  }

  public get state(): SequencerState {
    return this.current;
  }

  public async start(graph: ServiceGraph): Promise<ExitStatus> {
    if (this.current !== 'constructed') {
      throw new Error(`Cannot start: sequencer is ${this.current}`);
    }
    this.logger ??= graph.logger;

    const [engine, ...listeners] = collectLifecycleResources(graph);
    try {
      this.transition('engine-starting');
      if (engine) {
        await startResource(engine);
      }
      this.transition('engine-ready');

      this.transition('listeners-starting');
      for (const listener of listeners) {
        await startResource(listener);
      }
    } catch (error) {
      this.transition('faulted');
      throw error;
    }

    this.transition('running');
    return EXIT_STATUS.SUCCESS;
  }

  /** Closes the shell listener, the heartbeat listener and the engine, in that order. */
  public async stop(graph: ServiceGraph): Promise<void> {
    if (this.current !== 'running') {
      throw new Error(`Cannot stop: sequencer is ${this.current}`);
    }

    try {
      await closeResources(collectLifecycleResources(graph));
    } catch (error) {
      this.transition('faulted');
      throw error;
    }
    this.transition('stopped');
  }

  private transition(to: SequencerState): void {
    const from = this.current;
    this.current = to;
    this.logger?.debug({ from, to }, 'kernel state changed');
    this.onTransition?.({ from, to });
  }
}
