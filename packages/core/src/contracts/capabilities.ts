import type { ExecutionEngine } from '../ports/engine';
import type { HeartbeatListener, ShellListener } from '../ports/listeners';
import type { Logger } from '../ports/logger';

/**
 * Capabilities every kernel process has. The runtime registers defaults for
 * all of them except `engine`, which the embedding kernel must provide.
 */
export interface CoreCapabilities {
  logger: Logger;
  engine: ExecutionEngine;
  heartbeat: HeartbeatListener;
  shell: ShellListener;
}
