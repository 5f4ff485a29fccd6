import { type RuntimeResource } from '../lifecycle';

/** Echoes whatever it receives on its channel so clients can check liveness. */
export interface HeartbeatListener extends RuntimeResource {
  start(): Promise<void>;
}

/** Accepts client requests and dispatches them to the execution engine. */
export interface ShellListener extends RuntimeResource {
  start(): Promise<void>;
}
