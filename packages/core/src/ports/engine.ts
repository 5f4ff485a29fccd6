import { type RuntimeResource } from '../lifecycle';

export interface ExecuteRequest {
  code: string;
  /** Silent requests do not advance the execution count. */
  silent?: boolean | undefined;
}

export type ExecuteResult =
  | { status: 'ok'; output: string | null }
  | { status: 'error'; errorName: string; errorValue: string };

/**
 * The one capability the embedding kernel must provide. The orchestrator only
 * calls `start()` (and `close()` on shutdown); `execute()` is for listeners.
 */
export interface ExecutionEngine extends RuntimeResource {
  start(): Promise<void>;
  execute(request: ExecuteRequest): Promise<ExecuteResult>;
}
