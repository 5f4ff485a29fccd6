/**
 * Anything the runtime starts and may later close. `start()` resolves once
 * the resource is ready to accept input.
 */
export interface RuntimeResource {
  start?(): Promise<void>;
  close?(): Promise<void>;
}
