import type { ConnectionDescriptor } from './connection';
import type { KernelIdentity } from './identity';

/**
 * Process-wide state shared by every service. Built once by the service
 * assembler, before any service is constructed, and frozen.
 */
export interface RuntimeContext {
  readonly identity: KernelIdentity;
  readonly connection: ConnectionDescriptor;
}

export function createRuntimeContext(identity: KernelIdentity, connection: ConnectionDescriptor): RuntimeContext {
  return Object.freeze({
    identity: Object.isFrozen(identity) ? identity : Object.freeze({ ...identity }),
    connection: Object.freeze({
      ...connection,
      ports: Object.freeze({ ...connection.ports })
    })
  });
}
