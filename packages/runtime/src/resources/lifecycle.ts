import { type RuntimeResource, StartupFailedError } from '@kernelkit/core';

import type { ServiceGraph } from '../services/assemble';

export interface NamedResource {
  name: string;
  resource: RuntimeResource;
}

/** Startable services of a graph, in start order. */
export function collectLifecycleResources(graph: ServiceGraph): NamedResource[] {
  return [
    { name: 'engine', resource: graph.engine },
    { name: 'heartbeat', resource: graph.heartbeat },
    { name: 'shell', resource: graph.shell }
  ];
}

export async function startResource(entry: NamedResource): Promise<void> {
  try {
    await entry.resource.start?.();
  } catch (error) {
    throw new StartupFailedError(entry.name, error);
  }
}

export async function closeResources(resources: NamedResource[]): Promise<void> {
  for (const entry of [...resources].reverse()) {
    await entry.resource.close?.();
  }
}

/** The resources that had finished starting when `serviceName` failed. */
export function resourcesStartedBefore(resources: NamedResource[], serviceName: string): NamedResource[] {
  const failed = resources.findIndex((entry) => entry.name === serviceName);
  return failed === -1 ? [] : resources.slice(0, failed);
}
