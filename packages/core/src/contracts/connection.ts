export const CHANNEL_NAMES = ['heartbeat', 'shell', 'control', 'stdin', 'iopub'] as const;

export type ChannelName = (typeof CHANNEL_NAMES)[number];

export type ConnectionTransport = 'tcp' | 'ipc';

/**
 * Parameters the host hands a kernel instance through its connection file.
 * Field names are camel-cased; the on-disk names are the host's.
 */
export interface ConnectionDescriptor {
  readonly transport: ConnectionTransport;
  readonly ip: string;
  readonly ports: Readonly<Record<ChannelName, number>>;
  readonly signatureScheme: string;
  readonly key: string;
  readonly kernelName?: string | undefined;
}

export type ChannelEndpoint =
  | { kind: 'tcp'; host: string; port: number }
  | { kind: 'ipc'; path: string };
