import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import type { ChannelEndpoint, ChannelName, ConnectionDescriptor } from '../contracts/connection';
import { MalformedConnectionFileError, MissingRequiredFieldError } from '../errors';

const port = z.number().int().min(1).max(65535);

const connectionFileSchema = z.object({
  transport: z.enum(['tcp', 'ipc']),
  ip: z.string().min(1),
  hb_port: port,
  shell_port: port,
  control_port: port,
  stdin_port: port,
  iopub_port: port,
  signature_scheme: z.string().regex(/^hmac-[a-z0-9-]+$/, 'expected hmac-<hash>'),
  key: z.string(),
  kernel_name: z.string().optional()
});

type ConnectionFile = z.infer<typeof connectionFileSchema>;

// Security-relevant fields are listed here so their absence is never defaulted.
const REQUIRED_FIELDS = [
  'transport',
  'ip',
  'hb_port',
  'shell_port',
  'control_port',
  'stdin_port',
  'iopub_port',
  'signature_scheme',
  'key'
] as const satisfies ReadonlyArray<keyof ConnectionFile>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(raw: string, source: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new MalformedConnectionFileError(source, 'not valid JSON', { cause: error });
  }
}

function toDescriptor(file: ConnectionFile): ConnectionDescriptor {
  const descriptor: ConnectionDescriptor = {
    transport: file.transport,
    ip: file.ip,
    ports: Object.freeze({
      heartbeat: file.hb_port,
      shell: file.shell_port,
      control: file.control_port,
      stdin: file.stdin_port,
      iopub: file.iopub_port
    }),
    signatureScheme: file.signature_scheme,
    key: file.key,
    ...(file.kernel_name !== undefined ? { kernelName: file.kernel_name } : {})
  };
  return Object.freeze(descriptor);
}

/**
 * Parses the text of a connection file. `source` only labels errors.
 */
export function parseConnectionDescriptor(raw: string, source: string): ConnectionDescriptor {
  const data = parseJson(raw, source);
  if (!isRecord(data)) {
    throw new MalformedConnectionFileError(source, 'expected a JSON object');
  }

  const missing = REQUIRED_FIELDS.filter((field) => !Object.hasOwn(data, field));
  if (missing.length > 0) {
    throw new MissingRequiredFieldError(source, missing);
  }

  const parsed = connectionFileSchema.safeParse(data);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new MalformedConnectionFileError(source, details);
  }

  return toDescriptor(parsed.data);
}

export async function loadConnectionFile(path: string): Promise<ConnectionDescriptor> {
  const raw = await readFile(path, 'utf8');
  return parseConnectionDescriptor(raw, path);
}

/**
 * Where a channel listens: a host/port pair for `tcp`, or `<ip>-<port>` as a
 * socket path for `ipc`.
 */
export function resolveChannelEndpoint(connection: ConnectionDescriptor, channel: ChannelName): ChannelEndpoint {
  const channelPort = connection.ports[channel];
  if (connection.transport === 'ipc') {
    return { kind: 'ipc', path: `${connection.ip}-${channelPort}` };
  }
  return { kind: 'tcp', host: connection.ip, port: channelPort };
}

export function formatEndpoint(endpoint: ChannelEndpoint): string {
  return endpoint.kind === 'ipc' ? `ipc://${endpoint.path}` : `tcp://${endpoint.host}:${endpoint.port}`;
}
