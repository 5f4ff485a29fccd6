export type KernelErrorCode =
  | 'MALFORMED_CONNECTION_FILE'
  | 'MISSING_REQUIRED_FIELD'
  | 'HOST_REGISTRATION_FAILED'
  | 'MISSING_EXECUTION_ENGINE'
  | 'STARTUP_FAILED'
  | 'SERVICE_REGISTRATION'
  | 'SERVICE_RESOLUTION';

export class KernelError extends Error {
  public readonly code: KernelErrorCode;

  public constructor(code: KernelErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KernelError';
    this.code = code;
  }
}

export class MalformedConnectionFileError extends KernelError {
  public readonly path: string;

  public constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super('MALFORMED_CONNECTION_FILE', `Malformed connection file ${path}: ${reason}`, options);
    this.name = 'MalformedConnectionFileError';
    this.path = path;
  }
}

export class MissingRequiredFieldError extends KernelError {
  public readonly path: string;
  public readonly fields: readonly string[];

  public constructor(path: string, fields: readonly string[]) {
    super('MISSING_REQUIRED_FIELD', `Connection file ${path} is missing required field(s): ${fields.join(', ')}`);
    this.name = 'MissingRequiredFieldError';
    this.path = path;
    this.fields = fields;
  }
}

export class HostRegistrationFailedError extends KernelError {
  public readonly kernelName: string;
  /** `null` when the registration tool could not be spawned at all. */
  public readonly exitCode: number | null;

  public constructor(kernelName: string, exitCode: number | null, options?: { cause?: unknown }) {
    const detail = exitCode === null
      ? `the registration tool could not be run${describeCause(options?.cause)}`
      : `the registration tool exited with code ${exitCode}`;
    super('HOST_REGISTRATION_FAILED', `Failed to register kernel ${kernelName}: ${detail}`, options);
    this.name = 'HostRegistrationFailedError';
    this.kernelName = kernelName;
    this.exitCode = exitCode;
  }
}

export class MissingExecutionEngineError extends KernelError {
  public constructor() {
    super(
      'MISSING_EXECUTION_ENGINE',
      'No execution engine registered. Register an "engine" capability when configuring services.'
    );
    this.name = 'MissingExecutionEngineError';
  }
}

export class StartupFailedError extends KernelError {
  public readonly serviceName: string;

  public constructor(serviceName: string, cause: unknown) {
    super('STARTUP_FAILED', `Failed to start ${serviceName}${describeCause(cause)}`, { cause });
    this.name = 'StartupFailedError';
    this.serviceName = serviceName;
  }
}

export class ServiceRegistrationError extends KernelError {
  public constructor(message: string) {
    super('SERVICE_REGISTRATION', message);
    this.name = 'ServiceRegistrationError';
  }
}

export class ServiceResolutionError extends KernelError {
  public readonly capability: string;

  public constructor(capability: string, message: string, options?: { cause?: unknown }) {
    super('SERVICE_RESOLUTION', message, options);
    this.name = 'ServiceResolutionError';
    this.capability = capability;
  }
}

function describeCause(cause: unknown): string {
  if (cause === undefined) return '';
  const reason = cause instanceof Error ? cause.message : String(cause);
  return `: ${reason}`;
}
