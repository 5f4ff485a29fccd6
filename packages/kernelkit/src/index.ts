export * from './api/createKernelApplication';

export {
  type ExecuteRequest,
  type ExecuteResult,
  type ExecutionEngine,
  type HeartbeatListener,
  type KernelIdentity,
  type KernelIdentityInput,
  type Logger,
  type LogLevel,
  type RuntimeContext,
  type ShellListener,
  CORE_VERSION,
  EXIT_STATUS,
  KernelError,
  defineKernelIdentity,
  parseLogLevel
} from '@kernelkit/core';

export {
  type ConfigureServices,
  type KernelSession,
  type ServiceFactory,
  type ServiceGraph,
  type ServiceScope,
  ServiceBinding,
  ServiceRegistry
} from '@kernelkit/runtime';
