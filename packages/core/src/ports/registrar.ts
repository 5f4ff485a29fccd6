export interface KernelSpecRegistration {
  kernelName: string;
  /** Directory holding the synthesized `kernel.json`. */
  specDir: string;
}

/**
 * Delegates registration to the host's own tooling. Resolves with the tool's
 * exit code; rejects only when the tool could not be run.
 */
export interface KernelSpecRegistrar {
  register(registration: KernelSpecRegistration): Promise<number>;
}
