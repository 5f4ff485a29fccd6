export * from './services/registry';
export * from './services/assemble';
export * from './resources/lifecycle';
export * from './lifecycle/sequencer';
export * from './install/installKernelSpec';
export * from './kernel/runKernel';
