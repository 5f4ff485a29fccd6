export * from './config/defaults';
export * from './config/types';

export * from './contracts/capabilities';
export * from './contracts/connection';
export * from './contracts/context';
export * from './contracts/identity';
export * from './contracts/kernelspec';

export * from './ports/engine';
export * from './ports/listeners';
export * from './ports/logger';
export * from './ports/registrar';

export * from './lifecycle';
export * from './errors';

export * from './utils/connection';
export * from './utils/kernelspec';
export * from './utils/logLevel';
