export * from './logger/pino';
export * from './logger/fake';
export * from './engine/noop';
export * from './engine/fake';
export * from './listeners/socketListener';
export * from './listeners/heartbeat';
export * from './listeners/shell';
export * from './registrar/jupyter';
export * from './registrar/fake';
