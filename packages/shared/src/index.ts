export * from './config';
export * from './logger';
export * from './errors';
export * from './db';
export * from './events';
export * from './http/metrics';
export * from './tracing';
