export * from './config';
export * from './logger';
export * from './metrics';
export * from './types';
export * from './db/store';
export { migrateIfNeeded } from './db/migrations';
export * from './resources';
export * from './extract';
export * from './loader';
export * from './runLogger';
export * from './pipeline';
export * from './reports';
export { createProgram } from './cli';
