export * from './errors';
export * from './schema';
export * from './types';
export * from './timeBucket';
export * from './timestamps';
export * from './units';
export * from './normalizer';
export * from './deduplicator';
export * from './imputer';
export * from './ica';
