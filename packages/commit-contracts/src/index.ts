export * from './schema';
export * from './types/config';
export * from './schema/config.schema';
export * from './errors';
export * from './logger';
export * from './flags';
export * from './env';
