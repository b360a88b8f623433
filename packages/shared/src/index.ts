export const name = '@codecorpus/shared';

export * from './types/events';
export * from './types/records';
export * from './logger';
export * from './errors';
export * from './fs/io';
export * from './fs/path';
export * from './fs/counts';
export * from './columnar';
export * from './config/schema';
export * from './string-utils';
