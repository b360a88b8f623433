export const name = '@codecorpus/core';

export * from './config/loader';
export * from './stage';
export * from './extract';
export * from './merge';
export * from './shard';
export * from './finalize';
export * from './pipeline';
