export * from './schema';
export * from './migrations';
export * from './reader';
export * from './writer';
