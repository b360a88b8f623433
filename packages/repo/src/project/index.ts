export * from './names';
export * from './listing';
