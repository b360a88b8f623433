export * from './renderer';
export * from './summaries';
