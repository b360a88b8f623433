export * from './checkpoint';
export * from './extractor';
