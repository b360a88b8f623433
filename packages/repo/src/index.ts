export * from './project';
export * from './scanner';
export * from './tokenizer';
export * from './count';
