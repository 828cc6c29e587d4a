export * from './error';
export * from './parse';
export * from './syntax';
export * from './tokenize';
