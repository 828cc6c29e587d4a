export * from './position';
export * from './scanner';
export * from './token';
