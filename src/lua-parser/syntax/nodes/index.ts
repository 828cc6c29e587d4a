export * from './block';
export * from './chunk';
