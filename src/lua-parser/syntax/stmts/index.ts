export * from './assign-stmt';
export * from './branch-stmt';
export * from './call-stmt';
export * from './do-stmt';
export * from './for-stmt';
export * from './function-stmt';
export * from './if-stmt';
export * from './local-stmt';
export * from './return-stmt';
export * from './while-stmt';
