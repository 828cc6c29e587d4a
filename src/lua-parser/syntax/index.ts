export * from './category';
export * from './exprs';
export * from './interface';
export * from './kind';
export * from './nodes';
export * from './shape';
export * from './stmts';
export * from './tags';
