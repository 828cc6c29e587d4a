export * from './binary-expr';
export * from './call-expr';
export * from './function-expr';
export * from './index-expr';
export * from './literal-expr';
export * from './paren-expr';
export * from './table-expr';
export * from './unary-expr';
export * from './variable-expr';
