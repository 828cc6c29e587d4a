export * from './lua-parser';
export type { Binding } from './resolve/binding';
export { SymbolId, SymbolIdSource } from './resolve/binding';
export { ScopeError } from './resolve/error';
export { Scope } from './resolve/scope';
export * from './walk/visit';
export * from './splice/splice';
export * from './unparse/unparser';
export * from './steps';
export * from './pipeline/config';
export * from './pipeline/error';
export * from './pipeline/name-generators';
export * from './pipeline/pipeline';
export * from './pipeline/presets';
export * from './pipeline/random';
export * from './pipeline/rename';
export * from './utils/logger';
export { nearest, suggest } from './utils/spell';
