// A ScopeError reports a malformed tree: a reference that does not bind
// through its scope chain, an inconsistent higher-scope ledger, or a
// scope attached twice. It is never a property of the input program.
export class ScopeError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = 'ScopeError';
  }
}
