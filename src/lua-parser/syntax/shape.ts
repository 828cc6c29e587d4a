// A NodeShapeError reports a node constructed with the wrong arity or
// with children of the wrong form.
export class NodeShapeError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = 'NodeShapeError';
  }
}

export function checkShape(ok: boolean, msg: string): void {
  if (!ok) {
    throw new NodeShapeError(msg);
  }
}
