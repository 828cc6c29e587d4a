import { Scope } from '../../../resolve/scope';
import { Dialect } from '../../tokenize/token';
import { BaseNode, Node } from '../interface';
import { NodeKind } from '../kind';
import { checkShape } from '../shape';
import { NodeTags } from '../tags';
import type { Block } from './block';

// A Chunk is the root of a tree: one parsed program. Its body is a
// function block, since a Lua chunk is a vararg function.
export class Chunk extends BaseNode {
  readonly kind = NodeKind.Chunk;
  body: Block;
  readonly globalScope: Scope;
  readonly dialect: Dialect;

  constructor(body: Block, globalScope: Scope, dialect: Dialect, tags: NodeTags = NodeTags.none) {
    super(tags);
    checkShape(globalScope.isGlobal, 'a chunk requires the global scope');
    checkShape(body.scope.parent === globalScope, 'the chunk body must hang off the global scope');
    this.body = body;
    this.globalScope = globalScope;
    this.dialect = dialect;
  }
}

export function isChunk(n: Node): n is Chunk {
  return n.kind === NodeKind.Chunk;
}
