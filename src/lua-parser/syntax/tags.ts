// A NodeTag marks a node for the benefit of later rewrite steps.
export enum NodeTag {
  // built by a rewrite step rather than parsed from input
  Generated = 'generated',
  // later steps must leave the node as it is
  Exempt = 'exempt',
}

// NodeTags is the immutable tag set a node receives at construction.
// Steps that need to remember nodes across one traversal keep their own
// identity-keyed sets instead of writing to the tree.
export class NodeTags {
  static readonly none = new NodeTags([]);
  static readonly generated = new NodeTags([NodeTag.Generated]);
  static readonly exempt = new NodeTags([NodeTag.Generated, NodeTag.Exempt]);

  private readonly set: ReadonlySet<NodeTag>;

  private constructor(tags: Iterable<NodeTag>) {
    this.set = new Set(tags);
  }

  static of(...tags: NodeTag[]): NodeTags {
    return tags.length === 0 ? NodeTags.none : new NodeTags(tags);
  }

  has(tag: NodeTag): boolean {
    return this.set.has(tag);
  }

  // with returns a set holding tag as well; this set is unchanged.
  with(tag: NodeTag): NodeTags {
    return this.set.has(tag) ? this : new NodeTags([...this.set, tag]);
  }

  get size(): number {
    return this.set.size;
  }

  [Symbol.iterator](): Iterator<NodeTag> {
    return this.set.values();
  }
}
