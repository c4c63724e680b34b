/**
 * One element of a server response: a tag, string attributes and ordered
 * children. Nodes are frozen once built; a new response always produces a
 * new tree, so instance identity tells whether a response changed.
 */
export class AttributeNode {
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly AttributeNode[];

  constructor(
    readonly tag: string,
    attributes: Readonly<Record<string, string>> = {},
    children: readonly AttributeNode[] = [],
  ) {
    this.attributes = Object.freeze({ ...attributes });
    this.children = Object.freeze([...children]);
    Object.freeze(this);
  }

  /** An attribute-less, childless node, used where a lookup found nothing. */
  static empty(tag = 'Empty'): AttributeNode {
    return new AttributeNode(tag);
  }

  /** Exact-name attribute lookup; `null` when the attribute is absent. */
  attr(name: string): string | null {
    return Object.hasOwn(this.attributes, name) ? (this.attributes[name] ?? null) : null;
  }

  /** First direct child with the given tag. */
  find(tag: string): AttributeNode | null {
    return this.children.find((child) => child.tag === tag) ?? null;
  }

  findAll(tag: string): AttributeNode[] {
    return this.children.filter((child) => child.tag === tag);
  }

  /**
   * Breadth-first walk starting at this node (included), yielding every
   * node, or only those whose tag equals `tag` when given.
   */
  *bfs(tag?: string): Generator<AttributeNode> {
    const queue: AttributeNode[] = [this];
    for (let head = 0; head < queue.length; head++) {
      const node = queue[head];
      if (node === undefined) break;
      if (tag === undefined || node.tag === tag) yield node;
      queue.push(...node.children);
    }
  }
}
