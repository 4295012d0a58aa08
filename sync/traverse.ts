import type { SyncNode } from './syncNode';

export interface NodeSource {
  nodes(): readonly SyncNode[];
  lookup(id: string): SyncNode | undefined;
}

export interface VisitContext<T> {
  post: boolean;
  acc: T;
}

export type Visitor<T> = (
  node: SyncNode,
  parent: SyncNode | undefined,
  depth: number,
  context: VisitContext<T>
) => void;

export interface TraverseOptions<T> {
  /** Call the visitor a second time, with `post: true`, after a node's subtree. */
  post?: boolean;
  acc: T;
}

/**
 * Walks the tree below every node that has no parent, in registry order.
 * Children are read after the visitor runs, so nodes it inserts are visited.
 */
export function traverseTree<T>(source: NodeSource, visit: Visitor<T>, options: TraverseOptions<T>): T {
  const post = options.post ?? false;

  const walk = (node: SyncNode, parent: SyncNode | undefined, depth: number) => {
    visit(node, parent, depth, { post: false, acc: options.acc });
    for (const id of [...node.children]) {
      const child = source.lookup(id);
      if (child) {
        walk(child, node, depth + 1);
      }
    }
    if (post) {
      visit(node, parent, depth, { post: true, acc: options.acc });
    }
  };

  for (const node of source.nodes()) {
    if (node.parents.length === 0) {
      walk(node, undefined, 0);
    }
  }
  return options.acc;
}

export interface FormatTreeOptions {
  justTypes?: boolean;
}

/** Indented outline of the tree, one line per visit. */
export function formatTree(source: NodeSource, options: FormatTreeOptions = {}): string {
  const lines = traverseTree<string[]>(
    source,
    (node, _parent, depth, { acc }) => {
      const indent = '  '.repeat(Math.min(3, depth));
      if (options.justTypes) {
        acc.push(`${indent}- ${node.type}`);
      } else if (node.url) {
        acc.push(`${indent}- ${node.label} (${node.type}, url=${node.url})`);
      } else {
        acc.push(`${indent}- ${node.label} (${node.type})`);
      }
    },
    { acc: [] }
  );
  return lines.join('\n');
}
