import { traverseTree, type NodeSource } from './traverse';
import type { SyncNode } from './syncNode';
import { NodeType, type ClassificationPolicy } from './types';

/*
 * Only three levels below a root map onto board group > board > section >
 * card, anything deeper becomes a card. The two policies differ in how they
 * read a tree that's exactly three levels deep:
 *   favor-boards:   board group > board > card
 *   favor-sections: board > section > card
 */

const isLeaf = (node: SyncNode) => node.children.length === 0;

/**
 * Pre-order rule for favor-boards. Returns without changing anything when no
 * rule matches, the node keeps whatever type it was ingested with.
 */
export function classifyFavoringBoards(node: SyncNode, parent: SyncNode | undefined, depth: number): void {
  if (isLeaf(node) && !parent && node.content) {
    node.type = NodeType.CARD;
  } else if (depth === 0) {
    node.type = NodeType.BOARD;
  } else if (isLeaf(node)) {
    node.type = NodeType.CARD;
  } else if (depth > 2) {
    node.type = NodeType.CARD;
  } else if (!parent) {
    return;
  } else if (parent.type === NodeType.BOARD && depth === 1) {
    node.type = NodeType.BOARD;
    parent.type = NodeType.BOARD_GROUP;
  } else if (parent.type === NodeType.BOARD && depth === 2) {
    node.type = NodeType.SECTION;
  } else if (parent.type === NodeType.BOARD_GROUP) {
    node.type = NodeType.BOARD;
  }
}

export function classifyFavoringSections(node: SyncNode, parent: SyncNode | undefined, depth: number): void {
  if (isLeaf(node) && !parent && node.content) {
    node.type = NodeType.CARD;
  } else if (!isLeaf(node) && depth === 0) {
    node.type = NodeType.BOARD;
  } else if (isLeaf(node)) {
    node.type = NodeType.CARD;
  } else if (depth > 2) {
    node.type = NodeType.CARD;
  } else if (parent?.type === NodeType.BOARD && depth === 1) {
    node.type = NodeType.SECTION;
  } else if (parent?.type === NodeType.SECTION && depth === 2) {
    parent.type = NodeType.BOARD;
    node.type = NodeType.SECTION;
  } else {
    node.type = NodeType.CARD;
  }
}

/**
 * Post-order fix-up for favor-sections: a board that ended up holding another
 * board is really a board group.
 */
export function promoteBoardGroup(node: SyncNode, source: Pick<NodeSource, 'lookup'>): void {
  if (node.type !== NodeType.BOARD) return;

  for (const id of node.children) {
    if (source.lookup(id)?.type === NodeType.BOARD) {
      node.type = NodeType.BOARD_GROUP;
      return;
    }
  }
}

export function assignTypes(source: NodeSource, policy: ClassificationPolicy = 'favor-boards'): void {
  if (policy === 'favor-sections') {
    traverseTree(
      source,
      (node, parent, depth, { post }) => {
        if (post) {
          promoteBoardGroup(node, source);
        } else {
          classifyFavoringSections(node, parent, depth);
        }
      },
      { post: true, acc: undefined }
    );
  } else {
    traverseTree(
      source,
      (node, parent, depth, { post }) => {
        if (!post) classifyFavoringBoards(node, parent, depth);
      },
      { post: true, acc: undefined }
    );
  }
}
