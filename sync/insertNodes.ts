import { traverseTree, type NodeSource } from './traverse';
import type { SyncNode } from './syncNode';
import { NodeType, type UpsertInput } from './types';

export interface TreeEditor extends NodeSource {
  upsert(input: UpsertInput): SyncNode;
  addChild(parent: SyncNode, child: SyncNode, atFront?: boolean): void;
  moveTo(node: SyncNode, newParent: SyncNode): void;
}

export const contentCardId = (id: string) => `${id}_content`;
export const contentBoardId = (id: string) => `${id}_content_board`;

/**
 * Containers can't show content, so when a board group, board or section
 * still has some we give it a place to go:
 *  - board group: a "<title> Content" board holding a card with the content
 *  - board or section: a card with the content as its first child
 * A card sitting directly in a board group is wrapped in a board of its own.
 */
export function insertContentNodes(editor: TreeEditor, node: SyncNode, parent: SyncNode | undefined): void {
  if (node.content && node.type === NodeType.BOARD_GROUP) {
    const board = editor.upsert({
      id: contentBoardId(node.id),
      url: node.url,
      title: `${node.title} Content`,
      type: NodeType.BOARD,
    });
    editor.addChild(node, board, true);

    const card = editor.upsert({
      id: contentCardId(node.id),
      url: node.url,
      title: node.title,
      content: node.content,
      type: NodeType.CARD,
      cleanHtml: false,
    });
    editor.addChild(board, card, true);
  } else if (node.content && (node.type === NodeType.BOARD || node.type === NodeType.SECTION)) {
    const card = editor.upsert({
      id: contentCardId(node.id),
      url: node.url,
      title: node.title,
      content: node.content,
      type: NodeType.CARD,
      cleanHtml: false,
    });
    editor.addChild(node, card, true);
  } else if (node.type === NodeType.CARD && parent?.type === NodeType.BOARD_GROUP) {
    // Groups may only hold boards. Typing can leave a leaf directly under a
    // group when one of its siblings got promoted, so wrap it.
    const board = editor.upsert({
      id: contentBoardId(node.id),
      title: `${node.title} Content`,
      type: NodeType.BOARD,
    });
    editor.moveTo(node, board);
    editor.addChild(parent, board, true);
  }
}

export function insertNodes(editor: TreeEditor): void {
  traverseTree(editor, (node, parent) => insertContentNodes(editor, node, parent), { acc: undefined });
}
