import type { NodeSource } from '../traverse';
import type { SyncNode } from '../syncNode';
import {
  NodeType,
  type BoardGroupRecord,
  type BoardItem,
  type BoardRecord,
  type CardRecord,
  type CollectionItem,
  type CollectionRecord,
} from '../types';

/**
 * A board's item list. Cards nested under cards are flattened into the list
 * right after their parent, sections carry their own items and nested boards
 * are referenced by id.
 */
export function makeItemsList(node: SyncNode, source: Pick<NodeSource, 'lookup'>): BoardItem[] {
  const items: BoardItem[] = [];
  for (const id of node.children) {
    const child = source.lookup(id);
    if (!child) continue;

    if (child.type === NodeType.CARD) {
      items.push({ ID: child.id, Type: 'card' });
      items.push(...makeItemsList(child, source));
    } else if (child.type === NodeType.SECTION) {
      items.push({ Type: 'section', Title: child.title, Items: makeItemsList(child, source) });
    } else if (child.type === NodeType.BOARD) {
      items.push(child.id);
    }
  }
  return items;
}

export function makeCardRecord(node: SyncNode): CardRecord {
  const record: CardRecord = { Title: node.title, ExternalId: node.id };
  if (node.url) record.ExternalUrl = node.url;
  if (node.tags.size > 0) record.Tags = [...node.tags];
  return record;
}

export function makeBoardRecord(node: SyncNode, source: Pick<NodeSource, 'lookup'>): BoardRecord {
  const record: BoardRecord = {
    Title: node.title,
    ExternalId: node.id,
    Items: makeItemsList(node, source),
  };
  if (node.url) record.ExternalUrl = node.url;
  if (node.description) record.Description = node.description;
  return record;
}

export function makeBoardGroupRecord(node: SyncNode, source: Pick<NodeSource, 'lookup'>): BoardGroupRecord {
  const boards = node.children.filter(id => source.lookup(id)?.type === NodeType.BOARD);
  const record: BoardGroupRecord = { Title: node.title, ExternalId: node.id, Boards: boards };
  if (node.description) record.Description = node.description;
  return record;
}

/** Top-level boards and groups, plus every card tag in first-seen order. */
export function makeCollectionRecord(title: string, nodes: readonly SyncNode[]): CollectionRecord {
  const items: CollectionItem[] = [];
  const tags = new Set<string>();

  for (const node of nodes) {
    if (node.type === NodeType.BOARD && node.parents.length === 0) {
      items.push({ ID: node.id, Type: 'board', Title: node.title });
    } else if (node.type === NodeType.BOARD_GROUP) {
      items.push({ ID: node.id, Type: 'section', Title: node.title });
    } else if (node.type === NodeType.CARD) {
      node.tags.forEach(tag => tags.add(tag));
    }
  }

  return { Title: title, Items: items, Tags: [...tags] };
}
