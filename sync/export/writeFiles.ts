import fs from 'fs';
import path from 'path';
import * as yaml from 'yaml';
import type { Collection } from '../collection';
import { NodeType } from '../types';
import { makeBoardGroupRecord, makeBoardRecord, makeCardRecord, makeCollectionRecord } from './records';

function writeFile(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, 'utf-8');
}

export function clearDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
  fs.mkdirSync(dir, { recursive: true });
}

/**
 * Writes a .yaml file per card, board and board group, the card HTML next to
 * the card's .yaml, and collection.yaml at the root.
 * @param collection - A finalized collection
 * @returns Paths of every file written
 */
export function writeCollection(collection: Collection): string[] {
  const { paths } = collection;
  const written: string[] = [];
  const write = (filePath: string, content: string) => {
    writeFile(filePath, content);
    written.push(filePath);
  };

  for (const node of collection.nodes()) {
    if (node.type === NodeType.CARD) {
      write(paths.cardYaml(node.id), yaml.stringify(makeCardRecord(node)));
      write(paths.cardHtml(node.id), node.content);
    } else if (node.type === NodeType.BOARD) {
      write(paths.boardYaml(node.id), yaml.stringify(makeBoardRecord(node, collection)));
    } else if (node.type === NodeType.BOARD_GROUP) {
      write(paths.boardGroupYaml(node.id), yaml.stringify(makeBoardGroupRecord(node, collection)));
    }
  }

  write(paths.collectionYaml, yaml.stringify(makeCollectionRecord(collection.title, collection.nodes())));
  collection.log.record('wrote collection files', { count: written.length, dir: paths.contentDir });
  return written;
}
