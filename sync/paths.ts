import path from 'path';
import { idToFilename } from './ids';

export interface CollectionPaths {
  contentDir: string;
  resourceDir: string;
  zipPath: string;
  csvPath: string;
  collectionYaml: string;
  cardYaml(id: string): string;
  cardHtml(id: string): string;
  boardYaml(id: string): string;
  boardGroupYaml(id: string): string;
}

export function collectionPaths(folder: string, collectionId: string): CollectionPaths {
  const contentDir = path.join(folder, collectionId);
  return {
    contentDir,
    resourceDir: path.join(contentDir, 'resources'),
    zipPath: path.join(folder, `collection_${collectionId}.zip`),
    csvPath: path.join(contentDir, 'log.csv'),
    collectionYaml: path.join(contentDir, 'collection.yaml'),
    cardYaml: id => path.join(contentDir, 'cards', `${idToFilename(id)}.yaml`),
    cardHtml: id => path.join(contentDir, 'cards', `${idToFilename(id)}.html`),
    boardYaml: id => path.join(contentDir, 'boards', `${idToFilename(id)}.yaml`),
    boardGroupYaml: id => path.join(contentDir, 'board-groups', `${idToFilename(id)}.yaml`),
  };
}
