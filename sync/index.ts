export { Collection, type CollectionOptions } from './collection';
export { SyncNode } from './syncNode';
export { traverseTree, formatTree, type Visitor, type VisitContext, type NodeSource } from './traverse';
export { assignTypes, classifyFavoringBoards, classifyFavoringSections, promoteBoardGroup } from './assignTypes';
export { insertNodes, insertContentNodes, contentBoardId, contentCardId } from './insertNodes';
export { normalizeCardContent, copyLocalFile, type NormalizeSession, type FileCopier } from './normalizeContent';
export { cleanUpHtml } from './cleanHtml';
export { urlToId, slugify } from './ids';
export { resolveUrl, isLocal, canonicalUrl } from './urls';
export { EventLog, type SyncEvent } from './eventLog';
export { loadConfig, type SyncConfig } from './config';
export { loadManifest, readManifest, type Manifest } from './manifest';
export { runSync, type RunSyncOptions, type RunSyncResult } from './pipeline';
export { makeBoardGroupRecord, makeBoardRecord, makeCardRecord, makeCollectionRecord, makeItemsList } from './export/records';
export { writeCollection, clearDir } from './export/writeFiles';
export { zipCollection } from './export/archive';
export { KnowledgeBaseClient, type UploadMode, type UploadTarget, type UploadResponse } from './export/uploader';
export * from './errors';
export * from './types';
