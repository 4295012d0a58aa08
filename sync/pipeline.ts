import type { Collection } from './collection';
import { zipCollection } from './export/archive';
import type { KnowledgeBaseClient, UploadResponse, UploadTarget } from './export/uploader';
import { clearDir, writeCollection } from './export/writeFiles';
import type { FinalizeOptions } from './types';

export interface RunSyncOptions extends FinalizeOptions {
  /** Empty the collection's folder before anything is written to it. */
  clear?: boolean;
  upload?: UploadTarget & { client: KnowledgeBaseClient };
}

export interface RunSyncResult {
  zipPath: string;
  resources: Map<string, string>;
  files: string[];
  upload?: UploadResponse;
}

/**
 * Wraps up an import once every node has been added:
 * 1. finalize (types, inserted nodes, HTML cleanup, resources)
 * 2. write the .yaml and .html files
 * 3. zip them up
 * 4. write the event log
 * 5. optionally upload the archive
 * @param collection - Collection with every node added
 * @param options - Finalize options plus `clear` and the upload target
 * @returns Archive path, resources, written files and the upload response
 */
export async function runSync(collection: Collection, options: RunSyncOptions = {}): Promise<RunSyncResult> {
  const { clear, upload, ...finalizeOptions } = options;

  if (clear) {
    clearDir(collection.paths.contentDir);
  }

  console.log(`Step 1: Finalizing ${collection.nodes().length} nodes...`);
  const { resources } = collection.finalize(finalizeOptions);

  console.log('Step 2: Writing files...');
  const files = writeCollection(collection);

  console.log('Step 3: Building archive...');
  const zipPath = zipCollection(collection.paths.contentDir, collection.paths.zipPath, collection.log);
  console.log(`Archive saved to: ${zipPath}`);

  collection.log.writeCsv(collection.paths.csvPath);

  if (!upload) {
    return { zipPath, resources, files };
  }

  console.log('Step 4: Uploading...');
  const { client, ...target } = upload;
  const response = await client.upload(zipPath, target);
  return { zipPath, resources, files, upload: response };
}
