import fs from 'fs';
import path from 'path';
import AdmZip from 'adm-zip';
import type { EventLog } from '../eventLog';

function listFiles(dir: string): string[] {
  const files: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...listFiles(fullPath));
    } else if (entry.isFile() && !entry.name.startsWith('.')) {
      files.push(fullPath);
    }
  }
  return files;
}

/**
 * Bundles everything under `contentDir` (hidden files excluded) into a zip at
 * `zipPath`. Entries are stored relative to `contentDir`.
 * @param contentDir - Folder to bundle
 * @param zipPath - Where the archive is written
 * @param log - Receives one event per file added
 * @returns Path of the written archive
 */
export function zipCollection(contentDir: string, zipPath: string, log?: EventLog): string {
  const zip = new AdmZip();

  for (const file of listFiles(contentDir)) {
    const entryPath = path.relative(contentDir, file).split(path.sep).join('/');
    log?.record('add file to zip', { file: path.basename(file), zip_path: entryPath });
    zip.addFile(entryPath, fs.readFileSync(file));
  }

  fs.mkdirSync(path.dirname(zipPath), { recursive: true });
  zip.writeZip(zipPath);
  return zipPath;
}
