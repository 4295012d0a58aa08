#!/usr/bin/env node
import path from 'path';
import { parseArgs } from 'util';
import dotenv from 'dotenv';
import { loadConfig } from './config';
import { ConfigError } from './errors';
import { KnowledgeBaseClient, type UploadMode } from './export/uploader';
import { loadManifest, readManifest } from './manifest';
import { runSync, type RunSyncOptions } from './pipeline';
import type { ClassificationPolicy } from './types';

dotenv.config();

const USAGE = `Usage: content-sync <manifest.json> [--favor-sections] [--clear] [--upload <collection>] [--replace] [--tree]`;

export interface CommandLine {
  manifestPath?: string;
  favorSections: boolean;
  clear: boolean;
  /** Name of the remote collection to upload into. */
  upload?: string;
  mode: UploadMode;
  tree: boolean;
}

/**
 * Parse command-line flags. Uploads append unless `--replace` is given.
 * @param args - Arguments after the script name
 * @returns The parsed flags and manifest path
 */
export function parseCommandLine(args: string[]): CommandLine {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      'favor-sections': { type: 'boolean', default: false },
      clear: { type: 'boolean', default: false },
      upload: { type: 'string' },
      replace: { type: 'boolean', default: false },
      tree: { type: 'boolean', default: false },
    },
  });

  return {
    manifestPath: positionals[0],
    favorSections: values['favor-sections'] ?? false,
    clear: values.clear ?? false,
    upload: values.upload,
    mode: values.replace ? 'replace' : 'append',
    tree: values.tree ?? false,
  };
}

/**
 * Main entry point
 */
async function main() {
  const flags = parseCommandLine(process.argv.slice(2));
  const { manifestPath } = flags;
  if (!manifestPath) {
    console.error(USAGE);
    process.exit(1);
  }

  const config = loadConfig();
  const policy: ClassificationPolicy = flags.favorSections ? 'favor-sections' : config.policy;

  console.log(`Loading manifest: ${manifestPath}`);
  const manifest = readManifest(manifestPath);
  const collection = loadManifest(manifest, path.dirname(path.resolve(manifestPath)), {
    folder: config.folder,
    verbose: config.verbose,
  });
  console.log(`  - Collection: ${collection.id}`);
  console.log(`  - Items: ${manifest.items.length}`);

  let upload: RunSyncOptions['upload'];
  if (flags.upload) {
    if (!config.apiUrl) {
      throw new ConfigError('KB_API_URL must be set to upload');
    }
    upload = {
      client: new KnowledgeBaseClient({ baseUrl: config.apiUrl, token: config.apiToken }),
      name: flags.upload,
      mode: flags.mode,
    };
  }

  const result = await runSync(collection, { policy, clear: flags.clear, upload });

  if (flags.tree) {
    console.log('\n' + collection.formatTree());
  }

  console.log('\n' + '='.repeat(80));
  console.log('SYNC SUMMARY');
  console.log('='.repeat(80));
  console.log(`Nodes: ${collection.nodes().length}`);
  console.log(`Files written: ${result.files.length}`);
  console.log(`Resources: ${result.resources.size}`);
  console.log(`Archive: ${result.zipPath}`);
  if (result.upload) {
    console.log(`Upload: ${result.upload.status ?? 'submitted'}`);
  }
}

// Run if executed directly
if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
