import fs from 'fs';
import os from 'os';
import path from 'path';
import AdmZip from 'adm-zip';
import type { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { Collection } from './collection';
import { KnowledgeBaseClient } from './export/uploader';
import { runSync } from './pipeline';

describe('runSync', () => {
  let tmp: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'content-sync-run-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  function collectionWithPage() {
    const collection = new Collection({ id: 'kb', folder: tmp });
    collection.upsert({ id: 'page', title: 'Page', url: 'https://example.com/page', content: '<img src="/a.png">' });
    return collection;
  }

  it('finalizes, writes, zips and logs', async () => {
    const collection = collectionWithPage();
    fs.mkdirSync(path.join(tmp, 'kb'), { recursive: true });
    fs.writeFileSync(path.join(tmp, 'kb', 'stale.yaml'), 'old');

    const result = await runSync(collection, { clear: true, downloader: () => false });

    expect(result.zipPath).toBe(path.join(tmp, 'collection_kb.zip'));
    expect(result.upload).toBeUndefined();
    const names = new AdmZip(result.zipPath)
      .getEntries()
      .map(entry => entry.entryName)
      .sort();
    expect(names).toEqual(['cards/page.html', 'cards/page.yaml', 'collection.yaml']);
    expect(fs.readFileSync(path.join(tmp, 'kb', 'cards', 'page.html'), 'utf-8')).toBe(
      '<img src="https://example.com/a.png">'
    );
    expect(fs.readFileSync(path.join(tmp, 'kb', 'log.csv'), 'utf-8')).toContain('did not download');
  });

  it('uploads the archive when a target is given', async () => {
    const urls: string[] = [];
    const adapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      urls.push(`${config.method} ${config.url}`);
      return { data: { id: 'job-7', status: 'queued' }, status: 200, statusText: 'OK', headers: {}, config };
    };
    const client = new KnowledgeBaseClient({ baseUrl: 'https://kb.example.com/api', adapter });

    const result = await runSync(collectionWithPage(), { upload: { client, collectionId: 'c-1', mode: 'replace' } });

    expect(urls).toEqual(['post /collections/c-1/imports']);
    expect(result.upload).toEqual({ id: 'job-7', status: 'queued' });
  });
});
