import fs from 'fs';
import os from 'os';
import path from 'path';
import FormData from 'form-data';
import { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { UploadError } from '../errors';
import { KnowledgeBaseClient } from './uploader';

type Route = (config: InternalAxiosRequestConfig) => unknown;

/** An in-process stand-in for the API, keyed by "METHOD url". */
function fakeApi(routes: Record<string, Route>) {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    calls.push(config);
    const key = `${config.method?.toUpperCase()} ${config.url}`;
    const route = routes[key];
    if (!route) {
      const response = { data: { error: 'not found' }, status: 404, statusText: 'Not Found', headers: {}, config };
      throw new AxiosError('Request failed with status code 404', 'ERR_BAD_REQUEST', config, undefined, response);
    }
    return { data: route(config), status: 200, statusText: 'OK', headers: {}, config };
  };
  return { adapter, calls };
}

describe('KnowledgeBaseClient', () => {
  let tmp: string;
  let zipPath: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'content-sync-upload-'));
    zipPath = path.join(tmp, 'collection_docs.zip');
    fs.writeFileSync(zipPath, 'zip-bytes');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it('uploads into an existing collection found by name', async () => {
    const { adapter, calls } = fakeApi({
      'GET /collections': () => [
        { id: 'c-1', name: 'Engineering' },
        { id: 'c-2', name: 'Docs' },
      ],
      'POST /collections/c-2/imports': () => ({ id: 'job-1', status: 'queued' }),
    });
    const client = new KnowledgeBaseClient({ baseUrl: 'https://kb.example.com/api', token: 'test-token', adapter });

    const response = await client.upload(zipPath, { name: 'Docs', mode: 'replace' });

    expect(response).toEqual({ id: 'job-1', status: 'queued' });
    expect(calls.map(call => `${call.method} ${call.url}`)).toEqual(['get /collections', 'post /collections/c-2/imports']);
    expect(calls[0].headers.get('Authorization')).toBe('Bearer test-token');
    expect(calls[1].data).toBeInstanceOf(FormData);
  });

  it('creates the collection when none matches', async () => {
    const created: unknown[] = [];
    const { adapter, calls } = fakeApi({
      'GET /collections': () => [],
      'POST /collections': config => {
        created.push(JSON.parse(String(config.data)));
        return { id: 'c-9', name: 'Docs' };
      },
      'POST /collections/c-9/imports': () => ({ status: 'queued' }),
    });
    const client = new KnowledgeBaseClient({ baseUrl: 'https://kb.example.com/api', adapter });

    await client.upload(zipPath, { name: 'Docs', description: 'Team docs', mode: 'append' });

    expect(created).toEqual([{ name: 'Docs', description: 'Team docs', color: '', syncEnabled: false }]);
    expect(calls.map(call => call.url)).toEqual(['/collections', '/collections', '/collections/c-9/imports']);
    expect(calls[0].headers.get('Authorization')).toBeUndefined();
  });

  it('skips the lookup when given a collection id', async () => {
    const { adapter, calls } = fakeApi({
      'POST /collections/c-5/imports': () => ({ id: 'job-2' }),
    });
    const client = new KnowledgeBaseClient({ baseUrl: 'https://kb.example.com/api', adapter });

    await expect(client.upload(zipPath, { collectionId: 'c-5' })).resolves.toEqual({ id: 'job-2' });
    expect(calls).toHaveLength(1);
  });

  it('requires a collection name or id', async () => {
    const client = new KnowledgeBaseClient({ baseUrl: 'https://kb.example.com/api', adapter: fakeApi({}).adapter });

    await expect(client.upload(zipPath, {})).rejects.toThrow('A collection name or id is required to upload');
  });

  it('wraps request failures', async () => {
    const client = new KnowledgeBaseClient({ baseUrl: 'https://kb.example.com/api', adapter: fakeApi({}).adapter });

    const error = await client.findCollection('Docs').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UploadError);
    expect(error).toMatchObject({
      status: 404,
      message: 'GET /collections failed: Request failed with status code 404',
    });
  });

  it('rejects unexpected collection lists', async () => {
    const { adapter } = fakeApi({ 'GET /collections': () => ({ items: [] }) });
    const client = new KnowledgeBaseClient({ baseUrl: 'https://kb.example.com/api', adapter });

    await expect(client.findCollection('Docs')).rejects.toBeInstanceOf(UploadError);
  });
});
