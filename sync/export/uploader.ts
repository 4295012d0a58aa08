import fs from 'fs';
import path from 'path';
import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import FormData from 'form-data';
import { z } from 'zod';
import { UploadError } from '../errors';

export type UploadMode = 'replace' | 'append';

export interface KnowledgeBaseClientOptions {
  baseUrl: string;
  token?: string;
  /** Swaps out how requests are sent, mostly for tests. */
  adapter?: AxiosRequestConfig['adapter'];
}

export interface UploadTarget {
  /** Collection to upload into, created if no collection has this name. */
  name?: string;
  collectionId?: string;
  mode?: UploadMode;
  description?: string;
  color?: string;
}

const RemoteCollectionSchema = z.object({
  id: z.string(),
  name: z.string(),
});

const UploadResponseSchema = z
  .object({
    id: z.string().optional(),
    status: z.string().optional(),
  })
  .passthrough();

export type RemoteCollection = z.infer<typeof RemoteCollectionSchema>;
export type UploadResponse = z.infer<typeof UploadResponseSchema>;

/**
 * Talks to the knowledge-base API: finds or creates the target collection and
 * uploads a collection archive to it.
 */
export class KnowledgeBaseClient {
  private readonly http: AxiosInstance;

  constructor(options: KnowledgeBaseClientOptions) {
    this.http = axios.create({
      baseURL: options.baseUrl,
      headers: options.token ? { Authorization: `Bearer ${options.token}` } : {},
      adapter: options.adapter,
    });
  }

  async findCollection(name: string): Promise<RemoteCollection | undefined> {
    const data = await this.request<unknown>({ method: 'get', url: '/collections' });
    const collections = z.array(RemoteCollectionSchema).safeParse(data);
    if (!collections.success) {
      throw new UploadError(`Unexpected collection list: ${collections.error.message}`);
    }
    return collections.data.find(collection => collection.name === name);
  }

  async createCollection(target: { name: string; description?: string; color?: string; sync: boolean }) {
    const data = await this.request<unknown>({
      method: 'post',
      url: '/collections',
      data: {
        name: target.name,
        description: target.description ?? '',
        color: target.color ?? '',
        syncEnabled: target.sync,
      },
    });
    const collection = RemoteCollectionSchema.safeParse(data);
    if (!collection.success) {
      throw new UploadError(`Unexpected response creating collection '${target.name}'`);
    }
    console.log(`Created collection: ${collection.data.name} (${collection.data.id})`);
    return collection.data;
  }

  /**
   * Upload an archive into an existing collection
   * @param zipPath - Archive to upload
   * @param collectionId - Remote collection id
   * @param mode - Replace the collection's content or append to it
   * @returns The import job reported by the API
   */
  async uploadArchive(zipPath: string, collectionId: string, mode: UploadMode = 'append'): Promise<UploadResponse> {
    const formData = new FormData();
    formData.append('file', fs.readFileSync(zipPath), {
      filename: path.basename(zipPath),
      contentType: 'application/zip',
    });
    formData.append('mode', mode);

    console.log(`Uploading ${path.basename(zipPath)} to collection ${collectionId} (${mode})`);
    const data = await this.request<unknown>({
      method: 'post',
      url: `/collections/${encodeURIComponent(collectionId)}/imports`,
      data: formData,
      headers: formData.getHeaders(),
      maxContentLength: Infinity,
      maxBodyLength: Infinity,
    });
    return UploadResponseSchema.parse(data ?? {});
  }

  /**
   * Uploads the archive into the collection with the given id, or the one
   * matching `name` (creating it when there isn't one yet).
   * @param zipPath - Archive to upload
   * @param target - Collection name or id, and the import mode (default: append)
   * @returns The import job reported by the API
   */
  async upload(zipPath: string, target: UploadTarget): Promise<UploadResponse> {
    const mode = target.mode ?? 'append';
    let collectionId = target.collectionId;

    if (!collectionId && target.name) {
      const existing = await this.findCollection(target.name);
      collectionId = existing
        ? existing.id
        : (
            await this.createCollection({
              name: target.name,
              description: target.description,
              color: target.color,
              sync: mode === 'replace',
            })
          ).id;
    }

    if (!collectionId) {
      throw new UploadError('A collection name or id is required to upload');
    }
    return this.uploadArchive(zipPath, collectionId, mode);
  }

  private async request<T>(config: AxiosRequestConfig): Promise<T> {
    try {
      const response = await this.http.request<T>(config);
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new UploadError(
          `${config.method?.toUpperCase()} ${config.url} failed: ${error.message}`,
          error.response?.status
        );
      }
      throw error;
    }
  }
}
