import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { Collection, type CollectionOptions } from './collection';
import { InvalidInputError } from './errors';

const ManifestItemSchema = z
  .object({
    id: z.union([z.string(), z.number()]).optional(),
    url: z.string().optional(),
    title: z.string().optional(),
    content: z.string().optional(),
    contentPath: z.string().optional(),
    description: z.string().optional(),
    tags: z.array(z.string()).optional(),
    children: z.array(z.string()).optional(),
  })
  .refine(item => item.id !== undefined || !!item.url, { message: 'every item needs an id or a url' });

export const ManifestSchema = z.object({
  id: z.string().optional(),
  title: z.string().optional(),
  items: z.array(ManifestItemSchema),
});

export type Manifest = z.infer<typeof ManifestSchema>;

/**
 * Read and validate a manifest file
 * @param manifestPath - Path to the JSON manifest
 * @returns The parsed manifest
 */
export function readManifest(manifestPath: string): Manifest {
  const raw: unknown = JSON.parse(fs.readFileSync(manifestPath, 'utf-8'));
  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidInputError(`Invalid manifest ${manifestPath}: ${issue?.path.join('.')} ${issue?.message}`);
  }
  return parsed.data;
}

/**
 * Builds a collection from a manifest. `children` entries name another
 * item's id, or a url for a page that hasn't been seen yet. `contentPath` is
 * read relative to `baseDir`.
 * @param manifest - Parsed manifest
 * @param baseDir - Folder `contentPath` entries are relative to
 * @param options - Collection options other than id and title
 * @returns The populated, not yet finalized, collection
 */
export function loadManifest(
  manifest: Manifest,
  baseDir: string,
  options: Omit<CollectionOptions, 'id' | 'title'> = {}
): Collection {
  const collection = new Collection({ ...options, id: manifest.id, title: manifest.title });

  const nodes = manifest.items.map(item => {
    const content = item.contentPath
      ? fs.readFileSync(path.resolve(baseDir, item.contentPath), 'utf-8')
      : item.content;
    return collection.upsert({
      id: item.id,
      url: item.url,
      title: item.title,
      content,
      description: item.description,
      tags: item.tags,
    });
  });

  manifest.items.forEach((item, index) => {
    for (const ref of item.children ?? []) {
      const child = collection.lookup(ref) ?? collection.upsert({ url: ref });
      collection.addChild(nodes[index], child);
    }
  });

  return collection;
}
