export const NodeType = {
  NONE: 'NONE',
  BOARD_GROUP: 'BOARD_GROUP',
  BOARD: 'BOARD',
  SECTION: 'SECTION',
  CARD: 'CARD',
} as const;

export type NodeType = (typeof NodeType)[keyof typeof NodeType];

export type ClassificationPolicy = 'favor-boards' | 'favor-sections';

/**
 * Decides whether an href should be rewritten to the card with the given url.
 * Called with the other node's origin url and the link's absolute address.
 */
export type LinkComparator = (nodeUrl: string, absoluteUrl: string) => boolean;

/**
 * Fetches `absoluteUrl` into `destPath`. Returning true means the file was
 * written and references should point at the local copy.
 */
export type Downloader = (absoluteUrl: string, destPath: string) => boolean;

export interface UpsertInput {
  id?: string | number;
  url?: string;
  title?: string;
  content?: string;
  description?: string;
  tags?: Iterable<string>;
  type?: NodeType;
  cleanHtml?: boolean;
}

export interface FinalizeOptions {
  policy?: ClassificationPolicy;
  downloader?: Downloader;
  linkComparator?: LinkComparator;
}

export interface FinalizeResult {
  nodes: SyncNodeView[];
  resources: Map<string, string>;
}

export interface SyncNodeView {
  readonly id: string;
  readonly url: string;
  readonly title: string;
  readonly description: string;
  readonly tags: ReadonlySet<string>;
  readonly content: string;
  readonly children: readonly string[];
  readonly parents: readonly string[];
  readonly type: NodeType;
}

// Records handed to the serializer

export interface CardItem {
  ID: string;
  Type: 'card';
}

export interface SectionItem {
  Type: 'section';
  Title: string;
  Items: BoardItem[];
}

export type BoardItem = CardItem | SectionItem | string;

export interface CardRecord {
  Title: string;
  ExternalId: string;
  ExternalUrl?: string;
  Tags?: string[];
}

export interface BoardRecord {
  Title: string;
  ExternalId: string;
  ExternalUrl?: string;
  Description?: string;
  Items: BoardItem[];
}

export interface BoardGroupRecord {
  Title: string;
  ExternalId: string;
  Description?: string;
  Boards: string[];
}

export interface CollectionItem {
  ID: string;
  Type: 'board' | 'section';
  Title: string;
}

export interface CollectionRecord {
  Title: string;
  Items: CollectionItem[];
  Tags: string[];
}
