import os from 'os';
import { assignTypes } from './assignTypes';
import { cleanUpHtml } from './cleanHtml';
import { CycleError, FinalizedError, InvalidInputError } from './errors';
import { EventLog } from './eventLog';
import { slugify, truncateTitle, urlToId } from './ids';
import { insertNodes, type TreeEditor } from './insertNodes';
import { normalizeCardContent, type FileCopier } from './normalizeContent';
import { collectionPaths, type CollectionPaths } from './paths';
import { SyncNode } from './syncNode';
import { formatTree, type FormatTreeOptions } from './traverse';
import type { FinalizeOptions, FinalizeResult, UpsertInput } from './types';

export interface CollectionOptions {
  id?: string;
  title?: string;
  /** Parent folder for the collection's files, defaults to the OS temp dir. */
  folder?: string;
  verbose?: boolean;
  eventLog?: EventLog;
  /** Used for local resources when no downloader is given. */
  copyFile?: FileCopier;
}

type CollectionState = 'open' | 'finalizing' | 'finalized';

/**
 * Owns every node of an import. Nodes are added with `upsert()` as they're
 * discovered, wired together with `addChild()`, and `finalize()` turns the
 * result into board groups, boards, sections and cards.
 */
export class Collection implements TreeEditor {
  readonly id: string;
  readonly title: string;
  readonly paths: CollectionPaths;
  readonly log: EventLog;

  private readonly registry = new Map<string, SyncNode>();
  private readonly copyFile?: FileCopier;
  private state: CollectionState = 'open';

  constructor(options: CollectionOptions = {}) {
    this.id = options.id ? slugify(options.id) : String(Math.floor(Date.now() / 1000));
    this.title = options.title || this.id;
    this.paths = collectionPaths(options.folder ?? os.tmpdir(), this.id);
    this.log = options.eventLog ?? new EventLog({ verbose: options.verbose });
    this.copyFile = options.copyFile;
  }

  get isFinalized(): boolean {
    return this.state === 'finalized';
  }

  /**
   * Creates the node or updates the existing one. You may know a page's url
   * and title (e.g. from a link on its parent) before you have its content,
   * so calling this again later fills in whatever is still missing. Empty
   * values never overwrite what's already there.
   * @param input - Fields to set; needs an id or a url
   * @returns The created or updated node
   */
  upsert(input: UpsertInput): SyncNode {
    this.assertOpen('add nodes');

    let id = input.id != null ? String(input.id) : '';
    if (!id && input.url) {
      id = urlToId(input.url, false);
    }
    if (!id) {
      throw new InvalidInputError('A node needs an id or a url');
    }

    let node = this.registry.get(id);
    if (!node) {
      node = new SyncNode(id);
      this.registry.set(id, node);
    }

    const title = input.title ? truncateTitle(input.title) : '';
    const tags = input.tags ? new Set(input.tags) : undefined;

    if (input.url) node.url = input.url;
    if (title) node.title = title;
    if (input.description) node.description = input.description;
    if (input.content) {
      node.content = input.cleanHtml === false ? input.content : cleanUpHtml(input.content);
    }
    if (input.type) node.type = input.type;
    if (tags && tags.size > 0) node.tags = tags;

    return node;
  }

  lookup(id: string): SyncNode | undefined {
    return this.registry.get(id);
  }

  exists(id: string): boolean {
    return this.registry.has(id);
  }

  nodes(): SyncNode[] {
    return Array.from(this.registry.values());
  }

  /**
   * Adds `child` to the end of `parent`'s children, or the front with
   * `atFront`. Adding the same child twice does nothing.
   * @param parent - Node to add to
   * @param child - Node to add; must not be `parent` or one of its ancestors
   * @param atFront - Insert before the existing children (default: false)
   */
  addChild(parent: SyncNode, child: SyncNode, atFront: boolean = false): void {
    this.assertOpen('change the tree');

    if (parent.id === child.id || this.ancestors(parent).some(ancestor => ancestor.id === child.id)) {
      throw new CycleError(
        parent.id,
        child.id,
        `adding '${child.label}' as a child of '${parent.label}' would create a cycle`
      );
    }

    if (parent.children.includes(child.id)) {
      return;
    }

    child.parents.push(parent.id);
    if (atFront) {
      parent.children.unshift(child.id);
    } else {
      parent.children.push(child.id);
    }
  }

  /** Breadth-first; a node reachable along several paths is listed once per path. */
  ancestors(node: SyncNode): SyncNode[] {
    const result: SyncNode[] = [];
    const queue = [...node.parents];
    while (queue.length > 0) {
      const id = queue.shift();
      const ancestor = id !== undefined ? this.registry.get(id) : undefined;
      if (ancestor) {
        result.push(ancestor);
        queue.push(...ancestor.parents);
      }
    }
    return result;
  }

  detach(node: SyncNode): void {
    this.assertOpen('change the tree');

    for (const parentId of node.parents) {
      const parent = this.registry.get(parentId);
      if (parent) {
        parent.children = parent.children.filter(id => id !== node.id);
      }
    }
    node.parents = [];
  }

  moveTo(node: SyncNode, newParent: SyncNode): void {
    this.detach(node);
    this.addChild(newParent, node);
  }

  /**
   * Types every node, inserts nodes for content that landed on containers and
   * rewrites card HTML. A collection can only be finalized once.
   * @param options - Classification policy, downloader and link comparator
   * @returns Every node and the resources written, keyed by resource id
   */
  finalize(options: FinalizeOptions = {}): FinalizeResult {
    if (this.state !== 'open') {
      throw new FinalizedError(this.id, 'finalize again');
    }
    this.state = 'finalizing';

    try {
      assignTypes(this, options.policy ?? 'favor-boards');
      insertNodes(this);

      const nodes = this.nodes();
      const resources = new Map<string, string>();
      const session = {
        nodes,
        resources,
        resourceDir: this.paths.resourceDir,
        log: this.log,
        downloader: options.downloader,
        linkComparator: options.linkComparator,
        copyFile: this.copyFile,
      };

      nodes.forEach((node, index) => {
        this.log.record(`post-processing node ${index + 1} / ${nodes.length}`, { node: node.id });
        normalizeCardContent(node, session);
      });

      return { nodes, resources };
    } finally {
      this.state = 'finalized';
    }
  }

  formatTree(options: FormatTreeOptions = {}): string {
    return formatTree(this, options);
  }

  private assertOpen(action: string): void {
    if (this.state === 'finalized') {
      throw new FinalizedError(this.id, action);
    }
  }
}
