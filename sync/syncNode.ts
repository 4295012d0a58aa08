import { NodeType, type SyncNodeView } from './types';

/**
 * One page, folder or piece of content. Edges are kept as id lists so the
 * owning Collection can look nodes up, check for cycles and rewire them.
 */
export class SyncNode implements SyncNodeView {
  url = '';
  title = '';
  description = '';
  tags = new Set<string>();
  content = '';
  children: string[] = [];
  parents: string[] = [];
  type: NodeType = NodeType.NONE;

  constructor(readonly id: string) {}

  get label(): string {
    return this.title || this.id;
  }
}
