import { describe, it, expect } from 'vitest';
import { Collection } from './collection';
import { CycleError, FinalizedError, InvalidInputError } from './errors';
import { NodeType } from './types';

describe('Collection.upsert', () => {
  it('derives the id from the url when no id is given', () => {
    const collection = new Collection({ id: 'test' });
    const node = collection.upsert({ url: 'https://example.com/docs/page', title: 'Page' });

    expect(node.id).toBe('8409c83648adfc06acd023ca7cc7ec9e');
    expect(collection.upsert({ url: 'https://example.com/docs/page' })).toBe(node);
    expect(collection.nodes()).toHaveLength(1);
  });

  it('fills in missing fields without overwriting them with empty values', () => {
    const collection = new Collection({ id: 'test' });
    collection.upsert({ id: 'a', title: 'First', url: 'https://example.com/a', tags: ['b', 'a', 'b'] });
    const node = collection.upsert({ id: 'a', title: '', content: '<p>Body</p>', description: 'About a' });

    expect(node.title).toBe('First');
    expect(node.url).toBe('https://example.com/a');
    expect(node.content).toBe('<p>Body</p>');
    expect(node.description).toBe('About a');
    expect([...node.tags]).toEqual(['b', 'a']);
    expect(node.type).toBe(NodeType.NONE);
  });

  it('cleans content unless asked not to', () => {
    const collection = new Collection({ id: 'test' });
    expect(collection.upsert({ id: 'a', content: '<p class="x">A</p>' }).content).toBe('<p>A</p>');
    expect(collection.upsert({ id: 'b', content: '<p class="x">B</p>', cleanHtml: false }).content).toBe(
      '<p class="x">B</p>'
    );
  });

  it('accepts numeric ids and truncates long titles', () => {
    const collection = new Collection({ id: 'test' });
    const node = collection.upsert({ id: 42, title: 'y'.repeat(300) });

    expect(node.id).toBe('42');
    expect(node.title).toHaveLength(200);
    expect(collection.exists('42')).toBe(true);
    expect(collection.lookup('43')).toBeUndefined();
  });

  it('requires an id or a url', () => {
    const collection = new Collection({ id: 'test' });
    expect(() => collection.upsert({ title: 'Orphan' })).toThrow(InvalidInputError);
  });
});

describe('Collection tree operations', () => {
  const chain = () => {
    const collection = new Collection({ id: 'test' });
    const a = collection.upsert({ id: 'a' });
    const b = collection.upsert({ id: 'b' });
    const c = collection.upsert({ id: 'c' });
    collection.addChild(a, b);
    collection.addChild(b, c);
    return { collection, a, b, c };
  };

  it('rejects cycles without changing anything', () => {
    const { collection, a, b, c } = chain();

    expect(() => collection.addChild(c, a)).toThrow(CycleError);
    expect(() => collection.addChild(b, b)).toThrow(CycleError);
    expect(c.children).toEqual([]);
    expect(b.children).toEqual(['c']);
    expect(a.parents).toEqual([]);
  });

  it('adds a child only once', () => {
    const { collection, a, b } = chain();
    collection.addChild(a, b);

    expect(a.children).toEqual(['b']);
    expect(b.parents).toEqual(['a']);
  });

  it('can add a child at the front', () => {
    const { collection, a } = chain();
    const first = collection.upsert({ id: 'first' });
    collection.addChild(a, first, true);

    expect(a.children).toEqual(['first', 'b']);
  });

  it('lists ancestors breadth-first, repeating converging paths', () => {
    const collection = new Collection({ id: 'test' });
    const [top, left, right, bottom] = ['top', 'left', 'right', 'bottom'].map(id => collection.upsert({ id }));
    collection.addChild(top, left);
    collection.addChild(top, right);
    collection.addChild(left, bottom);
    collection.addChild(right, bottom);

    expect(collection.ancestors(bottom).map(node => node.id)).toEqual(['left', 'right', 'top', 'top']);
    expect(() => collection.addChild(bottom, top)).toThrow(CycleError);
  });

  it('detaches a node from all of its parents', () => {
    const collection = new Collection({ id: 'test' });
    const [p1, p2, child] = ['p1', 'p2', 'child'].map(id => collection.upsert({ id }));
    collection.addChild(p1, child);
    collection.addChild(p2, child);

    collection.detach(child);

    expect(p1.children).toEqual([]);
    expect(p2.children).toEqual([]);
    expect(child.parents).toEqual([]);
  });

  it('moves a node under a new parent', () => {
    const { collection, a, c } = chain();
    collection.moveTo(c, a);

    expect(a.children).toEqual(['b', 'c']);
    expect(c.parents).toEqual(['a']);
    expect(collection.lookup('b')?.children).toEqual([]);
  });
});

describe('Collection.finalize', () => {
  it('can only run once and freezes the collection', () => {
    const collection = new Collection({ id: 'test' });
    collection.upsert({ id: 'page', content: '<p>Hi</p>' });

    const { nodes } = collection.finalize();

    expect(nodes.map(node => [node.id, node.type])).toEqual([['page', NodeType.CARD]]);
    expect(collection.isFinalized).toBe(true);
    expect(() => collection.finalize()).toThrow(FinalizedError);
    expect(() => collection.upsert({ id: 'late' })).toThrow(FinalizedError);
  });

  it('records progress for every node', () => {
    const collection = new Collection({ id: 'test' });
    const root = collection.upsert({ id: 'root', title: 'Root' });
    collection.addChild(root, collection.upsert({ id: 'leaf', content: '<p>Leaf</p>' }));

    collection.finalize();

    expect(collection.log.events.map(event => event.message)).toEqual([
      'post-processing node 1 / 2',
      'post-processing node 2 / 2',
    ]);
  });

  it('slugifies the collection id and lays out its paths', () => {
    const collection = new Collection({ id: 'Help Center', folder: '/data' });

    expect(collection.id).toBe('Help_Center');
    expect(collection.paths.contentDir).toBe('/data/Help_Center');
    expect(collection.paths.zipPath).toBe('/data/collection_Help_Center.zip');
    expect(collection.paths.cardYaml('a/b')).toBe('/data/Help_Center/cards/a_b.yaml');
    expect(collection.paths.boardGroupYaml('g')).toBe('/data/Help_Center/board-groups/g.yaml');
  });
});
