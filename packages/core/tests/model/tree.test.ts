/**
 * Trees, Nodes and Edges
 */

import { describe, expect, it } from 'vitest';

import { Node, Tree } from '../../src/index.js';

function buildTree(): Tree {
  // ((A,B)x,C)
  const tree = new Tree({ label: 't1' });
  const x = tree.seedNode.addChild(new Node({ label: 'x', edgeLength: 0.5 }));
  x.addChild(new Node({ label: 'A' }));
  x.addChild(new Node({ label: 'B' }));
  tree.seedNode.addChild(new Node({ label: 'C', edgeLength: 3 }));
  return tree;
}

describe('Tree', () => {
  it('starts with a lone seed node', () => {
    const tree = new Tree();
    expect(tree.seedNode.isLeaf()).toBe(true);
    expect(tree.isRooted).toBeUndefined();
    expect(tree.edgeIndex.size).toBe(0);
  });

  it('creates detached nodes', () => {
    const tree = new Tree();
    const node = tree.nodeFactory();
    expect(node.parent).toBeUndefined();
    expect(tree.seedNode.children).toEqual([]);
  });

  it('walks nodes parents first', () => {
    const labels = [...buildTree().preorderNodes()].map((n) => n.label);
    expect(labels).toEqual([undefined, 'x', 'A', 'B', 'C']);
  });

  it('separates leaves from internal nodes', () => {
    const tree = buildTree();
    expect(tree.leafNodes().map((n) => n.label)).toEqual(['A', 'B', 'C']);
    expect(tree.internalNodes().map((n) => n.label)).toEqual([undefined, 'x']);
  });
});

describe('Node and Edge', () => {
  it('links child to parent through the edge', () => {
    const parent = new Node();
    const child = parent.addChild(new Node({ edgeLength: 2 }));
    expect(child.parent).toBe(parent);
    expect(child.edge.headNode).toBe(child);
    expect(child.edge.tailNode).toBe(parent);
    expect(child.edge.length).toBe(2);
    expect(parent.edge.tailNode).toBeUndefined();
  });
});
