/**
 * Trees
 * Rooted node/edge structure produced by the statement parser
 */

import type { Annotated, Annotation } from './annotation.js';
import type { Taxon, TaxonNamespace } from './taxon.js';

// ============================================================
// EDGE
// ============================================================

/** Edge subtending its head node. The root edge has no tail */
export class Edge implements Annotated {
  readonly headNode: Node;
  length: number | undefined;
  /** jplace edge number from `{n}` */
  edgeNumber: number | undefined;
  label: string | undefined;
  readonly annotations: Annotation[] = [];
  readonly comments: string[] = [];

  constructor(headNode: Node) {
    this.headNode = headNode;
  }

  get tailNode(): Node | undefined {
    return this.headNode.parent;
  }
}

// ============================================================
// NODE
// ============================================================

export interface NodeOptions {
  label?: string | undefined;
  taxon?: Taxon | undefined;
  edgeLength?: number | undefined;
}

export class Node implements Annotated {
  /** Free-text label; unset when the node carries a taxon */
  label: string | undefined;
  taxon: Taxon | undefined;
  parent: Node | undefined;
  readonly children: Node[] = [];
  readonly edge: Edge;
  readonly annotations: Annotation[] = [];
  readonly comments: string[] = [];

  constructor(options: NodeOptions = {}) {
    this.label = options.label;
    this.taxon = options.taxon;
    this.edge = new Edge(this);
    this.edge.length = options.edgeLength;
  }

  addChild(child: Node): Node {
    child.parent = this;
    this.children.push(child);
    return child;
  }

  isLeaf(): boolean {
    return this.children.length === 0;
  }

  /** This node and its descendants, parents before children */
  *preorder(): Generator<Node> {
    const stack: Node[] = [this];
    let node = stack.pop();
    while (node !== undefined) {
      yield node;
      for (let i = node.children.length - 1; i >= 0; i--) {
        const child = node.children[i];
        if (child !== undefined) stack.push(child);
      }
      node = stack.pop();
    }
  }
}

// ============================================================
// TREE
// ============================================================

export interface TreeOptions {
  label?: string | undefined;
  taxonNamespace?: TaxonNamespace | undefined;
}

export class Tree implements Annotated {
  readonly seedNode: Node;
  label: string | undefined;
  taxonNamespace: TaxonNamespace | undefined;
  /** undefined when rootedness was neither stated nor configured */
  isRooted: boolean | undefined;
  weight: number | undefined;
  /** jplace edge number to edge */
  readonly edgeIndex = new Map<number, Edge>();
  readonly annotations: Annotation[] = [];
  readonly comments: string[] = [];

  constructor(options: TreeOptions = {}) {
    this.label = options.label;
    this.taxonNamespace = options.taxonNamespace;
    this.seedNode = this.nodeFactory();
  }

  /** Fresh node, not yet attached to the tree */
  nodeFactory(): Node {
    return new Node();
  }

  preorderNodes(): Generator<Node> {
    return this.seedNode.preorder();
  }

  leafNodes(): Node[] {
    return [...this.preorderNodes()].filter((node) => node.isLeaf());
  }

  internalNodes(): Node[] {
    return [...this.preorderNodes()].filter((node) => !node.isLeaf());
  }
}

/** Zero-argument constructor for the trees a reader fills in */
export type TreeFactory = () => Tree;
