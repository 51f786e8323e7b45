/**
 * Test Helpers: Reading
 * Shorthands for reading trees and inspecting what was read
 */

import {
  PhyloError,
  readTrees,
  type Node,
  type ReadErrorEvent,
  type ReaderObservability,
  type ReadTreesOptions,
  type StatementStartEvent,
  type TaxonCreatedEvent,
  type Tree,
  type TreeCompleteEvent,
} from '../../src/index.js';

/** Read source and return its first tree */
export function readTree(source: string, options: ReadTreesOptions = {}): Tree {
  const tree = readTrees(source, options).trees[0];
  if (tree === undefined) {
    throw new Error(`no tree in ${JSON.stringify(source)}`);
  }
  return tree;
}

/** Run fn and return the PhyloError it throws */
export function captureError(fn: () => unknown): PhyloError {
  try {
    fn();
  } catch (error) {
    if (error instanceof PhyloError) return error;
    throw error;
  }
  throw new Error('expected a PhyloError to be thrown');
}

/** Taxon label, else free label */
export function nodeName(node: Node): string | undefined {
  return node.taxon?.label ?? node.label;
}

export function leafNames(tree: Tree): (string | undefined)[] {
  return tree.leafNodes().map(nodeName);
}

export function child(node: Node, ...path: number[]): Node {
  let current = node;
  for (const index of path) {
    const next = current.children[index];
    if (next === undefined) {
      throw new Error(`no child ${index} on path ${path.join('/')}`);
    }
    current = next;
  }
  return current;
}

export interface NodeShape {
  name: string | undefined;
  length: number | undefined;
  children: NodeShape[];
}

/** Topology, names and lengths, for comparing trees read separately */
export function describeNode(node: Node): NodeShape {
  return {
    name: nodeName(node),
    length: node.edge.length,
    children: node.children.map(describeNode),
  };
}

/** Events recorded by createEventCollector */
export interface CollectedEvents {
  statementStart: StatementStartEvent[];
  treeComplete: TreeCompleteEvent[];
  taxonCreated: TaxonCreatedEvent[];
  error: ReadErrorEvent[];
}

/** Create an event collector for observability callbacks */
export function createEventCollector(): {
  events: CollectedEvents;
  callbacks: ReaderObservability;
} {
  const events: CollectedEvents = {
    statementStart: [],
    treeComplete: [],
    taxonCreated: [],
    error: [],
  };

  const callbacks: ReaderObservability = {
    onStatementStart: (e) => events.statementStart.push(e),
    onTreeComplete: (e) => events.treeComplete.push(e),
    onTaxonCreated: (e) => events.taxonCreated.push(e),
    onError: (e) => events.error.push(e),
  };

  return { events, callbacks };
}
