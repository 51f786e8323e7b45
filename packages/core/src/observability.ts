/**
 * Observability
 *
 * Event callbacks for hosts that monitor reading.
 * Nothing in the core writes to stdout or stderr; hosts log from these.
 */

import type { PhyloError } from './error-classes.js';
import type { Taxon } from './model/taxon.js';
import type { Tree } from './model/tree.js';
import type { SourceLocation } from './source-location.js';

/** Observability callbacks for monitoring reads */
export interface ReaderObservability {
  /** Called when the first token of a tree statement has been read */
  onStatementStart?: ((event: StatementStartEvent) => void) | undefined;
  /** Called after a statement has been parsed into a tree */
  onTreeComplete?: ((event: TreeCompleteEvent) => void) | undefined;
  /** Called when symbol resolution adds a taxon to the namespace */
  onTaxonCreated?: ((event: TaxonCreatedEvent) => void) | undefined;
  /** Called before a reading error propagates */
  onError?: ((event: ReadErrorEvent) => void) | undefined;
}

/** Event emitted at the start of a tree statement */
export interface StatementStartEvent {
  /** Position of the statement's first token */
  location: SourceLocation;
}

/** Event emitted after a tree statement completes */
export interface TreeCompleteEvent {
  tree: Tree;
  /** Position of the statement's first token */
  location: SourceLocation;
  leafCount: number;
}

/** Event emitted when a taxon is created during resolution */
export interface TaxonCreatedEvent {
  taxon: Taxon;
  /** Symbol that failed every lookup table */
  symbol: string;
}

/** Event emitted when reading fails */
export interface ReadErrorEvent {
  error: PhyloError;
}
