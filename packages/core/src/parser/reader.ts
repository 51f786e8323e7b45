/**
 * Newick Reader
 * Statement iteration over a token stream
 */

import { PhyloError } from '../error-classes.js';
import { NexusTokenizer } from '../lexer/nexus-tokenizer.js';
import type { CharacterSource } from '../lexer/source.js';
import {
  TaxonNamespace,
  type TaxonNamespaceFactory,
} from '../model/taxon.js';
import { Tree, type TreeFactory } from '../model/tree.js';
import {
  TaxonSymbolResolver,
  withTaxonSymbolResolver,
  type SymbolResolver,
  type TaxonSymbolResolverOptions,
} from '../taxa/resolver.js';
import {
  resolveReaderOptions,
  type NewickReaderOptions,
  type ResolvedReaderOptions,
} from './options.js';
import { parseTreeStatement } from './parser-statement.js';

// ============================================================
// READER
// ============================================================

/**
 * Parser for Newick tree statements.
 *
 * @example
 * const reader = new NewickReader({ rooting: 'default-rooted' });
 * const { trees } = reader.readTrees('((A,B),C);');
 */
export class NewickReader {
  readonly options: ResolvedReaderOptions;

  /** @throws ConfigError on unknown, mistyped or conflicting options */
  constructor(options: NewickReaderOptions = {}) {
    this.options = resolveReaderOptions(options);
  }

  createTokenizer(source: string | CharacterSource): NexusTokenizer {
    return new NexusTokenizer(source, {
      preserveUnquotedUnderscores: this.options.preserveUnderscores,
    });
  }

  /** Namespace whose case sensitivity matches caseSensitiveTaxonLabels */
  createTaxonNamespace(label?: string): TaxonNamespace {
    return new TaxonNamespace([], {
      label,
      isCaseSensitive: this.options.caseSensitiveTaxonLabels,
    });
  }

  /**
   * Resolver honouring caseSensitiveTaxonLabels and onTaxonCreated.
   * Dispose it when done to unlock the namespace.
   */
  createResolver(taxonNamespace: TaxonNamespace): TaxonSymbolResolver {
    return new TaxonSymbolResolver(taxonNamespace, this.resolverOptions());
  }

  private resolverOptions(): TaxonSymbolResolverOptions {
    return {
      caseSensitive: this.options.caseSensitiveTaxonLabels,
      onTaxonCreated: this.options.observability.onTaxonCreated,
    };
  }

  /**
   * Parse one statement from tokenizer, or return null at end of stream.
   * Reuse the same tokenizer between calls.
   */
  parseNextStatement(
    tokenizer: NexusTokenizer,
    treeFactory: TreeFactory,
    resolver: SymbolResolver
  ): Tree | null {
    try {
      return parseTreeStatement(tokenizer, treeFactory, resolver, this.options);
    } catch (error) {
      if (error instanceof PhyloError) {
        this.options.observability.onError?.({ error });
      }
      throw error;
    }
  }

  /** Trees of source, one per statement, parsed as they are pulled */
  *treeIter(
    source: string | CharacterSource,
    resolver: SymbolResolver,
    treeFactory: TreeFactory
  ): Generator<Tree, void, undefined> {
    const tokenizer = this.createTokenizer(source);
    let tree = this.parseNextStatement(tokenizer, treeFactory, resolver);
    while (tree !== null) {
      yield tree;
      tree = this.parseNextStatement(tokenizer, treeFactory, resolver);
    }
  }

  /**
   * Read every statement of source into trees sharing one namespace.
   * The namespace's mutability is restored even when reading fails.
   */
  readTrees(
    source: string | CharacterSource,
    factories: ReadTreesFactories = {}
  ): ReadTreesResult {
    const taxonNamespace =
      factories.taxonNamespace ??
      (factories.taxonNamespaceFactory
        ? factories.taxonNamespaceFactory()
        : this.createTaxonNamespace());
    const treeFactory =
      factories.treeFactory ?? ((): Tree => new Tree({ taxonNamespace }));

    const trees = withTaxonSymbolResolver(
      taxonNamespace,
      this.resolverOptions(),
      (resolver) => [...this.treeIter(source, resolver, treeFactory)]
    );
    return { taxonNamespace, trees };
  }
}

// ============================================================
// CONVENIENCE
// ============================================================

export interface ReadTreesFactories {
  /** Namespace to read into; takes precedence over taxonNamespaceFactory */
  taxonNamespace?: TaxonNamespace | undefined;
  taxonNamespaceFactory?: TaxonNamespaceFactory | undefined;
  /** Default: trees bound to the namespace */
  treeFactory?: TreeFactory | undefined;
}

export interface ReadTreesResult {
  taxonNamespace: TaxonNamespace;
  trees: Tree[];
}

export type ReadTreesOptions = NewickReaderOptions & ReadTreesFactories;

/**
 * One-shot read of a Newick string or source.
 *
 * @example
 * const { taxonNamespace, trees } = readTrees('(A,(B,C));');
 * taxonNamespace.labels(); // ['A', 'B', 'C']
 */
export function readTrees(
  source: string | CharacterSource,
  options: ReadTreesOptions = {}
): ReadTreesResult {
  const { taxonNamespace, taxonNamespaceFactory, treeFactory, ...readerOptions } =
    options;
  return new NewickReader(readerOptions).readTrees(source, {
    taxonNamespace,
    taxonNamespaceFactory,
    treeFactory,
  });
}
