/**
 * Taxon Symbol Resolver
 *
 * Maps label, translate-token and taxon-number symbols to Taxon identities
 * in a namespace it holds locked for the duration of a read.
 */

import { ConfigError, TaxonError } from '../error-classes.js';
import type { Taxon, TaxonNamespace } from '../model/taxon.js';
import type { TaxonCreatedEvent } from '../observability.js';

// ============================================================
// TYPES
// ============================================================

/** What the statement parser needs from a resolver */
export interface SymbolResolver {
  resolve(symbol: string): Taxon;
}

export interface TaxonSymbolResolverOptions {
  /** Must equal the namespace's isCaseSensitive. Default: false */
  caseSensitive?: boolean | undefined;
  /** Resolve "1".."n" to the n-th taxon of the namespace. Default: true */
  enableLookupByTaxonNumber?: boolean | undefined;
  onTaxonCreated?: ((event: TaxonCreatedEvent) => void) | undefined;
}

// ============================================================
// RESOLVER
// ============================================================

/**
 * Resolution order: translate token, label, taxon number, then creation.
 *
 * Construction makes the namespace immutable so that every insertion goes
 * through this resolver and the lookup tables stay in step with it.
 * Call dispose() (or use withTaxonSymbolResolver) to give the namespace
 * back its original mutability.
 */
export class TaxonSymbolResolver implements SymbolResolver {
  readonly taxonNamespace: TaxonNamespace;
  readonly caseSensitive: boolean;
  readonly enableLookupByTaxonNumber: boolean;

  private readonly originalMutability: boolean;
  private readonly onTaxonCreated:
    | ((event: TaxonCreatedEvent) => void)
    | undefined;
  private readonly tokenTaxonMap = new Map<string, Taxon>();
  private labelTaxonMap = new Map<string, Taxon>();
  private readonly numberTaxonMap = new Map<string, Taxon>();
  private disposed = false;

  constructor(
    taxonNamespace: TaxonNamespace,
    options: TaxonSymbolResolverOptions = {}
  ) {
    const caseSensitive = options.caseSensitive ?? false;
    if (caseSensitive !== taxonNamespace.isCaseSensitive) {
      throw new ConfigError(
        caseSensitive
          ? 'case-sensitive resolution requested for a case-insensitive taxon namespace'
          : 'case-insensitive resolution requested for a case-sensitive taxon namespace'
      );
    }
    this.taxonNamespace = taxonNamespace;
    this.caseSensitive = caseSensitive;
    this.enableLookupByTaxonNumber = options.enableLookupByTaxonNumber ?? true;
    this.onTaxonCreated = options.onTaxonCreated;
    this.originalMutability = taxonNamespace.isMutable;
    taxonNamespace.isMutable = false;
    this.resetSupplementalMappings();
  }

  private key(symbol: string): string {
    return this.caseSensitive ? symbol : symbol.toLowerCase();
  }

  /** Rebuild label and number tables from the namespace; drop translate tokens */
  resetSupplementalMappings(): void {
    this.tokenTaxonMap.clear();
    this.labelTaxonMap = this.taxonNamespace.labelTaxonMap(this.caseSensitive);
    this.numberTaxonMap.clear();
    let position = 1;
    for (const taxon of this.taxonNamespace) {
      this.numberTaxonMap.set(String(position), taxon);
      position++;
    }
  }

  addTranslateToken(token: string, taxon: Taxon): void {
    this.tokenTaxonMap.set(this.key(token), taxon);
  }

  // ============================================================
  // LOOKUP
  // ============================================================

  private find(symbol: string): Taxon | undefined {
    const key = this.key(symbol);
    return (
      this.tokenTaxonMap.get(key) ??
      this.labelTaxonMap.get(key) ??
      (this.enableLookupByTaxonNumber
        ? this.numberTaxonMap.get(symbol)
        : undefined)
    );
  }

  /**
   * Find the taxon for symbol, creating one unless createIfNotFound is false.
   * @throws TaxonError (NWK-T001) when creation is needed but the namespace
   * was immutable before this resolver locked it
   */
  lookup(symbol: string, createIfNotFound = true): Taxon | undefined {
    const taxon = this.find(symbol);
    if (taxon !== undefined || !createIfNotFound) return taxon;
    return this.createForSymbol(symbol);
  }

  /** lookup() that always yields a taxon */
  resolve(symbol: string): Taxon {
    return this.find(symbol) ?? this.createForSymbol(symbol);
  }

  // ============================================================
  // INSERTION
  // ============================================================

  newTaxon(label: string): Taxon {
    return this.insert(label, () => this.taxonNamespace.newTaxon(label));
  }

  addTaxon(taxon: Taxon): Taxon {
    return this.insert(taxon.label, () => {
      this.taxonNamespace.addTaxon(taxon);
      return taxon;
    });
  }

  private createForSymbol(symbol: string): Taxon {
    if (!this.originalMutability) {
      throw new TaxonError('NWK-T001', { symbol });
    }
    const taxon = this.newTaxon(symbol);
    this.onTaxonCreated?.({ taxon, symbol });
    return taxon;
  }

  /**
   * Run one namespace insertion with the original mutability restored.
   * A taxon that was already a member registers nothing, and an existing
   * label entry is kept.
   */
  private insert(label: string, add: () => Taxon): Taxon {
    const sizeBefore = this.taxonNamespace.size;
    this.taxonNamespace.isMutable = this.originalMutability;
    let taxon: Taxon;
    try {
      taxon = add();
    } finally {
      this.taxonNamespace.isMutable = this.disposed
        ? this.originalMutability
        : false;
    }
    if (this.taxonNamespace.size === sizeBefore) return taxon;
    const key = this.key(label);
    if (!this.labelTaxonMap.has(key)) {
      this.labelTaxonMap.set(key, taxon);
    }
    this.numberTaxonMap.set(String(this.taxonNamespace.size), taxon);
    return taxon;
  }

  // ============================================================
  // LIFECYCLE
  // ============================================================

  /** Restore the namespace's original mutability. Idempotent */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.taxonNamespace.isMutable = this.originalMutability;
  }
}

/**
 * Run fn with a resolver over taxonNamespace, restoring the namespace's
 * mutability afterwards whether fn returns or throws.
 */
export function withTaxonSymbolResolver<T>(
  taxonNamespace: TaxonNamespace,
  options: TaxonSymbolResolverOptions,
  fn: (resolver: TaxonSymbolResolver) => T
): T {
  const resolver = new TaxonSymbolResolver(taxonNamespace, options);
  try {
    return fn(resolver);
  } finally {
    resolver.dispose();
  }
}
