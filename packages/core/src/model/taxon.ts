/**
 * Taxa
 * Operational taxonomic unit identities and the namespaces that own them
 */

import { TaxonError } from '../error-classes.js';

// ============================================================
// TAXON
// ============================================================

/**
 * Identity object for one operational taxonomic unit.
 * Two taxa with equal labels are still distinct objects.
 */
export class Taxon {
  private _label: string;
  private _lowerCasedLabel: string;

  constructor(label = '') {
    this._label = label;
    this._lowerCasedLabel = label.toLowerCase();
  }

  get label(): string {
    return this._label;
  }

  set label(value: string) {
    this._label = value;
    this._lowerCasedLabel = value.toLowerCase();
  }

  get lowerCasedLabel(): string {
    return this._lowerCasedLabel;
  }

  toString(): string {
    return `'${this._label}'`;
  }
}

// ============================================================
// TAXON NAMESPACE
// ============================================================

export interface TaxonNamespaceOptions {
  label?: string | undefined;
  /** Default: true */
  isMutable?: boolean | undefined;
  /** Default: false */
  isCaseSensitive?: boolean | undefined;
}

/**
 * Ordered collection of unique taxa.
 *
 * Each accepted taxon gets the next accession index. Indices are never
 * reused: removing a taxon leaves a gap rather than renumbering the others.
 */
export class TaxonNamespace implements Iterable<Taxon> {
  label: string | undefined;
  isMutable: boolean;
  isCaseSensitive: boolean;

  private readonly taxa: Taxon[] = [];
  private readonly accessionIndices = new Map<Taxon, number>();
  private accessionCount = 0;

  constructor(labels: Iterable<string> = [], options: TaxonNamespaceOptions = {}) {
    this.label = options.label;
    this.isMutable = true;
    this.isCaseSensitive = options.isCaseSensitive ?? false;
    for (const label of labels) {
      this.newTaxon(label);
    }
    this.isMutable = options.isMutable ?? true;
  }

  get size(): number {
    return this.taxa.length;
  }

  [Symbol.iterator](): Iterator<Taxon> {
    return this.taxa[Symbol.iterator]();
  }

  has(taxon: Taxon): boolean {
    return this.accessionIndices.has(taxon);
  }

  /** Taxon at a 0-based position in insertion order */
  at(position: number): Taxon | undefined {
    return this.taxa[position];
  }

  accessionIndex(taxon: Taxon): number | undefined {
    return this.accessionIndices.get(taxon);
  }

  labels(): string[] {
    return this.taxa.map((t) => t.label);
  }

  // ============================================================
  // ADDING / REMOVING
  // ============================================================

  /**
   * Accession a taxon. Adding a member again is a no-op.
   * @throws TaxonError (NWK-T002) if the namespace is immutable
   */
  addTaxon(taxon: Taxon): void {
    if (this.accessionIndices.has(taxon)) return;
    if (!this.isMutable) {
      throw new TaxonError('NWK-T002', { label: taxon.label });
    }
    this.taxa.push(taxon);
    this.accessionIndices.set(taxon, this.accessionCount);
    this.accessionCount++;
  }

  /** @throws TaxonError (NWK-T002) if the namespace is immutable */
  newTaxon(label: string): Taxon {
    if (!this.isMutable) {
      throw new TaxonError('NWK-T002', { label });
    }
    const taxon = new Taxon(label);
    this.addTaxon(taxon);
    return taxon;
  }

  removeTaxon(taxon: Taxon): void {
    const position = this.taxa.indexOf(taxon);
    if (position === -1) {
      throw new RangeError(`Taxon ${taxon.toString()} is not in this namespace`);
    }
    this.taxa.splice(position, 1);
    this.accessionIndices.delete(taxon);
  }

  // ============================================================
  // LABEL LOOKUP
  // ============================================================

  /** All taxa whose label matches, honouring case sensitivity */
  findTaxa(label: string, caseSensitive?: boolean): Taxon[] {
    if (caseSensitive ?? this.isCaseSensitive) {
      return this.taxa.filter((t) => t.label === label);
    }
    const lowered = label.toLowerCase();
    return this.taxa.filter((t) => t.lowerCasedLabel === lowered);
  }

  getTaxon(label: string, caseSensitive?: boolean): Taxon | undefined {
    return this.findTaxa(label, caseSensitive)[0];
  }

  hasTaxonLabel(label: string, caseSensitive?: boolean): boolean {
    return this.getTaxon(label, caseSensitive) !== undefined;
  }

  /**
   * Map from label to taxon. Keys are lower-cased when lookup is case
   * insensitive. Later taxa win on collisions.
   */
  labelTaxonMap(caseSensitive?: boolean): Map<string, Taxon> {
    const sensitive = caseSensitive ?? this.isCaseSensitive;
    const map = new Map<string, Taxon>();
    for (const taxon of this.taxa) {
      map.set(sensitive ? taxon.label : taxon.lowerCasedLabel, taxon);
    }
    return map;
  }
}

/** Builds the namespace a reader files its taxa under */
export type TaxonNamespaceFactory = (label?: string) => TaxonNamespace;
