/**
 * Taxa and Taxon Namespaces
 */

import { describe, expect, it } from 'vitest';

import { Taxon, TaxonError, TaxonNamespace } from '../../src/index.js';
import { captureError } from '../helpers/reader.js';

describe('Taxon', () => {
  it('caches the lower-cased label', () => {
    const taxon = new Taxon('Homo');
    expect(taxon.lowerCasedLabel).toBe('homo');
    taxon.label = 'PAN';
    expect(taxon.lowerCasedLabel).toBe('pan');
  });

  it('is compared by identity', () => {
    expect(new Taxon('A')).not.toBe(new Taxon('A'));
  });
});

describe('TaxonNamespace', () => {
  it('keeps insertion order and accession indices', () => {
    const ns = new TaxonNamespace(['A', 'B']);
    expect(ns.labels()).toEqual(['A', 'B']);
    expect(ns.size).toBe(2);
    expect([...ns].map((t) => ns.accessionIndex(t))).toEqual([0, 1]);
  });

  it('ignores adding a member twice', () => {
    const ns = new TaxonNamespace();
    const taxon = new Taxon('A');
    ns.addTaxon(taxon);
    ns.addTaxon(taxon);
    expect(ns.size).toBe(1);
  });

  it('never reuses an accession index', () => {
    const ns = new TaxonNamespace(['A', 'B']);
    const a = ns.getTaxon('A');
    if (a === undefined) throw new Error('A missing');
    ns.removeTaxon(a);
    const c = ns.newTaxon('C');
    expect(ns.accessionIndex(c)).toBe(2);
    expect(ns.labels()).toEqual(['B', 'C']);
    expect(ns.has(a)).toBe(false);
  });

  it('fails to remove a non-member', () => {
    const ns = new TaxonNamespace(['A']);
    expect(() => ns.removeTaxon(new Taxon('A'))).toThrow(RangeError);
  });

  it('rejects new taxa while immutable', () => {
    const ns = new TaxonNamespace(['A'], { isMutable: false });
    expect(ns.size).toBe(1);
    const error = captureError(() => ns.newTaxon('B'));
    expect(error).toBeInstanceOf(TaxonError);
    expect(error.errorId).toBe('NWK-T002');
    expect(error.message).toBe("Taxon 'B' cannot be added to an immutable taxon namespace");
    expect(() => ns.addTaxon(new Taxon('C'))).toThrow(TaxonError);
  });

  describe('label lookup', () => {
    it('is case-insensitive by default', () => {
      const ns = new TaxonNamespace(['Homo']);
      expect(ns.getTaxon('HOMO')?.label).toBe('Homo');
      expect(ns.getTaxon('HOMO', true)).toBeUndefined();
      expect(ns.hasTaxonLabel('homo')).toBe(true);
    });

    it('follows the namespace flag', () => {
      const ns = new TaxonNamespace(['Homo'], { isCaseSensitive: true });
      expect(ns.getTaxon('homo')).toBeUndefined();
      expect(ns.getTaxon('Homo')?.label).toBe('Homo');
    });

    it('finds every taxon with a label', () => {
      const ns = new TaxonNamespace();
      ns.addTaxon(new Taxon('X'));
      ns.addTaxon(new Taxon('x'));
      expect(ns.findTaxa('X')).toHaveLength(2);
      expect(ns.findTaxa('X', true)).toHaveLength(1);
    });

    it('maps labels to taxa', () => {
      const ns = new TaxonNamespace(['Homo', 'Pan']);
      expect([...ns.labelTaxonMap().keys()]).toEqual(['homo', 'pan']);
      expect([...ns.labelTaxonMap(true).keys()]).toEqual(['Homo', 'Pan']);
    });
  });
});
