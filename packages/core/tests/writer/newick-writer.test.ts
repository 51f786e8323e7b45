/**
 * Newick Writer
 */

import { describe, expect, it } from 'vitest';

import {
  escapeNexusToken,
  formatAnnotationsAsComment,
  Node,
  Taxon,
  Tree,
  writeNewick,
} from '../../src/index.js';
import { describeNode, readTree } from '../helpers/reader.js';

describe('escapeNexusToken', () => {
  it('writes blanks as underscores', () => {
    expect(escapeNexusToken('Homo sapiens')).toBe('Homo_sapiens');
  });

  it('leaves plain labels alone', () => {
    expect(escapeNexusToken('A')).toBe('A');
    expect(escapeNexusToken(undefined)).toBe('');
  });

  it('quotes punctuation and doubles quotes', () => {
    expect(escapeNexusToken("it's")).toBe("'it''s'");
    expect(escapeNexusToken('a:b')).toBe("'a:b'");
    expect(escapeNexusToken('(')).toBe("'('");
    expect(escapeNexusToken('a\rb')).toBe("'a\rb'");
  });

  it('quotes underscores unless told not to', () => {
    expect(escapeNexusToken('Homo_sapiens')).toBe("'Homo_sapiens'");
    expect(escapeNexusToken('Homo_sapiens', { quoteUnderscores: false })).toBe('Homo_sapiens');
  });

  it('quotes blanks when preserving spaces', () => {
    expect(escapeNexusToken('Homo sapiens', { preserveSpaces: true })).toBe("'Homo sapiens'");
  });
});

describe('formatAnnotationsAsComment', () => {
  function annotated(): Node {
    const node = new Node();
    node.annotations.push({ name: 'rate', value: [1, 2] }, { name: 'ok', value: true });
    return node;
  }

  it('writes FigTree form', () => {
    expect(formatAnnotationsAsComment(annotated())).toBe('[&rate={1,2},ok=true]');
  });

  it('writes NHX form', () => {
    expect(formatAnnotationsAsComment(annotated(), true)).toBe('[&&NHX:rate={1,2}:ok=true]');
  });

  it('writes nothing without annotations', () => {
    expect(formatAnnotationsAsComment(new Node())).toBe('');
  });
});

describe('writeNewick', () => {
  it('writes labels, lengths and internal labels', () => {
    const tree = readTree('(A:1.5,(B:2.0,C:3.0)internal:0.5);');
    expect(writeNewick(tree)).toBe('(A:1.5,(B:2,C:3)internal:0.5);');
  });

  it('writes the rooting prefix', () => {
    const tree = readTree('[&R] ((A:1,B:2):0.5,C:3);');
    expect(writeNewick(tree)).toBe('[&R] ((A:1,B:2):0.5,C:3);');
    expect(writeNewick(tree, { suppressRooting: true })).toBe('((A:1,B:2):0.5,C:3);');
    tree.isRooted = false;
    expect(writeNewick(tree)).toBe('[&U] ((A:1,B:2):0.5,C:3);');
  });

  it('keeps node, edge and tree annotations in place', () => {
    const source = '(A[&height=1]:1[&rate=2],B)[&support=0.9];';
    expect(writeNewick(readTree(source))).toBe(source);
  });

  it('drops annotations and comments when suppressed', () => {
    const tree = readTree('[note](A[&height=1]:1,B[leaf]);');
    expect(writeNewick(tree)).toBe('[note](A[&height=1]:1,B[leaf]);');
    expect(writeNewick(tree, { suppressAnnotations: true })).toBe('[note](A:1,B[leaf]);');
    expect(writeNewick(tree, { suppressItemComments: true })).toBe('(A[&height=1]:1,B);');
  });

  it('writes annotations in NHX form', () => {
    const tree = readTree('(A[&S=human],B);');
    expect(writeNewick(tree, { nhx: true })).toBe('(A[&&NHX:S=human],B);');
  });

  it('writes weights when asked', () => {
    const tree = readTree('(A,B);');
    tree.weight = 0.25;
    expect(writeNewick(tree, { storeTreeWeights: true })).toBe('[&W 0.25] (A,B);');
    expect(writeNewick(tree)).toBe('(A,B);');
  });

  it('formats or drops edge lengths', () => {
    const tree = readTree('(A:1,B:2);');
    expect(writeNewick(tree, { suppressEdgeLengths: true })).toBe('(A,B);');
    expect(writeNewick(tree, { edgeLengthFormatter: (n) => n.toFixed(2) })).toBe(
      '(A:1.00,B:2.00);'
    );
  });

  it('writes anonymous leaves as empty', () => {
    expect(writeNewick(readTree('(,);'))).toBe('(,);');
  });

  it('suppresses labels by role', () => {
    const tree = readTree('((A,B)x,C);');
    expect(writeNewick(tree, { suppressInternalNodeLabels: true })).toBe('((A,B),C);');
    expect(writeNewick(tree, { suppressLeafTaxonLabels: true })).toBe('((,)x,);');
  });

  it('joins a taxon label and a free label', () => {
    const tree = new Tree();
    tree.seedNode.addChild(new Node({ taxon: new Taxon('A'), label: 'n' }));
    tree.seedNode.addChild(new Node({ label: 'B', edgeLength: 2 }));
    expect(writeNewick(tree)).toBe('(A_n,B:2);');
  });

  it('reads back what it writes', () => {
    const sources = [
      "[&U] ((Homo_sapiens:1,'Pan troglodytes':2)x:0.5,'it''s':3);",
      '[&R] (A,(B,(C,D):1e-3):-2);',
      '((,),());',
      "('a\rb','c\td',e);",
    ];
    for (const source of sources) {
      const tree = readTree(source);
      const reread = readTree(writeNewick(tree));
      expect(describeNode(reread.seedNode)).toEqual(describeNode(tree.seedNode));
      expect(reread.isRooted).toBe(tree.isRooted);
    }
  });
});
