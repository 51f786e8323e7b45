/**
 * Comment Metadata
 */

import { describe, expect, it } from 'vitest';

import {
  Node,
  parseCommentMetadata,
  ParseError,
  processCommentsForItem,
} from '../../src/index.js';

describe('parseCommentMetadata', () => {
  it('reads FigTree fields and lists', () => {
    expect(parseCommentMetadata('&height=2.5,rate={1,2}')).toEqual([
      { name: 'height', value: '2.5' },
      { name: 'rate', value: ['1', '2'] },
    ]);
  });

  it('reads NHX fields', () => {
    expect(parseCommentMetadata('&&NHX:S=human:D=N')).toEqual([
      { name: 'S', value: 'human' },
      { name: 'D', value: 'N' },
    ]);
    expect(parseCommentMetadata('&&k=v')).toEqual([{ name: 'k', value: 'v' }]);
  });

  it('reads booleans and quoted strings', () => {
    expect(parseCommentMetadata('&flag=TRUE,off=false,name="x y"')).toEqual([
      { name: 'flag', value: true },
      { name: 'off', value: false },
      { name: 'name', value: 'x y' },
    ]);
  });

  it('converts typed fields', () => {
    const annotations = parseCommentMetadata('&height=2.5,count=3,rate={1,2}', {
      fieldValueTypes: { height: 'float', count: 'int', rate: 'int' },
    });
    expect(annotations).toEqual([
      { name: 'height', value: 2.5 },
      { name: 'count', value: 3 },
      { name: 'rate', value: [1, 2] },
    ]);
  });

  it('renames fields', () => {
    expect(parseCommentMetadata('&height=1', { fieldNameMap: { height: 'age' } })).toEqual([
      { name: 'age', value: '1' },
    ]);
  });

  it('strips spaces unless told not to', () => {
    expect(parseCommentMetadata('& a = 1 , b = 2')).toEqual([
      { name: 'a', value: '1' },
      { name: 'b', value: '2' },
    ]);
    expect(parseCommentMetadata('& a = 1 , b = 2', { stripSpaces: false })).toEqual([
      { name: ' a ', value: ' 1 ' },
      { name: ' b ', value: ' 2' },
    ]);
  });

  it('ignores comments without metadata', () => {
    expect(parseCommentMetadata('plain text')).toEqual([]);
    expect(parseCommentMetadata('&R')).toEqual([]);
  });

  it('rejects a value that does not fit its type', () => {
    expect(() => parseCommentMetadata('&n=abc', { fieldValueTypes: { n: 'int' } })).toThrow(
      ParseError
    );
  });
});

describe('processCommentsForItem', () => {
  it('splits annotations from plain comments', () => {
    const node = new Node();
    processCommentsForItem(node, ['&a=1', 'plain', '&R'], true);
    expect(node.annotations).toEqual([{ name: 'a', value: '1' }]);
    expect(node.comments).toEqual(['plain', '&R']);
  });

  it('keeps everything verbatim without extraction', () => {
    const node = new Node();
    processCommentsForItem(node, ['&a=1', 'plain'], false);
    expect(node.annotations).toEqual([]);
    expect(node.comments).toEqual(['&a=1', 'plain']);
  });
});
