/**
 * Comment Metadata
 * Extraction of key/value annotations from `[&...]` comments
 */

import { ParseError } from '../error-classes.js';
import type { Annotated, Annotation, AnnotationValue } from '../model/annotation.js';

// ============================================================
// PATTERNS
// ============================================================

/** FigTree / BEAST: `&k=v,k={a,b}` */
const FIGTREE_FIELD_PATTERN = /(.+?)=({.+?,.+?}|.+?)(,|$)/g;

/** NHX: `&&NHX:k=v:k=v` */
const NHX_FIELD_PATTERN = /(.+?)=({.+?,.+?}|.+?)(:|$)/g;

export type FieldValueType = 'int' | 'float' | 'string';

export interface CommentMetadataOptions {
  /** Rename fields as read, e.g. { height: 'age' } */
  fieldNameMap?: Readonly<Record<string, string>> | undefined;
  /** Convert values of the named fields. Unlisted fields stay strings */
  fieldValueTypes?: Readonly<Record<string, FieldValueType>> | undefined;
  /** Trim whitespace around keys and values. Default: true */
  stripSpaces?: boolean | undefined;
}

// ============================================================
// VALUE CONVERSION
// ============================================================

const INT_PATTERN = /^[+-]?\d+$/;

function convertValue(
  field: string,
  raw: string,
  type: FieldValueType | undefined
): string | number {
  switch (type) {
    case undefined:
    case 'string':
      return raw;
    case 'int': {
      const text = raw.trim();
      if (!INT_PATTERN.test(text)) {
        throw new ParseError('NWK-P004', { what: `int value for '${field}'`, value: raw });
      }
      return Number.parseInt(text, 10);
    }
    case 'float': {
      const text = raw.trim();
      const value = Number(text);
      if (text === '' || Number.isNaN(value)) {
        throw new ParseError('NWK-P004', { what: `float value for '${field}'`, value: raw });
      }
      return value;
    }
  }
}

function parseFieldValue(
  field: string,
  raw: string,
  type: FieldValueType | undefined
): AnnotationValue {
  if (raw.startsWith('{')) {
    return raw
      .slice(1, -1)
      .split(',')
      .map((item) => convertValue(field, item, type));
  }
  if (raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')) {
    return raw.slice(1, -1);
  }
  const lowered = raw.toLowerCase();
  if (lowered === 'false') return false;
  if (lowered === 'true') return true;
  return convertValue(field, raw, type);
}

// ============================================================
// PARSING
// ============================================================

/**
 * Parse one comment body (without brackets) into annotations.
 * Comments that do not start with '&' yield no annotations.
 *
 * @example
 * parseCommentMetadata('&height=2.5,rate={1,2}')
 * // [{ name: 'height', value: '2.5' }, { name: 'rate', value: ['1', '2'] }]
 */
export function parseCommentMetadata(
  comment: string,
  options: CommentMetadataOptions = {}
): Annotation[] {
  let pattern: RegExp;
  let body: string;
  if (comment.startsWith('&&NHX:')) {
    pattern = NHX_FIELD_PATTERN;
    body = comment.slice(6);
  } else if (comment.startsWith('&&')) {
    pattern = NHX_FIELD_PATTERN;
    body = comment.slice(2);
  } else if (comment.startsWith('&')) {
    pattern = FIGTREE_FIELD_PATTERN;
    body = comment.slice(1);
  } else {
    return [];
  }

  const strip = options.stripSpaces ?? true;
  const annotations: Annotation[] = [];
  for (const match of body.matchAll(pattern)) {
    let key = match[1] ?? '';
    let raw = match[2] ?? '';
    if (strip) {
      key = key.trim();
      raw = raw.trim();
    }
    const value = parseFieldValue(key, raw, options.fieldValueTypes?.[key]);
    annotations.push({ name: options.fieldNameMap?.[key] ?? key, value });
  }
  return annotations;
}

/**
 * Attach comments to an item. With extraction on, `&` comments that parse
 * to at least one annotation become annotations; everything else is kept
 * verbatim in item.comments.
 */
export function processCommentsForItem(
  item: Annotated,
  comments: readonly string[],
  extractMetadata: boolean
): void {
  for (const comment of comments) {
    if (extractMetadata && comment.startsWith('&')) {
      const annotations = parseCommentMetadata(comment);
      if (annotations.length > 0) {
        item.annotations.push(...annotations);
        continue;
      }
    }
    item.comments.push(comment);
  }
}
