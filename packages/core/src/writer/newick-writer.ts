/**
 * Newick Writer
 * Trees back to Newick statements
 */

import type { Annotated, AnnotationValue } from '../model/annotation.js';
import type { Node, Tree } from '../model/tree.js';

// ============================================================
// OPTIONS
// ============================================================

export interface NewickWriterOptions {
  suppressEdgeLengths?: boolean | undefined;
  /** Omit the `[&R]`/`[&U]` prefix */
  suppressRooting?: boolean | undefined;
  /** Write tree.weight as `[&W w]` */
  storeTreeWeights?: boolean | undefined;
  suppressAnnotations?: boolean | undefined;
  /** Omit plain (non-annotation) comments */
  suppressItemComments?: boolean | undefined;
  suppressLeafTaxonLabels?: boolean | undefined;
  suppressLeafNodeLabels?: boolean | undefined;
  suppressInternalTaxonLabels?: boolean | undefined;
  suppressInternalNodeLabels?: boolean | undefined;
  /** Annotations as `[&&NHX:k=v:k=v]` instead of `[&k=v,k=v]` */
  nhx?: boolean | undefined;
  /** Quote labels with spaces instead of writing underscores. Default: false */
  preserveSpaces?: boolean | undefined;
  /** Quote labels containing '_'. Default: true */
  quoteUnderscores?: boolean | undefined;
  /** Default: String(length) */
  edgeLengthFormatter?: ((length: number) => string) | undefined;
}

// ============================================================
// TOKEN ESCAPING
// ============================================================

const PROTECTED_CHARS = /[()[\]{}\\/,;:=*'"`+\-<>\0\t\n\r\v\f]/;

export interface EscapeOptions {
  preserveSpaces?: boolean | undefined;
  quoteUnderscores?: boolean | undefined;
}

/**
 * Make a label safe to write as one NEXUS token.
 *
 * Plain labels have blanks turned into underscores. Labels with NEXUS
 * punctuation, with blanks kept, or with underscores are single-quoted,
 * embedded quotes doubled.
 *
 * @example
 * escapeNexusToken('Homo sapiens') // 'Homo_sapiens'
 * escapeNexusToken("it's") // "'it''s'"
 */
export function escapeNexusToken(
  label: string | undefined,
  options: EscapeOptions = {}
): string {
  if (label === undefined) return '';
  const preserveSpaces = options.preserveSpaces ?? false;
  const quoteUnderscores = options.quoteUnderscores ?? true;
  const isProtected = PROTECTED_CHARS.test(label);

  if (!preserveSpaces && !label.includes('_') && !isProtected) {
    return label.replace(/[ \t]/g, '_');
  }
  if (isProtected || label.includes(' ') || (quoteUnderscores && label.includes('_'))) {
    return `'${label.split("'").join("''")}'`;
  }
  return label;
}

// ============================================================
// ANNOTATIONS
// ============================================================

function formatAnnotationValue(value: AnnotationValue): string {
  if (Array.isArray(value)) {
    return `{${value.map(String).join(',')}}`;
  }
  return String(value);
}

/**
 * Render an item's annotations as one comment, or '' when it has none.
 *
 * @example
 * formatAnnotationsAsComment(node) // '[&height=2.5,rate={1,2}]'
 */
export function formatAnnotationsAsComment(item: Annotated, nhx = false): string {
  if (item.annotations.length === 0) return '';
  const parts = item.annotations.map(
    (annotation) => `${annotation.name}=${formatAnnotationValue(annotation.value)}`
  );
  return nhx ? `[&&NHX:${parts.join(':')}]` : `[&${parts.join(',')}]`;
}

// ============================================================
// WRITER
// ============================================================

class NewickComposer {
  constructor(private readonly options: NewickWriterOptions) {}

  comments(item: Annotated): string {
    let result = '';
    if (!this.options.suppressAnnotations) {
      result += formatAnnotationsAsComment(item, this.options.nhx ?? false);
    }
    if (!this.options.suppressItemComments) {
      result += item.comments.map((comment) => `[${comment}]`).join('');
    }
    return result;
  }

  tag(node: Node): string {
    const leaf = node.isLeaf();
    const suppressTaxon = leaf
      ? this.options.suppressLeafTaxonLabels
      : this.options.suppressInternalTaxonLabels;
    const suppressLabel = leaf
      ? this.options.suppressLeafNodeLabels
      : this.options.suppressInternalNodeLabels;

    const parts: string[] = [];
    if (node.taxon !== undefined && !suppressTaxon) parts.push(node.taxon.label);
    if (node.label !== undefined && !suppressLabel) parts.push(node.label);
    if (parts.length === 0) return '';
    return escapeNexusToken(parts.join(' '), {
      preserveSpaces: this.options.preserveSpaces,
      quoteUnderscores: this.options.quoteUnderscores,
    });
  }

  /** Node comments sit before ':' and edge comments after the length */
  node(node: Node): string {
    let statement = '';
    if (!node.isLeaf()) {
      statement += `(${node.children.map((child) => this.node(child)).join(',')})`;
    }
    statement += this.tag(node);
    statement += this.comments(node);

    const length = node.edge.length;
    if (length !== undefined && !this.options.suppressEdgeLengths) {
      const format = this.options.edgeLengthFormatter ?? String;
      statement += `:${format(length)}`;
      statement += this.comments(node.edge);
    }
    return statement;
  }

  tree(tree: Tree): string {
    let prefix = '';
    if (tree.isRooted !== undefined && !this.options.suppressRooting) {
      prefix += tree.isRooted ? '[&R] ' : '[&U] ';
    }
    if (this.options.storeTreeWeights && tree.weight !== undefined) {
      prefix += `[&W ${String(tree.weight)}] `;
    }
    prefix += this.comments(tree);
    return `${prefix}${this.node(tree.seedNode)};`;
  }
}

/**
 * Write tree as one Newick statement, terminated by ';'.
 *
 * @example
 * writeNewick(tree) // '[&R] ((A:1,B:2):0.5,C:3);'
 */
export function writeNewick(tree: Tree, options: NewickWriterOptions = {}): string {
  return new NewickComposer(options).tree(tree);
}
