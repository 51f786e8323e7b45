/**
 * Parser State
 * Per-statement session state and token navigation
 */

import { ParseError } from '../error-classes.js';
import type { NexusTokenizer } from '../lexer/nexus-tokenizer.js';
import { isDelimiter, type Token } from '../lexer/token.js';
import type { Annotated } from '../model/annotation.js';
import type { Node, Tree } from '../model/tree.js';
import type { Taxon } from '../model/taxon.js';
import type { SymbolResolver } from '../taxa/resolver.js';
import { processCommentsForItem } from './metadata.js';
import type { ResolvedReaderOptions } from './options.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokenizer: NexusTokenizer;
  readonly tree: Tree;
  readonly resolver: SymbolResolver;
  readonly options: ResolvedReaderOptions;
  /** Open '(' minus closed ')' */
  depth: number;
  complete: boolean;
  /** Taxa already placed on this tree */
  readonly seenTaxa: Set<Taxon>;
  /** Last non-null token read, for end-of-stream messages */
  last: Token | null;
}

export function createParserState(
  tokenizer: NexusTokenizer,
  tree: Tree,
  resolver: SymbolResolver,
  options: ResolvedReaderOptions,
  depth: number
): ParserState {
  return {
    tokenizer,
    tree,
    resolver,
    options,
    depth,
    complete: false,
    seenTaxa: new Set(),
    last: tokenizer.currentToken,
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token | null {
  return state.tokenizer.currentToken;
}

/** @internal */
export function check(state: ParserState, ch: string): boolean {
  return isDelimiter(current(state), ch);
}

/** @internal */
export function incomplete(state: ParserState): ParseError {
  return new ParseError(
    'NWK-P003',
    { token: state.last?.value ?? '' },
    state.tokenizer.currentLocation()
  );
}

/**
 * Read the next token of the statement. At end of stream this throws
 * IncompleteStatement when the terminating semicolon is required and
 * returns null otherwise.
 * @internal
 */
export function advance(state: ParserState): Token | null {
  const token = state.tokenizer.nextToken();
  if (token !== null) {
    state.last = token;
    return token;
  }
  if (state.options.terminatingSemicolonRequired) {
    throw incomplete(state);
  }
  return null;
}

/**
 * Read a token the grammar cannot do without (inside a child list, after
 * ':' or '{'). End of stream is always IncompleteStatement.
 * @internal
 */
export function expectToken(state: ParserState): Token {
  const token = state.tokenizer.nextToken();
  if (token === null) throw incomplete(state);
  state.last = token;
  return token;
}

/** @internal */
export function finishNode(state: ParserState, node: Node): void {
  state.options.finishNode?.(node);
}

/** @internal */
export function processComments(
  state: ParserState,
  item: Annotated,
  comments: readonly string[]
): void {
  processCommentsForItem(item, comments, state.options.extractCommentMetadata);
}
