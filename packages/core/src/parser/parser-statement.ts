/**
 * Tree Statement Parsing
 * One ';'-terminated statement into one Tree
 */

import { ParseError } from '../error-classes.js';
import type { NexusTokenizer } from '../lexer/nexus-tokenizer.js';
import { isDelimiter } from '../lexer/token.js';
import type { Tree, TreeFactory } from '../model/tree.js';
import type { SourceLocation } from '../source-location.js';
import type { SymbolResolver } from '../taxa/resolver.js';
import { parseFloatToken } from './helpers.js';
import { processCommentsForItem } from './metadata.js';
import type { ResolvedReaderOptions, Rooting } from './options.js';
import { parseNodeDescription } from './parser-node.js';
import { createParserState } from './state.js';

// ============================================================
// STATEMENT
// ============================================================

/**
 * Parse the next tree statement, starting at the tokenizer's current token.
 *
 * Leading ';' tokens are skipped. Returns null when the stream ends before
 * any statement starts. On return the current token is the first one after
 * the statement's ';' run.
 */
export function parseTreeStatement(
  tokenizer: NexusTokenizer,
  treeFactory: TreeFactory,
  resolver: SymbolResolver,
  options: ResolvedReaderOptions
): Tree | null {
  let token = tokenizer.currentToken;
  let comments = tokenizer.pullCapturedComments();
  while (token === null || isDelimiter(token, ';')) {
    token = tokenizer.nextToken();
    comments = tokenizer.pullCapturedComments();
    if (token === null) return null;
  }

  const location = token.span.start;
  options.observability.onStatementStart?.({ location });

  const tree = treeFactory();
  const state = createParserState(
    tokenizer,
    tree,
    resolver,
    options,
    isDelimiter(token, '(') ? 1 : 0
  );
  processTreeComments(state.tree, comments, options, location);
  parseNodeDescription(state, tree.seedNode);

  if (!state.complete) {
    const last = tokenizer.currentToken;
    throw new ParseError(
      'NWK-P003',
      { token: last?.value ?? '' },
      last?.span.start ?? tokenizer.currentLocation()
    );
  }
  while (isDelimiter(tokenizer.currentToken, ';')) {
    tokenizer.clearCapturedComments();
    tokenizer.nextToken();
  }

  options.observability.onTreeComplete?.({
    tree,
    location,
    leafCount: tree.leafNodes().length,
  });
  return tree;
}

// ============================================================
// TREE COMMENTS
// ============================================================

const ROOTED_COMMENTS = new Set(['&R', '&r']);
const UNROOTED_COMMENTS = new Set(['&U', '&u']);

/**
 * Rootedness from configuration and an optional `&R`/`&U` comment.
 * force-* beats the comment, the comment beats default-*.
 */
export function resolveRooting(
  rooting: Rooting | undefined,
  comment = ''
): boolean | undefined {
  if (rooting === 'force-unrooted') return false;
  if (rooting === 'force-rooted') return true;
  if (ROOTED_COMMENTS.has(comment)) return true;
  if (UNROOTED_COMMENTS.has(comment)) return false;
  if (rooting === 'default-rooted') return true;
  if (rooting === 'default-unrooted') return false;
  return undefined;
}

/**
 * `&W n` or `&W n/d`.
 * @throws ParseError (NWK-P004) on anything else, or when n/d has no finite value
 */
export function parseTreeWeight(
  comment: string,
  location?: SourceLocation | undefined
): number {
  const invalid = (): ParseError =>
    new ParseError(
      'NWK-P004',
      { what: 'tree weight expression', value: comment },
      location
    );

  const parts = comment.slice(2).split('/').map((part) => part.trim());
  if (parts.length > 2) throw invalid();
  const [first = '', second] = parts;
  const numerator = parseFloatToken(first);
  if (numerator === undefined) throw invalid();
  if (second === undefined) return numerator;
  const denominator = parseFloatToken(second);
  if (denominator === undefined || denominator === 0) throw invalid();
  const weight = numerator / denominator;
  if (!Number.isFinite(weight)) throw invalid();
  return weight;
}

/**
 * Comments read before the statement's first token: rooting and weight
 * directives, annotations, and plain comments. Always settles isRooted and,
 * when storing weights, weight.
 */
function processTreeComments(
  tree: Tree,
  comments: readonly string[],
  options: ResolvedReaderOptions,
  location: SourceLocation
): void {
  let rootingFound = false;
  let weightFound = false;
  const rest: string[] = [];

  for (const comment of comments) {
    const stripped = comment.trim();
    if (ROOTED_COMMENTS.has(stripped) || UNROOTED_COMMENTS.has(stripped)) {
      tree.isRooted = resolveRooting(options.rooting, stripped);
      rootingFound = true;
    } else if (
      options.storeTreeWeights &&
      (stripped.startsWith('&W ') || stripped.startsWith('&w '))
    ) {
      tree.weight = parseTreeWeight(stripped, location);
      weightFound = true;
    } else {
      rest.push(comment);
    }
  }

  processCommentsForItem(tree, rest, options.extractCommentMetadata);
  if (!rootingFound) {
    tree.isRooted = resolveRooting(options.rooting);
  }
  if (options.storeTreeWeights && !weightFound) {
    tree.weight = options.defaultTreeWeight;
  }
}
