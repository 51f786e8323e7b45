/**
 * Node Description Parsing
 * Children, label, edge length and jplace edge number of one node
 */

import { DuplicateTaxonError, ParseError } from '../error-classes.js';
import { isDelimiter, TOKEN_TYPES, type Token } from '../lexer/token.js';
import type { Node } from '../model/tree.js';
import { parseFloatToken, parseIntToken } from './helpers.js';
import {
  advance,
  check,
  current,
  expectToken,
  finishNode,
  processComments,
  type ParserState,
} from './state.js';

// ============================================================
// NODE DESCRIPTION
// ============================================================

/**
 * Parse the node starting at the current token ('(' or its label) into node.
 *
 * Returns with the current token on the ',' or ')' that ends the node, or,
 * for the root, past the terminating ';'. isInternal is undefined only for
 * the root, whose role is settled by whether it turned out to have children.
 */
export function parseNodeDescription(
  state: ParserState,
  node: Node,
  isInternal?: boolean
): void {
  const nodeComments = state.tokenizer.pullCapturedComments();
  if (check(state, '(')) {
    expectToken(state);
    parseChildren(state, node);
  }
  parseNodeTail(state, node, isInternal ?? node.children.length > 0, nodeComments);
}

function addBlankChild(state: ParserState, parent: Node): void {
  const blank = state.tree.nodeFactory();
  processComments(state, blank, state.tokenizer.pullCapturedComments());
  finishNode(state, blank);
  parent.addChild(blank);
}

/** Child list, entered just past '(' */
function parseChildren(state: ParserState, node: Node): void {
  let nodeCreated = false;
  for (let count = 0; ; count++) {
    if (check(state, ',')) {
      // ',' with nothing before it stands for a blank sibling
      if (!nodeCreated) addBlankChild(state, node);
      expectToken(state);
      while (check(state, ',')) {
        addBlankChild(state, node);
        expectToken(state);
      }
      if (!nodeCreated && check(state, ')')) {
        addBlankChild(state, node);
        nodeCreated = true;
      }
    } else if (check(state, ')')) {
      // "()" is a unifurcation to a blank node
      if (count === 0) {
        const blank = state.tree.nodeFactory();
        finishNode(state, blank);
        node.addChild(blank);
      }
      state.depth--;
      advance(state);
      return;
    } else {
      const isInternal = check(state, '(');
      if (isInternal) state.depth++;
      const child = state.tree.nodeFactory();
      processComments(state, child, state.tokenizer.pullCapturedComments());
      parseNodeDescription(state, child, isInternal);
      node.addChild(child);
      nodeCreated = true;
    }
  }
}

// ============================================================
// LABEL, LENGTH AND EDGE NUMBER
// ============================================================

function parseNodeTail(
  state: ParserState,
  node: Node,
  isInternal: boolean,
  nodeComments: string[]
): void {
  const { tokenizer, options } = state;
  const comments = nodeComments;
  let labelParsed = false;
  state.complete = false;

  for (;;) {
    comments.push(...tokenizer.pullCapturedComments());
    const token = current(state);

    // end of stream with the terminating semicolon optional
    if (token === null) {
      state.complete = true;
      break;
    }

    if (isDelimiter(token, ':')) {
      parseEdgeLength(state, node);
      if (advance(state) === null) {
        state.complete = true;
        break;
      }
    } else if (isDelimiter(token, ')') || isDelimiter(token, ',')) {
      processComments(state, node, comments);
      finishNode(state, node);
      return;
    } else if (isDelimiter(token, ';')) {
      state.complete = true;
      tokenizer.nextToken();
      break;
    } else if (isDelimiter(token, '(')) {
      state.depth++;
      throw new ParseError(
        'NWK-P002',
        { detail: 'Malformed tree statement' },
        token.span.start
      );
    } else if (isDelimiter(token, '{') && options.parseJplaceTokens) {
      parseEdgeNumber(state, node);
      if (advance(state) === null) {
        state.complete = true;
        break;
      }
    } else if (token.type === TOKEN_TYPES.DELIMITER) {
      throw new ParseError(
        'NWK-P001',
        { token: token.value, expected: "a label, ':', ')', ',' or ';'" },
        token.span.start
      );
    } else {
      if (labelParsed) {
        const expected = options.parseJplaceTokens
          ? "':', '{', ')', ',' or ';'"
          : "':', ')', ',' or ';'";
        throw new ParseError(
          'NWK-P002',
          {
            detail: `Expecting ${expected} after reading label but found '${token.value}'`,
          },
          token.span.start
        );
      }
      assignLabel(state, node, isInternal, token);
      labelParsed = true;
      if (advance(state) === null) {
        state.complete = true;
        break;
      }
    }
  }

  if (state.depth !== 0) {
    throw new ParseError(
      'NWK-P002',
      {
        detail: `Unbalanced parentheses at tree statement termination: balance index = ${state.depth}`,
      },
      tokenizer.currentLocation()
    );
  }
  processComments(state, node, comments);
  finishNode(state, node);
}

/** Label becomes a taxon or a free label according to the node's role */
function assignLabel(
  state: ParserState,
  node: Node,
  isInternal: boolean,
  token: Token
): void {
  const { options } = state;
  const label = token.value;
  const suppressTaxa = isInternal
    ? options.suppressInternalNodeTaxa
    : options.suppressLeafNodeTaxa;

  if (suppressTaxa) {
    const suppressLabel = isInternal
      ? options.suppressInternalNodeLabels
      : options.suppressLeafNodeLabels;
    if (suppressLabel) return;
    if (isInternal && options.assignInternalLabelsToEdges) {
      node.edge.label = label;
    } else {
      node.label = label;
    }
    return;
  }

  const taxon = state.resolver.resolve(label);
  if (state.seenTaxa.has(taxon)) {
    throw new DuplicateTaxonError(taxon.label, token.span.start);
  }
  state.seenTaxa.add(taxon);
  node.taxon = taxon;
}

/** Entered on ':'; leaves the length token current */
function parseEdgeLength(state: ParserState, node: Node): void {
  const token = expectToken(state);
  processComments(state, node.edge, state.tokenizer.pullCapturedComments());
  if (state.options.suppressEdgeLengths) return;

  const length =
    token.type === TOKEN_TYPES.DELIMITER
      ? undefined
      : state.options.edgeLengthType === 'int'
        ? parseIntToken(token.value)
        : parseFloatToken(token.value);
  if (length === undefined) {
    throw new ParseError(
      'NWK-P004',
      { what: 'edge length', value: token.value },
      token.span.start
    );
  }
  node.edge.length = length;
}

/** Entered on '{'; leaves the closing '}' current */
function parseEdgeNumber(state: ParserState, node: Node): void {
  const token = expectToken(state);
  const edgeNumber =
    token.type === TOKEN_TYPES.WORD ? parseIntToken(token.value) : undefined;
  if (edgeNumber === undefined) {
    throw new ParseError(
      'NWK-P004',
      { what: 'edge number', value: token.value },
      token.span.start
    );
  }
  const close = expectToken(state);
  if (!isDelimiter(close, '}')) {
    throw new ParseError(
      'NWK-P001',
      { token: close.value, expected: "'}'" },
      close.span.start
    );
  }
  node.edge.edgeNumber = edgeNumber;
  state.tree.edgeIndex.set(edgeNumber, node.edge);
}
