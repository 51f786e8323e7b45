/**
 * Tokenizer
 * Delimiter, quote and comment aware splitting of a character stream
 */

import {
  ConfigError,
  UnexpectedEndOfStreamError,
  UnterminatedQuoteError,
} from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';
import { toCharacterSource, type CharacterSource } from './source.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
} from './state.js';
import { TOKEN_TYPES, type Token, type TokenType } from './token.js';

// ============================================================
// CONFIGURATION
// ============================================================

/**
 * Character classes driving the tokenizer. Each string is a set of
 * single characters; the sets must not overlap.
 */
export interface TokenizerConfig {
  /** Skipped silently between tokens. Default: space, tab, CR, LF */
  uncapturedDelimiters?: string | undefined;
  /** Returned as one-character tokens. Default: ( ) , ; : */
  capturedDelimiters?: string | undefined;
  /** Default: ' and " */
  quoteChars?: string | undefined;
  /** Two quote characters inside a quoted literal yield one. Default: false */
  escapeQuoteByDoubling?: boolean | undefined;
  /** '' disables comments. Default: [ */
  commentBegin?: string | undefined;
  /** Default: ] */
  commentEnd?: string | undefined;
  /** Keep comment text for pullCapturedComments(). Default: false */
  captureComments?: boolean | undefined;
  /** Keep '_' in unquoted tokens instead of mapping it to a space. Default: false */
  preserveUnquotedUnderscores?: boolean | undefined;
}

export interface ResolvedTokenizerConfig {
  readonly uncapturedDelimiters: Set<string>;
  readonly capturedDelimiters: Set<string>;
  readonly quoteChars: Set<string>;
  readonly escapeQuoteByDoubling: boolean;
  readonly commentBegin: string;
  readonly commentEnd: string;
  readonly captureComments: boolean;
  readonly preserveUnquotedUnderscores: boolean;
}

function isSingleChar(value: string): boolean {
  return value.length === 1;
}

/**
 * Validate config and fill defaults.
 * @throws ConfigError on overlapping classes or malformed comment markers
 */
export function resolveTokenizerConfig(
  config: TokenizerConfig = {}
): ResolvedTokenizerConfig {
  const uncaptured = new Set(config.uncapturedDelimiters ?? ' \t\n\r');
  const captured = new Set(config.capturedDelimiters ?? '(),;:');
  const quotes = new Set(config.quoteChars ?? '\'"');
  const commentBegin = config.commentBegin ?? '[';
  const commentEnd = config.commentEnd ?? ']';

  if ((commentBegin === '') !== (commentEnd === '')) {
    throw new ConfigError(
      'commentBegin and commentEnd must both be set or both be empty'
    );
  }
  if (commentBegin !== '') {
    if (!isSingleChar(commentBegin) || !isSingleChar(commentEnd)) {
      throw new ConfigError('comment markers must be single characters');
    }
    if (commentBegin === commentEnd) {
      throw new ConfigError('commentBegin and commentEnd must differ');
    }
  }

  const classes: [string, Set<string>][] = [
    ['uncapturedDelimiters', uncaptured],
    ['capturedDelimiters', captured],
    ['quoteChars', quotes],
    ['comment markers', new Set([commentBegin, commentEnd].filter(isSingleChar))],
  ];
  const owner = new Map<string, string>();
  for (const [name, chars] of classes) {
    for (const ch of chars) {
      const other = owner.get(ch);
      if (other !== undefined) {
        throw new ConfigError(
          `character '${ch}' appears in both ${other} and ${name}`
        );
      }
      owner.set(ch, name);
    }
  }

  return {
    uncapturedDelimiters: uncaptured,
    capturedDelimiters: captured,
    quoteChars: quotes,
    escapeQuoteByDoubling: config.escapeQuoteByDoubling ?? false,
    commentBegin,
    commentEnd,
    captureComments: config.captureComments ?? false,
    preserveUnquotedUnderscores: config.preserveUnquotedUnderscores ?? false,
  };
}

// ============================================================
// TOKENIZER
// ============================================================

/**
 * Pull tokenizer over a character source.
 *
 * Comments never appear as tokens. With captureComments on, their text
 * collects in a side channel drained by pullCapturedComments().
 */
export class Tokenizer {
  protected readonly state: LexerState;
  protected readonly config: ResolvedTokenizerConfig;
  protected token: Token | null = null;
  private captured: string[] = [];

  constructor(input: string | CharacterSource, config: TokenizerConfig = {}) {
    this.config = resolveTokenizerConfig(config);
    this.state = createLexerState(toCharacterSource(input));
  }

  /** Last token returned, null before the first read and at end of stream */
  get currentToken(): Token | null {
    return this.token;
  }

  isEof(): boolean {
    return isAtEnd(this.state);
  }

  currentLocation(): SourceLocation {
    return currentLocation(this.state);
  }

  /** Next token, or null at end of stream */
  nextToken(): Token | null {
    const state = this.state;
    const { uncapturedDelimiters, capturedDelimiters, quoteChars } =
      this.config;

    for (;;) {
      while (!isAtEnd(state) && uncapturedDelimiters.has(state.ch)) {
        advance(state);
      }
      if (isAtEnd(state)) {
        this.token = null;
        return null;
      }

      const ch = state.ch;
      if (ch === this.config.commentBegin) {
        this.skipComment();
        continue;
      }

      const start = currentLocation(state);
      if (capturedDelimiters.has(ch)) {
        advance(state);
        return this.emit(TOKEN_TYPES.DELIMITER, ch, start);
      }
      if (quoteChars.has(ch)) {
        return this.emit(TOKEN_TYPES.QUOTED, this.readQuoted(start), start);
      }

      const word = this.readWord();
      if (word !== '') {
        return this.emit(TOKEN_TYPES.WORD, word, start);
      }
      // only comments were found; keep scanning
    }
  }

  /** @throws UnexpectedEndOfStreamError when no token remains */
  requireNextToken(): Token {
    const token = this.nextToken();
    if (token === null) {
      throw new UnexpectedEndOfStreamError(currentLocation(this.state));
    }
    return token;
  }

  // ============================================================
  // CAPTURED COMMENTS
  // ============================================================

  /** Drain captured comments in the order they were read */
  pullCapturedComments(): string[] {
    const comments = this.captured;
    this.captured = [];
    return comments;
  }

  clearCapturedComments(): void {
    this.captured = [];
  }

  hasCapturedComments(): boolean {
    return this.captured.length > 0;
  }

  // ============================================================
  // READERS
  // ============================================================

  protected emit(type: TokenType, value: string, start: SourceLocation): Token {
    this.token = {
      type,
      value,
      raw: value,
      span: { start, end: currentLocation(this.state) },
    };
    return this.token;
  }

  private readQuoted(start: SourceLocation): string {
    const state = this.state;
    const quote = advance(state);
    let value = '';
    for (;;) {
      if (isAtEnd(state)) {
        throw new UnterminatedQuoteError(quote, start);
      }
      const ch = advance(state);
      if (ch === quote) {
        if (this.config.escapeQuoteByDoubling && state.ch === quote) {
          value += advance(state);
          continue;
        }
        return value;
      }
      value += ch;
    }
  }

  private readWord(): string {
    const state = this.state;
    const { uncapturedDelimiters, capturedDelimiters, quoteChars } =
      this.config;
    let value = '';
    while (!isAtEnd(state)) {
      const ch = state.ch;
      if (ch === this.config.commentBegin) {
        this.skipComment();
        continue;
      }
      if (
        uncapturedDelimiters.has(ch) ||
        capturedDelimiters.has(ch) ||
        quoteChars.has(ch)
      ) {
        break;
      }
      advance(state);
      value += ch === '_' && !this.config.preserveUnquotedUnderscores ? ' ' : ch;
    }
    return value;
  }

  /**
   * Consume a comment starting at the current begin marker. Nested markers
   * stay in the captured text; an unterminated comment runs to end of stream.
   */
  private skipComment(): void {
    const state = this.state;
    const { commentBegin, commentEnd } = this.config;
    advance(state);
    let depth = 1;
    let content = '';
    while (!isAtEnd(state)) {
      const ch = advance(state);
      if (ch === commentBegin) {
        depth++;
      } else if (ch === commentEnd) {
        depth--;
        if (depth === 0) break;
      }
      content += ch;
    }
    if (this.config.captureComments) {
      this.captured.push(content);
    }
  }
}
