/**
 * NEXUS Tokenizer
 * Tokenizer profile for NEXUS and Newick text
 */

import type { Annotated } from '../model/annotation.js';
import { processCommentsForItem } from '../parser/metadata.js';
import type { CharacterSource } from './source.js';
import { isDelimiter, type Token } from './token.js';
import { Tokenizer } from './tokenizer.js';

export interface NexusTokenizerOptions {
  /** Keep '_' in unquoted tokens. Default: false */
  preserveUnquotedUnderscores?: boolean | undefined;
}

const EOL_CHARS = ['\n', '\r'];

export class NexusTokenizer extends Tokenizer {
  constructor(
    input: string | CharacterSource,
    options: NexusTokenizerOptions = {}
  ) {
    super(input, {
      uncapturedDelimiters: ' \t\n\r',
      capturedDelimiters: '(),;:={}',
      quoteChars: '\'"',
      escapeQuoteByDoubling: true,
      commentBegin: '[',
      commentEnd: ']',
      captureComments: true,
      preserveUnquotedUnderscores: options.preserveUnquotedUnderscores ?? false,
    });
  }

  // ============================================================
  // MODE TOGGLES
  // ============================================================

  /** Return line breaks as delimiter tokens instead of skipping them */
  setCaptureEol(capture: boolean): void {
    const { capturedDelimiters, uncapturedDelimiters } = this.config;
    for (const ch of EOL_CHARS) {
      if (capture) {
        uncapturedDelimiters.delete(ch);
        capturedDelimiters.add(ch);
      } else {
        capturedDelimiters.delete(ch);
        uncapturedDelimiters.add(ch);
      }
    }
  }

  setHyphensAsCapturedDelimiters(capture: boolean): void {
    if (capture) {
      this.config.capturedDelimiters.add('-');
    } else {
      this.config.capturedDelimiters.delete('-');
    }
  }

  // ============================================================
  // CASE-FOLDED ACCESS
  // ============================================================

  nextTokenUcase(): Token | null {
    this.nextToken();
    return this.castCurrentTokenToUcase();
  }

  requireNextTokenUcase(): Token {
    return this.foldCase(this.requireNextToken());
  }

  /** Upper-case the current token's value; its raw text is kept */
  castCurrentTokenToUcase(): Token | null {
    return this.token === null ? null : this.foldCase(this.token);
  }

  private foldCase(token: Token): Token {
    this.token = { ...token, value: token.raw.toUpperCase() };
    return this.token;
  }

  // ============================================================
  // STATEMENT HELPERS
  // ============================================================

  /** Skip tokens up to and including the next ';' */
  skipToSemicolon(): void {
    let token = this.nextToken();
    while (token !== null && !isDelimiter(token, ';')) {
      token = this.nextToken();
    }
  }

  processAndClearCommentsForItem(
    item: Annotated,
    extractMetadata: boolean
  ): void {
    processCommentsForItem(item, this.pullCapturedComments(), extractMetadata);
  }
}
