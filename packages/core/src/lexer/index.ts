/**
 * Lexer Module
 * Converts character streams into Newick/NEXUS tokens
 */

export { NexusTokenizer, type NexusTokenizerOptions } from './nexus-tokenizer.js';
export {
  createFileSource,
  createStringSource,
  toCharacterSource,
  type CharacterSource,
} from './source.js';
export { createLexerState, type LexerState } from './state.js';
export { isDelimiter, TOKEN_TYPES, type Token, type TokenType } from './token.js';
export {
  resolveTokenizerConfig,
  Tokenizer,
  type ResolvedTokenizerConfig,
  type TokenizerConfig,
} from './tokenizer.js';
