/**
 * Token Types
 */

import type { SourceSpan } from '../source-location.js';

export const TOKEN_TYPES = {
  /** One captured delimiter character: ( ) , ; : = { } */
  DELIMITER: 'DELIMITER',
  /** Quoted literal, quotes removed and doubled quotes collapsed */
  QUOTED: 'QUOTED',
  /** Run of ordinary characters */
  WORD: 'WORD',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  /** Token text; upper-cased by the case-folding accessors */
  readonly value: string;
  /** Token text as read */
  readonly raw: string;
  readonly span: SourceSpan;
}

/** True when token is the captured delimiter ch (quoted text never matches) */
export function isDelimiter(token: Token | null, ch: string): boolean {
  return (
    token !== null && token.type === TOKEN_TYPES.DELIMITER && token.value === ch
  );
}
