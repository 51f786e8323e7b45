/**
 * Character Sources
 * Single-character pull interface the tokenizer reads from
 */

import { readFileSync } from 'node:fs';

export interface CharacterSource {
  /** Next character, or '' once the input is exhausted */
  read(): string;
}

export function createStringSource(text: string): CharacterSource {
  let pos = 0;
  return {
    read(): string {
      const ch = text.charAt(pos);
      if (ch !== '') pos++;
      return ch;
    },
  };
}

/** Reads the whole file up front */
export function createFileSource(
  path: string,
  encoding: BufferEncoding = 'utf8'
): CharacterSource {
  return createStringSource(readFileSync(path, encoding));
}

export function toCharacterSource(
  input: string | CharacterSource
): CharacterSource {
  return typeof input === 'string' ? createStringSource(input) : input;
}
