/**
 * Text asset reader
 */

import { readFileSync } from 'node:fs';

// Unicode White_Space: includes NEL (U+0085), excludes the BOM (U+FEFF)
const SURROUNDING_WHITE_SPACE = /^\p{White_Space}+|\p{White_Space}+$/gu;

/**
 * Counts Unicode scalar values after trimming surrounding whitespace.
 * Astral characters (emoji, CJK extension planes) count once.
 */
export function countCharacters(content: string): number {
  return Array.from(content.replace(SURROUNDING_WHITE_SPACE, '')).length;
}

/** Reads a UTF-8 text file and returns its trimmed character count. Throws on I/O errors. */
export function readCharacterCount(filePath: string): number {
  return countCharacters(readFileSync(filePath, 'utf-8'));
}
