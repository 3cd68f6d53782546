/**
 * Token scanning - cuts keys and bare scalar tokens out of a map body
 */

import { Cursor } from './cursor';
import { Token } from './types';

const TOKEN_DELIMITERS = new Set([',', '>']);
const STRUCTURAL_CHARS = new Set(['(', ')', '<', ':']);

function isKeyChar(ch: string): boolean {
  return ch >= 'a' && ch <= 'z';
}

/**
 * Scans up to the next `,`, `>` or the end of input and leaves the cursor on
 * that delimiter. The token may be empty; the classifier rejects it.
 */
export function scanToken(cursor: Cursor): Token {
  const start = cursor.position;
  while (!cursor.atEnd()) {
    const ch = cursor.peek();
    if (TOKEN_DELIMITERS.has(ch)) {
      break;
    }
    if (STRUCTURAL_CHARS.has(ch)) {
      cursor.fail('StructuralCharacter', 'Unexpected structural character inside value');
    }
    cursor.advance();
  }
  return { text: cursor.slice(start), start, end: cursor.position };
}

export function scanKey(cursor: Cursor): Token {
  const start = cursor.position;
  while (isKeyChar(cursor.peek())) {
    cursor.advance();
  }
  if (cursor.position === start) {
    cursor.fail('InvalidKey', 'Missing key');
  }
  return { text: cursor.slice(start), start, end: cursor.position };
}
