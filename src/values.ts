/**
 * Scalar classification and decoding for bare value tokens
 */

import { raiseParseError } from './errors';
import { SourceText } from './source';
import { ScalarValue, Token } from './types';

const BINARY_REGEX = /^[01]+$/;
const SIMPLE_STRING_REGEX = /^([A-Za-z0-9 \t]+)s$/;
const HEX_PAIR_REGEX = /^[0-9a-fA-F]{2}$/;

export type PercentDecodeResult =
  | { ok: true; value: string; escapes: number }
  | { ok: false; index: number; reason: string };

/**
 * Reads `bits` as an n-bit two's-complement integer. Returns null for
 * anything that is not a non-empty run of 0 and 1.
 */
export function decodeTwosComplement(bits: string): bigint | null {
  if (!BINARY_REGEX.test(bits)) {
    return null;
  }
  const unsigned = BigInt(`0b${bits}`);
  if (bits[0] === '1') {
    return unsigned - (1n << BigInt(bits.length));
  }
  return unsigned;
}

export function decodeSimpleString(token: string): string | null {
  const match = token.match(SIMPLE_STRING_REGEX);
  return match ? match[1] ?? null : null;
}

/**
 * Replaces every `%XX` with the byte it names and keeps other characters as
 * their own byte. Bytes come back one per character, 0-255. Text without a
 * single escape is not a complex string and fails.
 */
export function decodePercentEncoded(token: string): PercentDecodeResult {
  let value = '';
  let escapes = 0;
  let i = 0;
  while (i < token.length) {
    const ch = token.charAt(i);
    if (ch === '%') {
      const hex = token.slice(i + 1, i + 3);
      if (!HEX_PAIR_REGEX.test(hex)) {
        return { ok: false, index: i, reason: 'Invalid percent-encoding in complex string' };
      }
      value += String.fromCharCode(parseInt(hex, 16));
      escapes += 1;
      i += 3;
      continue;
    }
    if (ch.charCodeAt(0) > 0xff) {
      return { ok: false, index: i, reason: 'Invalid byte in complex string' };
    }
    value += ch;
    i += 1;
  }
  if (escapes === 0) {
    return { ok: false, index: 0, reason: 'Complex string must contain at least one %XX' };
  }
  return { ok: true, value, escapes };
}

function hasWhitespace(token: string): boolean {
  return token.includes(' ') || token.includes('\t');
}

// Order matters: '%' wins over whitespace, whitespace over digits.
export function classifyToken(token: Token, input: SourceText): ScalarValue {
  const { text } = token;

  if (text.includes('%')) {
    const decoded = decodePercentEncoded(text);
    if (!decoded.ok) {
      raiseParseError('InvalidComplexString', decoded.reason, input.locate(token.start + decoded.index));
    }
    return { kind: 'complex-string', value: decoded.value };
  }

  if (hasWhitespace(text)) {
    const value = decodeSimpleString(text);
    if (value === null) {
      raiseParseError('WhitespaceOutsideSimpleString', 'Whitespace outside simple-string', input.locate(token.start));
    }
    return { kind: 'simple-string', value };
  }

  const num = decodeTwosComplement(text);
  if (num !== null) {
    return { kind: 'num', value: num };
  }

  const value = decodeSimpleString(text);
  if (value === null) {
    raiseParseError('UnrecognizedToken', 'Unrecognized value token', input.locate(token.start));
  }
  return { kind: 'simple-string', value };
}
