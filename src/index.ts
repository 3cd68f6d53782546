/**
 * nosj - marshalled map decoder
 * Main entry point for the library
 */

export { NosjParser, load, loads, decodeEvents, DEFAULT_MAX_DEPTH } from './parser';
export { NosjError, NosjInputError } from './errors';
export type { ParseErrorKind, InputErrorKind, SourceLocation } from './errors';
export { Emitter, formatEvent, renderLines } from './emitter';
export { decodeTwosComplement, decodeSimpleString, decodePercentEncoded, classifyToken } from './values';
export type { PercentDecodeResult } from './values';
export type { NosjParserOptions, OutputEvent, ScalarValue, Token } from './types';

// Default export for convenience
export { loads as default } from './parser';
