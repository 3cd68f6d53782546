/**
 * Type definitions for the nosj decoder
 */

// A scalar token as cut out of the trimmed input, [start, end)
export interface Token {
  text: string;
  start: number;
  end: number;
}

export type ScalarValue =
  | { kind: 'num'; value: bigint }
  | { kind: 'simple-string'; value: string }
  | { kind: 'complex-string'; value: string };

export type OutputEvent =
  | { type: 'begin-map' }
  | { type: 'end-map' }
  | { type: 'num'; key: string; value: bigint }
  | { type: 'string'; key: string; value: string }
  | { type: 'map'; key: string };

// Parser configuration options
export interface NosjParserOptions {
  /** Deepest map nesting accepted; the top-level map is depth 1. Defaults to 512. */
  maxDepth?: number;
  /** Name shown in diagnostics, usually the input path. */
  source?: string;
}
