import { SourceLocation } from './errors';

/**
 * The whole input with its outer whitespace removed. Positions handed out by
 * the cursor refer to `text`; `locate` maps them back onto the original
 * content so diagnostics point at what the user wrote.
 */
export class SourceText {
  readonly text: string;
  readonly source?: string | undefined;
  private readonly original: string;
  private readonly leading: number;

  constructor(content: string, source?: string) {
    this.original = content;
    this.source = source;
    const start = skipOuterWhitespace(content, 0, 1);
    const end = skipOuterWhitespace(content, content.length - 1, -1) + 1;
    this.leading = start;
    this.text = start < end ? content.slice(start, end) : '';
  }

  get length(): number {
    return this.text.length;
  }

  locate(position: number): SourceLocation {
    const { row, column } = this.advance(this.leading + clamp(position, 0, this.text.length));
    return { source: this.source, row, column };
  }

  private advance(offset: number): { row: number; column: number } {
    let row = 1;
    let column = 1;
    for (let i = 0; i < offset; i += 1) {
      const ch = this.original[i];
      if (ch === '\n') {
        row += 1;
        column = 1;
      } else if (ch === '\r') {
        column = 1;
      } else {
        column += 1;
      }
    }
    return { row, column };
  }
}

// Unicode whitespace minus U+FEFF, plus the \x1c-\x1f separators and U+0085.
const OUTER_WHITESPACE = /[\t\n\v\f\r\x1c-\x1f \x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]/;

function skipOuterWhitespace(content: string, from: number, step: 1 | -1): number {
  let i = from;
  while (i >= 0 && i < content.length && OUTER_WHITESPACE.test(content.charAt(i))) {
    i += step;
  }
  return i;
}

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(Math.max(value, min), max);
}
