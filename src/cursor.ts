import { ParseErrorKind, raiseParseError } from './errors';
import { SourceText } from './source';

/**
 * Forward-only position over a {@link SourceText}. One cursor belongs to one
 * parse; nothing here ever moves backwards.
 */
export class Cursor {
  private readonly input: SourceText;
  private offset = 0;

  constructor(input: SourceText) {
    this.input = input;
  }

  get position(): number {
    return this.offset;
  }

  get sourceText(): SourceText {
    return this.input;
  }

  peek(offset = 0): string {
    return this.input.text.charAt(this.offset + offset);
  }

  startsWith(expected: string): boolean {
    return this.input.text.startsWith(expected, this.offset);
  }

  atEnd(): boolean {
    return this.offset >= this.input.length;
  }

  advance(count = 1): void {
    this.offset = Math.min(this.offset + count, this.input.length);
  }

  consumeExact(expected: string, kind: ParseErrorKind, message: string): void {
    if (!this.startsWith(expected)) {
      this.fail(kind, message);
    }
    this.offset += expected.length;
  }

  slice(start: number, end: number = this.offset): string {
    return this.input.text.slice(start, end);
  }

  fail(kind: ParseErrorKind, message: string, at: number = this.offset): never {
    raiseParseError(kind, message, this.input.locate(at));
  }
}
