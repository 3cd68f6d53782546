export type ParseErrorKind =
  | 'MalformedDelimiters'
  | 'StructuralCharacter'
  | 'ExpectedColon'
  | 'ExpectedComma'
  | 'ExpectedCloseParen'
  | 'InvalidKey'
  | 'DuplicateKey'
  | 'InvalidComplexString'
  | 'WhitespaceOutsideSimpleString'
  | 'UnrecognizedToken'
  | 'TrailingCharacters'
  | 'NestingTooDeep';

export type InputErrorKind = 'MissingInputFile' | 'FileNotFound' | 'Unreadable';

export interface SourceLocation {
  source?: string | undefined;
  row?: number | undefined;
  column?: number | undefined;
}

export class NosjError extends Error {
  readonly kind: ParseErrorKind;
  readonly reason: string;
  source?: string | undefined;
  row?: number | undefined;
  column?: number | undefined;

  constructor(kind: ParseErrorKind, reason: string, location: SourceLocation = {}) {
    super(`${locationPrefix(location)}${reason}`);
    this.name = 'NosjError';
    this.kind = kind;
    this.reason = reason;
    this.source = location.source;
    this.row = location.row;
    this.column = location.column;
  }
}

/**
 * Failure to obtain the input at all. Kept apart from {@link NosjError} so
 * callers can tell a missing file from a malformed one.
 */
export class NosjInputError extends Error {
  readonly kind: InputErrorKind;
  readonly path?: string | undefined;

  constructor(kind: InputErrorKind, message: string, path?: string) {
    super(message);
    this.name = 'NosjInputError';
    this.kind = kind;
    this.path = path;
  }
}

// `source:row:column - `; a column without a row is never shown.
function locationPrefix({ source, row, column }: SourceLocation): string {
  const segments: Array<string | number> = source ? [source] : [];
  if (row !== undefined) {
    segments.push(row);
    if (column !== undefined) {
      segments.push(column);
    }
  }
  return segments.length === 0 ? '' : `${segments.join(':')} - `;
}

export function raiseParseError(kind: ParseErrorKind, reason: string, location: SourceLocation = {}): never {
  throw new NosjError(kind, reason, location);
}
