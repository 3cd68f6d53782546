/**
 * nosj Parser - recursive-descent decoder for marshalled maps
 *
 * Main entry points: load(path) and loads(content)
 */

import * as fs from 'fs';
import { NosjInputError } from './errors';
import { NosjParserOptions, OutputEvent } from './types';
import { SourceText } from './source';
import { Cursor } from './cursor';
import { MapFrame } from './context';
import { Emitter } from './emitter';
import { scanKey, scanToken } from './lexer';
import { classifyToken } from './values';

export const DEFAULT_MAX_DEPTH = 512;

const OPEN_MAP = '(<';

// ============================================================================
// MapParser - one parse over one input
// ============================================================================

class MapParser {
  private readonly cursor: Cursor;
  private readonly emitter: Emitter;
  private readonly maxDepth: number;

  constructor(input: SourceText, emitter: Emitter, maxDepth: number) {
    this.cursor = new Cursor(input);
    this.emitter = emitter;
    this.maxDepth = maxDepth;
  }

  parseDocument(): void {
    const cursor = this.cursor;
    if (!cursor.startsWith(OPEN_MAP)) {
      cursor.fail('MalformedDelimiters', "Map must start with '(<'");
    }
    cursor.advance(OPEN_MAP.length);

    this.emitter.beginMap();
    this.parseBody(new MapFrame(1));

    cursor.consumeExact(')', 'MalformedDelimiters', "Map must end with ')'");
    if (!cursor.atEnd()) {
      cursor.fail('TrailingCharacters', 'Trailing characters after top-level map');
    }
    this.emitter.endMap();
  }

  // Cursor sits just past '<'; returns once the matching '>' is consumed.
  private parseBody(frame: MapFrame): void {
    const cursor = this.cursor;
    while (true) {
      if (cursor.peek() === '>') {
        cursor.advance();
        return;
      }

      if (!frame.isFirstPair()) {
        cursor.consumeExact(',', 'ExpectedComma', "Expected ',' between key-value pairs");
      }

      const key = scanKey(cursor);
      if (!frame.claimKey(key.text)) {
        cursor.fail('DuplicateKey', 'Duplicate key in map', key.start);
      }

      cursor.consumeExact(':', 'ExpectedColon', "Expected ':' after key");

      if (cursor.startsWith(OPEN_MAP)) {
        this.parseNestedMap(key.text, frame);
      } else {
        this.parseScalar(key.text);
      }
    }
  }

  private parseNestedMap(key: string, parent: MapFrame): void {
    const cursor = this.cursor;
    const frame = parent.child();
    if (frame.depth > this.maxDepth) {
      cursor.fail('NestingTooDeep', `Maximum nesting depth of ${this.maxDepth} exceeded`);
    }

    this.emitter.map(key);
    this.emitter.beginMap();
    cursor.advance(OPEN_MAP.length);
    this.parseBody(frame);
    cursor.consumeExact(')', 'ExpectedCloseParen', "Expected ')' after nested map");
    this.emitter.endMap();
  }

  private parseScalar(key: string): void {
    const token = scanToken(this.cursor);
    const scalar = classifyToken(token, this.cursor.sourceText);
    if (scalar.kind === 'num') {
      this.emitter.num(key, scalar.value);
    } else {
      this.emitter.string(key, scalar.value);
    }
  }
}

// ============================================================================
// Public API
// ============================================================================

export class NosjParser {
  private events: readonly OutputEvent[] | null = null;
  private readonly options: NosjParserOptions;
  private readonly maxDepth: number;

  constructor(options: NosjParserOptions = {}) {
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`);
    }
    this.options = options;
    this.maxDepth = maxDepth;
  }

  public static parse(content: string, options?: NosjParserOptions): string[] {
    const parser = new NosjParser(options);
    return parser.parseContent(content);
  }

  public static parseFile(filePath: string, options?: NosjParserOptions): string[] {
    const parser = new NosjParser(options);
    return parser.parseFile(filePath);
  }

  public parseContent(content: string, source: string | undefined = this.options.source): string[] {
    const emitter = new Emitter();
    const parser = new MapParser(new SourceText(content, source), emitter, this.maxDepth);
    parser.parseDocument();
    this.events = emitter.events;
    return emitter.lines();
  }

  public parseFile(filePath: string): string[] {
    const content = readInput(filePath);
    return this.parseContent(content, this.options.source ?? filePath);
  }

  public getEvents(): readonly OutputEvent[] {
    if (!this.events) {
      throw new Error('No events recorded. Call parseContent or parseFile first.');
    }
    return this.events;
  }
}

function readInput(filePath: string): string {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    throw new NosjInputError('FileNotFound', 'file not found', filePath);
  }
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new NosjInputError('Unreadable', `unable to read file: ${detail}`, filePath);
  }
}

export function load(filePath: string, options?: NosjParserOptions): string[] {
  return NosjParser.parseFile(filePath, options);
}

export function loads(content: string, options?: NosjParserOptions): string[] {
  return NosjParser.parse(content, options);
}

export function decodeEvents(content: string, options?: NosjParserOptions): readonly OutputEvent[] {
  const parser = new NosjParser(options);
  parser.parseContent(content);
  return parser.getEvents();
}
