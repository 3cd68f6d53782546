import { NosjError, NosjParserOptions, loads } from '../src/index';

/**
 * Runs `fn` and returns the NosjError it throws; anything else fails the test.
 */
export function captureNosjError(fn: () => unknown): NosjError {
  try {
    fn();
  } catch (error) {
    if (error instanceof NosjError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a NosjError to be thrown');
}

export function parseError(content: string, options?: NosjParserOptions): NosjError {
  return captureNosjError(() => loads(content, options));
}

/**
 * Walks begin-map/end-map lines with a counter; -1 means the counter went
 * negative or did not return to zero.
 */
export function maxNesting(lines: readonly string[]): number {
  let open = 0;
  let deepest = 0;
  for (const line of lines) {
    if (line === 'begin-map') {
      open += 1;
      deepest = Math.max(deepest, open);
    } else if (line === 'end-map') {
      open -= 1;
      if (open < 0) {
        return -1;
      }
    }
  }
  return open === 0 ? deepest : -1;
}

export function nestedDocument(depth: number): string {
  return `(<${'a:(<'.repeat(depth - 1)}${'>)'.repeat(depth)}`;
}
