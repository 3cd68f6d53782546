/**
 * MapFrame - per-nesting-level state of the map parser
 */

export class MapFrame {
  readonly depth: number;
  private readonly keys: Set<string> = new Set();

  constructor(depth: number) {
    this.depth = depth;
  }

  public isFirstPair(): boolean {
    return this.keys.size === 0;
  }

  /** Records `key` for this frame; false when it was already seen here. */
  public claimKey(key: string): boolean {
    if (this.keys.has(key)) {
      return false;
    }
    this.keys.add(key);
    return true;
  }

  public child(): MapFrame {
    return new MapFrame(this.depth + 1);
  }
}
