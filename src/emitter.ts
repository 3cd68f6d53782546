import { OutputEvent } from './types';

export function formatEvent(event: OutputEvent): string {
  switch (event.type) {
    case 'begin-map':
      return 'begin-map';
    case 'end-map':
      return 'end-map';
    case 'num':
      return `${event.key} -- num -- ${event.value.toString()}`;
    case 'string':
      return `${event.key} -- string -- ${event.value}`;
    case 'map':
      return `${event.key} -- map -- `;
  }
}

/** LF after every line, nothing for an empty list. */
export function renderLines(lines: readonly string[]): string {
  return lines.map(line => `${line}\n`).join('');
}

/**
 * Records events in the order the parser reports them. A failed parse simply
 * drops its emitter; nothing here is flushed anywhere.
 */
export class Emitter {
  private readonly recorded: OutputEvent[] = [];

  get events(): readonly OutputEvent[] {
    return this.recorded;
  }

  beginMap(): void {
    this.recorded.push({ type: 'begin-map' });
  }

  endMap(): void {
    this.recorded.push({ type: 'end-map' });
  }

  map(key: string): void {
    this.recorded.push({ type: 'map', key });
  }

  num(key: string, value: bigint): void {
    this.recorded.push({ type: 'num', key, value });
  }

  string(key: string, value: string): void {
    this.recorded.push({ type: 'string', key, value });
  }

  lines(): string[] {
    return this.recorded.map(formatEvent);
  }
}
