/**
 * Append-only mutation history supporting undo.
 */

import type { LoggedEntry } from './types.js';

export class MutationLog {
  private readonly entries: LoggedEntry[] = [];

  append(entry: LoggedEntry): void {
    this.entries.push(entry);
  }

  /** Remove and return the most recent entry. */
  pop(): LoggedEntry | undefined {
    return this.entries.pop();
  }

  last(): LoggedEntry | undefined {
    return this.entries[this.entries.length - 1];
  }

  find(id: string): LoggedEntry | undefined {
    return this.entries.find((entry) => entry.id === id);
  }

  has(id: string): boolean {
    return this.entries.some((entry) => entry.id === id);
  }

  /**
   * Entries recorded after `id`, oldest first. Undefined when `id` is not
   * in the log.
   */
  entriesSince(id: string): LoggedEntry[] | undefined {
    const index = this.entries.findIndex((entry) => entry.id === id);
    if (index === -1) return undefined;
    return this.entries.slice(index + 1);
  }

  *iterEntries(): Generator<LoggedEntry> {
    yield* this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries.length = 0;
  }
}
