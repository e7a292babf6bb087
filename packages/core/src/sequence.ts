/**
 * Monotonic per-key counters used to assign record ids
 */
export class IdSequence {
  private counters = new Map<string, number>();

  /** Returns the next ordinal for `key`, starting at 0 */
  next(key: string): number {
    const value = this.counters.get(key) ?? 0;
    this.counters.set(key, value + 1);
    return value;
  }

  /** Builds `<key>_<n>` from the next ordinal */
  nextId(key: string): string {
    return `${key}_${this.next(key)}`;
  }

  peek(key: string): number {
    return this.counters.get(key) ?? 0;
  }
}
