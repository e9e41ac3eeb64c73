/**
 * Snapshot of a population taken right after a mass transfer.
 */
export interface PopulationHistoryEntry {
  readonly mass: number;
  readonly massIn: number;
  readonly massOut: number;
  /** Group hash to group mass. */
  readonly groups: ReadonlyMap<string, number>;
}

/**
 * Bounded, most-recent-last list of population snapshots. A capacity of
 * zero disables archiving.
 */
export class PopulationHistory {
  private entries: PopulationHistoryEntry[] = [];

  constructor(public readonly capacity: number) {}

  public get length(): number {
    return this.entries.length;
  }

  public push(entry: PopulationHistoryEntry): void {
    if (this.capacity === 0) return;
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.shift();
    }
  }

  /**
   * Entry `delta` steps back; 1 is the most recent one.
   */
  public get(delta: number): PopulationHistoryEntry | undefined {
    if (delta < 1 || delta > this.entries.length) {
      return undefined;
    }
    return this.entries[this.entries.length - delta];
  }

  public clear(): void {
    this.entries = [];
  }
}
