/**
 * Size-1 cache for the resident model. A miss is a switch, the first
 * load included.
 */
export class WarmSlot<K> {
  private key: K | null = null;
  private hitCount = 0;
  private missCount = 0;
  private switchTimes: number[] = [];

  /**
   * Mark `key` as the resident entry.
   */
  touch(key: K): { hit: boolean; previous: K | null } {
    const previous = this.key;
    if (previous !== null && previous === key) {
      this.hitCount++;
      return { hit: true, previous };
    }
    this.missCount++;
    this.key = key;
    return { hit: false, previous };
  }

  recordSwitch(durationMs: number): void {
    this.switchTimes.push(durationMs);
  }

  get current(): K | null {
    return this.key;
  }

  get hits(): number {
    return this.hitCount;
  }

  get misses(): number {
    return this.missCount;
  }

  get switchCount(): number {
    return this.switchTimes.length;
  }

  get totalSwitchTime(): number {
    return this.switchTimes.reduce((sum, ms) => sum + ms, 0);
  }

  get averageSwitchTime(): number {
    return this.switchTimes.length === 0 ? 0 : this.totalSwitchTime / this.switchTimes.length;
  }

  clear(): void {
    this.key = null;
    this.hitCount = 0;
    this.missCount = 0;
    this.switchTimes = [];
  }
}
