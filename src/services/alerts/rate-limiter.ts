// Sliding-window delivery limits per alert type

export interface RateLimits {
  perMinute: number;
  perHour: number;
  perDay: number;
}

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * Counts deliveries per key over the last minute, hour and day
 */
export class RateLimiter {
  private deliveries = new Map<string, number[]>();

  constructor(
    private readonly limits: RateLimits,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Records a delivery for the key when every window has room
   *
   * @returns false when a limit is reached; nothing is recorded then
   */
  allow(key: string): boolean {
    const now = this.now();
    const recent = (this.deliveries.get(key) ?? []).filter(ts => now - ts < DAY_MS);

    const windows: Array<[number, number]> = [
      [MINUTE_MS, this.limits.perMinute],
      [HOUR_MS, this.limits.perHour],
      [DAY_MS, this.limits.perDay]
    ];
    for (const [windowMs, limit] of windows) {
      if (recent.filter(ts => now - ts < windowMs).length >= limit) {
        this.deliveries.set(key, recent);
        return false;
      }
    }

    recent.push(now);
    this.deliveries.set(key, recent);
    return true;
  }
}
