export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface LatencyOptions {
  delayMs: number;
  sleep?: Sleep;
}

/**
 * Makes every other applied payment slow (indices 0, 2, 4 ...), long enough
 * for a client with a short timeout to give up after the mutation has
 * already committed. Owned per server instance.
 */
export class AlternatingLatency {
  private invocations = 0;
  private readonly delayMs: number;
  private readonly sleep: Sleep;

  constructor(opts: LatencyOptions) {
    this.delayMs = opts.delayMs;
    this.sleep = opts.sleep ?? sleep;
  }

  async afterApply(): Promise<boolean> {
    // Counted before sleeping so a retry that lands mid-sleep takes the fast path
    const index = this.invocations++;
    if (index % 2 !== 0 || this.delayMs <= 0) return false;
    await this.sleep(this.delayMs);
    return true;
  }

  get count(): number {
    return this.invocations;
  }
}
