// Single-fire latch.

/**
 * Runs a side effect at most once.
 *
 * Every trigger that may finish a call (Ack, timer, local cancel, inbound
 * Cancel, disconnect) goes through `tryComplete`; only the first one wins.
 */
export class Latch<T = void> {
  private fired = false;

  constructor(private readonly effect: (value: T) => void) {}

  /** Whether the latch has fired. */
  get completed(): boolean {
    return this.fired;
  }

  /**
   * Fire the latch.
   *
   * The flag is set before the effect runs, so a re-entrant call from
   * inside the effect already loses.
   *
   * @returns true if this call won, false if the latch had already fired
   */
  tryComplete(value: T): boolean {
    if (this.fired) return false;
    this.fired = true;
    this.effect(value);
    return true;
  }
}
