/**
 * Accepts one request per window. Used to drop the repeated `add_tab` clicks a
 * double-click or a reconnecting client produces.
 */
export class RequestDebouncer {
  private lastAccepted: number | null = null;

  constructor(
    private readonly windowMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  /** True if the request may proceed; records it as the latest accepted one. */
  tryAcquire(): boolean {
    const time = this.now();
    if (this.lastAccepted !== null && time - this.lastAccepted < this.windowMs) {
      return false;
    }
    this.lastAccepted = time;
    return true;
  }
}
