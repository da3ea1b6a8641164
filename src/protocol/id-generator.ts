/**
 * Monotonic ID Generator
 *
 * Generates unique, time-ordered message, thread and artifact ids.
 *
 * Format: <PREFIX>-<timestamp-base36>-<counter-base36>-<nodeId>
 * Example: "MSG-LXYZ5G8-0001-7D2A"
 */

export class IdGenerator {
  private counter = 0;
  private readonly node: string;
  private lastTs = 0;
  private readonly clock: () => number;

  constructor(nodeId?: string, clock: () => number = Date.now) {
    // Process ID + random suffix keeps ids distinct across processes
    this.node = (nodeId ?? `${process.pid.toString(36)}${Math.random().toString(36).slice(2, 6)}`).toUpperCase();
    this.clock = clock;
  }

  /**
   * Generate a unique, monotonically increasing id with the given prefix.
   */
  next(prefix: string): string {
    const now = this.clock();

    if (now !== this.lastTs) {
      this.lastTs = now;
      this.counter = 0;
    }

    const ts = now.toString(36).toUpperCase();
    const seq = (this.counter++).toString(36).toUpperCase().padStart(4, '0');
    return `${prefix}-${ts}-${seq}-${this.node}`;
  }

  messageId(): string {
    return this.next('MSG');
  }

  threadId(): string {
    return this.next('THREAD');
  }
}

// Shared instance for callers that do not inject their own
export const idGen = new IdGenerator();
