export class Backoff {
  /** Delay before retry number `attempt` (0-based): base, 2x base, 4x base... */
  static delayFor(attempt: number, baseMs: number): number {
    return baseMs * 2 ** attempt;
  }

  static async sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
