export class CancellationToken {
  private cancelled = false;

  constructor(readonly sessionId: string) {}

  get isCancelled(): boolean {
    return this.cancelled;
  }

  cancel(): void {
    this.cancelled = true;
  }
}

/**
 * Tokens for the sessions this process is running. The launcher owns one registry;
 * entries are dropped once a run settles so finished sessions do not accumulate.
 */
export class CancellationRegistry {
  private readonly tokens = new Map<string, CancellationToken>();

  register(sessionId: string): CancellationToken {
    const existing = this.tokens.get(sessionId);
    if (existing) {
      return existing;
    }

    const token = new CancellationToken(sessionId);
    this.tokens.set(sessionId, token);
    return token;
  }

  get(sessionId: string): CancellationToken | null {
    return this.tokens.get(sessionId) ?? null;
  }

  cancel(sessionId: string): boolean {
    const token = this.tokens.get(sessionId);
    if (!token) {
      return false;
    }

    token.cancel();
    return true;
  }

  release(sessionId: string): void {
    this.tokens.delete(sessionId);
  }

  get size(): number {
    return this.tokens.size;
  }
}
