export interface Exchange {
  prompt: string;
  answer: string;
  modelId: string;
  personalityName: string;
  createdAt: number;
}

export function followUpContext(exchange: Exchange): string {
  return `User asked: ${exchange.prompt}\nAI Answered: ${exchange.answer}`;
}

/**
 * Last exchange behind each answer message, kept for follow-ups until the
 * TTL runs out. Keyed by the id of the message holding the Reply button.
 */
export class ExchangeStore {
  private exchanges = new Map<string, Exchange>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  remember(messageId: string, exchange: Omit<Exchange, 'createdAt'>): void {
    this.prune();
    this.exchanges.set(messageId, { ...exchange, createdAt: this.now() });
  }

  get(messageId: string): Exchange | undefined {
    const exchange = this.exchanges.get(messageId);
    if (!exchange) return undefined;
    if (this.isExpired(exchange)) {
      this.exchanges.delete(messageId);
      return undefined;
    }
    return exchange;
  }

  private isExpired(exchange: Exchange): boolean {
    return this.now() - exchange.createdAt >= this.ttlMs;
  }

  private prune(): void {
    for (const [messageId, exchange] of this.exchanges) {
      if (this.isExpired(exchange)) {
        this.exchanges.delete(messageId);
      }
    }
  }
}
