import { Injectable, Logger } from '@nestjs/common';
import { sleep } from '@/shared/lib/util';

/**
 * Per-origin politeness shared by every job in the process.
 * Callers for one origin are serialized through a promise chain, and each
 * waits until `delayMs` has passed since the previous fetch to that origin.
 * An origin nobody is waiting on is forgotten once its delay has elapsed.
 */
@Injectable()
export class HostThrottleService {
  private readonly logger = new Logger(HostThrottleService.name);
  private readonly tails = new Map<string, Promise<void>>();
  private readonly lastFetch = new Map<string, number>();

  async acquire(origin: string, delayMs: number): Promise<void> {
    const previous = this.tails.get(origin) ?? Promise.resolve();
    const turn = previous.then(() => this.waitTurn(origin, delayMs));
    this.tails.set(origin, turn);

    try {
      await turn;
    } finally {
      if (this.tails.get(origin) === turn) {
        this.tails.delete(origin);
        this.forgetLater(origin, delayMs);
      }
    }
  }

  lastFetchAt(origin: string): number | undefined {
    return this.lastFetch.get(origin);
  }

  private forgetLater(origin: string, delayMs: number): void {
    const stamp = this.lastFetch.get(origin);
    const timer = setTimeout(() => {
      if (!this.tails.has(origin) && this.lastFetch.get(origin) === stamp) {
        this.lastFetch.delete(origin);
      }
    }, delayMs);
    timer.unref();
  }

  private async waitTurn(origin: string, delayMs: number): Promise<void> {
    const last = this.lastFetch.get(origin);
    if (last !== undefined && delayMs > 0) {
      const wait = last + delayMs - Date.now();
      if (wait > 0) {
        this.logger.debug(`Waiting ${wait}ms before next fetch to ${origin}`);
        await sleep(wait);
      }
    }
    this.lastFetch.set(origin, Date.now());
  }
}
