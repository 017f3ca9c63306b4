import { SaleEngineError } from './sale-engine.error.js';

/**
 * Scoped exclusive lock held for the whole of a mutating entry point.
 * A nested entry while held is rejected; the lock is released on every exit.
 */
export class ReentrancyLock {
  private held = false;

  get locked(): boolean {
    return this.held;
  }

  run<T>(body: () => T): T {
    if (this.held) {
      throw new SaleEngineError('REENTRANT_CALL', 'Reentrant call rejected');
    }
    this.held = true;
    try {
      return body();
    } finally {
      this.held = false;
    }
  }
}
