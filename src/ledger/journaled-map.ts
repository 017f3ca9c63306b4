import type { LedgerCheckpoint } from './ledger.types.js';

export interface JournalCheckpoint extends LedgerCheckpoint {
  /** Keys written since the checkpoint was taken. */
  readonly touched: number;
}

/**
 * Map that records the prior value of each key written while a checkpoint
 * is open. Taking a checkpoint is O(1); rolling back costs one write per
 * touched key.
 */
export class JournaledMap<K, V> {
  private readonly values = new Map<K, V>();
  private readonly journals: Map<K, V | undefined>[] = [];

  get(key: K): V | undefined {
    return this.values.get(key);
  }

  set(key: K, value: V): void {
    this.record(key);
    this.values.set(key, value);
  }

  delete(key: K): void {
    this.record(key);
    this.values.delete(key);
  }

  checkpoint(): JournalCheckpoint {
    const journal = new Map<K, V | undefined>();
    this.journals.push(journal);
    const close = (): void => {
      const index = this.journals.indexOf(journal);
      if (index >= 0) {
        this.journals.splice(index, 1);
      }
    };

    return {
      get touched() {
        return journal.size;
      },
      rollback: () => {
        close();
        for (const [key, previous] of journal) {
          if (previous === undefined) {
            this.delete(key);
          } else {
            this.set(key, previous);
          }
        }
        journal.clear();
      },
      release: close,
    };
  }

  private record(key: K): void {
    for (const journal of this.journals) {
      if (!journal.has(key)) {
        journal.set(key, this.values.get(key));
      }
    }
  }
}

/** Combines the checkpoints of several maps into one. */
export function combineCheckpoints(
  checkpoints: readonly LedgerCheckpoint[],
): LedgerCheckpoint {
  return {
    rollback: () => [...checkpoints].reverse().forEach((cp) => cp.rollback()),
    release: () => checkpoints.forEach((cp) => cp.release()),
  };
}
