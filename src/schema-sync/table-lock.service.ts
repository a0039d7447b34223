import { Injectable } from '@nestjs/common';

/**
 * Per-table mutual exclusion. Tasks for the same table name (case-insensitive)
 * run one after another in submission order; different names run freely.
 */
@Injectable()
export class TableLockService {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(tableName: string, task: () => T | Promise<T>): Promise<T> {
    const key = tableName.toLowerCase();
    const previous = this.tails.get(key) ?? Promise.resolve();

    const run = previous.then(task);
    // The chain only orders tasks; the outcome reaches the caller through `run`.
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(tableName: string): boolean {
    return this.tails.has(tableName.toLowerCase());
  }
}
