// Reader/writer guard
//
// Every operation of the access manager runs synchronously, so two
// operations can only overlap by re-entrancy: a logger or a hook calling
// back into the manager while an operation is still on the stack. Reads
// may nest freely; a write must be the only operation running.

import { ConcurrentAccessError } from '@grantgraph/protocol';

export class ReadWriteGuard {
  private readers = 0;
  private writer: string | null = null;

  /** Number of reads currently running */
  get activeReaders(): number {
    return this.readers;
  }

  /** The write currently running, if any */
  get activeWriter(): string | null {
    return this.writer;
  }

  /**
   * Run `fn` as a read.
   * @throws ConcurrentAccessError if a write is running
   */
  read<T>(operation: string, fn: () => T): T {
    if (this.writer !== null) {
      throw new ConcurrentAccessError(operation, `write '${this.writer}' is in progress`);
    }
    this.readers += 1;
    try {
      return fn();
    } finally {
      this.readers -= 1;
    }
  }

  /**
   * Run `fn` as a write.
   * @throws ConcurrentAccessError if any read or write is running
   */
  write<T>(operation: string, fn: () => T): T {
    if (this.writer !== null) {
      throw new ConcurrentAccessError(operation, `write '${this.writer}' is in progress`);
    }
    if (this.readers > 0) {
      throw new ConcurrentAccessError(operation, `${this.readers} read(s) in progress`);
    }
    this.writer = operation;
    try {
      return fn();
    } finally {
      this.writer = null;
    }
  }
}
