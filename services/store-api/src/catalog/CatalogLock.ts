/**
 * Readers-writer discipline for the catalog.
 *
 * Critical sections are synchronous functions. Node runs them to completion,
 * so exclusion holds between whole batches; what the lock adds is detection of
 * the two ways a batch could still be observed half-applied:
 *
 * - re-entering the catalog (read or write) from inside a write, e.g. from a
 *   callback invoked mid-batch;
 * - handing the lock an async function, whose awaits would let other requests
 *   run against partially applied state.
 */
export class CatalogLock {
  private readers = 0;
  private writing = false;

  read<T>(section: () => T): T {
    if (this.writing) {
      throw new Error('Catalog read attempted while a write is in progress');
    }
    this.readers++;
    try {
      return this.settle(section());
    } finally {
      this.readers--;
    }
  }

  write<T>(section: () => T): T {
    if (this.writing) {
      throw new Error('Catalog write lock is not re-entrant');
    }
    if (this.readers > 0) {
      throw new Error('Catalog write attempted while a read is in progress');
    }
    this.writing = true;
    try {
      return this.settle(section());
    } finally {
      this.writing = false;
    }
  }

  get isWriting(): boolean {
    return this.writing;
  }

  get activeReaders(): number {
    return this.readers;
  }

  private settle<T>(result: T): T {
    if (result instanceof Promise) {
      throw new Error('Catalog critical sections must be synchronous');
    }
    return result;
  }
}
