/**
 * ConnectionPool - bounded pool of storage connections
 *
 * Connections are created on demand up to `max`. When all are checked out,
 * acquire() waits; waiters are served in arrival order.
 *
 *   const pool = new ConnectionPool({ max: 4, create: open, destroy: (c) => c.close() });
 *   const people = await pool.use((storage) => storage.listPeople());
 */

export interface ConnectionPoolOptions<T> {
  /** Maximum open connections (>= 1) */
  max: number;
  create: () => T | Promise<T>;
  destroy: (connection: T) => void | Promise<void>;
}

export interface ConnectionPoolStats {
  max: number;
  open: number;
  idle: number;
  inUse: number;
  waiting: number;
}

type Waiter<T> = {
  resolve: (connection: T) => void;
  reject: (error: Error) => void;
};

export class ConnectionPool<T> {
  private readonly options: ConnectionPoolOptions<T>;
  private readonly idle: T[] = [];
  private readonly inUse = new Set<T>();
  private readonly waiters: Waiter<T>[] = [];
  /** Connections currently being created, counted against `max` */
  private creating = 0;
  private draining = false;
  private onAllReleased: (() => void) | null = null;

  constructor(options: ConnectionPoolOptions<T>) {
    if (!Number.isInteger(options.max) || options.max < 1) {
      throw new RangeError(`ConnectionPool max must be a positive integer, got ${options.max}`);
    }
    this.options = options;
  }

  /**
   * Check out a connection. Callers must release() it.
   */
  async acquire(): Promise<T> {
    if (this.draining) {
      throw new Error('ConnectionPool is draining');
    }

    const connection = this.idle.pop();
    if (connection !== undefined) {
      this.inUse.add(connection);
      return connection;
    }

    if (this.inUse.size + this.creating < this.options.max) {
      return this.createConnection();
    }

    return new Promise<T>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Open a connection in a free slot. If opening fails, the slot goes to
   * the oldest waiter, which gets a fresh attempt of its own.
   */
  private async createConnection(): Promise<T> {
    this.creating++;
    let created: T;
    try {
      created = await this.options.create();
    } catch (err) {
      this.creating--;
      const waiter = this.waiters.shift();
      if (waiter) {
        this.createConnection().then(waiter.resolve, waiter.reject);
      } else {
        this.settle();
      }
      throw err;
    }
    this.creating--;
    this.inUse.add(created);
    return created;
  }

  /**
   * Return a connection. It goes straight to the oldest waiter if any.
   */
  release(connection: T): void {
    if (!this.inUse.has(connection)) {
      throw new Error('Released a connection that is not checked out from this pool');
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(connection);
      return;
    }

    this.inUse.delete(connection);
    this.idle.push(connection);
    this.settle();
  }

  /** Wake drain() once nothing is checked out or being created. */
  private settle(): void {
    if (this.inUse.size === 0 && this.creating === 0) {
      this.onAllReleased?.();
    }
  }

  /**
   * Run `fn` with a checked-out connection; it is released when `fn`
   * settles, whether it resolves or throws.
   */
  async use<R>(fn: (connection: T) => R | Promise<R>): Promise<R> {
    const connection = await this.acquire();
    try {
      return await fn(connection);
    } finally {
      this.release(connection);
    }
  }

  /**
   * A handle that acquires on first get() and can be released any number
   * of times. Used for request-scoped connections.
   */
  lease(): ConnectionLease<T> {
    return new ConnectionLease(this);
  }

  /**
   * Stop handing out connections: pending waiters are rejected, then once
   * every checked-out connection is back and no connection is still being
   * created, all connections are destroyed.
   */
  async drain(): Promise<void> {
    this.draining = true;

    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(new Error('ConnectionPool is draining'));
    }

    if (this.inUse.size > 0 || this.creating > 0) {
      await new Promise<void>((resolve) => {
        this.onAllReleased = resolve;
      });
      this.onAllReleased = null;
    }

    const idle = this.idle.splice(0);
    await Promise.all(idle.map((connection) => this.options.destroy(connection)));
  }

  getStats(): ConnectionPoolStats {
    return {
      max: this.options.max,
      open: this.idle.length + this.inUse.size,
      idle: this.idle.length,
      inUse: this.inUse.size,
      waiting: this.waiters.length,
    };
  }
}

/**
 * Lazily acquired, idempotently released connection.
 */
export class ConnectionLease<T> {
  private pending: Promise<T> | null = null;
  private released = false;

  constructor(private readonly pool: ConnectionPool<T>) {}

  get acquired(): boolean {
    return this.pending !== null;
  }

  get(): Promise<T> {
    if (this.released) {
      return Promise.reject(new Error('Connection lease already released'));
    }
    if (!this.pending) {
      this.pending = this.pool.acquire();
    }
    return this.pending;
  }

  /**
   * Give the connection back once it has been acquired. Safe to call when
   * nothing was acquired, and safe to call twice.
   */
  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    if (!this.pending) return;

    let connection: T;
    try {
      connection = await this.pending;
    } catch {
      // acquire() failed, so there is nothing to give back
      return;
    }
    this.pool.release(connection);
  }
}
