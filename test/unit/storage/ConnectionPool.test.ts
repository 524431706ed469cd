/**
 * ConnectionPool Tests
 *
 * Tests:
 * - Connections are created lazily up to max and reused
 * - Waiters are served in arrival order
 * - A failed create() hands its slot to the oldest waiter
 * - use() releases on success and failure
 * - ConnectionLease acquires once and releases idempotently
 * - drain() rejects waiters, waits for checked-out and in-flight
 *   connections, destroys all
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { ConnectionPool } from '@roster/core';

// =============================================================================
// Test Helpers
// =============================================================================

interface FakeConnection {
  id: number;
  destroyed: boolean;
}

function createFakePool(max: number) {
  let nextId = 1;
  const created: FakeConnection[] = [];
  const pool = new ConnectionPool<FakeConnection>({
    max,
    create: () => {
      const connection = { id: nextId++, destroyed: false };
      created.push(connection);
      return connection;
    },
    destroy: (connection) => {
      connection.destroyed = true;
    },
  });
  return { pool, created };
}

// =============================================================================
// TESTS: acquire / release
// =============================================================================

describe('ConnectionPool', () => {
  it('should reject an invalid max', () => {
    assert.throws(
      () => new ConnectionPool({ max: 0, create: () => 1, destroy: () => undefined }),
      { name: 'RangeError', message: 'ConnectionPool max must be a positive integer, got 0' }
    );
  });

  it('should create connections lazily and reuse released ones', async () => {
    const { pool, created } = createFakePool(2);
    assert.strictEqual(created.length, 0);

    const first = await pool.acquire();
    pool.release(first);
    const again = await pool.acquire();

    assert.strictEqual(again, first);
    assert.strictEqual(created.length, 1);
    pool.release(again);
  });

  it('should make callers wait once max connections are out', async () => {
    const { pool } = createFakePool(1);
    const held = await pool.acquire();
    const order: string[] = [];

    const a = pool.acquire().then((c) => {
      order.push('a');
      return c;
    });
    const b = pool.acquire().then((c) => {
      order.push('b');
      return c;
    });
    assert.deepStrictEqual(pool.getStats(), { max: 1, open: 1, idle: 0, inUse: 1, waiting: 2 });

    pool.release(held);
    const gotA = await a;
    assert.strictEqual(gotA, held);
    pool.release(gotA);
    const gotB = await b;
    pool.release(gotB);

    assert.deepStrictEqual(order, ['a', 'b']);
    assert.deepStrictEqual(pool.getStats(), { max: 1, open: 1, idle: 1, inUse: 0, waiting: 0 });
  });

  it('should give a waiter a fresh attempt when create() fails', async () => {
    let calls = 0;
    const pool = new ConnectionPool<FakeConnection>({
      max: 1,
      create: () => {
        calls++;
        if (calls === 1) {
          return new Promise<FakeConnection>((_, reject) => {
            setImmediate(() => reject(new Error('open failed')));
          });
        }
        return { id: calls, destroyed: false };
      },
      destroy: () => undefined,
    });

    const first = pool.acquire();
    const second = pool.acquire();
    assert.strictEqual(pool.getStats().waiting, 1);

    await assert.rejects(first, { message: 'open failed' });
    const connection = await second;

    assert.strictEqual(connection.id, 2);
    assert.deepStrictEqual(pool.getStats(), { max: 1, open: 1, idle: 0, inUse: 1, waiting: 0 });
    pool.release(connection);
  });

  it('should reject the waiter when its own attempt fails too', async () => {
    const pool = new ConnectionPool<FakeConnection>({
      max: 1,
      create: () => Promise.reject(new Error('open failed')),
      destroy: () => undefined,
    });

    const first = pool.acquire();
    const second = pool.acquire();

    await assert.rejects(first, { message: 'open failed' });
    await assert.rejects(second, { message: 'open failed' });
    assert.deepStrictEqual(pool.getStats(), { max: 1, open: 0, idle: 0, inUse: 0, waiting: 0 });
  });

  it('should refuse to release a connection it did not hand out', () => {
    const { pool } = createFakePool(1);
    assert.throws(() => pool.release({ id: 99, destroyed: false }), {
      message: 'Released a connection that is not checked out from this pool',
    });
  });

  // ===========================================================================
  // TESTS: use()
  // ===========================================================================

  describe('use', () => {
    it('should release after the callback resolves', async () => {
      const { pool } = createFakePool(1);
      const id = await pool.use((c) => c.id);

      assert.strictEqual(id, 1);
      assert.strictEqual(pool.getStats().inUse, 0);
    });

    it('should release after the callback throws', async () => {
      const { pool } = createFakePool(1);
      await assert.rejects(
        pool.use(async () => {
          throw new Error('query failed');
        }),
        { message: 'query failed' }
      );

      assert.strictEqual(pool.getStats().inUse, 0);
      assert.strictEqual(pool.getStats().idle, 1);
    });
  });

  // ===========================================================================
  // TESTS: ConnectionLease
  // ===========================================================================

  describe('lease', () => {
    it('should not acquire until get() is called', async () => {
      const { pool, created } = createFakePool(1);
      const lease = pool.lease();

      assert.strictEqual(lease.acquired, false);
      await lease.release();
      assert.strictEqual(created.length, 0);
    });

    it('should hand out the same connection for every get()', async () => {
      const { pool } = createFakePool(2);
      const lease = pool.lease();

      const [a, b] = await Promise.all([lease.get(), lease.get()]);
      assert.strictEqual(a, b);
      assert.strictEqual(pool.getStats().inUse, 1);

      await lease.release();
      await lease.release();
      assert.strictEqual(pool.getStats().inUse, 0);
    });

    it('should reject get() after release', async () => {
      const { pool } = createFakePool(1);
      const lease = pool.lease();
      await lease.release();

      await assert.rejects(lease.get(), { message: 'Connection lease already released' });
    });
  });

  // ===========================================================================
  // TESTS: drain()
  // ===========================================================================

  describe('drain', () => {
    it('should reject waiters and new acquires', async () => {
      const { pool } = createFakePool(1);
      const held = await pool.acquire();
      const waiting = pool.acquire();

      const drained = pool.drain();
      await assert.rejects(waiting, { message: 'ConnectionPool is draining' });
      await assert.rejects(pool.acquire(), { message: 'ConnectionPool is draining' });

      pool.release(held);
      await drained;
    });

    it('should wait for checked-out connections before destroying them', async () => {
      const { pool, created } = createFakePool(2);
      const held = await pool.acquire();

      let finished = false;
      const drained = pool.drain().then(() => {
        finished = true;
      });
      await new Promise((resolve) => setImmediate(resolve));
      assert.strictEqual(finished, false);
      assert.strictEqual(held.destroyed, false);

      pool.release(held);
      await drained;

      assert.strictEqual(finished, true);
      assert.deepStrictEqual(created.map((c) => c.destroyed), [true]);
      assert.strictEqual(pool.getStats().open, 0);
    });

    it('should wait for a connection still being created', async () => {
      let finishCreate: (connection: FakeConnection) => void = () => undefined;
      const pool = new ConnectionPool<FakeConnection>({
        max: 1,
        create: () =>
          new Promise<FakeConnection>((resolve) => {
            finishCreate = resolve;
          }),
        destroy: (connection) => {
          connection.destroyed = true;
        },
      });

      const acquiring = pool.acquire();
      let finished = false;
      const drained = pool.drain().then(() => {
        finished = true;
      });
      await new Promise((resolve) => setImmediate(resolve));
      assert.strictEqual(finished, false);

      const connection = { id: 1, destroyed: false };
      finishCreate(connection);
      const got = await acquiring;
      assert.strictEqual(got, connection);
      await new Promise((resolve) => setImmediate(resolve));
      assert.strictEqual(finished, false);

      pool.release(got);
      await drained;

      assert.strictEqual(connection.destroyed, true);
      assert.strictEqual(pool.getStats().open, 0);
    });

    it('should finish when the only in-flight create fails', async () => {
      const pool = new ConnectionPool<FakeConnection>({
        max: 1,
        create: () =>
          new Promise<FakeConnection>((_, reject) => {
            setImmediate(() => reject(new Error('open failed')));
          }),
        destroy: () => undefined,
      });

      const acquiring = pool.acquire();
      const drained = pool.drain();

      await assert.rejects(acquiring, { message: 'open failed' });
      await drained;
      assert.strictEqual(pool.getStats().open, 0);
    });
  });
});
