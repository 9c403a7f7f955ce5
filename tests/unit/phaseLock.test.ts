import { describe, it, expect } from 'vitest';
import { PhaseLock } from '../../src/utils/phaseLock';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const flush = () => new Promise((r) => setImmediate(r));

describe('PhaseLock', () => {
  it('runs holders of the same phase together', async () => {
    const lock = new PhaseLock();
    const gate = deferred();
    const started: string[] = [];

    const a = lock.run('write', async () => {
      started.push('a');
      await gate.promise;
    });
    const b = lock.run('write', async () => {
      started.push('b');
      await gate.promise;
    });
    await flush();

    expect(started).toEqual(['a', 'b']);
    gate.resolve();
    await Promise.all([a, b]);
  });

  it('keeps the other phase out until every holder is done', async () => {
    const lock = new PhaseLock();
    const first = deferred();
    const second = deferred();
    const order: string[] = [];

    const w1 = lock.run('write', async () => {
      await first.promise;
      order.push('write 1');
    });
    const w2 = lock.run('write', async () => {
      await second.promise;
      order.push('write 2');
    });
    const r = lock.run('read', async () => {
      order.push('read');
    });

    first.resolve();
    await w1;
    await flush();
    expect(order).toEqual(['write 1']);

    second.resolve();
    await Promise.all([w2, r]);
    expect(order).toEqual(['write 1', 'write 2', 'read']);
  });

  it('admits waiters in arrival order, batching neighbours of one phase', async () => {
    const lock = new PhaseLock();
    const gate = deferred();
    const order: string[] = [];

    const held = lock.run('read', () => gate.promise);
    const queued = [
      lock.run('write', async () => {
        order.push('write a');
      }),
      lock.run('read', async () => {
        order.push('read b');
      }),
      lock.run('read', async () => {
        order.push('read c');
      }),
      lock.run('write', async () => {
        order.push('write d');
      }),
    ];
    gate.resolve();
    await Promise.all([held, ...queued]);

    expect(order).toEqual(['write a', 'read b', 'read c', 'write d']);
  });

  it('releases the phase when the holder throws', async () => {
    const lock = new PhaseLock();
    await expect(lock.run('write', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(lock.run('read', async () => 'ok')).resolves.toBe('ok');
  });
});
