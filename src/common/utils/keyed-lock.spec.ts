import { KeyedLock } from './keyed-lock';

const deferred = () => {
  let resolve!: () => void;
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
};

describe('KeyedLock', () => {
  it('serializa las tareas de una misma clave', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run('a', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.run('a', () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('no bloquea claves distintas', async () => {
    const lock = new KeyedLock();
    const gate = deferred();

    const blocked = lock.run('a', () => gate.promise);
    await expect(lock.run('b', () => 'libre')).resolves.toBe('libre');

    gate.resolve();
    await blocked;
  });

  it('continúa la cola cuando una tarea falla y libera la clave', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run('a', () => Promise.reject(new Error('fail'))),
    ).rejects.toThrow('fail');
    await expect(lock.run('a', () => 42)).resolves.toBe(42);

    await new Promise((res) => setImmediate(res));
    expect(lock.isBusy('a')).toBe(false);
  });
});
