import { describe, expect, it } from 'vitest';
import { Semaphore } from './semaphore';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe('Semaphore', () => {
  it('hands out at most `permits` permits and queues the rest in order', async () => {
    const sem = new Semaphore(2);
    const order: string[] = [];

    const r1 = await sem.acquire();
    const r2 = await sem.acquire();
    const third = sem.acquire().then((release) => {
      order.push('third');
      return release;
    });
    const fourth = sem.acquire().then((release) => {
      order.push('fourth');
      return release;
    });

    await tick();
    expect(order).toEqual([]);

    r1();
    (await third)();
    r2();
    (await fourth)();
    expect(order).toEqual(['third', 'fourth']);
  });

  it('ignores a second call to the same release', async () => {
    const sem = new Semaphore(1);
    const release = await sem.acquire();
    release();
    release();

    await sem.acquire();
    let acquired = false;
    void sem.acquire().then(() => {
      acquired = true;
    });
    await tick();
    expect(acquired).toBe(false);
  });

  it('clamps the permit count to at least one', async () => {
    const sem = new Semaphore(0);
    expect(sem.permits).toBe(1);

    await sem.acquire();
    let second = false;
    void sem.acquire().then(() => {
      second = true;
    });
    await tick();
    expect(second).toBe(false);
  });

  it('floors a fractional permit count', () => {
    expect(new Semaphore(2.7).permits).toBe(2);
  });
});
