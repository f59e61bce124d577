// Unit tests for driving poll sources from async code

import { describe, it, expect } from 'vitest';
import { collect, drainReady, drive, WakeSignal } from '../../src/driver.js';
import { weightedSelect } from '../../src/builder.js';
import { fromAsyncIterable, fromIterable } from '../../src/sources.js';
import { Poll, noopWaker } from '../../src/poll.js';
import { ScriptedSource, WithBreaks, items } from '../helpers/sources.js';

async function* delayed<T>(values: T[], delayMs: number): AsyncGenerator<T> {
  for (const value of values) {
    await new Promise((resolve) => setTimeout(resolve, delayMs));
    yield value;
  }
}

describe('WakeSignal', () => {
  it('should resolve wait() immediately when woken first', async () => {
    const signal = new WakeSignal();
    signal.wake();

    await expect(signal.wait()).resolves.toBeUndefined();
  });

  it('should resolve a pending wait() on wake()', async () => {
    const signal = new WakeSignal();
    let resolved = false;
    const waiting = signal.wait().then(() => {
      resolved = true;
    });

    await Promise.resolve();
    expect(resolved).toBe(false);

    signal.wake();
    await waiting;
    expect(resolved).toBe(true);
  });

  it('should forget an earlier wake after reset()', async () => {
    const signal = new WakeSignal();
    signal.wake();
    signal.reset();

    let resolved = false;
    void signal.wait().then(() => {
      resolved = true;
    });
    await Promise.resolve();

    expect(resolved).toBe(false);
  });
});

describe('collect()', () => {
  it('should gather a weighted select of always-ready sources', async () => {
    const select = weightedSelect<number>()
      .append(fromIterable([1, 1]), 1)
      .append(fromIterable([2, 2, 2]), 3)
      .append(fromIterable([3, 3, 3, 3]), 1)
      .finalize();

    await expect(collect(select)).resolves.toEqual([1, 2, 2, 2, 3, 1, 3, 3, 3]);
  });

  it('should suspend on NotReady until the source wakes', async () => {
    const select = weightedSelect<number>()
      .append(new WithBreaks(items([1, 1])), 1)
      .append(new WithBreaks(items([2, 2, 2])), 3)
      .append(new WithBreaks(items([3, 3, 3, 3])), 1)
      .finalize();

    await expect(collect(select)).resolves.toEqual([1, 2, 3, 2, 1, 2, 3, 3, 3]);
  });

  it('should keep each async source in order', async () => {
    const select = weightedSelect<string>()
      .append(fromAsyncIterable(delayed(['a1', 'a2', 'a3'], 1)), 1)
      .append(fromAsyncIterable(delayed(['b1', 'b2'], 2)), 2)
      .finalize();

    const result = await collect(select);

    expect(result).toHaveLength(5);
    expect(result.filter((item) => item.startsWith('a'))).toEqual(['a1', 'a2', 'a3']);
    expect(result.filter((item) => item.startsWith('b'))).toEqual(['b1', 'b2']);
  });

  it('should return an empty array for an empty select', async () => {
    await expect(collect(weightedSelect<number>().finalize())).resolves.toEqual([]);
  });
});

describe('drive()', () => {
  it('should throw the failure value and close every source', async () => {
    const failure = new Error('upstream broke');
    const a = new ScriptedSource<number, Error>([Poll.item(1), Poll.failure(failure)]);
    const b = new ScriptedSource<number, Error>([Poll.item(2), Poll.item(2)]);
    const select = weightedSelect<number, Error>().append(a, 1).append(b, 1).finalize();

    const seen: number[] = [];
    await expect(
      (async () => {
        for await (const item of drive(select)) {
          seen.push(item);
        }
      })()
    ).rejects.toBe(failure);

    expect(seen).toEqual([1, 2]);
    expect(a.closeCalls).toBe(1);
    expect(b.closeCalls).toBe(1);
  });

  it('should close the sources when the consumer stops early', async () => {
    const a = items([1, 1, 1]);
    const b = items([2, 2, 2]);
    const select = weightedSelect<number>().append(a, 1).append(b, 1).finalize();

    const seen: number[] = [];
    for await (const item of drive(select)) {
      seen.push(item);
      if (seen.length === 3) {
        break;
      }
    }

    expect(seen).toEqual([1, 2, 1]);
    expect(a.closeCalls).toBe(1);
    expect(b.closeCalls).toBe(1);
  });
});

describe('drainReady()', () => {
  it('should stop at Completed', () => {
    const { items: drained, outcome } = drainReady(fromIterable([1, 2, 3]), noopWaker);

    expect(drained).toEqual([1, 2, 3]);
    expect(outcome).toEqual(Poll.completed());
  });

  it('should stop at the first NotReady', () => {
    const source = new ScriptedSource<number>([Poll.item(1), Poll.notReady(), Poll.item(2)]);

    const { items: drained, outcome } = drainReady(source, noopWaker);

    expect(drained).toEqual([1]);
    expect(outcome).toEqual(Poll.notReady());
  });
});
