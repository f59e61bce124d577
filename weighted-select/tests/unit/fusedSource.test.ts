// Unit tests for FusedSource

import { describe, it, expect } from 'vitest';
import { FusedSource } from '../../src/fusedSource.js';
import { Poll } from '../../src/poll.js';
import { CountingWaker, ScriptedSource, items } from '../helpers/sources.js';

describe('FusedSource', () => {
  it('should forward polls until the source completes', () => {
    const inner = items([1, 2]);
    const fused = new FusedSource(inner);
    const waker = new CountingWaker();

    expect(fused.poll(waker)).toEqual(Poll.item(1));
    expect(fused.poll(waker)).toEqual(Poll.item(2));
    expect(fused.isTerminated()).toBe(false);
    expect(fused.poll(waker)).toEqual(Poll.completed());
    expect(fused.isTerminated()).toBe(true);
    expect(inner.polls).toBe(3);
  });

  it('should not poll the source again after Completed', () => {
    const inner = new ScriptedSource<number>([Poll.completed(), Poll.item(5)]);
    const fused = new FusedSource(inner);
    const waker = new CountingWaker();

    expect(fused.poll(waker)).toEqual(Poll.completed());
    expect(fused.poll(waker)).toEqual(Poll.completed());
    expect(fused.poll(waker)).toEqual(Poll.completed());
    expect(inner.polls).toBe(1);
  });

  it('should forward the failure once and then report Completed', () => {
    const inner = new ScriptedSource<number, string>([Poll.failure('disk gone'), Poll.item(5)]);
    const fused = new FusedSource(inner);
    const waker = new CountingWaker();

    expect(fused.poll(waker)).toEqual(Poll.failure('disk gone'));
    expect(fused.poll(waker)).toEqual(Poll.completed());
    expect(inner.polls).toBe(1);
  });

  it('should keep polling through NotReady', () => {
    const inner = new ScriptedSource<number>([Poll.notReady(), Poll.item(1)]);
    const fused = new FusedSource(inner);
    const waker = new CountingWaker();

    expect(fused.poll(waker)).toEqual(Poll.notReady());
    expect(fused.poll(waker)).toEqual(Poll.item(1));
    expect(waker.wakes).toBe(1);
  });

  it('should close the source only once', async () => {
    const inner = items([1]);
    const fused = new FusedSource(inner);

    await fused.close();
    await fused.close();

    expect(inner.closeCalls).toBe(1);
    expect(fused.poll(new CountingWaker())).toEqual(Poll.completed());
    expect(inner.polls).toBe(0);
  });
});
