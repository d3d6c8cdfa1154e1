/**
 * Tests for EventEmitter
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventEmitter } from '../events';

type TestEvents = {
  tick: number;
  name: string;
};

describe('EventEmitter', () => {
  let emitter: EventEmitter<TestEvents>;

  beforeEach(() => {
    emitter = new EventEmitter<TestEvents>();
  });

  it('should deliver payloads to listeners of that event only', () => {
    const onTick = vi.fn();
    const onName = vi.fn();
    emitter.on('tick', onTick).on('name', onName);

    expect(emitter.emit('tick', 3)).toBe(true);

    expect(onTick).toHaveBeenCalledWith(3);
    expect(onName).not.toHaveBeenCalled();
  });

  it('should report when nobody listened', () => {
    expect(emitter.emit('name', 'a')).toBe(false);
  });

  it('should run once-listeners a single time', () => {
    const listener = vi.fn();
    emitter.once('tick', listener);

    emitter.emit('tick', 1);
    emitter.emit('tick', 2);

    expect(listener.mock.calls).toEqual([[1]]);
    expect(emitter.listenerCount('tick')).toBe(0);
  });

  it('should remove listeners with off and removeAllListeners', () => {
    const first = vi.fn();
    const second = vi.fn();
    emitter.on('tick', first).on('tick', second).on('name', second);

    emitter.off('tick', first);
    expect(emitter.listenerCount('tick')).toBe(1);

    emitter.removeAllListeners('tick');
    expect(emitter.listenerCount('tick')).toBe(0);
    expect(emitter.listenerCount('name')).toBe(1);

    emitter.removeAllListeners();
    expect(emitter.listenerCount('name')).toBe(0);
  });

  it('should keep notifying after a listener throws', () => {
    const after = vi.fn();
    emitter.on('tick', () => {
      throw new Error('boom');
    });
    emitter.on('tick', after);

    expect(() => emitter.emit('tick', 5)).not.toThrow();
    expect(after).toHaveBeenCalledWith(5);
  });

  it('should still add listeners past the leak threshold', () => {
    emitter.setMaxListeners(1);
    emitter.on('tick', vi.fn()).on('tick', vi.fn());

    expect(emitter.listenerCount('tick')).toBe(2);
  });
});
