import { describe, expect, it, vi } from 'vitest';
import { OnceGate } from '../once';

describe('OnceGate', () => {
  it('runs the body once per key', () => {
    const gate = new OnceGate<number>();
    const body = vi.fn(() => 42);

    expect(gate.run('demo', body)).toEqual({ value: 42, fresh: true });
    expect(gate.run('demo', body)).toEqual({ value: 42, fresh: false });
    expect(body).toHaveBeenCalledTimes(1);
  });

  it('keeps keys independent', () => {
    const gate = new OnceGate<string>();

    gate.run('a', () => 'first');

    expect(gate.run('b', () => 'second')).toEqual({ value: 'second', fresh: true });
  });

  it('does not mark a key whose body throws', () => {
    const gate = new OnceGate();

    expect(() =>
      gate.run('demo', () => {
        throw new Error('boom');
      }),
    ).toThrow('boom');
    expect(gate.run('demo', () => undefined)).toEqual({ value: undefined, fresh: true });
  });
});
