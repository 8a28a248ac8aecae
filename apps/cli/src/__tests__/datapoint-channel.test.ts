import { describe, it, expect, jest } from '@jest/globals';
import { Channel } from '../services/stream/datapoint-channel.js';
import { collect } from './fakes.js';

describe('Channel', () => {
  it('delivers buffered values in order, then ends after close', async () => {
    const ch = new Channel<number>();
    ch.push(1);
    ch.push(2);
    ch.push(3);
    ch.close();

    await expect(collect(ch)).resolves.toEqual([1, 2, 3]);
  });

  it('wakes a waiting reader on push and on close', async () => {
    const ch = new Channel<string>();
    const it = ch[Symbol.asyncIterator]();

    const first = it.next();
    ch.push('a');
    await expect(first).resolves.toEqual({ done: false, value: 'a' });

    const second = it.next();
    ch.close();
    await expect(second).resolves.toEqual({ done: true, value: undefined });
  });

  it('refuses pushes once the consumer leaves', async () => {
    const onDisconnect = jest.fn();
    const ch = new Channel<number>(onDisconnect);
    ch.push(1);
    ch.push(2);

    await expect(collect(ch, 1)).resolves.toEqual([1]);

    expect(ch.disconnected).toBe(true);
    expect(ch.size).toBe(0);
    expect(ch.push(3)).toBe(false);
    expect(onDisconnect).toHaveBeenCalledTimes(1);
  });

  it('ends a pending read when the consumer returns', async () => {
    const ch = new Channel<number>();
    const it = ch[Symbol.asyncIterator]();
    const pending = it.next();

    await it.return?.();

    await expect(pending).resolves.toEqual({ done: true, value: undefined });
    expect(ch.push(1)).toBe(false);
  });

  it('delivers buffered values before surfacing a failure', async () => {
    const ch = new Channel<number>();
    ch.push(7);
    ch.fail(new Error('probe broke'));
    const it = ch[Symbol.asyncIterator]();

    await expect(it.next()).resolves.toEqual({ done: false, value: 7 });
    await expect(it.next()).rejects.toThrow('probe broke');
    await expect(it.next()).resolves.toEqual({ done: true, value: undefined });
  });

  it('allows a single consumer', () => {
    const ch = new Channel<number>();
    ch[Symbol.asyncIterator]();
    expect(() => ch[Symbol.asyncIterator]()).toThrow('channel already has a consumer');
  });

  it('rejects pushes after the producer closed', () => {
    const ch = new Channel<number>();
    ch.close();
    expect(() => ch.push(1)).toThrow('push after close');
  });
});
