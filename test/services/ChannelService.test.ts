import { describe, it, expect, beforeEach } from 'vitest';
import { ChannelService, EventChannel } from '../../src/services/ChannelService.js';
import { metrics } from '../../src/utils/metrics.js';

/**
 * EventChannel and ChannelService Tests
 * - FIFO delivery and waiting consumers
 * - Overflow policies
 * - Close, fail, abort and timeout wake-ups
 * - Silent drop for sessions without a channel
 */

function droppedCount(policy: string): number {
  const counter = metrics.snapshot().counters['toolstream_stream_frames_dropped_total'];
  return counter?.[`policy="${policy}"`] ?? 0;
}

describe('EventChannel', () => {
  it('should deliver frames in FIFO order', async () => {
    const channel = new EventChannel('s1', { maxQueueSize: 10, overflowPolicy: 'drop-oldest' });
    channel.push('a');
    channel.push('b');
    channel.push('c');

    expect(await channel.next(100)).toEqual({ kind: 'frame', frame: 'a' });
    expect(await channel.next(100)).toEqual({ kind: 'frame', frame: 'b' });
    expect(await channel.next(100)).toEqual({ kind: 'frame', frame: 'c' });
  });

  it('should hand a frame to a waiting consumer', async () => {
    const channel = new EventChannel('s1', { maxQueueSize: 10, overflowPolicy: 'drop-oldest' });
    const pending = channel.next(1000);

    expect(channel.push({ n: 1 })).toBe(true);
    expect(await pending).toEqual({ kind: 'frame', frame: { n: 1 } });
    expect(channel.pending).toBe(0);
  });

  it('should time out when idle', async () => {
    const channel = new EventChannel('s1', { maxQueueSize: 10, overflowPolicy: 'drop-oldest' });
    expect(await channel.next(10)).toEqual({ kind: 'timeout' });
  });

  it('should drop the oldest frame when full', async () => {
    const before = droppedCount('drop-oldest');
    const channel = new EventChannel('s1', { maxQueueSize: 2, overflowPolicy: 'drop-oldest' });
    let overflows = 0;
    const counted = new EventChannel('s2', {
      maxQueueSize: 2,
      overflowPolicy: 'drop-oldest',
      onOverflow: () => overflows++
    });

    channel.push(1);
    channel.push(2);
    expect(channel.push(3)).toBe(true);
    expect(channel.pending).toBe(2);
    expect(await channel.next(10)).toEqual({ kind: 'frame', frame: 2 });
    expect(await channel.next(10)).toEqual({ kind: 'frame', frame: 3 });

    counted.push(1);
    counted.push(2);
    counted.push(3);
    expect(overflows).toBe(1);
    // A bare channel has no overflow hook, so the counter is untouched
    expect(droppedCount('drop-oldest')).toBe(before);
  });

  it('should drop the newest frame when full under drop-newest', async () => {
    const channel = new EventChannel('s1', { maxQueueSize: 2, overflowPolicy: 'drop-newest' });
    channel.push(1);
    channel.push(2);

    expect(channel.push(3)).toBe(false);
    expect(await channel.next(10)).toEqual({ kind: 'frame', frame: 1 });
    expect(await channel.next(10)).toEqual({ kind: 'frame', frame: 2 });
  });

  it('should wake waiting consumers on close', async () => {
    const channel = new EventChannel('s1', { maxQueueSize: 10, overflowPolicy: 'drop-oldest' });
    const pending = channel.next(1000);

    channel.close();
    expect(await pending).toEqual({ kind: 'closed' });
    expect(await channel.next(1000)).toEqual({ kind: 'closed' });
    expect(channel.push('late')).toBe(false);
    expect(channel.isClosed).toBe(true);
  });

  it('should discard queued frames on close', async () => {
    const channel = new EventChannel('s1', { maxQueueSize: 10, overflowPolicy: 'drop-oldest' });
    channel.push('queued');
    channel.close();
    expect(await channel.next(10)).toEqual({ kind: 'closed' });
  });

  it('should abort its closed signal on close', () => {
    const channel = new EventChannel('s1', { maxQueueSize: 10, overflowPolicy: 'drop-oldest' });
    expect(channel.closedSignal.aborted).toBe(false);

    channel.close();
    expect(channel.closedSignal.aborted).toBe(true);
  });

  it('should resolve as aborted when the signal fires', async () => {
    const channel = new EventChannel('s1', { maxQueueSize: 10, overflowPolicy: 'drop-oldest' });
    const controller = new AbortController();
    const pending = channel.next(1000, controller.signal);

    controller.abort();
    expect(await pending).toEqual({ kind: 'aborted' });
  });

  it('should resolve as aborted immediately for an aborted signal', async () => {
    const channel = new EventChannel('s1', { maxQueueSize: 10, overflowPolicy: 'drop-oldest' });
    const controller = new AbortController();
    controller.abort();
    expect(await channel.next(1000, controller.signal)).toEqual({ kind: 'aborted' });
  });

  it('should still deliver queued frames before reporting an abort', async () => {
    const channel = new EventChannel('s1', { maxQueueSize: 10, overflowPolicy: 'drop-oldest' });
    const controller = new AbortController();
    channel.push('queued');
    controller.abort();
    expect(await channel.next(1000, controller.signal)).toEqual({ kind: 'frame', frame: 'queued' });
  });

  it('should serve several consumers in arrival order', async () => {
    const channel = new EventChannel('s1', { maxQueueSize: 10, overflowPolicy: 'drop-oldest' });
    const first = channel.next(1000);
    const second = channel.next(1000);

    channel.push('a');
    channel.push('b');
    expect(await first).toEqual({ kind: 'frame', frame: 'a' });
    expect(await second).toEqual({ kind: 'frame', frame: 'b' });
  });
});

describe('ChannelService', () => {
  let channels: ChannelService;

  beforeEach(() => {
    channels = new ChannelService({ maxQueueSize: 2, overflowPolicy: 'drop-oldest' });
  });

  it('should create a channel on first attach and reuse it', () => {
    const channel = channels.attach('s1');
    expect(channels.attach('s1')).toBe(channel);
    expect(channels.has('s1')).toBe(true);
    expect(channels.size()).toBe(1);
  });

  it('should drop frames silently for sessions without a channel', () => {
    expect(channels.push('nobody', { a: 1 })).toBe(false);
    expect(channels.has('nobody')).toBe(false);
    expect(channels.size()).toBe(0);
  });

  it('should push into an attached channel', async () => {
    const channel = channels.attach('s1');
    expect(channels.push('s1', 'hello')).toBe(true);
    expect(await channel.next(10)).toEqual({ kind: 'frame', frame: 'hello' });
  });

  it('should count dropped frames on overflow', () => {
    const before = droppedCount('drop-oldest');
    channels.attach('s1');
    channels.push('s1', 1);
    channels.push('s1', 2);
    channels.push('s1', 3);
    expect(droppedCount('drop-oldest')).toBe(before + 1);
  });

  it('should close the channel on remove', async () => {
    const channel = channels.attach('s1');
    const pending = channel.next(1000);

    expect(channels.remove('s1')).toBe(true);
    expect(await pending).toEqual({ kind: 'closed' });
    expect(channels.has('s1')).toBe(false);
    expect(channels.remove('s1')).toBe(false);
  });

  it('should only unregister the current channel on release', () => {
    const stale = channels.attach('s1');
    channels.remove('s1');
    const current = channels.attach('s1');

    channels.release(stale);
    expect(channels.has('s1')).toBe(true);

    channels.release(current);
    expect(channels.has('s1')).toBe(false);
    expect(current.isClosed).toBe(true);
  });

  it('should close every channel', () => {
    const a = channels.attach('a');
    const b = channels.attach('b');

    channels.closeAll();
    expect(channels.size()).toBe(0);
    expect(a.isClosed).toBe(true);
    expect(b.isClosed).toBe(true);
  });
});
