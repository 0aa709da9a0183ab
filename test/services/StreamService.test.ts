import { describe, it, expect, beforeEach } from 'vitest';
import { ChannelService } from '../../src/services/ChannelService.js';
import { SessionService } from '../../src/services/SessionService.js';
import { StreamService, formatEventFrame } from '../../src/services/StreamService.js';
import { Session, StreamSink } from '../../src/types/index.js';
import { metrics } from '../../src/utils/metrics.js';
import { BlockingSink, ManualClock, RecordingSink, waitFor } from '../fixtures/index.js';

/**
 * StreamService Tests
 * - Connection frame first, messages in push order
 * - Heartbeats while idle, ending on session expiry
 * - Error frames for producer faults
 * - Channel cleanup on every exit
 */

const TIMEOUT_MS = 60_000;

function droppedFrames(): number {
  return metrics.snapshot().counters['toolstream_stream_frames_dropped_total']?.['policy="drop-oldest"'] ?? 0;
}

function activeStreams(): number {
  return metrics.snapshot().gauges['toolstream_streams_active']?.[''] ?? 0;
}

describe('formatEventFrame', () => {
  it('should frame a JSON payload as one event', () => {
    expect(formatEventFrame({ type: 'connection', session_id: 'abc' }))
      .toBe('data: {"type":"connection","session_id":"abc"}\n\n');
  });
});

describe('StreamService', () => {
  let clock: ManualClock;
  let sessions: SessionService;
  let channels: ChannelService;
  let session: Session;
  let sink: RecordingSink;
  let controller: AbortController;

  const createStreams = (heartbeatIntervalMs: number): StreamService =>
    new StreamService(sessions, channels, heartbeatIntervalMs);

  beforeEach(() => {
    clock = new ManualClock();
    sessions = new SessionService({ timeoutMs: TIMEOUT_MS, sweepIntervalMs: TIMEOUT_MS, now: clock.now });
    channels = new ChannelService({ maxQueueSize: 100, overflowPolicy: 'drop-oldest' });
    session = sessions.create();
    sink = new RecordingSink();
    controller = new AbortController();
  });

  it('should write the connection frame and then messages in order', async () => {
    const done = createStreams(10_000).stream(session, sink, controller.signal);
    expect(channels.has(session.id)).toBe(true);

    channels.push(session.id, { step: 1 });
    channels.push(session.id, { step: 2 });
    await waitFor(() => sink.chunks.length === 3);

    controller.abort();
    expect(await done).toBe('disconnected');

    const frames = sink.frames();
    expect(frames[0]).toEqual({ type: 'connection', session_id: session.id });
    expect(frames[1]).toEqual({ type: 'message', timestamp: expect.any(Number), data: { step: 1 } });
    expect(frames[2]).toEqual({ type: 'message', timestamp: expect.any(Number), data: { step: 2 } });
    expect(channels.has(session.id)).toBe(false);
  });

  it('should write heartbeats while idle', async () => {
    const done = createStreams(20).stream(session, sink, controller.signal);
    await waitFor(() => sink.chunks.length >= 3);
    controller.abort();
    await done;

    const frames = sink.frames();
    expect(frames[1]).toEqual({ type: 'heartbeat', timestamp: expect.any(Number), session_id: session.id });
    expect(frames[2]?.type).toBe('heartbeat');
  });

  it('should end with session-expired when the session is gone at the idle check', async () => {
    clock.advance(TIMEOUT_MS);

    const outcome = await createStreams(20).stream(session, sink, controller.signal);
    expect(outcome).toBe('session-expired');
    expect(sink.frames()).toEqual([{ type: 'connection', session_id: session.id }]);
    expect(channels.has(session.id)).toBe(false);
  });

  it('should end with closed when the channel is removed', async () => {
    const done = createStreams(10_000).stream(session, sink, controller.signal);
    channels.remove(session.id);

    expect(await done).toBe('closed');
    expect(sink.chunks).toHaveLength(1);
  });

  it('should write an error frame for an unserializable frame', async () => {
    const done = createStreams(10_000).stream(session, sink, controller.signal);
    channels.push(session.id, { value: BigInt(1) });

    expect(await done).toBe('error');
    const frames = sink.frames();
    expect(frames).toHaveLength(2);
    expect(frames[1]).toEqual({
      type: 'error',
      timestamp: expect.any(Number),
      message: 'Do not know how to serialize a BigInt'
    });
    expect(channels.has(session.id)).toBe(false);
  });

  it('should end with error when the sink stops accepting writes', async () => {
    let writes = 0;
    const brokenSink: StreamSink = {
      write: () => {
        writes++;
        if (writes > 1) {
          throw new Error('socket closed');
        }
        return true;
      },
      drain: async () => undefined
    };

    const done = createStreams(10_000).stream(session, brokenSink, controller.signal);
    channels.push(session.id, 'frame');

    expect(await done).toBe('error');
    expect(channels.has(session.id)).toBe(false);
  });

  it('should track the number of open streams', async () => {
    const before = activeStreams();
    const done = createStreams(10_000).stream(session, sink, controller.signal);
    expect(activeStreams()).toBe(before + 1);

    controller.abort();
    await done;
    expect(activeStreams()).toBe(before);
  });

  describe('backpressure', () => {
    beforeEach(() => {
      channels = new ChannelService({ maxQueueSize: 5, overflowPolicy: 'drop-oldest' });
    });

    it('should hold frames in the bounded channel while the sink is buffering', async () => {
      const blocking = new BlockingSink();
      const before = droppedFrames();
      const done = createStreams(10_000).stream(session, blocking, controller.signal);

      for (let step = 0; step < 20; step++) {
        channels.push(session.id, { step });
      }

      expect(blocking.drainCalls).toBe(1);
      expect(blocking.chunks).toHaveLength(1);
      expect(channels.attach(session.id).pending).toBe(5);
      expect(droppedFrames()).toBe(before + 15);

      blocking.unblock();
      await waitFor(() => blocking.chunks.length === 6);
      expect(blocking.frames().slice(1).map(frame => frame.data)).toEqual([
        { step: 15 },
        { step: 16 },
        { step: 17 },
        { step: 18 },
        { step: 19 }
      ]);

      controller.abort();
      expect(await done).toBe('disconnected');
    });

    it('should stop waiting for drain when the client disconnects', async () => {
      const blocking = new BlockingSink();
      const done = createStreams(10_000).stream(session, blocking, controller.signal);

      controller.abort();
      expect(await done).toBe('disconnected');
      expect(channels.has(session.id)).toBe(false);
    });

    it('should stop waiting for drain when the channel is removed', async () => {
      const blocking = new BlockingSink();
      const done = createStreams(10_000).stream(session, blocking, controller.signal);

      channels.remove(session.id);
      expect(await done).toBe('closed');
    });
  });
});
