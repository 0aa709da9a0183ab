import { ChannelWait, OverflowPolicy } from '../types/index.js';
import { logger, shortId } from '../utils/logger.js';
import { metrics } from '../utils/metrics.js';

export interface EventChannelOptions {
  maxQueueSize: number;
  overflowPolicy: OverflowPolicy;
  onOverflow?: (sessionId: string, policy: OverflowPolicy) => void;
}

type Waiter = (result: ChannelWait) => void;

/**
 * Bounded FIFO of outbound frames for one session.
 *
 * Producers never wait: a full queue drops a frame according to the overflow
 * policy. Consumers wait in `next()` for a frame, a timeout, a close or an
 * abort signal, whichever comes first.
 */
export class EventChannel {
  private readonly frames: unknown[] = [];
  private readonly waiters: Waiter[] = [];
  private closed = false;
  private readonly closing = new AbortController();

  constructor(
    readonly sessionId: string,
    private readonly options: EventChannelOptions
  ) {}

  /**
   * Enqueue a frame. Returns false when the frame was not delivered to the
   * queue (channel closed, or dropped under drop-newest).
   */
  push(frame: unknown): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ kind: 'frame', frame });
      return true;
    }

    if (this.frames.length >= this.options.maxQueueSize) {
      this.options.onOverflow?.(this.sessionId, this.options.overflowPolicy);
      if (this.options.overflowPolicy === 'drop-newest') {
        return false;
      }
      this.frames.shift();
    }

    this.frames.push(frame);
    return true;
  }

  /**
   * Wait for the next frame
   */
  next(timeoutMs: number, signal?: AbortSignal): Promise<ChannelWait> {
    if (this.frames.length > 0) {
      return Promise.resolve({ kind: 'frame', frame: this.frames.shift() });
    }
    if (this.closed) {
      return Promise.resolve({ kind: 'closed' });
    }
    if (signal?.aborted) {
      return Promise.resolve({ kind: 'aborted' });
    }

    return new Promise<ChannelWait>((resolve) => {
      const settle: Waiter = (result) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        const index = this.waiters.indexOf(settle);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        resolve(result);
      };
      const onAbort = (): void => settle({ kind: 'aborted' });
      const timer = setTimeout(() => settle({ kind: 'timeout' }), timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(settle);
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.frames.length = 0;
    this.closing.abort();
    for (const waiter of this.waiters.splice(0)) {
      waiter({ kind: 'closed' });
    }
  }

  get pending(): number {
    return this.frames.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Aborts when the channel closes
   */
  get closedSignal(): AbortSignal {
    return this.closing.signal;
  }
}

/**
 * Owns the session id → EventChannel map.
 * Pushing to a session without a channel is a silent no-op.
 */
export class ChannelService {
  private readonly channels = new Map<string, EventChannel>();
  private readonly log = logger.child({ component: 'event-channels' });

  constructor(private readonly options: Omit<EventChannelOptions, 'onOverflow'>) {}

  /**
   * Return the session's channel, creating it on first attach
   */
  attach(sessionId: string): EventChannel {
    const existing = this.channels.get(sessionId);
    if (existing) {
      return existing;
    }

    const channel = new EventChannel(sessionId, {
      ...this.options,
      onOverflow: (id, policy) => this.handleOverflow(id, policy)
    });
    this.channels.set(sessionId, channel);
    this.log.debug('Created event channel', { sessionId: shortId(sessionId) });
    return channel;
  }

  /**
   * Queue a frame for the session's stream; false when nothing is listening
   */
  push(sessionId: string, frame: unknown): boolean {
    const channel = this.channels.get(sessionId);
    if (!channel) {
      return false;
    }
    return channel.push(frame);
  }

  /**
   * Close and forget the session's channel
   */
  remove(sessionId: string): boolean {
    const channel = this.channels.get(sessionId);
    if (!channel) {
      return false;
    }
    this.channels.delete(sessionId);
    channel.close();
    this.log.debug('Cleaned up event channel', { sessionId: shortId(sessionId) });
    return true;
  }

  /**
   * Remove the channel if it is still the one registered for the session
   */
  release(channel: EventChannel): void {
    if (this.channels.get(channel.sessionId) === channel) {
      this.remove(channel.sessionId);
    } else {
      channel.close();
    }
  }

  has(sessionId: string): boolean {
    return this.channels.has(sessionId);
  }

  size(): number {
    return this.channels.size;
  }

  closeAll(): void {
    for (const sessionId of [...this.channels.keys()]) {
      this.remove(sessionId);
    }
  }

  private handleOverflow(sessionId: string, policy: OverflowPolicy): void {
    metrics.incrementCounter('toolstream_stream_frames_dropped_total', { policy });
    this.log.warn('Event channel full, dropping frame', {
      sessionId: shortId(sessionId),
      policy,
      maxQueueSize: this.options.maxQueueSize
    });
  }
}
