import {
  getErrorMessage,
  Session,
  StreamFrame,
  StreamOutcome,
  StreamSink
} from '../types/index.js';
import { epochSeconds } from '../utils/index.js';
import { logger, shortId } from '../utils/logger.js';
import { metrics } from '../utils/metrics.js';
import { ChannelService, EventChannel } from './ChannelService.js';
import { SessionService } from './SessionService.js';

/**
 * Serialize one frame for the text/event-stream wire
 */
export function formatEventFrame(frame: StreamFrame): string {
  return `data: ${JSON.stringify(frame)}\n\n`;
}

/**
 * Drives one server-push stream: drains the session's event channel into a
 * sink, writing heartbeats while idle, until the client disconnects, the
 * channel is closed, the session expires or a frame cannot be delivered.
 * A buffering sink pauses the loop, so a slow client backs frames up into
 * the bounded channel rather than into the socket.
 */
export class StreamService {
  private readonly log = logger.child({ component: 'stream' });

  constructor(
    private readonly sessions: SessionService,
    private readonly channels: ChannelService,
    private readonly heartbeatIntervalMs: number
  ) {}

  async stream(session: Session, sink: StreamSink, signal: AbortSignal): Promise<StreamOutcome> {
    const sessionId = session.id;
    const channel = this.channels.attach(sessionId);

    metrics.incrementGauge('toolstream_streams_active');
    this.log.info('Stream opened', { sessionId: shortId(sessionId) });

    let outcome: StreamOutcome = 'disconnected';
    try {
      outcome = await this.pump(channel, sink, signal);
    } finally {
      this.channels.release(channel);
      metrics.decrementGauge('toolstream_streams_active');
      this.log.info('Stream closed', { sessionId: shortId(sessionId), outcome });
    }
    return outcome;
  }

  private async pump(channel: EventChannel, sink: StreamSink, signal: AbortSignal): Promise<StreamOutcome> {
    const sessionId = channel.sessionId;

    try {
      await this.deliver(channel, sink, signal, { type: 'connection', session_id: sessionId });

      for (;;) {
        if (signal.aborted) {
          return 'disconnected';
        }

        const wait = await channel.next(this.heartbeatIntervalMs, signal);

        switch (wait.kind) {
          case 'frame':
            await this.deliver(channel, sink, signal, { type: 'message', timestamp: epochSeconds(), data: wait.frame });
            break;

          case 'timeout':
            if (!this.sessions.get(sessionId)) {
              this.log.info('Session expired during stream', { sessionId: shortId(sessionId) });
              return 'session-expired';
            }
            await this.deliver(channel, sink, signal, { type: 'heartbeat', timestamp: epochSeconds(), session_id: sessionId });
            break;

          case 'aborted':
            return 'disconnected';

          case 'closed':
            return 'closed';
        }
      }
    } catch (error) {
      if (signal.aborted) {
        return 'disconnected';
      }

      const message = getErrorMessage(error);
      this.log.error('Stream delivery failed', { sessionId: shortId(sessionId), message });
      try {
        sink.write(formatEventFrame({ type: 'error', timestamp: epochSeconds(), message }));
      } catch (writeError) {
        this.log.debug('Could not write error frame', {
          sessionId: shortId(sessionId),
          message: getErrorMessage(writeError)
        });
      }
      return 'error';
    }
  }

  /**
   * Write one frame. While the sink is buffering, frames stay in the bounded
   * channel, where its overflow policy applies.
   */
  private async deliver(
    channel: EventChannel,
    sink: StreamSink,
    signal: AbortSignal,
    frame: StreamFrame
  ): Promise<void> {
    if (sink.write(formatEventFrame(frame))) {
      return;
    }

    const stop = new AbortController();
    const onStop = (): void => stop.abort();
    signal.addEventListener('abort', onStop, { once: true });
    channel.closedSignal.addEventListener('abort', onStop, { once: true });
    if (signal.aborted || channel.isClosed) {
      stop.abort();
    }

    metrics.incrementCounter('toolstream_stream_backpressure_total');
    this.log.debug('Stream sink is buffering, waiting for drain', {
      sessionId: shortId(channel.sessionId),
      pending: channel.pending
    });

    try {
      await sink.drain(stop.signal);
    } finally {
      signal.removeEventListener('abort', onStop);
      channel.closedSignal.removeEventListener('abort', onStop);
    }
  }
}
