/**
 * Server-push stream types
 */

export type StreamFrameType = 'connection' | 'message' | 'heartbeat' | 'error';

export interface StreamFrame {
  type: StreamFrameType;
  timestamp?: number;
  session_id?: string;
  data?: unknown;
  message?: string;
}

export type OverflowPolicy = 'drop-oldest' | 'drop-newest';

/**
 * Why a stream loop ended
 */
export type StreamOutcome = 'disconnected' | 'closed' | 'session-expired' | 'error';

export type ChannelWait =
  | { kind: 'frame'; frame: unknown }
  | { kind: 'timeout' }
  | { kind: 'closed' }
  | { kind: 'aborted' };

/**
 * Destination of serialized frames, e.g. an HTTP response
 */
export interface StreamSink {
  /**
   * Returns false once the destination is buffering; the stream then waits
   * for `drain` before taking the next frame off its channel.
   */
  write(chunk: string): boolean;
  /**
   * Resolves when buffered output has been flushed or the signal aborts
   */
  drain(signal: AbortSignal): Promise<void>;
}
