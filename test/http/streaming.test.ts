import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import http from 'node:http';
import request from 'supertest';
import { ToolstreamHttpServer } from '../../src/server.js';
import { createTestConfig, parseEventChunk, waitFor } from '../fixtures/index.js';
import { isPlainObject } from '../../src/utils/index.js';
import { metrics } from '../../src/utils/metrics.js';

/**
 * Event stream tests over a real socket
 * - Connection frame and session header on GET
 * - Tool progress delivered as message frames
 * - Session termination ends the stream
 * - A stalled client backs frames up into the bounded channel
 */

function droppedFrames(): number {
  return metrics.snapshot().counters['toolstream_stream_frames_dropped_total']?.['policy="drop-oldest"'] ?? 0;
}

const nextTick = (): Promise<void> => new Promise(resolve => setImmediate(resolve));

interface OpenStream {
  response: http.IncomingMessage;
  frames: Record<string, unknown>[];
  ended: () => boolean;
  close: () => void;
}

function openStream(port: number, path: string, headers: Record<string, string> = {}): Promise<OpenStream> {
  return new Promise((resolve, reject) => {
    const req = http.get({
      host: '127.0.0.1',
      port,
      path,
      headers: { Accept: 'text/event-stream', ...headers }
    }, response => {
      const frames: Record<string, unknown>[] = [];
      let buffer = '';
      let ended = false;

      response.setEncoding('utf8');
      response.on('data', (chunk: string) => {
        buffer += chunk;
        let boundary = buffer.indexOf('\n\n');
        while (boundary !== -1) {
          frames.push(parseEventChunk(buffer.slice(0, boundary + 2)));
          buffer = buffer.slice(boundary + 2);
          boundary = buffer.indexOf('\n\n');
        }
      });
      response.on('end', () => {
        ended = true;
      });

      resolve({
        response,
        frames,
        ended: () => ended,
        close: () => req.destroy()
      });
    });
    req.on('error', reject);
  });
}

describe('Event streams', () => {
  let server: ToolstreamHttpServer;
  let port: number;
  const streams: OpenStream[] = [];

  const open = async (path: string, headers?: Record<string, string>): Promise<OpenStream> => {
    const stream = await openStream(port, path, headers);
    streams.push(stream);
    return stream;
  };

  beforeEach(async () => {
    server = new ToolstreamHttpServer(createTestConfig());
    await server.start();
    const address = server.getAddress();
    if (!address) {
      throw new Error('server did not bind');
    }
    port = address.port;
  });

  afterEach(async () => {
    for (const stream of streams.splice(0)) {
      stream.close();
    }
    await server.stop();
  });

  it('should create a session and announce it in the connection frame', async () => {
    const stream = await open('/mcp');
    await waitFor(() => stream.frames.length === 1);

    const sessionId = stream.response.headers['mcp-session-id'];
    expect(stream.response.statusCode).toBe(200);
    expect(stream.response.headers['content-type']).toContain('text/event-stream');
    expect(stream.response.headers['cache-control']).toBe('no-cache');
    expect(typeof sessionId).toBe('string');
    expect(stream.frames[0]).toEqual({ type: 'connection', session_id: sessionId });
    expect(server.getChannels().size()).toBe(1);
  });

  it('should deliver tool progress to the bound stream', async () => {
    const initialized = await request(server.getApp())
      .post('/mcp')
      .send({ jsonrpc: '2.0', id: 1, method: 'initialize', params: {} })
      .expect(200);
    const sessionId = String(initialized.headers['mcp-session-id']);

    const stream = await open('/mcp', { 'Mcp-Session-Id': sessionId });
    await waitFor(() => stream.frames.length === 1 && server.getChannels().has(sessionId));

    await request(server.getApp())
      .post('/mcp')
      .set('Mcp-Session-Id', sessionId)
      .send({ jsonrpc: '2.0', id: 7, method: 'tools/call', params: { name: 'echo', arguments: { message: 'hi' } } })
      .expect(200);

    await waitFor(() => stream.frames.length === 3);
    const [, begin, end] = stream.frames;

    expect(begin).toMatchObject({
      type: 'message',
      data: {
        jsonrpc: '2.0',
        method: 'notifications/progress',
        params: {
          progressToken: 'tool_7',
          value: { kind: 'begin', title: 'Executing echo', message: 'Starting tool execution...' }
        }
      }
    });
    expect(typeof begin?.timestamp).toBe('number');
    expect(end).toMatchObject({
      type: 'message',
      data: { params: { progressToken: 'tool_7', value: { kind: 'end', message: 'Tool execution completed' } } }
    });
  });

  it('should relay client progress notifications', async () => {
    const stream = await open('/sse');
    await waitFor(() => stream.frames.length === 1);
    const sessionId = String(stream.response.headers['mcp-session-id']);

    await request(server.getApp())
      .post('/sse')
      .set('Mcp-Session-Id', sessionId)
      .send({ jsonrpc: '2.0', method: 'notifications/progress', params: { progressToken: 'upload', progress: 50 } })
      .expect(204);

    await waitFor(() => stream.frames.length === 2);
    expect(stream.frames[1]).toMatchObject({
      type: 'message',
      data: { method: 'notifications/progress', params: { progressToken: 'upload', progress: 50 } }
    });
  });

  it('should end the stream when the session is terminated', async () => {
    const stream = await open('/mcp');
    await waitFor(() => stream.frames.length === 1);
    const sessionId = String(stream.response.headers['mcp-session-id']);

    await request(server.getApp()).delete('/mcp').set('Mcp-Session-Id', sessionId).expect(200);

    await waitFor(() => stream.ended());
    expect(server.getChannels().has(sessionId)).toBe(false);
    expect(server.getSessions().get(sessionId)).toBeUndefined();
  });

  it('should release the channel when the client disconnects', async () => {
    const stream = await open('/mcp');
    await waitFor(() => stream.frames.length === 1);

    stream.close();
    await waitFor(() => server.getChannels().size() === 0);
  });
});

describe('Event streams with a stalled client', () => {
  const QUEUE_SIZE = 10;
  let server: ToolstreamHttpServer;
  let stream: OpenStream | undefined;

  beforeEach(async () => {
    server = new ToolstreamHttpServer(createTestConfig({
      stream: { heartbeatIntervalMs: 30000, maxQueueSize: QUEUE_SIZE, overflowPolicy: 'drop-oldest' }
    }));
    await server.start();
  });

  afterEach(async () => {
    stream?.close();
    stream = undefined;
    await server.stop();
  });

  it('should queue and drop frames instead of buffering them in the socket', async () => {
    const address = server.getAddress();
    if (!address) {
      throw new Error('server did not bind');
    }
    const opened = await openStream(address.port, '/mcp');
    stream = opened;
    await waitFor(() => opened.frames.length === 1);
    const sessionId = String(opened.response.headers['mcp-session-id']);
    const channel = server.getChannels().attach(sessionId);

    opened.response.pause();

    const blob = 'x'.repeat(64 * 1024);
    let seq = 0;
    while (channel.pending < QUEUE_SIZE && seq < 2000) {
      server.getChannels().push(sessionId, { seq: seq++, blob });
      await nextTick();
    }
    expect(channel.pending).toBe(QUEUE_SIZE);

    const before = droppedFrames();
    for (let extra = 0; extra < 5; extra++) {
      server.getChannels().push(sessionId, { seq: seq++, blob });
    }
    expect(channel.pending).toBe(QUEUE_SIZE);
    expect(droppedFrames()).toBe(before + 5);

    // The newest frame survives drop-oldest and arrives once the client reads again
    const lastSeq = seq - 1;
    opened.response.resume();
    await waitFor(() => {
      const data = opened.frames[opened.frames.length - 1]?.data;
      return isPlainObject(data) && data.seq === lastSeq;
    }, 8000);
  });
});
