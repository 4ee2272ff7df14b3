/**
 * Tests WsEventChannel against an in-process WebSocket server on a free
 * local port.
 */
import net from 'node:net';
import WebSocket, { WebSocketServer } from 'ws';
import { WsEventChannel } from '../src/client/EventChannel';
import { CanceledError } from '../src/core/Errors';

const HANDSHAKE_MS = 1_000;

interface Engine {
  url: string;
  /** Resolves with the server side of the next connection. */
  nextConnection: () => Promise<WebSocket>;
  authorization: Array<string | undefined>;
  stop: () => Promise<void>;
}

async function startEngine(): Promise<Engine> {
  const wss = new WebSocketServer({ port: 0 });
  await new Promise<void>((resolve) => wss.once('listening', () => resolve()));
  const address = wss.address();
  if (typeof address === 'string') throw new Error('expected a TCP address');

  const authorization: Array<string | undefined> = [];
  const connections: WebSocket[] = [];
  const waiting: Array<(ws: WebSocket) => void> = [];
  wss.on('connection', (ws, req) => {
    authorization.push(req.headers.authorization);
    const waiter = waiting.shift();
    if (waiter) waiter(ws);
    else connections.push(ws);
  });

  return {
    url: `ws://127.0.0.1:${address.port}/ws?clientId=c1`,
    authorization,
    nextConnection: () => {
      const ready = connections.shift();
      return ready ? Promise.resolve(ready) : new Promise((resolve) => waiting.push(resolve));
    },
    stop: async () => {
      for (const client of wss.clients) client.terminate();
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    },
  };
}

/** Accepts TCP connections and never answers the upgrade request. */
async function startSilentServer(): Promise<{ url: string; stop: () => Promise<void> }> {
  const sockets: net.Socket[] = [];
  const server = net.createServer((socket) => {
    sockets.push(socket);
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('expected a TCP address');

  return {
    url: `ws://127.0.0.1:${address.port}/ws`,
    stop: async () => {
      for (const socket of sockets) socket.destroy();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    },
  };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('TestWsEventChannel', () => {
  let engine: Engine;
  let warnSpy: jest.SpyInstance;

  beforeEach(async () => {
    engine = await startEngine();
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    warnSpy.mockRestore();
    await engine.stop();
  });

  test('test_headers_sent_on_connect', async () => {
    const channel = await WsEventChannel.open(engine.url, {
      headers: { Authorization: 'Bearer test-secret' },
      handshakeTimeoutMs: HANDSHAKE_MS,
    });
    await engine.nextConnection();

    expect(engine.authorization).toEqual(['Bearer test-secret']);
    channel.close();
  });

  /** Frames that arrive before anyone reads are kept in order; text and binary stay apart. */
  test('test_buffered_text_and_binary', async () => {
    const channel = await WsEventChannel.open(engine.url, { headers: {}, handshakeTimeoutMs: HANDSHAKE_MS });
    const server = await engine.nextConnection();
    server.send('{"type":"status"}');
    server.send(Buffer.from([1, 2, 3]));
    await sleep(50);

    expect(await channel.next(HANDSHAKE_MS)).toEqual({ binary: false, data: '{"type":"status"}' });
    expect(await channel.next(HANDSHAKE_MS)).toEqual({ binary: true, data: Buffer.from([1, 2, 3]) });
    channel.close();
  });

  test('test_waiting_reader_gets_next_frame', async () => {
    const channel = await WsEventChannel.open(engine.url, { headers: {}, handshakeTimeoutMs: HANDSHAKE_MS });
    const server = await engine.nextConnection();

    const read = channel.next(HANDSHAKE_MS);
    server.send('{"type":"executing"}');

    expect(await read).toEqual({ binary: false, data: '{"type":"executing"}' });
    channel.close();
  });

  test('test_next_times_out_with_null', async () => {
    const channel = await WsEventChannel.open(engine.url, { headers: {}, handshakeTimeoutMs: HANDSHAKE_MS });

    expect(await channel.next(30)).toBeNull();
    channel.close();
  });

  /** A close from the engine fails the pending read and every later one. */
  test('test_remote_close_rejects_readers', async () => {
    const channel = await WsEventChannel.open(engine.url, { headers: {}, handshakeTimeoutMs: HANDSHAKE_MS });
    const server = await engine.nextConnection();

    const read = channel.next(5_000);
    server.close(4000, 'bye');

    await expect(read).rejects.toThrow('event channel closed (code 4000)');
    await expect(channel.next(5_000)).rejects.toThrow('event channel closed (code 4000)');
    channel.close();
  });

  test('test_local_close_rejects_readers', async () => {
    const channel = await WsEventChannel.open(engine.url, { headers: {}, handshakeTimeoutMs: HANDSHAKE_MS });

    const read = channel.next(5_000);
    channel.close();

    await expect(read).rejects.toThrow('event channel closed locally');
  });
});

describe('TestWsEventChannelConnect', () => {
  let silent: { url: string; stop: () => Promise<void> };

  beforeEach(async () => {
    silent = await startSilentServer();
  });

  afterEach(async () => {
    await silent.stop();
  });

  /** An upgrade the server never answers fails after the handshake bound. */
  test('test_handshake_timeout', async () => {
    await expect(WsEventChannel.open(silent.url, { headers: {}, handshakeTimeoutMs: 100 })).rejects.toThrow(
      'Opening handshake has timed out',
    );
  });

  test('test_abort_while_connecting', async () => {
    const controller = new AbortController();
    const opening = WsEventChannel.open(silent.url, {
      headers: {},
      handshakeTimeoutMs: 5_000,
      signal: controller.signal,
    });

    controller.abort();

    await expect(opening).rejects.toBeInstanceOf(CanceledError);
  });

  test('test_already_aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      WsEventChannel.open(silent.url, { headers: {}, handshakeTimeoutMs: 5_000, signal: controller.signal }),
    ).rejects.toBeInstanceOf(CanceledError);
  });
});
