import WebSocket, { RawData } from 'ws';
import { CanceledError } from '../core/Errors';
import { ChannelFrame, ChannelOptions, IEventChannel } from '../core/Interface';
import { debug } from '../core/log';

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

type Waiter = {
  resolve: (frame: ChannelFrame | null) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
};

/**
 * Event stream over a `ws` WebSocket. Frames are buffered as they arrive and
 * handed out one at a time by `next()`.
 */
export class WsEventChannel extends IEventChannel {
  private socket: WebSocket;
  private frames: ChannelFrame[] = [];
  private waiters: Waiter[] = [];
  private closedReason: string | null = null;

  private constructor(socket: WebSocket) {
    super();
    this.socket = socket;

    socket.on('message', (data: RawData, isBinary: boolean) => {
      const buf = toBuffer(data);
      this.push(isBinary ? { binary: true, data: buf } : { binary: false, data: buf.toString('utf8') });
    });

    socket.on('close', (code: number) => {
      this.fail(`event channel closed (code ${code})`);
    });

    socket.on('error', (err: Error) => {
      console.warn('[channel] WebSocket error:', err.message);
      this.fail(`event channel error: ${err.message}`);
    });
  }

  /**
   * Connect to `url`. Rejects when the handshake fails or outlasts
   * `handshakeTimeoutMs`, and with CanceledError when `signal` aborts first.
   */
  static open(url: string, options: ChannelOptions): Promise<WsEventChannel> {
    const { headers, handshakeTimeoutMs, signal } = options;
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CanceledError(`Connecting to ${url} was canceled`));
        return;
      }

      const socket = new WebSocket(url, { headers, handshakeTimeout: handshakeTimeoutMs });
      debug('[channel]', `WS connecting: ${url}`);

      const settle = () => {
        socket.removeListener('open', onOpen);
        socket.removeListener('error', onError);
        signal?.removeEventListener('abort', onAbort);
      };
      const onError = (err: Error) => {
        settle();
        reject(err);
      };
      const onOpen = () => {
        settle();
        resolve(new WsEventChannel(socket));
      };
      const onAbort = () => {
        settle();
        // terminate() on a connecting socket emits one more 'error'
        socket.once('error', (err: Error) => debug('[channel]', `aborted connect: ${err.message}`));
        socket.terminate();
        reject(new CanceledError(`Connecting to ${url} was canceled`));
      };

      socket.once('open', onOpen);
      socket.once('error', onError);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  next(timeoutMs: number): Promise<ChannelFrame | null> {
    const frame = this.frames.shift();
    if (frame) return Promise.resolve(frame);
    if (this.closedReason !== null) return Promise.reject(new Error(this.closedReason));

    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve(null);
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  close(): void {
    if (this.closedReason === null) {
      this.fail('event channel closed locally');
    }
    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close();
    }
  }

  private push(frame: ChannelFrame): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(frame);
    } else {
      this.frames.push(frame);
    }
  }

  private fail(reason: string): void {
    if (this.closedReason !== null) return;
    this.closedReason = reason;
    for (const waiter of this.waiters) {
      clearTimeout(waiter.timer);
      waiter.reject(new Error(reason));
    }
    this.waiters = [];
  }
}

export function httpToWsUrl(baseUrl: string): string {
  if (baseUrl.startsWith('https://')) return 'wss://' + baseUrl.slice('https://'.length);
  if (baseUrl.startsWith('http://')) return 'ws://' + baseUrl.slice('http://'.length);
  return baseUrl;
}
