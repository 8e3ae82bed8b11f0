/**
 * 实时事件通道：ws 连接按需拉取文本消息，二进制帧（预览图）直接丢弃
 */
import { WebSocket, type RawData } from 'ws';
import { ConnectTimeoutError, errorMessage } from '../../../domain/index.js';
import { silentLogger, type Logger } from '../../../services/log-manager.js';

export interface EventChannel {
  /**
   * 取下一条文本消息；通道关闭后返回 null。
   * signal 被中止时以 signal.reason 拒绝
   */
  receive(signal?: AbortSignal): Promise<string | null>;
  close(): void;
}

export interface ConnectOptions {
  /** 单次握手的时限；超时以错误拒绝 */
  timeoutMs?: number;
}

export type ChannelConnector = (url: string, options?: ConnectOptions) => Promise<EventChannel>;

interface Waiter {
  resolve: (message: string | null) => void;
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  return data.toString('utf-8');
}

export class WsEventChannel implements EventChannel {
  private readonly buffered: string[] = [];
  private readonly waiters: Waiter[] = [];
  private closed = false;

  constructor(private readonly socket: WebSocket) {
    socket.on('message', (data: RawData, isBinary: boolean) => {
      if (isBinary) return;
      this.push(rawToString(data));
    });
    socket.on('close', () => this.markClosed());
    socket.on('error', () => this.markClosed());
  }

  receive(signal?: AbortSignal): Promise<string | null> {
    const next = this.buffered.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(null);
    if (signal?.aborted) return Promise.reject(signal.reason);

    return new Promise<string | null>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        reject(signal?.reason);
      };
      const waiter: Waiter = {
        resolve: (message) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(message);
        },
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  close(): void {
    if (this.socket.readyState === WebSocket.OPEN) {
      this.socket.close();
    }
    this.markClosed();
  }

  private push(message: string): void {
    const waiter = this.waiters.shift();
    if (waiter) waiter.resolve(message);
    else this.buffered.push(message);
  }

  private markClosed(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter.resolve(null);
  }
}

/** 建立一次 ws 连接；握手失败（拒绝连接、非 101 响应、握手超时）即拒绝 */
export const connectWebSocket: ChannelConnector = (url, options = {}) =>
  new Promise<EventChannel>((resolve, reject) => {
    const socket = new WebSocket(
      url,
      options.timeoutMs !== undefined ? { handshakeTimeout: Math.max(1, Math.ceil(options.timeoutMs)) } : {}
    );
    const onError = (error: Error) => {
      socket.removeListener('open', onOpen);
      reject(error);
    };
    const onOpen = () => {
      socket.removeListener('error', onError);
      resolve(new WsEventChannel(socket));
    };
    socket.once('open', onOpen);
    socket.once('error', onError);
  });

export interface ConnectRetryOptions {
  retryIntervalMs: number;
  connectTimeoutMs: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  logger?: Logger;
}

/**
 * 按固定间隔重试连接，直到成功、尝试次数 ceil(timeout / interval) 用尽或超过总时限。
 * 每次握手的时限不超过剩余时间
 */
export async function connectWithRetry(
  connector: ChannelConnector,
  url: string,
  options: ConnectRetryOptions
): Promise<EventChannel> {
  const logger = options.logger ?? silentLogger;
  const sleep = options.sleep ?? ((ms: number) => new Promise<void>((r) => setTimeout(r, ms)));
  const now = options.now ?? Date.now;
  const maxAttempts = Math.max(1, Math.ceil(options.connectTimeoutMs / options.retryIntervalMs));
  const deadline = now() + options.connectTimeoutMs;

  let lastError: unknown;
  let attempt = 0;
  for (;;) {
    attempt++;
    try {
      const channel = await connector(url, { timeoutMs: Math.max(1, deadline - now()) });
      if (attempt > 1) logger.info(`Realtime channel connected after ${attempt} attempts`);
      return channel;
    } catch (error) {
      lastError = error;
      logger.warn(`Realtime channel connect failed (${attempt}/${maxAttempts}): ${errorMessage(error)}`);
    }
    const remaining = deadline - now();
    if (attempt >= maxAttempts || remaining <= 0) break;
    await sleep(Math.min(options.retryIntervalMs, remaining));
  }
  throw new ConnectTimeoutError(
    `Could not connect to ${url} within ${options.connectTimeoutMs}ms (${attempt} attempts): ${errorMessage(lastError)}`,
    { cause: lastError }
  );
}
