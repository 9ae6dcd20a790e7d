import { randomUUID } from 'node:crypto';
import { type RawData, WebSocket } from 'ws';
import { logger } from '../utils/logger.js';
import { CloseCode, type Connection } from './Connection.js';

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

/**
 * The parts of a `ws` socket the adapter uses.
 * Lets tests drive the adapter without a network socket.
 */
export interface SocketLike {
  readonly readyState: number;
  on(event: 'message', listener: (data: RawData) => void): unknown;
  on(event: 'close', listener: (code: number) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  send(data: string, cb: (error?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

/** Inbound messages held for a handler that has not read them yet */
export const DEFAULT_MAX_QUEUED_MESSAGES = 64;

export interface WebSocketConnectionOptions {
  /** Close with 1008 once more unread messages than this pile up */
  maxQueuedMessages?: number;
}

/**
 * Adapts a `ws` socket to the pull-based Connection interface.
 * Inbound messages queue until the handler asks for them.
 */
export class WebSocketConnection implements Connection {
  readonly id: string = randomUUID();
  private readonly inbox: string[] = [];
  private readonly waiting: ((data: string | null) => void)[] = [];
  private readonly maxQueuedMessages: number;
  private closed = false;

  constructor(
    private readonly socket: SocketLike,
    options: WebSocketConnectionOptions = {}
  ) {
    this.maxQueuedMessages = options.maxQueuedMessages ?? DEFAULT_MAX_QUEUED_MESSAGES;

    socket.on('message', (data: RawData) => {
      this.push(rawDataToString(data));
    });

    socket.on('close', (code: number) => {
      logger.debug('WebSocket closed', { connectionId: this.id, code });
      this.finish();
    });

    socket.on('error', (error: Error) => {
      logger.error('WebSocket error', { connectionId: this.id, error: error.message });
      this.finish();
    });
  }

  get isOpen(): boolean {
    return !this.closed && this.socket.readyState === WebSocket.OPEN;
  }

  send(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.readyState !== WebSocket.OPEN) {
        reject(new Error('WebSocket is not open'));
        return;
      }
      this.socket.send(data, (error?: Error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  receive(): Promise<string | null> {
    const next = this.inbox.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  close(code: number = CloseCode.NORMAL, reason?: string): void {
    this.finish();
    if (
      this.socket.readyState === WebSocket.OPEN ||
      this.socket.readyState === WebSocket.CONNECTING
    ) {
      this.socket.close(code, reason);
    }
  }

  private push(data: string): void {
    if (this.closed) return;
    const waiter = this.waiting.shift();
    if (waiter) {
      waiter(data);
      return;
    }
    if (this.inbox.length >= this.maxQueuedMessages) {
      logger.warn('Inbound queue full, closing connection', {
        connectionId: this.id,
        queued: this.inbox.length,
      });
      this.close(CloseCode.POLICY_VIOLATION, 'Too many queued messages');
      return;
    }
    this.inbox.push(data);
  }

  private finish(): void {
    if (this.closed) return;
    this.closed = true;
    this.inbox.length = 0;
    for (const waiter of this.waiting.splice(0)) {
      waiter(null);
    }
  }
}
