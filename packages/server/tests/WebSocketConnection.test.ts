import { EventEmitter } from 'node:events';
import { describe, expect, it } from 'vitest';
import { WebSocket } from 'ws';
import { CloseCode } from '../src/transport/Connection.js';
import { WebSocketConnection } from '../src/transport/WebSocketConnection.js';

/**
 * Stand-in for a `ws` socket: an emitter that records sends and closes.
 */
class FakeSocket extends EventEmitter {
  readyState: number = WebSocket.OPEN;
  readonly sent: string[] = [];
  closedWith: { code?: number; reason?: string } | null = null;
  sendError: Error | null = null;

  send(data: string, cb: (error?: Error) => void): void {
    if (this.sendError) {
      cb(this.sendError);
      return;
    }
    this.sent.push(data);
    cb();
  }

  close(code?: number, reason?: string): void {
    this.closedWith = { code, reason };
    this.readyState = WebSocket.CLOSING;
  }
}

describe('WebSocketConnection', () => {
  describe('receive', () => {
    it('should return messages that arrived before the call', async () => {
      const socket = new FakeSocket();
      const conn = new WebSocketConnection(socket);

      socket.emit('message', Buffer.from('{"type":"init"}'));

      await expect(conn.receive()).resolves.toBe('{"type":"init"}');
    });

    it('should wait for the next message', async () => {
      const socket = new FakeSocket();
      const conn = new WebSocketConnection(socket);

      const pending = conn.receive();
      socket.emit('message', Buffer.from('first'));
      socket.emit('message', Buffer.from('second'));

      await expect(pending).resolves.toBe('first');
      await expect(conn.receive()).resolves.toBe('second');
    });

    it('should join fragmented buffers', async () => {
      const socket = new FakeSocket();
      const conn = new WebSocketConnection(socket);

      socket.emit('message', [Buffer.from('{"type":'), Buffer.from('"init"}')]);

      await expect(conn.receive()).resolves.toBe('{"type":"init"}');
    });

    it('should resolve pending receives with null when the socket closes', async () => {
      const socket = new FakeSocket();
      const conn = new WebSocketConnection(socket);

      const pending = conn.receive();
      socket.readyState = WebSocket.CLOSED;
      socket.emit('close', 1006);

      await expect(pending).resolves.toBeNull();
      await expect(conn.receive()).resolves.toBeNull();
      expect(conn.isOpen).toBe(false);
    });

    it('should close with policy violation when unread messages pile up', async () => {
      const socket = new FakeSocket();
      const conn = new WebSocketConnection(socket, { maxQueuedMessages: 2 });

      socket.emit('message', Buffer.from('{"type":"play","column":0}'));
      socket.emit('message', Buffer.from('{"type":"play","column":1}'));
      expect(socket.closedWith).toBeNull();

      socket.emit('message', Buffer.from('{"type":"play","column":2}'));

      expect(socket.closedWith).toEqual({ code: 1008, reason: 'Too many queued messages' });
      expect(conn.isOpen).toBe(false);
      await expect(conn.receive()).resolves.toBeNull();
    });

    it('should not count messages handed straight to a waiting receive', async () => {
      const socket = new FakeSocket();
      const conn = new WebSocketConnection(socket, { maxQueuedMessages: 1 });

      for (const column of [0, 1, 2]) {
        const pending = conn.receive();
        socket.emit('message', Buffer.from(`{"type":"play","column":${column}}`));
        await expect(pending).resolves.toBe(`{"type":"play","column":${column}}`);
      }

      expect(socket.closedWith).toBeNull();
    });

    it('should resolve with null after a socket error', async () => {
      const socket = new FakeSocket();
      const conn = new WebSocketConnection(socket);

      const pending = conn.receive();
      socket.emit('error', new Error('read ECONNRESET'));

      await expect(pending).resolves.toBeNull();
    });
  });

  describe('send', () => {
    it('should write to the socket', async () => {
      const socket = new FakeSocket();
      const conn = new WebSocketConnection(socket);

      await conn.send('{"type":"win","player":"player1"}');

      expect(socket.sent).toEqual(['{"type":"win","player":"player1"}']);
    });

    it('should reject when the socket reports a write error', async () => {
      const socket = new FakeSocket();
      socket.sendError = new Error('write EPIPE');
      const conn = new WebSocketConnection(socket);

      await expect(conn.send('data')).rejects.toThrow('write EPIPE');
    });

    it('should reject when the socket is not open', async () => {
      const socket = new FakeSocket();
      socket.readyState = WebSocket.CLOSED;
      const conn = new WebSocketConnection(socket);

      await expect(conn.send('data')).rejects.toThrow('WebSocket is not open');
      expect(socket.sent).toHaveLength(0);
    });
  });

  describe('close', () => {
    it('should close the socket and end receiving', async () => {
      const socket = new FakeSocket();
      const conn = new WebSocketConnection(socket);
      socket.emit('message', Buffer.from('unread'));

      conn.close(CloseCode.POLICY_VIOLATION, 'Protocol violation');

      expect(socket.closedWith).toEqual({ code: 1008, reason: 'Protocol violation' });
      expect(conn.isOpen).toBe(false);
      await expect(conn.receive()).resolves.toBeNull();
    });

    it('should not close a socket that is already closed', () => {
      const socket = new FakeSocket();
      const conn = new WebSocketConnection(socket);
      socket.readyState = WebSocket.CLOSED;

      conn.close();

      expect(socket.closedWith).toBeNull();
    });
  });

  it('should assign a unique id per connection', () => {
    const a = new WebSocketConnection(new FakeSocket());
    const b = new WebSocketConnection(new FakeSocket());

    expect(a.id).not.toBe(b.id);
  });
});
