import { createMockConnection } from '@dropline/testing';
import { describe, expect, it } from 'vitest';
import { BroadcastDispatcher } from '../src/session/BroadcastDispatcher.js';
import { CloseCode } from '../src/transport/Connection.js';

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('BroadcastDispatcher', () => {
  it('should deliver the encoded event to every open connection', async () => {
    const dispatcher = new BroadcastDispatcher();
    const a = createMockConnection();
    const b = createMockConnection();

    const delivered = await dispatcher.deliver({ type: 'win', player: 'player1' }, [a, b]);

    expect(delivered).toBe(2);
    expect(a.sentMessages).toEqual(['{"type":"win","player":"player1"}']);
    expect(b.sentMessages).toEqual(['{"type":"win","player":"player1"}']);
  });

  it('should skip connections that are already closed', async () => {
    const dispatcher = new BroadcastDispatcher();
    const open = createMockConnection();
    const closed = createMockConnection();
    closed.disconnect();

    const delivered = await dispatcher.deliver({ type: 'win', player: 'player2' }, [closed, open]);

    expect(delivered).toBe(1);
    expect(open.sentMessages).toHaveLength(1);
    expect(closed.sentMessages).toHaveLength(0);
  });

  it('should isolate a failing connection from the others', async () => {
    const dispatcher = new BroadcastDispatcher();
    const broken = createMockConnection({ failSends: true });
    const healthy = createMockConnection();

    const delivered = await dispatcher.deliver(
      { type: 'play', player: 'player1', column: 2, row: 0 },
      [broken, healthy]
    );
    await flush();

    expect(delivered).toBe(1);
    expect(healthy.getSentEvents()).toEqual([
      { type: 'play', player: 'player1', column: 2, row: 0 },
    ]);
    expect(broken.isClosed).toBe(true);
    expect(broken.closeCode).toBe(CloseCode.INTERNAL_ERROR);
    expect(healthy.isClosed).toBe(false);
  });

  it('should preserve per-connection order across deliveries', async () => {
    const dispatcher = new BroadcastDispatcher();
    const conn = createMockConnection();

    const first = dispatcher.deliver({ type: 'play', player: 'player1', column: 0, row: 0 }, [conn]);
    const second = dispatcher.deliver({ type: 'win', player: 'player1' }, [conn]);
    await Promise.all([first, second]);

    expect(conn.getSentEvents().map((event) => event.type)).toEqual(['play', 'win']);
  });
});
