import { decodeServerEvent, type ServerEvent } from '@dropline/protocol';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { WebSocket } from 'ws';
import type { ServerConfig } from '../src/config/serverConfig.js';
import { DroplineServer } from '../src/server.js';

const TEST_CONFIG: ServerConfig = {
  server: { host: '127.0.0.1', port: 0, maxPayloadBytes: 4096, maxQueuedMessages: 64 },
  tokens: { bytes: 12 },
  board: { columns: 7, rows: 6, connect: 4 },
  logging: { level: 'error' },
};

function connect(port: number): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(`ws://127.0.0.1:${port}`);
    ws.once('open', () => resolve(ws));
    ws.once('error', reject);
  });
}

function nextEvent(ws: WebSocket): Promise<ServerEvent> {
  return new Promise((resolve) => {
    ws.once('message', (data) => resolve(decodeServerEvent(data.toString())));
  });
}

function closeCode(ws: WebSocket): Promise<number> {
  return new Promise((resolve) => {
    ws.once('close', (code) => resolve(code));
  });
}

describe('DroplineServer', () => {
  let server: DroplineServer;
  let port: number;

  beforeEach(async () => {
    server = new DroplineServer({ config: TEST_CONFIG });
    port = await server.listen();
  });

  afterEach(async () => {
    await server.close();
  });

  it('should bind an ephemeral port when configured with 0', () => {
    expect(port).toBeGreaterThan(0);
  });

  it('should create a session and relay moves between players', async () => {
    const host = await connect(port);
    const created = nextEvent(host);
    host.send(JSON.stringify({ type: 'init' }));
    const init = await created;

    if (init.type !== 'init') throw new Error(`expected init, got ${init.type}`);
    expect(init.join).toMatch(/^[A-Za-z0-9_-]{16}$/);
    expect(server.sessionCount).toBe(1);

    const guest = await connect(port);
    guest.send(JSON.stringify({ type: 'init', join: init.join }));

    const hostPlayed = nextEvent(host);
    const guestPlayed = nextEvent(guest);
    // Give the join time to attach before the move is broadcast
    await new Promise((resolve) => setTimeout(resolve, 50));
    host.send(JSON.stringify({ type: 'play', column: 3 }));

    const expected = { type: 'play', player: 'player1', column: 3, row: 0 };
    await expect(hostPlayed).resolves.toEqual(expected);
    await expect(guestPlayed).resolves.toEqual(expected);

    host.close();
    guest.close();
  });

  it('should close connections with going away on shutdown', async () => {
    const client = await connect(port);
    const created = nextEvent(client);
    client.send(JSON.stringify({ type: 'init' }));
    await created;
    const closed = closeCode(client);

    await server.close();

    await expect(closed).resolves.toBe(1001);
    expect(server.sessionCount).toBe(0);
  });
});
