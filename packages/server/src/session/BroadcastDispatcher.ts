import { encodeServerEvent, type ServerEvent } from '@dropline/protocol';
import { CloseCode, type Connection } from '../transport/Connection.js';
import { logger } from '../utils/logger.js';

/**
 * Fans one event out to many connections.
 *
 * Each send is started synchronously in iteration order, so the events a
 * single connection receives keep the order in which they were dispatched.
 * A failing connection is closed on its own; the others still get the event.
 */
export class BroadcastDispatcher {
  /**
   * Deliver an event to every open connection.
   * @returns Number of connections that accepted the event
   */
  async deliver(event: ServerEvent, connections: Iterable<Connection>): Promise<number> {
    const data = encodeServerEvent(event);
    const sends: Promise<boolean>[] = [];

    for (const conn of connections) {
      if (conn.isOpen) {
        sends.push(this.sendTo(conn, data, event.type));
      }
    }

    const results = await Promise.all(sends);
    return results.filter(Boolean).length;
  }

  private async sendTo(conn: Connection, data: string, eventType: string): Promise<boolean> {
    try {
      await conn.send(data);
      return true;
    } catch (error) {
      logger.warn('Broadcast delivery failed', {
        connectionId: conn.id,
        eventType,
        error: error instanceof Error ? error.message : String(error),
      });
      queueMicrotask(() => conn.close(CloseCode.INTERNAL_ERROR, 'Delivery failed'));
      return false;
    }
  }
}
