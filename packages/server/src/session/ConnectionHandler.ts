/**
 * @fileoverview Per-connection control loop.
 *
 * Drives one connection through init -> active -> closed, translating wire
 * events into session operations. Every exit path, including transport
 * failures and protocol violations, releases the connection's attachment.
 */

import {
  DecodeError,
  decodeClientEvent,
  encodeServerEvent,
  type InitRequest,
  isPlayerRole,
  ProtocolError,
  type ServerEvent,
} from '@dropline/protocol';
import { IllegalMoveError, NotFoundError } from '../errors.js';
import { CloseCode, type Connection } from '../transport/Connection.js';
import { logger, redactToken } from '../utils/logger.js';
import type { Attachment } from './Session.js';
import type { SessionRegistry } from './SessionRegistry.js';

export type HandlerState = 'init' | 'active' | 'closed';

export const INTERNAL_ERROR_MESSAGE = 'Internal server error.';

export class ConnectionHandler {
  private state: HandlerState = 'init';
  private attachment: Attachment | null = null;

  constructor(
    private readonly connection: Connection,
    private readonly registry: SessionRegistry
  ) {}

  get currentState(): HandlerState {
    return this.state;
  }

  /** Role held once active, or null */
  get role(): Attachment['role'] | null {
    return this.attachment?.role ?? null;
  }

  /**
   * Run the connection to completion. Resolves once the connection is closed
   * and detached; never rejects.
   */
  async run(): Promise<void> {
    try {
      const attachment = await this.handshake();
      if (attachment === null) return;

      this.attachment = attachment;
      this.state = 'active';
      await this.relay(attachment);
    } catch (error) {
      await this.abort(error);
    } finally {
      this.attachment?.release();
      this.state = 'closed';
      logger.debug('Connection handler finished', { connectionId: this.connection.id });
    }
  }

  // ============ Init ============

  private async handshake(): Promise<Attachment | null> {
    const raw = await this.connection.receive();
    if (raw === null) return null;

    const event = decodeClientEvent(raw);
    if (event.type !== 'init') {
      throw new ProtocolError([`type: expected init, received ${event.type}`]);
    }

    return this.enter(event);
  }

  private async enter(request: InitRequest): Promise<Attachment> {
    if (request.join !== undefined) {
      return this.registry.lookup(request.join).attach(this.connection, 'player');
    }

    if (request.watch !== undefined) {
      return this.registry.lookupWatch(request.watch).attach(this.connection, 'spectator');
    }

    const session = this.registry.create();
    const attachment = session.attach(this.connection, 'player');
    await this.send({ type: 'init', join: session.token, watch: session.watchToken });
    return attachment;
  }

  // ============ Active ============

  private async relay(attachment: Attachment): Promise<void> {
    for (;;) {
      const raw = await this.connection.receive();
      if (raw === null) return;

      const event = decodeClientEvent(raw);
      switch (event.type) {
        case 'init':
          throw new ProtocolError(['type: init is only valid as the first event']);
        case 'play':
          await this.play(attachment, event.column);
          break;
      }
    }
  }

  private async play(attachment: Attachment, column: number): Promise<void> {
    if (!isPlayerRole(attachment.role)) {
      await this.send({ type: 'error', message: 'Spectators cannot play.' });
      return;
    }

    try {
      await attachment.session.applyMove(attachment.role, column);
    } catch (error) {
      if (error instanceof IllegalMoveError) {
        await this.send({ type: 'error', message: error.message });
        return;
      }
      throw error;
    }
  }

  // ============ Closed ============

  /**
   * Report a failure to this connection only and close it.
   */
  private async abort(error: unknown): Promise<void> {
    if (error instanceof NotFoundError) {
      await this.send({ type: 'error', message: error.message });
      this.connection.close(CloseCode.NORMAL, error.message);
      return;
    }

    if (error instanceof DecodeError || error instanceof ProtocolError) {
      logger.warn('Protocol violation', {
        connectionId: this.connection.id,
        state: this.state,
        error: error.message,
      });
      await this.send({ type: 'error', message: error.message });
      this.connection.close(CloseCode.POLICY_VIOLATION, 'Protocol violation');
      return;
    }

    logger.error('Unexpected failure while handling connection', {
      connectionId: this.connection.id,
      session: this.attachment ? redactToken(this.attachment.session.token) : undefined,
      error: error instanceof Error ? error.message : String(error),
    });
    await this.send({ type: 'error', message: INTERNAL_ERROR_MESSAGE });
    this.connection.close(CloseCode.INTERNAL_ERROR, INTERNAL_ERROR_MESSAGE);
  }

  private async send(event: ServerEvent): Promise<void> {
    if (!this.connection.isOpen) return;
    try {
      await this.connection.send(encodeServerEvent(event));
    } catch (error) {
      logger.warn('Failed to send event', {
        connectionId: this.connection.id,
        eventType: event.type,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
