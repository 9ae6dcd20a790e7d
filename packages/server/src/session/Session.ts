import {
  type AccessKind,
  ALL_ROLES,
  isPlayerRole,
  type PlayerRole,
  type Role,
  type ServerEvent,
  type Token,
} from '@dropline/protocol';
import { IllegalMoveError, NotFoundError } from '../errors.js';
import type { GameEngine } from '../game/types.js';
import { CloseCode, type Connection } from '../transport/Connection.js';
import { logger, redactToken } from '../utils/logger.js';
import type { BroadcastDispatcher } from './BroadcastDispatcher.js';
import { MutationLock } from './MutationLock.js';

/**
 * A connection's membership in a session.
 * Released exactly once; further release calls are no-ops.
 */
export interface Attachment {
  readonly session: Session;
  readonly connection: Connection;
  readonly role: Role;
  release(): void;
}

/**
 * Outcome of an applied move.
 */
export interface MoveResult {
  readonly player: PlayerRole;
  readonly column: number;
  /** Row the disc came to rest in */
  readonly row: number;
  /** Set when this move won the game */
  readonly winner: PlayerRole | null;
}

export interface SessionOptions {
  readonly token: Token;
  readonly watchToken: Token;
  readonly game: GameEngine;
  readonly dispatcher: BroadcastDispatcher;
  /** Invoked when the session has no attachments left or has ended */
  readonly onRelease: (session: Session) => void;
}

/**
 * Shared game state plus the connections attached to it.
 *
 * All moves go through one mutation lock. The resulting broadcasts are
 * started before the lock is released, so every connection sees events in
 * application order, but the lock never waits for a recipient to drain.
 */
export class Session {
  readonly token: Token;
  readonly watchToken: Token;
  private readonly game: GameEngine;
  private readonly dispatcher: BroadcastDispatcher;
  private readonly onRelease: (session: Session) => void;
  private readonly attachments = new Map<Connection, Role>();
  private readonly lock = new MutationLock();
  private readonly deliveries = new Set<Promise<number>>();
  private ended = false;

  constructor(options: SessionOptions) {
    this.token = options.token;
    this.watchToken = options.watchToken;
    this.game = options.game;
    this.dispatcher = options.dispatcher;
    this.onRelease = options.onRelease;
  }

  // ============ Attachments ============

  /**
   * Attach a connection. Player access takes the first free player slot and
   * falls back to spectator; spectator access always yields spectator.
   * @throws {NotFoundError} if the session has ended
   */
  attach(connection: Connection, access: AccessKind): Attachment {
    if (this.ended) {
      throw new NotFoundError();
    }

    const existing = this.attachments.get(connection);
    const role = existing ?? this.assignRole(access);
    this.attachments.set(connection, role);

    if (!existing) {
      logger.info('Connection attached', {
        session: redactToken(this.token),
        connectionId: connection.id,
        role,
        attachments: this.attachments.size,
      });
    }

    let released = false;
    return {
      session: this,
      connection,
      role,
      release: () => {
        if (released) return;
        released = true;
        this.detach(connection);
      },
    };
  }

  /**
   * Detach a connection. Releases the session once nothing is attached.
   * Safe to call repeatedly and from cleanup paths.
   */
  detach(connection: Connection): void {
    const role = this.attachments.get(connection);
    if (role === undefined) return;

    this.attachments.delete(connection);
    logger.info('Connection detached', {
      session: redactToken(this.token),
      connectionId: connection.id,
      role,
      attachments: this.attachments.size,
    });

    // A departing player frees the slot; the game continues for whoever remains.
    if (this.attachments.size === 0) {
      this.onRelease(this);
    }
  }

  private assignRole(access: AccessKind): Role {
    if (access === 'spectator') return 'spectator';

    const taken = new Set(this.attachments.values());
    if (!taken.has('player1')) return 'player1';
    if (!taken.has('player2')) return 'player2';
    return 'spectator';
  }

  // ============ Moves ============

  /**
   * Apply a move under the session lock and broadcast its outcome.
   * Broadcasts `play`, then `win` and ends the session if the move won.
   * Resolves once the broadcasts are handed to every connection, without
   * waiting for any of them to be written.
   * @throws {IllegalMoveError} if the move is rejected; state is unchanged
   */
  applyMove(role: Role, column: number): Promise<MoveResult> {
    return this.lock.runExclusive(() => {
      if (this.ended) {
        throw new IllegalMoveError('Game is over.');
      }
      if (!isPlayerRole(role)) {
        throw new IllegalMoveError('Spectators cannot play.');
      }

      const row = this.game.play(role, column);
      const winner = this.game.winner;

      this.dispatch({ type: 'play', player: role, column, row });

      if (winner !== null) {
        this.dispatch({ type: 'win', player: winner });
        logger.info('Game won', { session: redactToken(this.token), winner });
        this.end();
      }

      return { player: role, column, row, winner };
    });
  }

  // ============ Broadcast ============

  /**
   * Send an event to every attached connection whose role is included.
   * @returns Number of connections that accepted the event
   */
  broadcast(event: ServerEvent, includeRoles: readonly Role[] = ALL_ROLES): Promise<number> {
    const targets: Connection[] = [];
    for (const [conn, role] of this.attachments) {
      if (includeRoles.includes(role)) {
        targets.push(conn);
      }
    }
    return this.dispatcher.deliver(event, targets);
  }

  /**
   * Resolve once every broadcast started by a move has settled.
   */
  async whenDelivered(): Promise<void> {
    await Promise.all([...this.deliveries]);
  }

  /** Broadcasts started by moves that have not settled yet */
  get pendingDeliveries(): number {
    return this.deliveries.size;
  }

  private dispatch(event: ServerEvent): void {
    const delivery = this.broadcast(event);
    this.deliveries.add(delivery);
    void delivery.then(
      () => {
        this.deliveries.delete(delivery);
      },
      (error: unknown) => {
        this.deliveries.delete(delivery);
        logger.error('Broadcast failed', {
          session: redactToken(this.token),
          eventType: event.type,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    );
  }

  // ============ Lifecycle ============

  /**
   * End the session: release it and close every attached connection, which
   * drives each connection's handler to its closed state.
   */
  end(code: number = CloseCode.NORMAL, reason = 'Game over'): void {
    if (this.ended) return;
    this.ended = true;
    this.onRelease(this);

    for (const conn of [...this.attachments.keys()]) {
      conn.close(code, reason);
    }
  }

  // ============ Queries ============

  get isEnded(): boolean {
    return this.ended;
  }

  get attachmentCount(): number {
    return this.attachments.size;
  }

  getRole(connection: Connection): Role | undefined {
    return this.attachments.get(connection);
  }

  /** Roles currently held, in attachment order */
  getRoles(): Role[] {
    return [...this.attachments.values()];
  }
}
