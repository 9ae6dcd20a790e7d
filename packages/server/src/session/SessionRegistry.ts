import { randomBytes } from 'node:crypto';
import type { Token } from '@dropline/protocol';
import { NotFoundError } from '../errors.js';
import type { GameEngineFactory } from '../game/types.js';
import { CloseCode } from '../transport/Connection.js';
import { logger, redactToken } from '../utils/logger.js';
import { BroadcastDispatcher } from './BroadcastDispatcher.js';
import { Session } from './Session.js';

/** Random bytes per token: 96 bits */
export const DEFAULT_TOKEN_BYTES = 12;

/**
 * Generate an unguessable, URL-safe token.
 */
export function generateToken(bytes: number = DEFAULT_TOKEN_BYTES): Token {
  return randomBytes(bytes).toString('base64url');
}

export interface SessionRegistryOptions {
  /** Creates the game engine each new session owns */
  readonly createGame: GameEngineFactory;
  /** Token source (default: generateToken with tokenBytes) */
  readonly generateToken?: () => Token;
  /** Random bytes per generated token */
  readonly tokenBytes?: number;
  readonly dispatcher?: BroadcastDispatcher;
}

/**
 * Process-wide table of live sessions, keyed by join token and by watch token.
 *
 * Every operation runs to completion without yielding, so the table is never
 * observed half-updated by another connection's handler. Sessions share
 * nothing beyond this table; each serializes its own moves.
 *
 * A multi-process deployment would replace the two maps with a shared store
 * and forward broadcasts through a pub/sub channel.
 */
export class SessionRegistry {
  private readonly sessions = new Map<Token, Session>();
  private readonly watchTokens = new Map<Token, Session>();
  private readonly createGame: GameEngineFactory;
  private readonly nextToken: () => Token;
  private readonly dispatcher: BroadcastDispatcher;

  constructor(options: SessionRegistryOptions) {
    this.createGame = options.createGame;
    const tokenBytes = options.tokenBytes ?? DEFAULT_TOKEN_BYTES;
    this.nextToken = options.generateToken ?? (() => generateToken(tokenBytes));
    this.dispatcher = options.dispatcher ?? new BroadcastDispatcher();
  }

  /**
   * Create an empty session with fresh join and watch tokens.
   * A token that collides with a live one is regenerated.
   */
  create(): Session {
    const token = this.generateUniqueToken();
    const reserved = new Set([token]);
    const watchToken = this.generateUniqueToken(reserved);

    const session = new Session({
      token,
      watchToken,
      game: this.createGame(),
      dispatcher: this.dispatcher,
      onRelease: (released) => this.release(released),
    });

    this.sessions.set(token, session);
    this.watchTokens.set(watchToken, session);
    logger.info('Session created', {
      session: redactToken(token),
      sessions: this.sessions.size,
    });
    return session;
  }

  /**
   * Find a session by join token.
   * @throws {NotFoundError} if no live session has that token
   */
  lookup(token: Token): Session {
    const session = this.sessions.get(token);
    if (!session) {
      throw new NotFoundError();
    }
    return session;
  }

  /**
   * Find a session by watch token.
   * @throws {NotFoundError} if no live session has that token
   */
  lookupWatch(watchToken: Token): Session {
    const session = this.watchTokens.get(watchToken);
    if (!session) {
      throw new NotFoundError();
    }
    return session;
  }

  /**
   * Remove a session. Releasing an already removed session is a no-op.
   */
  release(session: Session): void {
    if (this.sessions.get(session.token) !== session) return;

    this.sessions.delete(session.token);
    this.watchTokens.delete(session.watchToken);
    logger.info('Session released', {
      session: redactToken(session.token),
      sessions: this.sessions.size,
    });
  }

  has(token: Token): boolean {
    return this.sessions.has(token);
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * End every live session, closing its connections.
   */
  close(): void {
    for (const session of [...this.sessions.values()]) {
      session.end(CloseCode.GOING_AWAY, 'Server shutting down');
    }
  }

  private generateUniqueToken(reserved: ReadonlySet<Token> = new Set()): Token {
    for (;;) {
      const token = this.nextToken();
      if (!this.sessions.has(token) && !this.watchTokens.has(token) && !reserved.has(token)) {
        return token;
      }
      logger.warn('Token collision, regenerating');
    }
  }
}
