/**
 * @fileoverview Dropline session server.
 *
 * Coordinates two-player games over persistent connections:
 * - Session registry keyed by unguessable join and watch tokens
 * - Per-session serialized moves
 * - Ordered fan-out of results to players and spectators
 * - Per-connection lifecycle with guaranteed detach
 */

export { IllegalMoveError, NotFoundError } from './errors.js';

export { ConnectFour } from './game/ConnectFour.js';
export {
  type BoardConfig,
  DEFAULT_BOARD,
  type GameEngine,
  type GameEngineFactory,
} from './game/types.js';

export { BroadcastDispatcher } from './session/BroadcastDispatcher.js';
export {
  ConnectionHandler,
  type HandlerState,
  INTERNAL_ERROR_MESSAGE,
} from './session/ConnectionHandler.js';
export { MutationLock } from './session/MutationLock.js';
export { type Attachment, type MoveResult, Session, type SessionOptions } from './session/Session.js';
export {
  DEFAULT_TOKEN_BYTES,
  generateToken,
  SessionRegistry,
  type SessionRegistryOptions,
} from './session/SessionRegistry.js';

export { CloseCode, type Connection } from './transport/Connection.js';
export {
  DEFAULT_MAX_QUEUED_MESSAGES,
  type SocketLike,
  WebSocketConnection,
  type WebSocketConnectionOptions,
} from './transport/WebSocketConnection.js';

export {
  clearConfigCache,
  loadServerConfig,
  parseServerConfig,
  type ServerConfig,
} from './config/serverConfig.js';
export { type LogLevel, logger, redactToken, setLogLevel } from './utils/logger.js';

export { DroplineServer, type DroplineServerOptions } from './server.js';
