/**
 * @fileoverview Dropline wire protocol.
 *
 * Defines the events exchanged between clients and the session server,
 * the roles a connection can hold, and the codec that validates events
 * at the connection boundary.
 */

export {
  type AccessKind,
  ALL_ROLES,
  isPlayerRole,
  type PlayerRole,
  PlayerRoleSchema,
  type Role,
  RoleSchema,
  type Token,
  TokenSchema,
} from './types.js';

export { DecodeError, ProtocolError } from './errors.js';

export {
  // Client events
  InitRequestEvent,
  PlayRequestEvent,
  ClientEvent,
  type InitRequest,
  type PlayRequest,
  // Server events
  InitResponseEvent,
  PlayedEvent,
  WinEvent,
  ErrorEvent,
  ServerEvent,
  type InitResponse,
  type Played,
  type Win,
  // Codec
  decodeClientEvent,
  decodeServerEvent,
  encodeClientEvent,
  encodeServerEvent,
  isEventType,
} from './events.js';
