/**
 * @fileoverview Core types shared between the server and its clients.
 */

import { z } from 'zod';

/**
 * Unguessable, URL-safe string that identifies a session.
 * A session has two: a join token for players and a watch token for spectators.
 */
export type Token = string;

/**
 * Schema for a session token as it appears on the wire.
 */
export const TokenSchema = z.string().min(1).max(128);

/**
 * Schema for roles that may submit moves.
 * - player1: Created the session, moves first
 * - player2: First connection to join with the join token
 */
export const PlayerRoleSchema = z.enum(['player1', 'player2']);
export type PlayerRole = z.infer<typeof PlayerRoleSchema>;

/**
 * Schema for every role a connection can hold within a session.
 */
export const RoleSchema = z.enum(['player1', 'player2', 'spectator']);
export type Role = z.infer<typeof RoleSchema>;

/**
 * How a connection asked to enter a session.
 * Spectator access always yields the spectator role.
 */
export type AccessKind = 'player' | 'spectator';

export const ALL_ROLES: readonly Role[] = RoleSchema.options;

export function isPlayerRole(role: Role): role is PlayerRole {
  return role !== 'spectator';
}
