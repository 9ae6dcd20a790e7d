/**
 * @fileoverview Wire event definitions and codec.
 * Uses Zod for runtime validation of incoming events. Every event is a JSON
 * object tagged by its `type` field.
 */

import { type ZodError, z } from 'zod';
import { DecodeError, ProtocolError } from './errors.js';
import { PlayerRoleSchema, TokenSchema } from './types.js';

// ============ Client -> Server Events ============

/**
 * First event on every connection.
 * - no token: create a new session
 * - join: take a player slot in an existing session
 * - watch: follow an existing session as a spectator
 */
export const InitRequestEvent = z.object({
  type: z.literal('init'),
  join: TokenSchema.optional(),
  watch: TokenSchema.optional(),
});

/**
 * Player request to drop a disc into a column.
 */
export const PlayRequestEvent = z.object({
  type: z.literal('play'),
  column: z.number().int(),
});

/**
 * Union of all valid client-to-server events.
 */
export const ClientEvent = z
  .discriminatedUnion('type', [InitRequestEvent, PlayRequestEvent])
  .superRefine((event, ctx) => {
    if (event.type === 'init' && event.join !== undefined && event.watch !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['watch'],
        message: 'init cannot carry both join and watch',
      });
    }
  });

export type ClientEvent = z.infer<typeof ClientEvent>;
export type InitRequest = z.infer<typeof InitRequestEvent>;
export type PlayRequest = z.infer<typeof PlayRequestEvent>;

// ============ Server -> Client Events ============

/**
 * Reply to the connection that created a session.
 */
export const InitResponseEvent = z.object({
  type: z.literal('init'),
  join: TokenSchema,
  watch: TokenSchema,
});

/**
 * A move was applied. Sent to every attached connection.
 */
export const PlayedEvent = z.object({
  type: z.literal('play'),
  player: PlayerRoleSchema,
  column: z.number().int(),
  row: z.number().int(),
});

/**
 * The last move won the game. Sent to every attached connection.
 */
export const WinEvent = z.object({
  type: z.literal('win'),
  player: PlayerRoleSchema,
});

/**
 * Error reported to the originating connection only.
 */
export const ErrorEvent = z.object({
  type: z.literal('error'),
  message: z.string(),
});

/**
 * Union of all valid server-to-client events.
 */
export const ServerEvent = z.discriminatedUnion('type', [
  InitResponseEvent,
  PlayedEvent,
  WinEvent,
  ErrorEvent,
]);

export type ServerEvent = z.infer<typeof ServerEvent>;
export type InitResponse = z.infer<typeof InitResponseEvent>;
export type Played = z.infer<typeof PlayedEvent>;
export type Win = z.infer<typeof WinEvent>;

// ============ Codec ============

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    throw new DecodeError(error instanceof Error ? error.message : String(error));
  }
}

function toProtocolError(error: ZodError): ProtocolError {
  return new ProtocolError(
    error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'event';
      return `${path}: ${issue.message}`;
    })
  );
}

/**
 * Decode and validate a raw client event.
 * @throws {DecodeError} if raw is not valid JSON
 * @throws {ProtocolError} if the event type is unknown or its fields are invalid
 */
export function decodeClientEvent(raw: string): ClientEvent {
  const result = ClientEvent.safeParse(parseJson(raw));
  if (!result.success) {
    throw toProtocolError(result.error);
  }
  return result.data;
}

/**
 * Decode and validate a raw server event. Used by clients.
 * @throws {DecodeError} if raw is not valid JSON
 * @throws {ProtocolError} if the event type is unknown or its fields are invalid
 */
export function decodeServerEvent(raw: string): ServerEvent {
  const result = ServerEvent.safeParse(parseJson(raw));
  if (!result.success) {
    throw toProtocolError(result.error);
  }
  return result.data;
}

/**
 * Serialize a server event to its wire form.
 */
export function encodeServerEvent(event: ServerEvent): string {
  return JSON.stringify(event);
}

/**
 * Serialize a client event to its wire form.
 */
export function encodeClientEvent(event: ClientEvent): string {
  return JSON.stringify(event);
}

/**
 * Type guard for checking if an event is a specific type.
 */
export function isEventType<T extends ServerEvent['type']>(
  event: ServerEvent,
  type: T
): event is Extract<ServerEvent, { type: T }> {
  return event.type === type;
}
