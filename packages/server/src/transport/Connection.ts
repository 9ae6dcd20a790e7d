/**
 * Transport-level connection as seen by sessions and handlers.
 * The transport owns its lifetime; sessions only reference it.
 */
export interface Connection {
  /** Stable identifier for logging */
  readonly id: string;

  /** Whether sends can still succeed */
  readonly isOpen: boolean;

  /**
   * Send one serialized event. Calls are delivered in call order.
   * Rejects when the transport fails to write.
   */
  send(data: string): Promise<void>;

  /**
   * Wait for the next inbound message.
   * @returns The raw message, or null once the connection is closed
   */
  receive(): Promise<string | null>;

  /** Close the connection. Pending and later receives resolve with null. */
  close(code?: number, reason?: string): void;
}

/**
 * WebSocket close codes used by the server.
 */
export const CloseCode = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  POLICY_VIOLATION: 1008,
  INTERNAL_ERROR: 1011,
} as const;

export type CloseCode = (typeof CloseCode)[keyof typeof CloseCode];
