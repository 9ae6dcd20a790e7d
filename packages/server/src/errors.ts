/**
 * @fileoverview Recoverable session errors. Both are reported to the
 * originating connection as an `error` event and leave the session intact.
 */

/**
 * No live session holds the requested token.
 */
export class NotFoundError extends Error {
  constructor(message = 'Game not found.') {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * The move was rejected. Game state is unchanged.
 */
export class IllegalMoveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IllegalMoveError';
  }
}
