import type { PlayerRole } from '@dropline/protocol';

/**
 * Board dimensions and the run length that wins.
 */
export interface BoardConfig {
  readonly columns: number;
  readonly rows: number;
  readonly connect: number;
}

export const DEFAULT_BOARD: BoardConfig = {
  columns: 7,
  rows: 6,
  connect: 4,
};

/**
 * Rules engine owned by a session.
 *
 * The session only ever calls it under its mutation lock, so implementations
 * need no synchronization of their own.
 */
export interface GameEngine {
  /**
   * Apply a move for a player.
   * @returns Row the disc came to rest in (0 is the bottom)
   * @throws {IllegalMoveError} if the move is rejected; state is unchanged
   */
  play(player: PlayerRole, column: number): number;

  /** Winner after the last applied move, or null */
  readonly winner: PlayerRole | null;
}

export type GameEngineFactory = () => GameEngine;
