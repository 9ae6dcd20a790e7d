import type { PlayerRole } from '@dropline/protocol';
import { IllegalMoveError } from '../errors.js';
import { type BoardConfig, DEFAULT_BOARD, type GameEngine } from './types.js';

/** Directions checked for a winning run: horizontal, vertical, both diagonals */
const DIRECTIONS: readonly (readonly [number, number])[] = [
  [1, 0],
  [0, 1],
  [1, 1],
  [1, -1],
];

/**
 * Connect Four rules. player1 moves first and players alternate.
 * Discs drop to the lowest free row of a column; row 0 is the bottom.
 */
export class ConnectFour implements GameEngine {
  private readonly config: BoardConfig;
  /** cells[column][row] */
  private readonly cells: (PlayerRole | null)[][];
  private readonly heights: number[];
  private lastPlayer: PlayerRole = 'player2';
  private currentWinner: PlayerRole | null = null;

  constructor(config: BoardConfig = DEFAULT_BOARD) {
    this.config = config;
    this.cells = Array.from({ length: config.columns }, () =>
      Array.from({ length: config.rows }, () => null)
    );
    this.heights = Array.from({ length: config.columns }, () => 0);
  }

  get winner(): PlayerRole | null {
    return this.currentWinner;
  }

  play(player: PlayerRole, column: number): number {
    if (this.currentWinner !== null) {
      throw new IllegalMoveError('Game is over.');
    }
    if (player === this.lastPlayer) {
      throw new IllegalMoveError("It isn't your turn.");
    }

    const height = this.heights[column];
    const cells = this.cells[column];
    if (!Number.isInteger(column) || height === undefined || cells === undefined) {
      throw new IllegalMoveError('Illegal column.');
    }
    if (height >= this.config.rows) {
      throw new IllegalMoveError('This column is full.');
    }

    const row = height;
    cells[row] = player;
    this.heights[column] = height + 1;
    this.lastPlayer = player;

    if (this.completesRun(player, column, row)) {
      this.currentWinner = player;
    }

    return row;
  }

  /** Owner of a cell, or null when empty or off the board */
  getCell(column: number, row: number): PlayerRole | null {
    return this.cells[column]?.[row] ?? null;
  }

  private completesRun(player: PlayerRole, column: number, row: number): boolean {
    for (const [dc, dr] of DIRECTIONS) {
      const length =
        1 + this.countFrom(player, column, row, dc, dr) + this.countFrom(player, column, row, -dc, -dr);
      if (length >= this.config.connect) {
        return true;
      }
    }
    return false;
  }

  private countFrom(player: PlayerRole, column: number, row: number, dc: number, dr: number): number {
    let count = 0;
    let c = column + dc;
    let r = row + dr;
    while (this.getCell(c, r) === player) {
      count++;
      c += dc;
      r += dr;
    }
    return count;
  }
}
