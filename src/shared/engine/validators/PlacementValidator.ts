import { GameError, GameErrorCode } from '../../errors';
import { BORDER_OFFSET, PlayerColor, Position, ReadonlyBoard, Shape } from '../../types/game';
import { isWithinBoardArray } from '../board';
import { occupiedCells } from '../shapes';

/**
 * Machine-readable reasons a placement can fail on the board itself.
 * Bounds failures never reach this validator; recentering filters them.
 */
export type PlacementRejectionCode = 'CELL_OCCUPIED' | 'EDGE_CONTACT' | 'NO_CORNER_CONTACT';

export interface PlacementValidationResult {
  valid: boolean;
  /** Optional machine-readable error code. */
  code?: PlacementRejectionCode;
  /** Optional human-readable explanation for invalid placements. */
  reason?: string;
}

const ORTHOGONAL: ReadonlyArray<readonly [number, number]> = [
  [-1, 0],
  [0, -1],
  [1, 0],
  [0, 1],
];

const DIAGONAL: ReadonlyArray<readonly [number, number]> = [
  [-1, -1],
  [1, -1],
  [-1, 1],
  [1, 1],
];

/**
 * Canonical validator for placing `shape` with its frame origin at `origin`
 * (play-area coordinates) on behalf of `color`.
 *
 * Rules, evaluated per occupied cell in row-major order:
 * 1. The target tile must be empty (the wall ring and seed cells are not).
 * 2. No orthogonal neighbour may already hold `color`.
 * 3. Across the whole shape, at least one diagonal neighbour must hold
 *    `color`.
 *
 * Rules 1 and 2 stop the scan at the first violation. Rule 3 is only known
 * once every cell has been visited.
 *
 * Callers must have bounds-checked the footprint: a cell outside the padded
 * array is a programming error and throws.
 */
export function validatePlacementOnBoard(
  board: ReadonlyBoard,
  shape: Shape,
  origin: Position,
  color: PlayerColor
): PlacementValidationResult {
  let touchesCorner = false;

  for (const cell of occupiedCells(shape)) {
    const row = origin.row + cell.row + BORDER_OFFSET;
    const col = origin.col + cell.col + BORDER_OFFSET;

    if (!isWithinBoardArray(row, col)) {
      throw new GameError(
        GameErrorCode.INTERNAL_ERROR,
        'Placement footprint escapes the board array; bounds were not checked',
        { origin, cell, row, col },
        true
      );
    }

    if (board[row][col] !== 'empty') {
      return {
        valid: false,
        code: 'CELL_OCCUPIED',
        reason: `Tile (${row - BORDER_OFFSET}, ${col - BORDER_OFFSET}) is not empty`,
      };
    }

    if (ORTHOGONAL.some(([dr, dc]) => board[row + dr][col + dc] === color)) {
      return {
        valid: false,
        code: 'EDGE_CONTACT',
        reason: `Piece would share an edge with another ${color} tile`,
      };
    }

    touchesCorner =
      touchesCorner || DIAGONAL.some(([dr, dc]) => board[row + dr][col + dc] === color);
  }

  if (!touchesCorner) {
    return {
      valid: false,
      code: 'NO_CORNER_CONTACT',
      reason: `Piece does not touch a ${color} tile at a corner`,
    };
  }

  return { valid: true };
}

/** Boolean form of {@link validatePlacementOnBoard}. */
export function isLegalPlacement(
  board: ReadonlyBoard,
  shape: Shape,
  origin: Position,
  color: PlayerColor
): boolean {
  return validatePlacementOnBoard(board, shape, origin, color).valid;
}
