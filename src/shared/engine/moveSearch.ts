import {
  BOARD_SIZE,
  BORDER_OFFSET,
  PieceId,
  Position,
  ReadonlyBoard,
  ReadonlyPlayer,
  Shape,
  SHAPE_CENTER,
} from '../types/game';
import { isWithinBoardArray } from './board';
import { shapeOf } from './pieceCatalog';
import { flip, occupiedCells, rotate } from './shapes';
import { isLegalPlacement } from './validators/PlacementValidator';

/**
 * Brute-force search for any legal placement.
 *
 * For every piece still in hand, every orientation and every play-area cell
 * used as the frame centre, ask the placement validator. The search stops
 * at the first hit. It works on throwaway shapes derived from the catalog
 * and never reads or writes a live piece buffer.
 *
 * Worst case is pieces × 8 × 400 validator calls of at most five cells each.
 * Small pieces tend to be kept for late in the game and match early, so
 * the full sweep is rare in practice.
 */

export interface LegalPlacement {
  pieceId: PieceId;
  shape: Shape;
  /** Play-area coordinate of the frame's (0,0) cell. */
  origin: Position;
}

/**
 * The eight orientations the search probes, in probe order: flip the
 * running shape vertically, then rotate it right four times, recording each
 * rotation; do this twice. Symmetric pieces yield repeats, which are kept.
 */
export function generateOrientations(shape: Shape): Shape[] {
  const orientations: Shape[] = [];
  let current = shape;
  for (let f = 0; f < 2; f++) {
    current = flip(current, 'vertical');
    for (let r = 0; r < 4; r++) {
      current = rotate(current, 'right');
      orientations.push(current);
    }
  }
  return orientations;
}

function fitsBoardArray(shape: Shape, origin: Position): boolean {
  return occupiedCells(shape).every((cell) =>
    isWithinBoardArray(
      origin.row + cell.row + BORDER_OFFSET,
      origin.col + cell.col + BORDER_OFFSET
    )
  );
}

export function findLegalPlacement(board: ReadonlyBoard, player: ReadonlyPlayer): LegalPlacement | null {
  const pieceIds = [...player.remainingPieces].sort((a, b) => a - b);

  for (const pieceId of pieceIds) {
    for (const shape of generateOrientations(shapeOf(pieceId))) {
      for (let row = 0; row < BOARD_SIZE; row++) {
        for (let col = 0; col < BOARD_SIZE; col++) {
          const origin = { row: row - SHAPE_CENTER, col: col - SHAPE_CENTER };
          if (!fitsBoardArray(shape, origin)) continue;
          if (isLegalPlacement(board, shape, origin, player.color)) {
            return { pieceId, shape, origin };
          }
        }
      }
    }
  }

  return null;
}

export function canMakeMove(board: ReadonlyBoard, player: ReadonlyPlayer): boolean {
  return findLegalPlacement(board, player) !== null;
}
