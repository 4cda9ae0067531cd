import { BOARD_SIZE, Position, Shape, SHAPE_CENTER } from '../types/game';
import { occupiedCells } from './shapes';

/**
 * Offsets of a shape's occupied cells relative to the frame centre.
 *
 * Each bound starts at zero and only moves outward, so the centre cell is
 * always inside the box even when it is not occupied.
 */
export interface ShapeExtents {
  minRow: number;
  maxRow: number;
  minCol: number;
  maxCol: number;
}

export function shapeExtents(shape: Shape): ShapeExtents {
  const extents: ShapeExtents = { minRow: 0, maxRow: 0, minCol: 0, maxCol: 0 };

  for (const cell of occupiedCells(shape)) {
    const dr = cell.row - SHAPE_CENTER;
    const dc = cell.col - SHAPE_CENTER;

    if (dr < extents.minRow) {
      extents.minRow = dr;
    } else if (dr > extents.maxRow) {
      extents.maxRow = dr;
    }

    if (dc < extents.minCol) {
      extents.minCol = dc;
    } else if (dc > extents.maxCol) {
      extents.maxCol = dc;
    }
  }

  return extents;
}

/**
 * Map an anchor (the play-area cell under the cursor, standing for the
 * frame centre) to the placement origin of `shape`.
 *
 * Returns null when any occupied cell would land outside the play area.
 * The origin is the play-area coordinate of the frame's (0,0) cell and may
 * be negative; board indexing adds the border offset on top.
 */
export function checkBoundsAndRecenter(shape: Shape, anchor: Position): Position | null {
  const { minRow, maxRow, minCol, maxCol } = shapeExtents(shape);

  const fits =
    anchor.row + minRow >= 0 &&
    anchor.row + maxRow < BOARD_SIZE &&
    anchor.col + minCol >= 0 &&
    anchor.col + maxCol < BOARD_SIZE;

  if (!fits) {
    return null;
  }

  return { row: anchor.row - SHAPE_CENTER, col: anchor.col - SHAPE_CENTER };
}

/** Play-area cells covered by `shape` placed at `origin`, row-major. */
export function footprint(shape: Shape, origin: Position): Position[] {
  return occupiedCells(shape).map((cell) => ({
    row: origin.row + cell.row,
    col: origin.col + cell.col,
  }));
}
