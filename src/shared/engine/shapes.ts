import {
  FlipAxis,
  RotateDirection,
  Shape,
  ShapeTransform,
  SHAPE_SIZE,
} from '../types/game';

/**
 * Pure geometry over 5×5 shape frames.
 *
 * Every function here returns a fresh grid; inputs are never written to.
 * Rotations are composed from {@link transpose} and a vertical flip so that
 * the two directions are exact inverses of each other.
 */

/** Local (frame) coordinate of an occupied cell. */
export interface ShapeCell {
  row: number;
  col: number;
}

const buildShape = (fill: (row: number, col: number) => boolean): Shape =>
  Array.from({ length: SHAPE_SIZE }, (_, row) =>
    Array.from({ length: SHAPE_SIZE }, (_, col) => fill(row, col))
  );

export const EMPTY_SHAPE: Shape = buildShape(() => false);

/**
 * Build a shape from five row strings where '1' or '#' marks an occupied
 * cell. Rows shorter than the frame are padded with empty cells.
 */
export function shapeFromRows(rows: readonly string[]): Shape {
  if (rows.length > SHAPE_SIZE || rows.some((r) => r.length > SHAPE_SIZE)) {
    throw new RangeError(`Shape rows must fit in a ${SHAPE_SIZE}x${SHAPE_SIZE} frame`);
  }
  return buildShape((row, col) => {
    const ch = rows[row]?.[col];
    return ch === '1' || ch === '#';
  });
}

export function transpose(shape: Shape): Shape {
  return buildShape((row, col) => shape[col][row]);
}

export function flip(shape: Shape, axis: FlipAxis): Shape {
  const last = SHAPE_SIZE - 1;
  if (axis === 'vertical') {
    return buildShape((row, col) => shape[last - row][col]);
  }
  return buildShape((row, col) => shape[row][last - col]);
}

export function rotate(shape: Shape, direction: RotateDirection): Shape {
  if (direction === 'right') {
    return transpose(flip(shape, 'vertical'));
  }
  return flip(transpose(shape), 'vertical');
}

export function applyShapeTransform(shape: Shape, transform: ShapeTransform): Shape {
  switch (transform.kind) {
    case 'rotate':
      return rotate(shape, transform.direction);
    case 'flip':
      return flip(shape, transform.axis);
  }
}

/** Occupied frame cells in row-major order. */
export function occupiedCells(shape: Shape): ShapeCell[] {
  const cells: ShapeCell[] = [];
  shape.forEach((cols, row) => {
    cols.forEach((filled, col) => {
      if (filled) cells.push({ row, col });
    });
  });
  return cells;
}

export const cellCount = (shape: Shape): number => occupiedCells(shape).length;

export const isEmptyShape = (shape: Shape): boolean => cellCount(shape) === 0;

export function shapesEqual(a: Shape, b: Shape): boolean {
  for (let row = 0; row < SHAPE_SIZE; row++) {
    for (let col = 0; col < SHAPE_SIZE; col++) {
      if (a[row][col] !== b[row][col]) return false;
    }
  }
  return true;
}

/** Multi-line dump, '#' for occupied and '.' for empty. */
export function formatShape(shape: Shape): string {
  return shape.map((cols) => cols.map((filled) => (filled ? '#' : '.')).join('')).join('\n');
}
