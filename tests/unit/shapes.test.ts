/**
 * Shape geometry: transpose, flips, rotations and helpers over 5×5 frames.
 */

import fc from 'fast-check';

import {
  EMPTY_SHAPE,
  applyShapeTransform,
  cellCount,
  flip,
  formatShape,
  isEmptyShape,
  occupiedCells,
  rotate,
  shapeFromRows,
  shapesEqual,
  transpose,
} from '../../src/shared/engine/shapes';
import { shapeOf, pieceIdByName } from '../../src/shared/engine/pieceCatalog';
import type { Shape } from '../../src/shared/types/game';

const rows = (shape: Shape): string[] =>
  shape.map((cols) => cols.map((filled) => (filled ? '1' : '0')).join(''));

const CHAIR = ['00000', '01000', '01110', '00100', '00000'];

const shapeArb = fc
  .array(fc.array(fc.boolean(), { minLength: 5, maxLength: 5 }), { minLength: 5, maxLength: 5 })
  .map((grid): Shape => grid);

describe('shapes', () => {
  describe('shapeFromRows', () => {
    it('reads 1 and # as occupied', () => {
      const shape = shapeFromRows(['#....', '.1', '', '', '....1']);
      expect(occupiedCells(shape)).toEqual([
        { row: 0, col: 0 },
        { row: 1, col: 1 },
        { row: 4, col: 4 },
      ]);
    });

    it('rejects rows that do not fit the frame', () => {
      expect(() => shapeFromRows(['000000'])).toThrow(RangeError);
      expect(() => shapeFromRows(['0', '0', '0', '0', '0', '0'])).toThrow(RangeError);
    });
  });

  describe('transpose', () => {
    it('mirrors the chair across the main diagonal', () => {
      expect(rows(transpose(shapeFromRows(CHAIR)))).toEqual([
        '00000',
        '01100',
        '00110',
        '00100',
        '00000',
      ]);
    });

    it('turns the vertical line into a horizontal one', () => {
      const line = shapeOf(pieceIdByName('Line5') ?? -1);
      expect(rows(transpose(line))).toEqual(['00000', '00000', '11111', '00000', '00000']);
    });
  });

  describe('flip', () => {
    it('flips the chair vertically', () => {
      expect(rows(flip(shapeFromRows(CHAIR), 'vertical'))).toEqual([
        '00000',
        '00100',
        '01110',
        '01000',
        '00000',
      ]);
    });

    it('flips the chair horizontally', () => {
      expect(rows(flip(shapeFromRows(CHAIR), 'horizontal'))).toEqual([
        '00000',
        '00010',
        '01110',
        '00100',
        '00000',
      ]);
    });

    it('does not write to its input', () => {
      const chair = shapeFromRows(CHAIR);
      flip(chair, 'vertical');
      expect(rows(chair)).toEqual(CHAIR);
    });
  });

  describe('rotate', () => {
    it('rotates the L clockwise', () => {
      const l5 = shapeOf(pieceIdByName('L5') ?? -1);
      expect(rows(rotate(l5, 'right'))).toEqual([
        '00000',
        '00000',
        '01111',
        '01000',
        '00000',
      ]);
    });

    it('rotates the L counter-clockwise', () => {
      const l5 = shapeOf(pieceIdByName('L5') ?? -1);
      expect(rows(rotate(l5, 'left'))).toEqual([
        '00000',
        '00010',
        '11110',
        '00000',
        '00000',
      ]);
    });

    it('rotates the chair both ways', () => {
      const chair = shapeOf(pieceIdByName('Chair') ?? -1);
      expect(rows(chair)).toEqual(CHAIR);
      expect(rows(rotate(chair, 'right'))).toEqual([
        '00000',
        '00110',
        '01100',
        '00100',
        '00000',
      ]);
      expect(rows(rotate(chair, 'left'))).toEqual([
        '00000',
        '00100',
        '00110',
        '01100',
        '00000',
      ]);
    });

    it('turns the vertical line into the middle row either way', () => {
      const line5 = shapeOf(pieceIdByName('Line5') ?? -1);
      const horizontal = ['00000', '00000', '11111', '00000', '00000'];
      expect(rows(rotate(line5, 'right'))).toEqual(horizontal);
      expect(rows(rotate(line5, 'left'))).toEqual(horizontal);
    });

    it('left undoes right and right undoes left', () => {
      fc.assert(
        fc.property(shapeArb, (shape) => {
          expect(shapesEqual(rotate(rotate(shape, 'right'), 'left'), shape)).toBe(true);
          expect(shapesEqual(rotate(rotate(shape, 'left'), 'right'), shape)).toBe(true);
        })
      );
    });

    it('four quarter turns are the identity', () => {
      fc.assert(
        fc.property(shapeArb, fc.constantFrom('right' as const, 'left' as const), (shape, dir) => {
          let current = shape;
          for (let i = 0; i < 4; i++) current = rotate(current, dir);
          expect(shapesEqual(current, shape)).toBe(true);
        })
      );
    });

    it('preserves the cell count', () => {
      fc.assert(
        fc.property(shapeArb, (shape) => {
          expect(cellCount(rotate(shape, 'right'))).toBe(cellCount(shape));
          expect(cellCount(flip(shape, 'horizontal'))).toBe(cellCount(shape));
        })
      );
    });
  });

  describe('involutions', () => {
    it('transpose and both flips are their own inverses', () => {
      fc.assert(
        fc.property(shapeArb, (shape) => {
          expect(shapesEqual(transpose(transpose(shape)), shape)).toBe(true);
          expect(shapesEqual(flip(flip(shape, 'vertical'), 'vertical'), shape)).toBe(true);
          expect(shapesEqual(flip(flip(shape, 'horizontal'), 'horizontal'), shape)).toBe(true);
        })
      );
    });
  });

  describe('applyShapeTransform', () => {
    it('dispatches to rotate and flip', () => {
      const chair = shapeFromRows(CHAIR);
      expect(
        shapesEqual(
          applyShapeTransform(chair, { kind: 'rotate', direction: 'left' }),
          rotate(chair, 'left')
        )
      ).toBe(true);
      expect(
        shapesEqual(
          applyShapeTransform(chair, { kind: 'flip', axis: 'horizontal' }),
          flip(chair, 'horizontal')
        )
      ).toBe(true);
    });
  });

  describe('helpers', () => {
    it('treats the all-false frame as empty', () => {
      expect(isEmptyShape(EMPTY_SHAPE)).toBe(true);
      expect(isEmptyShape(rotate(EMPTY_SHAPE, 'right'))).toBe(true);
      expect(isEmptyShape(shapeFromRows(CHAIR))).toBe(false);
    });

    it('lists occupied cells row-major', () => {
      expect(occupiedCells(shapeFromRows(CHAIR))).toEqual([
        { row: 1, col: 1 },
        { row: 2, col: 1 },
        { row: 2, col: 2 },
        { row: 2, col: 3 },
        { row: 3, col: 2 },
      ]);
    });

    it('formats a shape as # and .', () => {
      expect(formatShape(shapeFromRows(CHAIR))).toBe(
        ['.....', '.#...', '.###.', '..#..', '.....'].join('\n')
      );
    });
  });
});
