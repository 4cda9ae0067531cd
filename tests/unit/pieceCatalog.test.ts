import {
  ALL_PIECE_IDS,
  PIECE_CATALOG,
  getPiece,
  isPieceId,
  pieceIdByName,
  shapeOf,
} from '../../src/shared/engine/pieceCatalog';
import { generateOrientations } from '../../src/shared/engine/moveSearch';
import { occupiedCells } from '../../src/shared/engine/shapes';
import { GameError, GameErrorCode } from '../../src/shared/errors';
import { PieceCatalogSchema } from '../../src/shared/validation/schemas';

describe('pieceCatalog', () => {
  it('holds 21 pieces with ids 0..20 in order', () => {
    expect(PIECE_CATALOG).toHaveLength(21);
    expect(ALL_PIECE_IDS).toEqual(Array.from({ length: 21 }, (_, i) => i));
    PIECE_CATALOG.forEach((piece, index) => expect(piece.id).toBe(index));
  });

  it('has the standard size distribution', () => {
    const bySize = new Map<number, number>();
    for (const piece of PIECE_CATALOG) {
      bySize.set(piece.size, (bySize.get(piece.size) ?? 0) + 1);
    }
    expect(Object.fromEntries(bySize)).toEqual({ 1: 1, 2: 1, 3: 2, 4: 5, 5: 12 });
    expect(PIECE_CATALOG.reduce((sum, p) => sum + p.size, 0)).toBe(89);
  });

  it('gives every piece a unique name', () => {
    const names = PIECE_CATALOG.map((p) => p.name);
    expect(new Set(names).size).toBe(names.length);
  });

  it('keeps every orientation of every piece on the frame centre row and column', () => {
    for (const piece of PIECE_CATALOG) {
      for (const shape of generateOrientations(piece.shape)) {
        const cells = occupiedCells(shape);
        expect(cells.some((c) => c.row === 2)).toBe(true);
        expect(cells.some((c) => c.col === 2)).toBe(true);
      }
    }
  });

  it('looks pieces up by name', () => {
    expect(pieceIdByName('Dot')).toBe(0);
    expect(pieceIdByName('Plus')).toBe(20);
    expect(pieceIdByName('Hexomino')).toBeUndefined();
  });

  it('returns the catalog shape for an id', () => {
    expect(occupiedCells(shapeOf(0))).toEqual([{ row: 2, col: 2 }]);
    expect(getPiece(20).size).toBe(5);
  });

  describe('isPieceId', () => {
    it('accepts integers in range only', () => {
      expect(isPieceId(0)).toBe(true);
      expect(isPieceId(20)).toBe(true);
      expect(isPieceId(21)).toBe(false);
      expect(isPieceId(-1)).toBe(false);
      expect(isPieceId(1.5)).toBe(false);
      expect(isPieceId('3')).toBe(false);
    });
  });

  it('throws MOVE_INVALID for an unknown id', () => {
    expect(() => getPiece(21)).toThrow(GameError);
    expect(() => getPiece(99)).toThrow(
      expect.objectContaining({ code: GameErrorCode.MOVE_INVALID })
    );
  });

  describe('PieceCatalogSchema', () => {
    const validPieces = PIECE_CATALOG.map((piece) => ({
      id: piece.id,
      name: piece.name,
      rows: piece.shape.map((cols) => cols.map((f) => (f ? '1' : '0')).join('')),
    }));

    it('accepts the shipped catalog', () => {
      expect(PieceCatalogSchema.safeParse({ pieces: validPieces }).success).toBe(true);
    });

    it('rejects a catalog with a missing piece', () => {
      expect(PieceCatalogSchema.safeParse({ pieces: validPieces.slice(1) }).success).toBe(false);
    });

    it('rejects ids out of order', () => {
      const swapped = [validPieces[1], validPieces[0], ...validPieces.slice(2)];
      expect(PieceCatalogSchema.safeParse({ pieces: swapped }).success).toBe(false);
    });

    it('rejects a piece with six squares', () => {
      const pieces = [...validPieces];
      pieces[20] = { ...pieces[20], rows: ['00000', '01110', '01110', '00000', '00000'] };
      expect(PieceCatalogSchema.safeParse({ pieces }).success).toBe(false);
    });
  });
});
