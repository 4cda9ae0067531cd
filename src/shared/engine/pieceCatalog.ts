import catalogJson from './data/pieceCatalog.json';
import { GameError, GameErrorCode } from '../errors';
import { PieceId, PIECE_COUNT, Shape } from '../types/game';
import { PieceCatalogSchema } from '../validation/schemas';
import { cellCount, shapeFromRows } from './shapes';

/**
 * The fixed table of 21 canonical pieces.
 *
 * Every shape is authored inside a 5×5 frame with its footprint around the
 * frame centre (2,2), which is what recentering treats as the anchor cell.
 * The table is read from `data/pieceCatalog.json` and validated once at
 * module load; a malformed catalog is a fatal configuration error.
 */
export interface PieceDefinition {
  readonly id: PieceId;
  readonly name: string;
  readonly shape: Shape;
  /** Number of squares the piece covers. */
  readonly size: number;
}

function loadCatalog(raw: unknown): readonly PieceDefinition[] {
  const parsed = PieceCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new GameError(
      GameErrorCode.CONFIGURATION_ERROR,
      'Piece catalog failed validation',
      { issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
      true
    );
  }
  return parsed.data.pieces.map((piece) => {
    const shape = shapeFromRows(piece.rows);
    return { id: piece.id, name: piece.name, shape, size: cellCount(shape) };
  });
}

export const PIECE_CATALOG: readonly PieceDefinition[] = loadCatalog(catalogJson);

/** All ids in catalog order. */
export const ALL_PIECE_IDS: readonly PieceId[] = PIECE_CATALOG.map((p) => p.id);

export function isPieceId(value: unknown): value is PieceId {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value < PIECE_COUNT;
}

export function getPiece(id: PieceId): PieceDefinition {
  if (!isPieceId(id)) {
    throw new GameError(GameErrorCode.MOVE_INVALID, `Unknown piece id ${id}`, { pieceId: id });
  }
  return PIECE_CATALOG[id];
}

/** Canonical (untransformed) shape for a catalog id. */
export const shapeOf = (id: PieceId): Shape => getPiece(id).shape;

export function pieceIdByName(name: string): PieceId | undefined {
  return PIECE_CATALOG.find((p) => p.name === name)?.id;
}
