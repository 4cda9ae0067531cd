// =============================================================================
// RULES ENGINE - PUBLIC API
// =============================================================================
// Hosts (UIs, servers, bots) should only import from this file.
//
// Layers, bottom-up:
// - Geometry: shapes, recentering
// - Board: padded board model and catalog
// - Rules: placement validation and legal-move search
// - Flow: turn state machine and the GameEngine that drives it
// =============================================================================

// =============================================================================
// CORE TYPES
// =============================================================================

export type {
  Board,
  ReadonlyBoard,
  TileState,
  Position,
  Shape,
  PieceId,
  PlayerColor,
  Player,
  ReadonlyPlayer,
  RotateDirection,
  FlipAxis,
  ShapeTransform,
  PlacedPiece,
  PassRecord,
  MoveRecord,
  GameState,
  GameOverReason,
  GameSummary,
} from '../types/game';

export {
  BOARD_SIZE,
  BORDER_OFFSET,
  PADDED_BOARD_SIZE,
  SHAPE_SIZE,
  SHAPE_CENTER,
  PIECE_COUNT,
  MIN_PLAYERS,
  MAX_PLAYERS,
  PLAYER_COLORS,
  isPlayerColor,
  positionToString,
  positionsEqual,
} from '../types/game';

// =============================================================================
// GEOMETRY
// =============================================================================

export {
  EMPTY_SHAPE,
  shapeFromRows,
  transpose,
  flip,
  rotate,
  applyShapeTransform,
  occupiedCells,
  cellCount,
  isEmptyShape,
  shapesEqual,
  formatShape,
} from './shapes';
export type { ShapeCell } from './shapes';

export { shapeExtents, checkBoundsAndRecenter, footprint } from './recentering';
export type { ShapeExtents } from './recentering';

// =============================================================================
// BOARD & PIECES
// =============================================================================

export {
  SEED_CORNERS,
  seedCornersFor,
  createBoard,
  cloneBoard,
  isWithinBoardArray,
  isInPlayArea,
  getTile,
  getPlayAreaRows,
  formatBoard,
  countTiles,
} from './board';

export {
  PIECE_CATALOG,
  ALL_PIECE_IDS,
  isPieceId,
  getPiece,
  shapeOf,
  pieceIdByName,
} from './pieceCatalog';
export type { PieceDefinition } from './pieceCatalog';

export {
  createPlayer,
  createPlayers,
  defaultPlayers,
  addPlayer,
  remainingSquares,
  hasPiecesLeft,
} from './playerStateHelpers';

// =============================================================================
// RULES
// =============================================================================

export { validatePlacementOnBoard, isLegalPlacement } from './validators/PlacementValidator';
export type {
  PlacementRejectionCode,
  PlacementValidationResult,
} from './validators/PlacementValidator';

export { generateOrientations, findLegalPlacement, canMakeMove } from './moveSearch';
export type { LegalPlacement } from './moveSearch';

// =============================================================================
// TURN FLOW
// =============================================================================

export * from './fsm';

export { GameEngine } from './GameEngine';
export type { GameEngineOptions, PlacementOutcome, PlacementRejection } from './GameEngine';
