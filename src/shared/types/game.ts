/**
 * Core data model for the corner-territory game.
 *
 * Coordinates come in two flavours:
 *
 * - Play-area coordinates ({@link Position}) address the 20×20 playable
 *   grid, `0 <= row, col < BOARD_SIZE`. Everything a host shows to a user
 *   uses these.
 * - Board coordinates address the padded {@link PADDED_BOARD_SIZE} array that
 *   carries a one-cell sentinel ring. A play-area cell `(r, c)` lives at board
 *   index `(r + 1, c + 1)`.
 */

/** Side length of the playable area. */
export const BOARD_SIZE = 20;

/** Offset between play-area coordinates and padded board indices. */
export const BORDER_OFFSET = 1;

/** Side length of the padded board (play area plus sentinel ring). */
export const PADDED_BOARD_SIZE = BOARD_SIZE + 2 * BORDER_OFFSET;

/** Side length of the square frame every shape is authored in. */
export const SHAPE_SIZE = 5;

/** Row/column of the frame cell that is treated as the shape's centre. */
export const SHAPE_CENTER = 2;

/** Number of pieces in the catalog (and in every player's starting hand). */
export const PIECE_COUNT = 21;

export const MIN_PLAYERS = 2;
export const MAX_PLAYERS = 4;

export type PlayerColor = 'blue' | 'yellow' | 'red' | 'green';

/** Every colour, in the default seating order. */
export const PLAYER_COLORS: readonly PlayerColor[] = ['blue', 'yellow', 'red', 'green'];

/**
 * State of a single board cell.
 *
 * 'wall' marks the immutable sentinel ring. A colour marks a tile owned by
 * that player; once set it never changes.
 */
export type TileState = 'empty' | 'wall' | PlayerColor;

export type Board = TileState[][];
export type ReadonlyBoard = ReadonlyArray<ReadonlyArray<TileState>>;

/** Play-area coordinate. */
export interface Position {
  row: number;
  col: number;
}

/**
 * Immutable 5×5 occupancy grid: one piece in one orientation.
 * `shape[row][col]` is true when the cell is occupied.
 */
export type Shape = ReadonlyArray<ReadonlyArray<boolean>>;

/** Stable catalog index, 0..20. */
export type PieceId = number;

export type RotateDirection = 'right' | 'left';
export type FlipAxis = 'horizontal' | 'vertical';

export type ShapeTransform =
  | { readonly kind: 'rotate'; readonly direction: RotateDirection }
  | { readonly kind: 'flip'; readonly axis: FlipAxis };

export interface Player {
  readonly color: PlayerColor;
  /** Pieces still in hand. Ids are only ever removed. */
  remainingPieces: Set<PieceId>;
}

/** Player view handed to hosts; the hand cannot be changed through it. */
export interface ReadonlyPlayer {
  readonly color: PlayerColor;
  readonly remainingPieces: ReadonlySet<PieceId>;
}

/** Record of a committed placement. */
export interface PlacedPiece {
  readonly type: 'place';
  readonly player: number;
  readonly color: PlayerColor;
  readonly pieceId: PieceId;
  /** Play-area coordinate of the shape frame's (0,0) cell. May be negative. */
  readonly origin: Position;
  /** Play-area cells written by this placement, row-major. */
  readonly cells: readonly Position[];
  readonly shape: Shape;
}

/** Record of a forced pass. */
export interface PassRecord {
  readonly type: 'pass';
  readonly player: number;
  readonly color: PlayerColor;
}

export type MoveRecord = PlacedPiece | PassRecord;

export interface GameState {
  board: Board;
  players: Player[];
  /** Index into {@link players} of whose turn it is. */
  currentPlayer: number;
  selectedPiece: PieceId | null;
  /** Live orientation of the selected piece; the empty shape when none. */
  pieceBuffer: Shape;
  /** Consecutive passes since the last successful placement. */
  passCounter: number;
  history: MoveRecord[];
}

export type GameOverReason = 'pieces_exhausted' | 'all_passed';

export interface GameSummary {
  over: boolean;
  reason: GameOverReason | null;
  /**
   * The player on turn for an exhausted hand; the fewest squares left after
   * a full round of passes. Null while running and on a tie.
   */
  winner: PlayerColor | null;
  /** Squares left in hand per seated colour. */
  remainingSquares: Partial<Record<PlayerColor, number>>;
}

export const positionToString = (pos: Position): string => `${pos.row},${pos.col}`;

export const positionsEqual = (a: Position, b: Position): boolean =>
  a.row === b.row && a.col === b.col;

export function isPlayerColor(value: unknown): value is PlayerColor {
  return PLAYER_COLORS.some((color) => color === value);
}
