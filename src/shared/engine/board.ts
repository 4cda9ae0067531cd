import { GameError, GameErrorCode } from '../errors';
import {
  Board,
  BOARD_SIZE,
  BORDER_OFFSET,
  PADDED_BOARD_SIZE,
  PlayerColor,
  Position,
  ReadonlyBoard,
  TileState,
} from '../types/game';

/**
 * Padded board model.
 *
 * The board is a {@link PADDED_BOARD_SIZE}² array whose outer ring is 'wall'.
 * Adjacency scans can then look one cell past any play-area cell without a
 * bounds check: the ring never matches a player colour and never counts as
 * empty.
 *
 * Seed cells: before the first move each seated player owns one corner of
 * the ring. They are never rendered, but they give every player's opening
 * piece a diagonal same-colour neighbour at the matching play-area corner.
 */

const LAST = PADDED_BOARD_SIZE - 1;

/**
 * Ring corners in seating order, as padded [row, col] indices. Seats go
 * round the board from the bottom-right; a two-player game takes opposite
 * corners instead.
 */
export const SEED_CORNERS: ReadonlyArray<readonly [number, number]> = [
  [LAST, LAST],
  [LAST, 0],
  [0, 0],
  [0, LAST],
];

const TWO_PLAYER_SEED_CORNERS: ReadonlyArray<readonly [number, number]> = [
  [LAST, LAST],
  [0, 0],
];

export function seedCornersFor(playerCount: number): ReadonlyArray<readonly [number, number]> {
  return playerCount <= 2 ? TWO_PLAYER_SEED_CORNERS : SEED_CORNERS;
}

export function createBoard(colors: readonly PlayerColor[]): Board {
  if (colors.length > SEED_CORNERS.length) {
    throw new GameError(
      GameErrorCode.PLAYER_INVALID_ROSTER,
      `At most ${SEED_CORNERS.length} players are supported`,
      { playerCount: colors.length }
    );
  }

  const board: Board = Array.from({ length: PADDED_BOARD_SIZE }, (_, row) =>
    Array.from({ length: PADDED_BOARD_SIZE }, (_, col): TileState =>
      row === 0 || col === 0 || row === LAST || col === LAST ? 'wall' : 'empty'
    )
  );

  const corners = seedCornersFor(colors.length);
  colors.forEach((color, index) => {
    const [row, col] = corners[index];
    board[row][col] = color;
  });

  return board;
}

export const cloneBoard = (board: ReadonlyBoard): Board => board.map((row) => [...row]);

/** True when a padded index pair addresses a cell of the array. */
export const isWithinBoardArray = (row: number, col: number): boolean =>
  row >= 0 && row < PADDED_BOARD_SIZE && col >= 0 && col < PADDED_BOARD_SIZE;

export const isInPlayArea = (pos: Position): boolean =>
  pos.row >= 0 && pos.row < BOARD_SIZE && pos.col >= 0 && pos.col < BOARD_SIZE;

/** Tile at a play-area coordinate. */
export function getTile(board: ReadonlyBoard, pos: Position): TileState {
  if (!isInPlayArea(pos)) {
    throw new GameError(
      GameErrorCode.MOVE_INVALID_POSITION,
      `Position (${pos.row}, ${pos.col}) is outside the play area`,
      { position: pos }
    );
  }
  return board[pos.row + BORDER_OFFSET][pos.col + BORDER_OFFSET];
}

/** The 20×20 playable region, without the ring or the seed cells. */
export function getPlayAreaRows(board: ReadonlyBoard): TileState[][] {
  return board
    .slice(BORDER_OFFSET, BORDER_OFFSET + BOARD_SIZE)
    .map((row) => row.slice(BORDER_OFFSET, BORDER_OFFSET + BOARD_SIZE));
}

const TILE_GLYPHS: Record<TileState, string> = {
  empty: '.',
  wall: '#',
  blue: 'B',
  yellow: 'Y',
  red: 'R',
  green: 'G',
};

/** Full padded dump, one line per row. */
export function formatBoard(board: ReadonlyBoard): string {
  return board.map((row) => row.map((tile) => TILE_GLYPHS[tile]).join('')).join('\n');
}

/** Number of play-area tiles owned by `color`. */
export function countTiles(board: ReadonlyBoard, color: PlayerColor): number {
  return getPlayAreaRows(board).reduce(
    (total, row) => total + row.filter((tile) => tile === color).length,
    0
  );
}
