import type { Logger } from 'winston';
import { config } from '../config';
import { GameError, GameErrorCode, GameNotActiveError, InvalidMoveError } from '../errors';
import {
  FlipAxis,
  GameOverReason,
  GameState,
  GameSummary,
  PieceId,
  PlacedPiece,
  Player,
  PlayerColor,
  Position,
  ReadonlyBoard,
  ReadonlyPlayer,
  RotateDirection,
  Shape,
  ShapeTransform,
  TileState,
  BORDER_OFFSET,
  PADDED_BOARD_SIZE,
  SHAPE_SIZE,
  isPlayerColor,
} from '../types/game';
import { logger as defaultLogger } from '../utils/logger';
import { PositionSchema, ShapeTransformSchema } from '../validation/schemas';
import { cloneBoard, createBoard, formatBoard, getTile, seedCornersFor } from './board';
import { Action, TurnEvent, TurnPhase, TurnStateMachine } from './fsm';
import { canMakeMove as searchForMove } from './moveSearch';
import { getPiece, isPieceId, shapeOf } from './pieceCatalog';
import { createPlayers, defaultPlayers, remainingSquares } from './playerStateHelpers';
import { checkBoundsAndRecenter, footprint } from './recentering';
import { applyShapeTransform, cellCount, EMPTY_SHAPE, isEmptyShape } from './shapes';
import { validatePlacementOnBoard } from './validators/PlacementValidator';

export interface GameEngineOptions {
  /** Seated colours in turn order. Defaults to the configured order. */
  colors?: readonly PlayerColor[];
  /**
   * Seat only the first `playerCount` colours of the configured order.
   * Ignored when `colors` is given.
   */
  playerCount?: number;
  /** Keep the piece selected after a rejected placement. */
  keepSelectionOnFailure?: boolean;
  /** Dump the board at debug level on each placement attempt. */
  debugBoard?: boolean;
  logger?: Logger;
}

export type PlacementRejection = 'out_of_bounds' | 'illegal';

export type PlacementOutcome =
  | { readonly ok: true; readonly placement: PlacedPiece }
  | { readonly ok: false; readonly reason: PlacementRejection };

const copyPlayer = (player: ReadonlyPlayer): Player => ({
  color: player.color,
  remainingPieces: new Set(player.remainingPieces),
});

function restoreState(snapshot: GameState): GameState {
  const invalid = (message: string, context: Record<string, unknown> = {}): GameError =>
    new GameError(GameErrorCode.GAME_INVALID_STATE, message, context);

  const players = createPlayers(snapshot.players.map((p) => p.color)).map((fresh, index) => ({
    color: fresh.color,
    remainingPieces: new Set(snapshot.players[index].remainingPieces),
  }));
  for (const player of players) {
    const unknown = [...player.remainingPieces].filter((id) => !isPieceId(id));
    if (unknown.length > 0) {
      throw invalid(`Unknown piece ids in ${player.color}'s hand`, { ids: unknown });
    }
  }

  const board = snapshot.board;
  if (board.length !== PADDED_BOARD_SIZE || board.some((row) => row.length !== PADDED_BOARD_SIZE)) {
    throw invalid(`Board must be ${PADDED_BOARD_SIZE}x${PADDED_BOARD_SIZE}`);
  }
  const seeds = new Map(
    seedCornersFor(players.length)
      .slice(0, players.length)
      .map(([row, col], index): [string, number] => [`${row},${col}`, index])
  );
  const last = PADDED_BOARD_SIZE - 1;
  board.forEach((cells, row) =>
    cells.forEach((tile, col) => {
      const context = { row, col, tile };
      if (row === 0 || col === 0 || row === last || col === last) {
        const seat = seeds.get(`${row},${col}`);
        const expected = seat === undefined ? 'wall' : players[seat].color;
        if (tile !== expected) {
          throw invalid(`Ring cell (${row}, ${col}) must be ${expected}`, context);
        }
      } else if (tile !== 'empty' && !isPlayerColor(tile)) {
        throw invalid(`Unknown tile at (${row}, ${col})`, context);
      }
    })
  );
  if (
    !Number.isInteger(snapshot.currentPlayer) ||
    snapshot.currentPlayer < 0 ||
    snapshot.currentPlayer >= players.length
  ) {
    throw invalid(`Current player ${snapshot.currentPlayer} is not seated`);
  }
  if (!Number.isInteger(snapshot.passCounter) || snapshot.passCounter < 0) {
    throw invalid('Pass counter must be a non-negative integer');
  }

  const selected = snapshot.selectedPiece;
  if (selected !== null && !players[snapshot.currentPlayer].remainingPieces.has(selected)) {
    throw invalid(`Selected piece ${selected} is not in the current player's hand`);
  }
  const buffer = snapshot.pieceBuffer;
  const bufferFits =
    buffer.length === SHAPE_SIZE && buffer.every((row) => row.length === SHAPE_SIZE);
  if (selected !== null && (!bufferFits || cellCount(buffer) !== getPiece(selected).size)) {
    throw invalid(`Piece buffer does not hold piece ${selected}`);
  }

  return {
    board: cloneBoard(board),
    players,
    currentPlayer: snapshot.currentPlayer,
    selectedPiece: selected,
    pieceBuffer: selected === null ? EMPTY_SHAPE : buffer,
    passCounter: snapshot.passCounter,
    history: [...snapshot.history],
  };
}

/**
 * Authoritative game host.
 *
 * Owns the board and roster and is the only thing that mutates them. Every
 * turn-level operation is routed through the {@link TurnStateMachine}; the
 * engine performs the board and inventory writes and applies the actions the
 * machine returns.
 *
 * The engine is synchronous and assumes a single caller. Hosts that accept
 * input from several sources must serialise mutating calls per game.
 */
export class GameEngine {
  private readonly state: GameState;
  private readonly fsm: TurnStateMachine;
  private readonly debugBoard: boolean;
  private readonly log: Logger;

  constructor(options: GameEngineOptions = {}, snapshot?: GameState) {
    if (snapshot) {
      this.state = restoreState(snapshot);
    } else {
      const order = config.game.playerOrder;
      const players = options.colors
        ? createPlayers(options.colors)
        : defaultPlayers(options.playerCount ?? order.length, order);
      this.state = {
        board: createBoard(players.map((p) => p.color)),
        players,
        currentPlayer: 0,
        selectedPiece: null,
        pieceBuffer: EMPTY_SHAPE,
        passCounter: 0,
        history: [],
      };
    }

    const player = this.state.currentPlayer;
    const pieceId = this.state.selectedPiece;
    this.fsm = new TurnStateMachine(
      pieceId === null
        ? { phase: 'awaiting_selection', player }
        : { phase: 'piece_pending', player, pieceId },
      {
        numPlayers: this.state.players.length,
        keepSelectionOnFailure:
          options.keepSelectionOnFailure ?? config.game.keepSelectionOnFailure,
      }
    );
    this.debugBoard = options.debugBoard ?? config.game.debugBoard;
    this.log = options.logger ?? defaultLogger;

    this.log.info(snapshot ? 'Game restored' : 'Game created', {
      colors: this.state.players.map((p) => p.color),
    });

    if (snapshot) {
      this.checkGameOver();
    }
  }

  /**
   * Resume a game from a {@link getState} snapshot. The snapshot is copied;
   * the engine never aliases it.
   *
   * @throws GameError when the snapshot is structurally inconsistent.
   */
  public static fromState(snapshot: GameState, options: GameEngineOptions = {}): GameEngine {
    return new GameEngine(options, snapshot);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Read access
  // ═══════════════════════════════════════════════════════════════════════

  /** Deep snapshot of the game state; mutating it does not affect the game. */
  public getState(): GameState {
    return {
      ...this.state,
      board: cloneBoard(this.state.board),
      players: this.state.players.map(copyPlayer),
      history: [...this.state.history],
    };
  }

  public getBoard(): ReadonlyBoard {
    return this.state.board;
  }

  /** Tile at a play-area coordinate. */
  public getTile(pos: Position): TileState {
    return getTile(this.state.board, pos);
  }

  /** Copies of the seated players; the engine's hands stay private. */
  public getPlayers(): ReadonlyPlayer[] {
    return this.state.players.map(copyPlayer);
  }

  public getCurrentPlayerIndex(): number {
    return this.state.currentPlayer;
  }

  public getCurrentPlayer(): ReadonlyPlayer {
    return copyPlayer(this.currentPlayer());
  }

  /** Pieces the player at `index` still holds, ascending. */
  public getRemainingPieces(index: number = this.state.currentPlayer): PieceId[] {
    return [...this.playerAt(index).remainingPieces].sort((a, b) => a - b);
  }

  public getSelectedPiece(): PieceId | null {
    return this.state.selectedPiece;
  }

  public getPieceBuffer(): Shape {
    return this.state.pieceBuffer;
  }

  public getPassCounter(): number {
    return this.state.passCounter;
  }

  public getPhase(): TurnPhase {
    return this.fsm.phase;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Selection and orientation
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Select a piece for the current player, resetting the buffer to its
   * canonical shape, or clear the selection with `null`.
   *
   * @throws InvalidMoveError when the piece is unknown or no longer in hand.
   */
  public selectPiece(pieceId: PieceId | null): void {
    this.assertActive();

    if (pieceId === null) {
      this.send({ type: 'DESELECT' });
      this.state.selectedPiece = null;
      this.state.pieceBuffer = EMPTY_SHAPE;
      return;
    }

    if (!isPieceId(pieceId)) {
      throw new InvalidMoveError(`Unknown piece id ${pieceId}`, { pieceId });
    }
    const player = this.currentPlayer();
    if (!player.remainingPieces.has(pieceId)) {
      throw new InvalidMoveError(`Piece ${pieceId} is not in ${player.color}'s hand`, {
        pieceId,
        color: player.color,
      });
    }

    this.send({ type: 'SELECT_PIECE', pieceId });
    this.state.selectedPiece = pieceId;
    this.state.pieceBuffer = shapeOf(pieceId);
  }

  /**
   * Replace the piece buffer with its transformed value. Transforming an
   * empty buffer is allowed and leaves it empty.
   *
   * @throws InvalidMoveError for a malformed transform.
   */
  public applyTransform(transform: ShapeTransform): Shape {
    this.assertActive();
    const parsed = ShapeTransformSchema.safeParse(transform);
    if (!parsed.success) {
      throw new InvalidMoveError('Unknown shape transform', { transform });
    }
    this.send({ type: 'TRANSFORM' });
    this.state.pieceBuffer = applyShapeTransform(this.state.pieceBuffer, parsed.data);
    return this.state.pieceBuffer;
  }

  public rotate(direction: RotateDirection): Shape {
    return this.applyTransform({ kind: 'rotate', direction });
  }

  public flip(axis: FlipAxis): Shape {
    return this.applyTransform({ kind: 'flip', axis });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Placement
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Origin the buffered piece would take if placed at `anchor`, or null when
   * the placement would be rejected. Never mutates state.
   */
  public suggestPlacement(anchor: Position): Position | null {
    if (this.fsm.phase === 'game_over' || isEmptyShape(this.state.pieceBuffer)) {
      return null;
    }
    const origin = checkBoundsAndRecenter(this.state.pieceBuffer, this.parseAnchor(anchor));
    if (!origin) {
      return null;
    }
    const color = this.currentPlayer().color;
    return validatePlacementOnBoard(this.state.board, this.state.pieceBuffer, origin, color).valid
      ? origin
      : null;
  }

  /**
   * Place the buffered piece for the current player with its frame centre
   * at `anchor` (play-area coordinates).
   *
   * A rejected placement leaves board and inventory untouched. An accepted
   * one writes the tiles, removes the piece from hand, resets the pass
   * counter and hands the turn to the next player.
   *
   * @throws InvalidMoveError when no piece is selected.
   */
  public attemptPlacement(anchor: Position): PlacementOutcome {
    this.assertActive();
    const target = this.parseAnchor(anchor);

    const pieceId = this.state.selectedPiece;
    if (pieceId === null) {
      throw new InvalidMoveError('Cannot place without a selected piece', { anchor: target });
    }

    const playerIndex = this.state.currentPlayer;
    const player = this.playerAt(playerIndex);
    const shape = this.state.pieceBuffer;

    if (this.debugBoard) {
      this.log.debug(`Board before placement:\n${formatBoard(this.state.board)}`);
    }

    const origin = checkBoundsAndRecenter(shape, target);
    if (!origin) {
      return this.reject('out_of_bounds', { color: player.color, pieceId, anchor: target });
    }

    const validation = validatePlacementOnBoard(this.state.board, shape, origin, player.color);
    if (!validation.valid) {
      return this.reject('illegal', {
        color: player.color,
        pieceId,
        anchor: target,
        code: validation.code,
      });
    }

    const cells = footprint(shape, origin);
    for (const cell of cells) {
      this.state.board[cell.row + BORDER_OFFSET][cell.col + BORDER_OFFSET] = player.color;
    }
    player.remainingPieces.delete(pieceId);

    const placement: PlacedPiece = {
      type: 'place',
      player: playerIndex,
      color: player.color,
      pieceId,
      origin,
      cells,
      shape,
    };
    this.state.history.push(placement);

    this.send({ type: 'PLACEMENT_ACCEPTED', pieceId });
    this.log.info('Piece placed', {
      color: player.color,
      piece: getPiece(pieceId).name,
      origin,
      remaining: player.remainingPieces.size,
    });

    this.checkGameOver();
    return { ok: true, placement };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Turn flow
  // ═══════════════════════════════════════════════════════════════════════

  /** Hand the turn to the next player without placing or counting a pass. */
  public endTurn(): void {
    this.assertActive();
    this.send({ type: 'END_TURN' });
    this.checkGameOver();
  }

  /**
   * Forced pass: the current player has no legal move.
   *
   * @throws InvalidMoveError when a legal move exists.
   */
  public passTurn(): void {
    this.assertActive();
    if (this.canMakeMove()) {
      throw new InvalidMoveError(`${this.currentPlayer().color} has a legal move and cannot pass`);
    }
    this.forcePass();
  }

  /**
   * Start-of-turn step for a game loop: pass for every player in a row who
   * is stuck, stopping at the first who can move or when the game ends.
   * Returns the number of passes applied.
   */
  public beginTurn(): number {
    let passes = 0;
    while (this.fsm.phase !== 'game_over' && !this.isGameOver() && !this.canMakeMove()) {
      this.forcePass();
      passes++;
    }
    return passes;
  }

  /** True when the current player has at least one legal placement. */
  public canMakeMove(): boolean {
    return this.canPlayerMove(this.state.currentPlayer);
  }

  public canPlayerMove(index: number): boolean {
    return searchForMove(this.state.board, this.playerAt(index));
  }

  /**
   * True when the current player has no pieces left, or every player has
   * passed in a row.
   */
  public isGameOver(): boolean {
    return this.fsm.phase === 'game_over' || this.gameOverReason() !== null;
  }

  public getSummary(): GameSummary {
    const fsmState = this.fsm.state;
    const reason = fsmState.phase === 'game_over' ? fsmState.reason : this.gameOverReason();

    const remaining: GameSummary['remainingSquares'] = {};
    for (const player of this.state.players) {
      remaining[player.color] = remainingSquares(player);
    }

    return {
      over: reason !== null,
      reason,
      winner: reason === null ? null : this.winnerFor(reason),
      remainingSquares: remaining,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Internals
  // ═══════════════════════════════════════════════════════════════════════

  private currentPlayer(): Player {
    return this.playerAt(this.state.currentPlayer);
  }

  private playerAt(index: number): Player {
    const player = this.state.players[index];
    if (!player) {
      throw new GameError(GameErrorCode.PLAYER_NOT_FOUND, `No player at seat ${index}`, {
        index,
        playerCount: this.state.players.length,
      });
    }
    return player;
  }

  private parseAnchor(anchor: Position): Position {
    const parsed = PositionSchema.safeParse(anchor);
    if (!parsed.success) {
      throw new GameError(
        GameErrorCode.MOVE_INVALID_POSITION,
        'Anchor must have integer row and col',
        { anchor }
      );
    }
    return parsed.data;
  }

  private assertActive(): void {
    const fsmState = this.fsm.state;
    if (fsmState.phase === 'game_over') {
      throw new GameNotActiveError(fsmState.reason);
    }
  }

  private reject(reason: PlacementRejection, meta: Record<string, unknown>): PlacementOutcome {
    this.send({ type: 'PLACEMENT_REJECTED' });
    this.log.debug('Placement rejected', { reason, ...meta });
    return { ok: false, reason };
  }

  private forcePass(): void {
    const player = this.currentPlayer();
    this.state.history.push({
      type: 'pass',
      player: this.state.currentPlayer,
      color: player.color,
    });
    this.send({ type: 'PASS' });
    this.log.info('Player passed', { color: player.color, passCounter: this.state.passCounter });
    this.checkGameOver();
  }

  private gameOverReason(): GameOverReason | null {
    if (this.currentPlayer().remainingPieces.size === 0) {
      return 'pieces_exhausted';
    }
    if (this.state.passCounter >= this.state.players.length) {
      return 'all_passed';
    }
    return null;
  }

  private winnerFor(reason: GameOverReason): PlayerColor | null {
    if (reason === 'pieces_exhausted') {
      return this.currentPlayer().color;
    }
    const scores = this.state.players.map((p) => ({ color: p.color, squares: remainingSquares(p) }));
    const best = Math.min(...scores.map((s) => s.squares));
    const leaders = scores.filter((s) => s.squares === best);
    return leaders.length === 1 ? leaders[0].color : null;
  }

  private checkGameOver(): void {
    if (this.fsm.phase === 'game_over') {
      return;
    }
    const reason = this.gameOverReason();
    if (reason === null) {
      return;
    }
    this.send({ type: 'GAME_OVER', reason });
    const summary = this.getSummary();
    this.log.info('Game over', {
      reason,
      winner: summary.winner,
      remainingSquares: summary.remainingSquares,
    });
  }

  private send(event: TurnEvent): void {
    const result = this.fsm.send(event);
    if (result.ok === false) {
      const { code, message, currentPhase, eventType } = result.error;
      throw new GameError(GameErrorCode.GAME_INVALID_PHASE, message, {
        code,
        phase: currentPhase,
        event: eventType,
      });
    }
    this.applyActions(result.actions);
  }

  private applyActions(actions: readonly Action[]): void {
    for (const action of actions) {
      switch (action.type) {
        case 'CLEAR_SELECTION':
          this.state.selectedPiece = null;
          this.state.pieceBuffer = EMPTY_SHAPE;
          break;
        case 'RESET_PASS_COUNTER':
          this.state.passCounter = 0;
          break;
        case 'INCREMENT_PASS_COUNTER':
          this.state.passCounter++;
          break;
        case 'ADVANCE_PLAYER':
          this.state.currentPlayer = action.to;
          break;
      }
    }
  }
}
