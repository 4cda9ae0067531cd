/**
 * TurnStateMachine - Finite State Machine for a player's turn
 *
 * A turn moves through:
 *
 *   awaiting_selection ──SELECT_PIECE──▶ piece_pending
 *          ▲                               │  ▲
 *          │                      TRANSFORM│  │SELECT_PIECE
 *          │                               ▼  │
 *          └──PLACEMENT_ACCEPTED / PASS / END_TURN (next player)
 *
 * A placement that passes validation completes the turn at once, so there
 * is no resting "turn complete" state: the machine lands in
 * awaiting_selection for the next player. game_over is terminal.
 *
 * The machine is pure. Hosts apply the returned {@link Action}s to their own
 * state; board writes happen before PLACEMENT_ACCEPTED is sent.
 *
 * @module TurnStateMachine
 */

import type { GameOverReason, PieceId } from '../../types/game';

// ═══════════════════════════════════════════════════════════════════════════
// STATES - Discriminated union with phase-specific context
// ═══════════════════════════════════════════════════════════════════════════

export type TurnState = AwaitingSelectionState | PiecePendingState | GameOverState;

export interface AwaitingSelectionState {
  readonly phase: 'awaiting_selection';
  readonly player: number;
}

export interface PiecePendingState {
  readonly phase: 'piece_pending';
  readonly player: number;
  readonly pieceId: PieceId;
}

export interface GameOverState {
  readonly phase: 'game_over';
  readonly reason: GameOverReason;
}

export type TurnPhase = TurnState['phase'];

// ═══════════════════════════════════════════════════════════════════════════
// EVENTS - All valid inputs to the state machine
// ═══════════════════════════════════════════════════════════════════════════

export type TurnEvent =
  | { readonly type: 'SELECT_PIECE'; readonly pieceId: PieceId }
  | { readonly type: 'DESELECT' }
  | { readonly type: 'TRANSFORM' }
  | { readonly type: 'PLACEMENT_ACCEPTED'; readonly pieceId: PieceId }
  | { readonly type: 'PLACEMENT_REJECTED' }
  | { readonly type: 'PASS' }
  | { readonly type: 'END_TURN' }
  | { readonly type: 'GAME_OVER'; readonly reason: GameOverReason };

// ═══════════════════════════════════════════════════════════════════════════
// TRANSITION RESULT
// ═══════════════════════════════════════════════════════════════════════════

export type TransitionResult =
  | { readonly ok: true; readonly state: TurnState; readonly actions: Action[] }
  | { readonly ok: false; readonly error: TransitionError };

export interface TransitionError {
  readonly code: 'INVALID_EVENT' | 'GUARD_FAILED';
  readonly message: string;
  readonly currentPhase: TurnPhase;
  readonly eventType: TurnEvent['type'];
}

// ═══════════════════════════════════════════════════════════════════════════
// ACTIONS - Side effects to apply after transition
// ═══════════════════════════════════════════════════════════════════════════

export type Action =
  | { readonly type: 'CLEAR_SELECTION' }
  | { readonly type: 'RESET_PASS_COUNTER' }
  | { readonly type: 'INCREMENT_PASS_COUNTER' }
  | { readonly type: 'ADVANCE_PLAYER'; readonly from: number; readonly to: number };

// ═══════════════════════════════════════════════════════════════════════════
// STATE MACHINE IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export interface TurnContext {
  readonly numPlayers: number;
  /** Keep the piece selected after a rejected placement. */
  readonly keepSelectionOnFailure: boolean;
}

/**
 * Pure transition function.
 * Takes current state + event, returns new state + actions (or error).
 */
export function transition(
  state: TurnState,
  event: TurnEvent,
  context: TurnContext
): TransitionResult {
  switch (state.phase) {
    case 'awaiting_selection':
      return handleAwaitingSelection(state, event, context);
    case 'piece_pending':
      return handlePiecePending(state, event, context);
    case 'game_over':
      return invalidTransition(state, event, 'Game is over - no transitions allowed');
  }
}

function handleAwaitingSelection(
  state: AwaitingSelectionState,
  event: TurnEvent,
  context: TurnContext
): TransitionResult {
  switch (event.type) {
    case 'SELECT_PIECE':
      return ok<PiecePendingState>(
        { phase: 'piece_pending', player: state.player, pieceId: event.pieceId },
        []
      );

    // Nothing is selected; both leave the (empty) buffer as it is.
    case 'DESELECT':
    case 'TRANSFORM':
      return ok(state, []);

    case 'PASS':
      return advance(state.player, context, [{ type: 'INCREMENT_PASS_COUNTER' }]);

    case 'END_TURN':
      return advance(state.player, context, []);

    case 'GAME_OVER':
      return gameOver(event.reason);

    case 'PLACEMENT_ACCEPTED':
    case 'PLACEMENT_REJECTED':
      return guardFailed(state, event, 'No piece is selected');
  }
}

function handlePiecePending(
  state: PiecePendingState,
  event: TurnEvent,
  context: TurnContext
): TransitionResult {
  switch (event.type) {
    case 'SELECT_PIECE':
      return ok<PiecePendingState>({ ...state, pieceId: event.pieceId }, []);

    case 'DESELECT':
      return ok<AwaitingSelectionState>({ phase: 'awaiting_selection', player: state.player }, [
        { type: 'CLEAR_SELECTION' },
      ]);

    case 'TRANSFORM':
      return ok(state, []);

    case 'PLACEMENT_ACCEPTED':
      if (event.pieceId !== state.pieceId) {
        return guardFailed(
          state,
          event,
          `Placed piece ${event.pieceId} does not match selected piece ${state.pieceId}`
        );
      }
      return advance(state.player, context, [
        { type: 'CLEAR_SELECTION' },
        { type: 'RESET_PASS_COUNTER' },
      ]);

    case 'PLACEMENT_REJECTED':
      if (context.keepSelectionOnFailure) {
        return ok(state, []);
      }
      return ok<AwaitingSelectionState>({ phase: 'awaiting_selection', player: state.player }, [
        { type: 'CLEAR_SELECTION' },
      ]);

    case 'PASS':
      return advance(state.player, context, [
        { type: 'CLEAR_SELECTION' },
        { type: 'INCREMENT_PASS_COUNTER' },
      ]);

    case 'END_TURN':
      return advance(state.player, context, [{ type: 'CLEAR_SELECTION' }]);

    case 'GAME_OVER':
      return gameOver(event.reason, [{ type: 'CLEAR_SELECTION' }]);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function ok<S extends TurnState>(state: S, actions: Action[]): TransitionResult {
  return { ok: true, state, actions };
}

function advance(player: number, context: TurnContext, actions: Action[]): TransitionResult {
  const next = (player + 1) % context.numPlayers;
  return ok<AwaitingSelectionState>({ phase: 'awaiting_selection', player: next }, [
    ...actions,
    { type: 'ADVANCE_PLAYER', from: player, to: next },
  ]);
}

function gameOver(reason: GameOverReason, actions: Action[] = []): TransitionResult {
  return ok<GameOverState>({ phase: 'game_over', reason }, actions);
}

function invalidTransition(state: TurnState, event: TurnEvent, message?: string): TransitionResult {
  return {
    ok: false,
    error: {
      code: 'INVALID_EVENT',
      message: message || `Event '${event.type}' not valid in phase '${state.phase}'`,
      currentPhase: state.phase,
      eventType: event.type,
    },
  };
}

function guardFailed(state: TurnState, event: TurnEvent, message: string): TransitionResult {
  return {
    ok: false,
    error: {
      code: 'GUARD_FAILED',
      message,
      currentPhase: state.phase,
      eventType: event.type,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// STATEFUL WRAPPER
// ═══════════════════════════════════════════════════════════════════════════

export class TurnStateMachine {
  private _state: TurnState;
  private readonly context: TurnContext;
  private readonly history: Array<{ state: TurnState; event: TurnEvent }> = [];

  constructor(initialState: TurnState, context: TurnContext) {
    this._state = initialState;
    this.context = context;
  }

  get state(): TurnState {
    return this._state;
  }

  get phase(): TurnPhase {
    return this._state.phase;
  }

  /**
   * Send an event to the state machine.
   * Returns actions to apply if successful, or the transition error.
   */
  send(event: TurnEvent): TransitionResult {
    const result = transition(this._state, event, this.context);
    if (result.ok) {
      this.history.push({ state: this._state, event });
      this._state = result.state;
    }
    return result;
  }

  /**
   * Check if an event is valid in the current state.
   */
  canSend(event: TurnEvent): boolean {
    return transition(this._state, event, this.context).ok;
  }

  /**
   * Get the transition history for debugging.
   */
  getHistory(): ReadonlyArray<{ state: TurnState; event: TurnEvent }> {
    return this.history;
  }
}
