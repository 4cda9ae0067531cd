export {
  TurnStateMachine,
  transition,
  type TurnState,
  type TurnPhase,
  type TurnEvent,
  type TurnContext,
  type Action,
  type TransitionResult,
  type TransitionError,
  type AwaitingSelectionState,
  type PiecePendingState,
  type GameOverState,
} from './TurnStateMachine';
