/**
 * Game Domain Errors - Structured error types for the rules engine
 *
 * Rejected placements (out of bounds, overlapping, touching an own edge,
 * missing a corner contact) are ordinary results and never thrown. The types
 * here cover contract violations: a host asking the engine to do something
 * that the current state does not allow, or a broken configuration.
 *
 * Usage:
 * ```typescript
 * import { GameError, GameErrorCode, InvalidMoveError } from './GameDomainErrors';
 *
 * throw new InvalidMoveError('Piece 10 is no longer in hand', { pieceId: 10 });
 *
 * if (error instanceof GameError) {
 *   logger.warn(error.message, { code: error.code, ...error.context });
 * }
 * ```
 *
 * @module GameDomainErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Enumeration of all game domain error codes.
 *
 * Error codes are prefixed by category:
 * - GAME_*: General game state errors
 * - MOVE_*: Move-related errors
 * - PLAYER_*: Player/roster errors
 */
export enum GameErrorCode {
  // Game State Errors
  GAME_NOT_ACTIVE = 'GAME_NOT_ACTIVE',
  GAME_INVALID_STATE = 'GAME_INVALID_STATE',
  GAME_INVALID_PHASE = 'GAME_INVALID_PHASE',

  // Move Errors
  MOVE_INVALID = 'MOVE_INVALID',
  MOVE_INVALID_POSITION = 'MOVE_INVALID_POSITION',

  // Player Errors
  PLAYER_NOT_FOUND = 'PLAYER_NOT_FOUND',
  PLAYER_INVALID_ROSTER = 'PLAYER_INVALID_ROSTER',

  // Internal Errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

const GAME_ERROR_CODES: readonly string[] = Object.values(GameErrorCode);

export function isGameErrorCode(value: unknown): value is GameErrorCode {
  return typeof value === 'string' && GAME_ERROR_CODES.includes(value);
}

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for all game domain errors.
 *
 * Provides:
 * - Structured error code
 * - Context for debugging
 * - Serialization for hosts that forward errors to clients
 */
export class GameError extends Error {
  /** Error code for programmatic handling */
  readonly code: GameErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Whether this error is fatal (game should be aborted) */
  readonly isFatal: boolean;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    code: GameErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    isFatal: boolean = false
  ) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.context = context;
    this.isFatal = isFatal;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, GameError.prototype);
  }

  /** Serialize to a JSON-safe object */
  toJSON(): GameErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      isFatal: this.isFatal,
      timestamp: this.timestamp.toISOString(),
    };
  }

  /** Create from a JSON representation; unknown codes become INTERNAL_ERROR. */
  static fromJSON(json: GameErrorJSON): GameError {
    const code = isGameErrorCode(json.code) ? json.code : GameErrorCode.INTERNAL_ERROR;
    return new GameError(code, json.message, json.context, json.isFatal);
  }
}

/**
 * JSON representation of a GameError.
 */
export interface GameErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  isFatal: boolean;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Error for moves the current state cannot accept (no piece selected, a
 * piece that is no longer in hand, a pass while a move exists).
 */
export class InvalidMoveError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.MOVE_INVALID, message, context, false);
    this.name = 'InvalidMoveError';
    Object.setPrototypeOf(this, InvalidMoveError.prototype);
  }
}

/**
 * Error when a mutating operation arrives after the game has ended.
 */
export class GameNotActiveError extends GameError {
  constructor(reason: string, context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.GAME_NOT_ACTIVE,
      `Game is not active (${reason})`,
      { reason, ...context },
      false
    );
    this.name = 'GameNotActiveError';
    Object.setPrototypeOf(this, GameNotActiveError.prototype);
  }
}

/**
 * Error for a player roster that cannot seat a game.
 */
export class InvalidRosterError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.PLAYER_INVALID_ROSTER, message, context, false);
    this.name = 'InvalidRosterError';
    Object.setPrototypeOf(this, InvalidRosterError.prototype);
  }
}

/**
 * Error when configuration fails validation at load time.
 */
export class InvalidConfigurationError extends GameError {
  constructor(errors: Array<{ path: string; message: string }>) {
    super(
      GameErrorCode.CONFIGURATION_ERROR,
      `Invalid configuration: ${errors.map((e) => `${e.path || 'root'}: ${e.message}`).join('; ')}`,
      { errors },
      true
    );
    this.name = 'InvalidConfigurationError';
    Object.setPrototypeOf(this, InvalidConfigurationError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Check if an error is a GameError.
 */
export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}

/**
 * Check if an error is fatal.
 */
export function isFatalError(error: unknown): boolean {
  return isGameError(error) && error.isFatal;
}

/**
 * Wrap an unknown error in a GameError.
 */
export function wrapError(error: unknown, context: Record<string, unknown> = {}): GameError {
  if (isGameError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new GameError(GameErrorCode.INTERNAL_ERROR, message, {
    ...context,
    originalStack: stack,
  });
}
