/**
 * Shared Errors Module
 *
 * This module exports structured error types for consistent error handling
 * across the engine and its hosts.
 *
 * @module errors
 */

export {
  // Error codes
  GameErrorCode,
  isGameErrorCode,
  // Base class
  GameError,
  type GameErrorJSON,
  // Specific errors
  InvalidMoveError,
  GameNotActiveError,
  InvalidRosterError,
  InvalidConfigurationError,
  // Utilities
  isGameError,
  isFatalError,
  wrapError,
} from './GameDomainErrors';
