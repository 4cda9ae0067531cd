/**
 * Player State Helpers
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Roster construction and per-player inventory queries. The seating order
 * of colours is a policy, so every builder takes the order explicitly; the
 * engine passes the configured default when a host has no opinion.
 *
 * @module playerStateHelpers
 */

import { InvalidRosterError } from '../errors';
import {
  MAX_PLAYERS,
  MIN_PLAYERS,
  PLAYER_COLORS,
  Player,
  PlayerColor,
  ReadonlyPlayer,
} from '../types/game';
import { ALL_PIECE_IDS, getPiece } from './pieceCatalog';

/** A fresh player holding every piece. */
export function createPlayer(color: PlayerColor): Player {
  return { color, remainingPieces: new Set(ALL_PIECE_IDS) };
}

/**
 * Seat one player per colour, in the given order.
 *
 * @throws InvalidRosterError for fewer than 2 or more than 4 colours, or
 *   a repeated colour.
 */
export function createPlayers(colors: readonly PlayerColor[]): Player[] {
  if (colors.length < MIN_PLAYERS || colors.length > MAX_PLAYERS) {
    throw new InvalidRosterError(
      `A game seats ${MIN_PLAYERS} to ${MAX_PLAYERS} players, got ${colors.length}`,
      { colors }
    );
  }
  if (new Set(colors).size !== colors.length) {
    throw new InvalidRosterError('Each player needs a distinct colour', { colors });
  }
  return colors.map(createPlayer);
}

/** The first `count` colours of `order`, seated. */
export function defaultPlayers(
  count: number,
  order: readonly PlayerColor[] = PLAYER_COLORS
): Player[] {
  if (count > order.length) {
    throw new InvalidRosterError(`Seating order only names ${order.length} colours`, {
      count,
      order,
    });
  }
  return createPlayers(order.slice(0, count));
}

/**
 * Add a player with the first colour of `order` nobody has taken yet.
 * Returns the roster unchanged when every colour is in use.
 */
export function addPlayer(
  players: readonly Player[],
  order: readonly PlayerColor[] = PLAYER_COLORS
): Player[] {
  const color = order.find((c) => players.every((p) => p.color !== c));
  if (color === undefined || players.length >= MAX_PLAYERS) {
    return [...players];
  }
  return [...players, createPlayer(color)];
}

/** Squares still in hand; the usual end-of-game score (lower is better). */
export function remainingSquares(player: ReadonlyPlayer): number {
  let total = 0;
  for (const id of player.remainingPieces) {
    total += getPiece(id).size;
  }
  return total;
}

export const hasPiecesLeft = (player: ReadonlyPlayer): boolean => player.remainingPieces.size > 0;
