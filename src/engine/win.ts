import type { GameEvent, GameState, Player } from "./types";
import { activePlayers } from "./utils";

export type GameOverVerdict =
  | { kind: "WINNER"; winner: Player }
  | { kind: "NO_WINNER" };

/**
 * Computes whether coin balances force the game to end.
 * - Sole survivor wins once more than one player took part.
 * - Nobody left with coins ends the game without a winner.
 */
export function checkGameOver(state: GameState): GameOverVerdict | null {
  const withCoins = activePlayers(state.players);
  if (withCoins.length === 1 && state.players.length > 1) {
    return { kind: "WINNER", winner: withCoins[0] };
  }
  if (withCoins.length === 0) return { kind: "NO_WINNER" };
  return null;
}

/**
 * Runs the game-over check after a coin change and applies the forced phase.
 * @returns true when the game ended and the current transition must stop.
 */
export function handleGameOver(state: GameState, events: GameEvent[]): boolean {
  const verdict = checkGameOver(state);
  if (!verdict) return false;

  if (verdict.kind === "WINNER") {
    events.push({ type: "GAME_ENDED", winnerId: verdict.winner.id, finalCoins: verdict.winner.coins });
    state.phase = { type: "REWARDS_DISTRIBUTION" };
  } else {
    events.push({ type: "GAME_ENDED", winnerId: null, finalCoins: 0 });
    state.phase = { type: "GAME_OVER" };
  }
  return true;
}

/** Richest player, first in registration order on ties. */
export function richestPlayer(players: Player[]): Player | null {
  let best: Player | null = null;
  for (const player of players) {
    if (!best || player.coins > best.coins) best = player;
  }
  return best;
}
