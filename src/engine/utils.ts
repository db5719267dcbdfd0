/** Utility helpers shared across engine modules. */
import type { Bet, GameEvent, GameState, Identity, MinigameSetup, Player } from "./types";
import { GameRuleError } from "./types";

/** Deep clone of the whole state; transitions only ever touch the copy. */
export function cloneGame(game: GameState): GameState {
  return {
    ...game,
    players: game.players.map(player => ({ ...player, usedTokens: [...player.usedTokens] })),
    minigames: [...game.minigames],
    dice: { ...game.dice },
    phase: { ...game.phase },
    bets: game.bets.map(bet => ({ ...bet })),
    options: { ...game.options, durations: { ...game.options.durations } }
  };
}

/** Safe player lookup, null when missing. */
export function getPlayer(players: Player[], playerId: Identity): Player | null {
  return players.find(p => p.id === playerId) ?? null;
}

/** Players still in play (positive balance), in registration order. */
export function activePlayers(players: Player[]): Player[] {
  return players.filter(p => p.coins > 0);
}

/** True when the identity belongs to a player who still holds coins. */
export function isRegistered(game: GameState, caller: Identity): boolean {
  return game.players.some(p => p.id === caller && p.coins > 0);
}

/** Bet ledger entries ordered by identity, the iteration order every consumer relies on. */
export function betEntries(game: GameState): Bet[] {
  return [...game.bets].sort((a, b) => compareIdentity(a.playerId, b.playerId));
}

export function hasBet(game: GameState, playerId: Identity): boolean {
  return game.bets.some(bet => bet.playerId === playerId);
}

/** Adds a wager, keeping the ledger ordered by identity. */
export function recordBet(game: GameState, playerId: Identity, amount: number): void {
  const at = game.bets.findIndex(bet => compareIdentity(bet.playerId, playerId) > 0);
  game.bets.splice(at < 0 ? game.bets.length : at, 0, { playerId, amount });
}

export function compareIdentity(a: Identity, b: Identity): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Ordered bettor manifest handed to a minigame contract.
 * Bets whose owner has no coins left are skipped.
 */
export function getMinigameSetup(game: GameState): MinigameSetup {
  const setup: MinigameSetup = [];
  for (const { playerId, amount } of betEntries(game)) {
    const player = game.players.find(p => p.id === playerId && p.coins > 0);
    if (player) {
      setup.push({ playerId: player.id, name: player.name, amount });
    }
  }
  return setup;
}

/** Structural equality of two manifests, order included. */
export function sameSetup(a: MinigameSetup, b: MinigameSetup): boolean {
  if (a.length !== b.length) return false;
  return a.every(
    (entry, i) => entry.playerId === b[i].playerId && entry.name === b[i].name && entry.amount === b[i].amount
  );
}

/** Milliseconds between `since` and `now`, floored at zero. */
export function elapsedSince(since: number, now: number): number {
  return Math.max(0, now - since);
}

/**
 * Applies a signed delta to a player's balance, clamped at zero, and logs the change actually made.
 * Throws when the index does not point at a player or the balance would leave the safe integer range.
 */
export function updatePlayerCoins(game: GameState, index: number, delta: number, events: GameEvent[]): void {
  const player = game.players[index];
  if (!player) {
    throw new GameRuleError("INVARIANT", "Player not found");
  }
  const next = player.coins + delta;
  if (!Number.isSafeInteger(next)) {
    throw new GameRuleError("OUT_OF_RANGE", `Balance of player ${player.id} out of range`);
  }
  const coins = Math.max(0, next);
  const applied = coins - player.coins;
  player.coins = coins;
  events.push({ type: "COINS_CHANGED", playerId: player.id, amount: applied });
}
