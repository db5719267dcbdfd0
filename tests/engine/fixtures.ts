import { createDice, roll } from "../../src/engine/dice";
import { DEFAULT_GAME_OPTIONS, processAction } from "../../src/engine/transitions";
import type { Bet, GameAction, GameState, Player, TransitionResult } from "../../src/engine/types";

export const MINIGAME = "coin-flip";

export const makePlayer = (id: string, coins: number, name = id): Player => ({
  id,
  name,
  position: 0,
  coins,
  usedTokens: []
});

export function makeState(partial: Partial<GameState> = {}): GameState {
  return {
    players: [],
    minigames: [MINIGAME],
    dice: createDice(1, 10, 0),
    phase: { type: "BETTING" },
    roundStartedAt: 0,
    round: 0,
    bets: [],
    allOrNothing: false,
    options: DEFAULT_GAME_OPTIONS,
    backendIdentity: "backend",
    lastInteractionTime: 0,
    laneId: "lane-1",
    ...partial
  };
}

/** Bet ledger from `[playerId, amount]` pairs, in the order given. */
export const ledger = (...entries: [string, number][]): Bet[] =>
  entries.map(([playerId, amount]) => ({ playerId, amount }));

let tokenCounter = 0;

/** processAction with a fresh token for every call. */
export function act(game: GameState, caller: string, action: GameAction, timestamp: number): TransitionResult {
  tokenCounter += 1;
  return processAction(game, caller, `token-${tokenCounter}`, action, timestamp);
}

/** First seed whose consecutive wheel draws (no shuffles in between) give `outcomes`. */
export function seedForOutcomes(outcomes: number[], from = 0): number {
  for (let seed = from; seed < from + 100_000; seed++) {
    const dice = createDice(1, 10, seed);
    if (outcomes.every(outcome => roll(dice) % 5 === outcome)) return seed;
  }
  throw new Error(`No seed found for outcomes ${outcomes.join(",")}`);
}

export const totalCoins = (game: GameState): number => game.players.reduce((sum, p) => sum + p.coins, 0);
