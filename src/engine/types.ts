/**
 * Core domain types for the coin wheel game engine.
 * Keep this file dependency-free so it can be shared across layers.
 */

/** Opaque caller identity as delivered by the ledger. */
export type Identity = string;

/** Name of an external minigame contract. */
export type MinigameId = string;

/** Lifecycle phases the deterministic state machine can be in. */
export type Phase =
  | { type: "REGISTRATION" }
  | { type: "BETTING" }
  | { type: "WHEEL_SPIN" }
  | { type: "START_MINIGAME"; minigame: MinigameId }
  | { type: "IN_MINIGAME"; minigame: MinigameId }
  | { type: "FINAL_MINIGAME"; minigame: MinigameId }
  | { type: "REWARDS_DISTRIBUTION" }
  | { type: "GAME_OVER" };

export type PhaseName = Phase["type"];

/**
 * Seeded generator state. Plain data so it serializes with the rest of the game.
 * `state` is the 32-bit internal counter; `seed` is kept so a reset can replay the stream.
 */
export interface Dice {
  min: number;
  max: number;
  seed: number;
  state: number;
}

/**
 * A registered player.
 * Players are never removed; a player with zero coins is out of play but stays listed.
 */
export interface Player {
  id: Identity;
  name: string;
  position: number;
  coins: number;
  usedTokens: string[];
}

/** Tunable rules. Stored inside the state so replays use the same numbers. */
export interface GameOptions {
  maxPlayers: number;
  rounds: number;
  maxDeposit: number;
  missedBetPenalty: number;
  wheelOutcomes: number;
  durations: {
    registration: number;
    betting: number;
    backendStall: number;
    abandonedGame: number;
  };
}

/** One wager in the round's ledger. */
export interface Bet {
  playerId: Identity;
  amount: number;
}

/**
 * The entire authoritative game.
 * Key invariants:
 * - `players.length <= options.maxPlayers` and player ids are unique.
 * - Coin balances never go below zero.
 * - `bets` holds at most one entry per player, ordered by identity, and only for players with a positive balance.
 * - `round < options.rounds`.
 */
export interface GameState {
  players: Player[];
  minigames: MinigameId[];
  dice: Dice;
  phase: Phase;
  roundStartedAt: number;
  round: number;
  bets: Bet[];
  allOrNothing: boolean;
  options: GameOptions;
  backendIdentity: Identity;
  lastInteractionTime: number;
  laneId: string;
}

export interface PlayerMinigameResult {
  playerId: Identity;
  coinsDelta: number;
}

/** Verdict returned by an external minigame contract. */
export interface MinigameResult {
  contractName: MinigameId;
  playerResults: PlayerMinigameResult[];
}

/** One bettor as handed to a minigame contract. */
export interface MinigameSetupEntry {
  playerId: Identity;
  name: string;
  amount: number;
}

export type MinigameSetup = MinigameSetupEntry[];

/** Everything a caller can ask the state machine to do. */
export type GameAction =
  | { type: "END_GAME" }
  | { type: "INITIALIZE"; minigames: MinigameId[]; randomSeed: number }
  | { type: "REGISTER_PLAYER"; name: string; deposit: number }
  | { type: "START_GAME" }
  | { type: "PLACE_BET"; amount: number }
  | { type: "SPIN_WHEEL" }
  | { type: "START_MINIGAME"; minigame: MinigameId; players: MinigameSetup }
  | { type: "END_MINIGAME"; result: MinigameResult }
  | { type: "DISTRIBUTE_REWARDS" };

export type ActionType = GameAction["type"];

/** Observational log entries emitted while processing one action. */
export type GameEvent =
  | { type: "GAME_INITIALIZED"; randomSeed: number }
  | { type: "PLAYER_REGISTERED"; playerId: Identity; name: string }
  | { type: "GAME_STARTED"; playerCount: number }
  | { type: "BET_PLACED"; playerId: Identity; amount: number }
  | { type: "WHEEL_SPUN"; round: number; outcome: number }
  | { type: "COINS_CHANGED"; playerId: Identity; amount: number }
  | { type: "ALL_OR_NOTHING_ACTIVATED" }
  | { type: "MINIGAME_READY"; minigame: MinigameId }
  | { type: "MINIGAME_STARTED"; minigame: MinigameId }
  | { type: "MINIGAME_ENDED"; result: MinigameResult }
  | { type: "GAME_ENDED"; winnerId: Identity | null; finalCoins: number };

/** Result of an accepted action. */
export interface TransitionResult {
  state: GameState;
  events: GameEvent[];
}

export type GameErrorCode =
  | "PHASE_MISMATCH"
  | "UNAUTHORIZED"
  | "CAPACITY"
  | "DUPLICATE"
  | "OUT_OF_RANGE"
  | "TIMING"
  | "INCONSISTENT"
  | "INVARIANT";

/** Application-level error for rejected actions. Surfaces to callers as structured error codes. */
export class GameRuleError extends Error {
  constructor(public code: GameErrorCode, message: string) {
    super(message);
    this.name = "GameRuleError";
  }
}
