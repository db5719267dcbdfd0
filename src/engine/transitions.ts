import type {
  ActionType,
  GameAction,
  GameEvent,
  GameOptions,
  GameState,
  Identity,
  MinigameId,
  MinigameResult,
  MinigameSetup,
  PhaseName,
  TransitionResult
} from "./types";
import { GameRuleError } from "./types";
import { createDice, roll, shuffleInPlace } from "./dice";
import {
  activePlayers,
  betEntries,
  cloneGame,
  elapsedSince,
  getMinigameSetup,
  getPlayer,
  hasBet,
  isRegistered,
  recordBet,
  sameSetup,
  updatePlayerCoins
} from "./utils";
import { handleGameOver, richestPlayer } from "./win";

/** Partial overrides to tweak defaults when creating a game. */
export interface GameOptionsOverrides {
  maxPlayers?: number;
  rounds?: number;
  maxDeposit?: number;
  missedBetPenalty?: number;
  durations?: Partial<GameOptions["durations"]>;
}

export const DEFAULT_GAME_OPTIONS: GameOptions = {
  maxPlayers: 20,
  rounds: 10,
  maxDeposit: 10_000_000,
  missedBetPenalty: 10,
  wheelOutcomes: 5,
  durations: {
    registration: 55_000,
    betting: 30_000,
    backendStall: 2 * 60 * 1000,
    abandonedGame: 10 * 60 * 1000
  }
};

/** Merges supplied overrides with the default options. */
export function mergeOptions(overrides?: GameOptionsOverrides): GameOptions {
  const durations = { ...DEFAULT_GAME_OPTIONS.durations, ...overrides?.durations };
  return { ...DEFAULT_GAME_OPTIONS, ...overrides, durations };
}

/** Dice range used by the wheel; `roll % wheelOutcomes` is uniform over it. */
const DICE_MIN = 1;
const DICE_MAX = 10;

/**
 * Creates the state a backend deploys: no players, waiting in GAME_OVER for INITIALIZE.
 */
export function createGame(backendIdentity: Identity, laneId: string, overrides?: GameOptionsOverrides): GameState {
  return {
    players: [],
    minigames: [],
    dice: createDice(DICE_MIN, DICE_MAX, 0),
    phase: { type: "GAME_OVER" },
    roundStartedAt: 0,
    round: 0,
    bets: [],
    allOrNothing: false,
    options: mergeOptions(overrides),
    backendIdentity,
    lastInteractionTime: 0,
    laneId
  };
}

/** Clears everything game-specific, keeping options, backend identity, lane and last interaction. */
function resetGame(game: GameState, minigames: MinigameId[], randomSeed: number): void {
  game.players = [];
  game.minigames = minigames;
  game.dice = createDice(DICE_MIN, DICE_MAX, randomSeed);
  game.phase = { type: "GAME_OVER" };
  game.roundStartedAt = 0;
  game.round = 0;
  game.bets = [];
  game.allOrNothing = false;
}

/**
 * Phases in which each action is accepted. END_GAME is accepted from any phase and
 * carries its own guard; every pair missing from this table is rejected.
 */
export const TRANSITION_TABLE: Record<Exclude<ActionType, "END_GAME">, readonly PhaseName[]> = {
  INITIALIZE: ["GAME_OVER"],
  REGISTER_PLAYER: ["REGISTRATION"],
  START_GAME: ["REGISTRATION"],
  PLACE_BET: ["BETTING"],
  SPIN_WHEEL: ["BETTING", "WHEEL_SPIN"],
  START_MINIGAME: ["START_MINIGAME", "FINAL_MINIGAME"],
  END_MINIGAME: ["IN_MINIGAME"],
  DISTRIBUTE_REWARDS: ["REWARDS_DISTRIBUTION"]
};

/**
 * Ensures the (phase, action) pair is listed in the transition table.
 * Throws a GameRuleError if the guard fails.
 */
export function ensureTransition(game: GameState, action: GameAction): void {
  if (action.type === "END_GAME") return;
  if (!TRANSITION_TABLE[action.type].includes(game.phase.type)) {
    throw new GameRuleError("PHASE_MISMATCH", `Invalid action ${action.type} for phase ${game.phase.type}`);
  }
}

/** Steps into the next round's betting window. */
function advanceRound(game: GameState, now: number): void {
  game.round += 1;
  game.bets = [];
  game.roundStartedAt = now;
  game.phase = { type: "BETTING" };
}

function offerFinalMinigame(game: GameState, events: GameEvent[]): void {
  const finalMinigame = game.minigames[0];
  if (finalMinigame === undefined) {
    throw new GameRuleError("INVARIANT", "No final minigame available");
  }
  events.push({ type: "MINIGAME_READY", minigame: finalMinigame });
  game.phase = { type: "FINAL_MINIGAME", minigame: finalMinigame };
}

function isLastRound(game: GameState): boolean {
  return game.round >= game.options.rounds - 1;
}

/**
 * Force-ends the game. Allowed once it is already over, for the backend after a short stall,
 * and for anyone after a long one. Minigames and seed survive the reset.
 */
export function endGame(game: GameState, caller: Identity, now: number, events: GameEvent[]): void {
  const idle = elapsedSince(game.lastInteractionTime, now);
  const isEnded = game.phase.type === "GAME_OVER";
  const isBackend = game.backendIdentity === caller;
  const backendTimedOut = idle > game.options.durations.backendStall;
  const gameTimedOut = idle > game.options.durations.abandonedGame;

  if (!isEnded && !(isBackend && backendTimedOut) && !gameTimedOut) {
    throw new GameRuleError("UNAUTHORIZED", "Only the backend can end the game");
  }
  events.push({ type: "GAME_ENDED", winnerId: null, finalCoins: 0 });
  resetGame(game, [...game.minigames], game.dice.seed);
}

/** Starts a new game on a finished table and opens registration. */
export function initialize(
  game: GameState,
  minigames: MinigameId[],
  randomSeed: number,
  now: number,
  events: GameEvent[]
): void {
  if (minigames.length === 0) {
    throw new GameRuleError("OUT_OF_RANGE", "Minigames cannot be empty");
  }
  resetGame(game, [...minigames], randomSeed);
  game.roundStartedAt = now;
  game.phase = { type: "REGISTRATION" };
  events.push({ type: "GAME_INITIALIZED", randomSeed });
}

/** Seats the caller with an initial deposit. */
export function registerPlayer(
  game: GameState,
  caller: Identity,
  name: string,
  deposit: number,
  events: GameEvent[]
): void {
  if (game.players.length >= game.options.maxPlayers) {
    throw new GameRuleError("CAPACITY", "Game is full");
  }
  if (isRegistered(game, caller)) {
    throw new GameRuleError("DUPLICATE", `Player with identity ${caller} already exists`);
  }
  if (game.players.some(p => p.name === name)) {
    throw new GameRuleError("DUPLICATE", `Player with name ${name} already exists`);
  }
  if (!Number.isSafeInteger(deposit) || deposit <= 0) {
    throw new GameRuleError("OUT_OF_RANGE", "Deposit must be greater than zero");
  }
  if (deposit > game.options.maxDeposit) {
    throw new GameRuleError("OUT_OF_RANGE", "Deposit exceeds maximum allowed amount");
  }

  game.players.push({ id: caller, name, position: 0, coins: deposit, usedTokens: [] });
  events.push({ type: "PLAYER_REGISTERED", playerId: caller, name });
}

/** Closes registration once the table is full or the registration window has elapsed. */
export function startGame(game: GameState, now: number, events: GameEvent[]): void {
  const isFull = game.players.length === game.options.maxPlayers;
  const registrationOver = elapsedSince(game.roundStartedAt, now) >= game.options.durations.registration;
  if (!isFull && !registrationOver) {
    throw new GameRuleError("TIMING", "Game is not full and registration period is not over");
  }
  game.phase = { type: "BETTING" };
  game.roundStartedAt = now;
  game.round = 0;
  events.push({ type: "GAME_STARTED", playerCount: game.players.length });
}

/**
 * Records the caller's wager. Once every player with coins has bet the game moves on by itself:
 * to the wheel, or to the final minigame on the last round.
 */
export function placeBet(game: GameState, caller: Identity, amount: number, now: number, events: GameEvent[]): void {
  if (elapsedSince(game.roundStartedAt, now) > game.options.durations.betting) {
    throw new GameRuleError("TIMING", "Betting time is over");
  }
  if (hasBet(game, caller)) {
    throw new GameRuleError("DUPLICATE", "Player has already placed a bet");
  }
  const player = getPlayer(game.players, caller);
  if (!player) {
    throw new GameRuleError("UNAUTHORIZED", `Player ${caller} not found`);
  }
  if (player.coins === 0) {
    throw new GameRuleError("UNAUTHORIZED", `Player ${caller} is out of the game (no coins)`);
  }
  if (!Number.isSafeInteger(amount) || amount < 0) {
    throw new GameRuleError("OUT_OF_RANGE", "Bet must be a non-negative whole number");
  }
  if (game.allOrNothing) {
    if (amount !== player.coins) {
      throw new GameRuleError("OUT_OF_RANGE", "All or nothing round: you must bet all your coins");
    }
  } else if (amount > player.coins) {
    throw new GameRuleError("OUT_OF_RANGE", `Player ${caller} does not have enough coins`);
  }

  recordBet(game, caller, amount);
  events.push({ type: "BET_PLACED", playerId: caller, amount });

  if (game.bets.length === activePlayers(game.players).length) {
    if (isLastRound(game)) {
      offerFinalMinigame(game, events);
    } else {
      game.phase = { type: "WHEEL_SPIN" };
    }
  }
}

/** Zeroes or fines every player with coins who let the betting window close without wagering. */
function penalizeMissingBets(game: GameState, events: GameEvent[]): void {
  const wipeOut = game.round === 0 || game.allOrNothing;
  game.players.forEach((player, index) => {
    if (player.coins <= 0 || hasBet(game, player.id)) return;
    const delta = wipeOut ? -player.coins : -game.options.missedBetPenalty;
    updatePlayerCoins(game, index, delta, events);
  });
}

/** Outcome 1: every pending bet is taken from its bettor and paid to a shuffled active player. */
function redistributeBets(game: GameState, events: GameEvent[]): void {
  const entries = betEntries(game);
  game.bets = [];
  const recipients: number[] = [];
  game.players.forEach((player, index) => {
    if (player.coins > 0) recipients.push(index);
  });
  if (recipients.length === 0) {
    throw new GameRuleError("INVARIANT", "No players left to receive bets");
  }
  shuffleInPlace(game.dice, recipients);

  entries.forEach(({ playerId: bettor, amount }, i) => {
    const bettorIndex = game.players.findIndex(p => p.id === bettor);
    if (bettorIndex < 0) {
      throw new GameRuleError("INVARIANT", "Bettor not found");
    }
    updatePlayerCoins(game, bettorIndex, -amount, events);
    updatePlayerCoins(game, recipients[i % recipients.length], amount, events);
  });
}

/**
 * Spins the wheel. From BETTING the window must have closed, and missing bets are punished first.
 * The outcome is never drawn when the punishment already ended the game.
 */
export function spinWheel(game: GameState, now: number, events: GameEvent[]): void {
  const fromBetting = game.phase.type === "BETTING";
  if (fromBetting) {
    if (elapsedSince(game.roundStartedAt, now) < game.options.durations.betting) {
      throw new GameRuleError("TIMING", "Not enough time has passed");
    }
    penalizeMissingBets(game, events);
  }
  game.allOrNothing = false;

  if (handleGameOver(game, events)) return;

  if (fromBetting && isLastRound(game)) {
    offerFinalMinigame(game, events);
    return;
  }

  const outcome = roll(game.dice) % game.options.wheelOutcomes;
  events.push({ type: "WHEEL_SPUN", round: game.round, outcome });

  switch (outcome) {
    case 0:
      advanceRound(game, now);
      break;
    case 1:
      redistributeBets(game, events);
      advanceRound(game, now);
      break;
    case 2:
      game.allOrNothing = true;
      events.push({ type: "ALL_OR_NOTHING_ACTIVATED" });
      advanceRound(game, now);
      break;
    default: {
      const minigame = game.minigames[0];
      if (minigame === undefined) {
        throw new GameRuleError("INVARIANT", "No minigame available");
      }
      events.push({ type: "MINIGAME_READY", minigame });
      game.phase = { type: "START_MINIGAME", minigame };
    }
  }
}

/** Hands the bettor manifest over to the minigame; it must match what the ledger says exactly. */
export function startMinigame(
  game: GameState,
  minigame: MinigameId,
  players: MinigameSetup,
  events: GameEvent[]
): void {
  if (game.phase.type !== "START_MINIGAME" && game.phase.type !== "FINAL_MINIGAME") {
    throw new GameRuleError("PHASE_MISMATCH", `Invalid action START_MINIGAME for phase ${game.phase.type}`);
  }
  if (game.phase.minigame !== minigame) {
    throw new GameRuleError("INCONSISTENT", "Minigame mismatch");
  }
  if (!sameSetup(getMinigameSetup(game), players)) {
    throw new GameRuleError("INCONSISTENT", "Minigame players mismatch");
  }
  events.push({ type: "MINIGAME_STARTED", minigame });
  game.phase = { type: "IN_MINIGAME", minigame };
}

/**
 * Applies a minigame verdict, then ends the game on the last round or opens the next one.
 */
export function endMinigame(game: GameState, result: MinigameResult, now: number, events: GameEvent[]): void {
  for (const playerResult of result.playerResults) {
    const index = game.players.findIndex(p => p.id === playerResult.playerId);
    if (index < 0) {
      throw new GameRuleError("INCONSISTENT", "Player not found for minigame result");
    }
    if (playerResult.coinsDelta !== 0) {
      updatePlayerCoins(game, index, playerResult.coinsDelta, events);
    }
  }

  if (handleGameOver(game, events)) return;

  events.push({ type: "MINIGAME_ENDED", result });

  if (isLastRound(game)) {
    const winner = richestPlayer(game.players);
    if (!winner) {
      throw new GameRuleError("INVARIANT", "No players found");
    }
    events.push({ type: "GAME_ENDED", winnerId: winner.id, finalCoins: winner.coins });
    game.phase = { type: "REWARDS_DISTRIBUTION" };
  } else {
    advanceRound(game, now);
  }
}

/** Settlement is validated by the caller; the engine only closes the game. */
export function distributeRewards(game: GameState): void {
  game.phase = { type: "GAME_OVER" };
}

function applyAction(game: GameState, caller: Identity, action: GameAction, now: number, events: GameEvent[]): void {
  ensureTransition(game, action);
  switch (action.type) {
    case "END_GAME":
      return endGame(game, caller, now, events);
    case "INITIALIZE":
      return initialize(game, action.minigames, action.randomSeed, now, events);
    case "REGISTER_PLAYER":
      return registerPlayer(game, caller, action.name, action.deposit, events);
    case "START_GAME":
      return startGame(game, now, events);
    case "PLACE_BET":
      return placeBet(game, caller, action.amount, now, events);
    case "SPIN_WHEEL":
      return spinWheel(game, now, events);
    case "START_MINIGAME":
      return startMinigame(game, action.minigame, action.players, events);
    case "END_MINIGAME":
      return endMinigame(game, action.result, now, events);
    case "DISTRIBUTE_REWARDS":
      return distributeRewards(game);
    default: {
      const exhaustive: never = action;
      throw new GameRuleError("PHASE_MISMATCH", `Unknown action ${JSON.stringify(exhaustive)}`);
    }
  }
}

/**
 * Single entry point of the state machine.
 * Works on a copy: on success returns the next state and the ordered events,
 * on rejection throws a GameRuleError and `game` is left exactly as it was.
 */
export function processAction(
  game: GameState,
  caller: Identity,
  token: string,
  action: GameAction,
  timestamp: number
): TransitionResult {
  const callerPlayer = getPlayer(game.players, caller);
  if (callerPlayer?.usedTokens.includes(token)) {
    throw new GameRuleError("DUPLICATE", `Action token ${token} was already used`);
  }

  const next = cloneGame(game);
  const events: GameEvent[] = [];
  applyAction(next, caller, action, timestamp, events);

  getPlayer(next.players, caller)?.usedTokens.push(token);
  next.lastInteractionTime = timestamp;
  return { state: next, events };
}
