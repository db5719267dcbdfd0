import { z } from "zod";
import type { Bet, GameErrorCode, GameEvent, GameState, MinigameId, MinigameSetup, Phase } from "../engine/types";
import { GameActionSchema } from "../engine/codec";
import { betEntries, getMinigameSetup } from "../engine/utils";

/**
 * One action as delivered by the ordering layer, together with the state it applies to.
 * `state` is the encoded blob produced by encodeState.
 */
export const ExecuteInputSchema = z.object({
  state: z.string(),
  caller: z.string(),
  token: z.string(),
  action: GameActionSchema,
  timestamp: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER)
});

export type ExecuteInput = z.infer<typeof ExecuteInputSchema>;

/** Rule violations, plus input that failed validation and unexpected host failures. */
export type ExecuteErrorCode = GameErrorCode | "BAD_INPUT" | "SERVER_ERROR";

/**
 * What the execute boundary commits. On failure `state` is the input state, untouched.
 */
export type ExecuteOutput =
  | { ok: true; state: string; events: GameEvent[] }
  | { ok: false; state: string; error: { code: ExecuteErrorCode; message: string } };

/** Public info about a player; replay tokens stay private. */
export interface PublicPlayerView {
  id: string;
  name: string;
  position: number;
  coins: number;
}

/**
 * Snapshot for listeners such as a frontend or indexer.
 * The dice state is left out: with it anyone could predict the next spins.
 */
export interface GameView {
  laneId: string;
  phase: Phase;
  round: number;
  rounds: number;
  roundStartedAt: number;
  allOrNothing: boolean;
  minigames: MinigameId[];
  players: PublicPlayerView[];
  bets: Bet[];
  minigameSetup: MinigameSetup;
}

/** Builds the redacted view of a game. */
export function buildGameView(game: GameState): GameView {
  return {
    laneId: game.laneId,
    phase: { ...game.phase },
    round: game.round,
    rounds: game.options.rounds,
    roundStartedAt: game.roundStartedAt,
    allOrNothing: game.allOrNothing,
    minigames: [...game.minigames],
    players: game.players.map(p => ({ id: p.id, name: p.name, position: p.position, coins: p.coins })),
    bets: betEntries(game).map(bet => ({ ...bet })),
    minigameSetup: getMinigameSetup(game)
  };
}
