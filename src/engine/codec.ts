import { z } from "zod";
import type { GameState } from "./types";
import { betEntries } from "./utils";

/**
 * Schemas for the persisted state blob and the action payload.
 * Key order in each `z.object` is the key order of the encoded output, so keep it stable.
 */

const count = z.number().int().nonnegative();
const safeCount = count.max(Number.MAX_SAFE_INTEGER);
/** Minigame contracts report deltas as 32-bit signed integers. */
const coinsDelta = z.number().int().min(-0x8000_0000).max(0x7fff_ffff);

export const PhaseSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("REGISTRATION") }),
  z.object({ type: z.literal("BETTING") }),
  z.object({ type: z.literal("WHEEL_SPIN") }),
  z.object({ type: z.literal("START_MINIGAME"), minigame: z.string() }),
  z.object({ type: z.literal("IN_MINIGAME"), minigame: z.string() }),
  z.object({ type: z.literal("FINAL_MINIGAME"), minigame: z.string() }),
  z.object({ type: z.literal("REWARDS_DISTRIBUTION") }),
  z.object({ type: z.literal("GAME_OVER") })
]);

export const DiceSchema = z.object({
  min: z.number().int(),
  max: z.number().int(),
  seed: safeCount,
  state: count.max(0xffff_ffff)
});

export const PlayerSchema = z.object({
  id: z.string(),
  name: z.string(),
  position: count,
  coins: safeCount,
  usedTokens: z.array(z.string())
});

export const GameOptionsSchema = z.object({
  maxPlayers: count,
  rounds: count.min(1),
  maxDeposit: safeCount,
  missedBetPenalty: count,
  wheelOutcomes: count.min(1),
  durations: z.object({
    registration: count,
    betting: count,
    backendStall: count,
    abandonedGame: count
  })
});

export const GameStateSchema = z.object({
  players: z.array(PlayerSchema),
  minigames: z.array(z.string()),
  dice: DiceSchema,
  phase: PhaseSchema,
  roundStartedAt: safeCount,
  round: count,
  bets: z
    .array(z.object({ playerId: z.string(), amount: safeCount }))
    .refine(bets => new Set(bets.map(bet => bet.playerId)).size === bets.length, "Duplicate bet in ledger"),
  allOrNothing: z.boolean(),
  options: GameOptionsSchema,
  backendIdentity: z.string(),
  lastInteractionTime: safeCount,
  laneId: z.string()
});

export const MinigameSetupSchema = z.array(
  z.object({ playerId: z.string(), name: z.string(), amount: safeCount })
);

export const MinigameResultSchema = z.object({
  contractName: z.string(),
  playerResults: z.array(z.object({ playerId: z.string(), coinsDelta }))
});

export const GameActionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("END_GAME") }),
  z.object({ type: z.literal("INITIALIZE"), minigames: z.array(z.string()), randomSeed: safeCount }),
  z.object({ type: z.literal("REGISTER_PLAYER"), name: z.string(), deposit: z.number().int() }),
  z.object({ type: z.literal("START_GAME") }),
  z.object({ type: z.literal("PLACE_BET"), amount: safeCount }),
  z.object({ type: z.literal("SPIN_WHEEL") }),
  z.object({ type: z.literal("START_MINIGAME"), minigame: z.string(), players: MinigameSetupSchema }),
  z.object({ type: z.literal("END_MINIGAME"), result: MinigameResultSchema }),
  z.object({ type: z.literal("DISTRIBUTE_REWARDS") })
]);

/** Canonical blob for a state. Throws a ZodError if the state breaks the schema. */
export function encodeState(state: GameState): string {
  const parsed = GameStateSchema.parse(state);
  return JSON.stringify({ ...parsed, bets: betEntries(parsed) });
}

/** Inverse of encodeState. Throws on malformed JSON or a schema violation. */
export function decodeState(blob: string): GameState {
  const parsed = GameStateSchema.parse(JSON.parse(blob));
  return { ...parsed, bets: betEntries(parsed) };
}
