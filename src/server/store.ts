import type { GameAction, GameEvent, GameState, TransitionResult } from "../engine/types";
import { GameRuleError } from "../engine/types";
import { processAction } from "../engine/transitions";
import type { GameView } from "../shared/messages";
import { buildGameView } from "../shared/messages";

/** One ordered, timestamped action as the ledger hands it over. */
export interface ActionEnvelope {
  caller: string;
  token: string;
  action: GameAction;
  timestamp: number;
}

/** Observer for accepted actions, e.g. an indexer. Runs after the new state is stored and sees only the public view. */
export type EventListener = (laneId: string, events: GameEvent[], view: GameView) => void;

/**
 * In-memory registry of game instances keyed by lane id.
 * It is the single writer per game: actions are applied one at a time, in the order given.
 */
export class GameStore {
  private games = new Map<string, GameState>();
  private busy = new Set<string>();
  private listeners: EventListener[] = [];

  /** Inserts a brand new game, throwing if the lane is already taken. */
  create(game: GameState): GameState {
    if (this.games.has(game.laneId)) {
      throw new Error(`Game ${game.laneId} already exists`);
    }
    this.games.set(game.laneId, game);
    console.log(`Game created on lane ${game.laneId}`);
    return game;
  }

  /** Fetches a game by lane or undefined when missing. */
  get(laneId: string): GameState | undefined {
    return this.games.get(laneId);
  }

  /**
   * Runs one action through the engine, stores the result and notifies listeners.
   * Rejected actions leave the stored state as it was and rethrow the GameRuleError.
   * The game stays locked until every listener has run, so a listener cannot dispatch into it.
   */
  dispatch(laneId: string, envelope: ActionEnvelope): TransitionResult {
    const current = this.games.get(laneId);
    if (!current) {
      throw new Error(`Game ${laneId} not found`);
    }
    if (this.busy.has(laneId)) {
      throw new Error(`Game ${laneId} is already processing an action`);
    }
    this.busy.add(laneId);
    try {
      const result = this.apply(laneId, current, envelope);
      this.games.set(laneId, result.state);
      this.notify(laneId, result);
      return result;
    } finally {
      this.busy.delete(laneId);
    }
  }

  private apply(laneId: string, current: GameState, envelope: ActionEnvelope): TransitionResult {
    try {
      return processAction(current, envelope.caller, envelope.token, envelope.action, envelope.timestamp);
    } catch (err) {
      if (err instanceof GameRuleError) {
        console.warn(`Rejected ${envelope.action.type} on lane ${laneId} [${err.code}]: ${err.message}`);
      }
      throw err;
    }
  }

  /** Registers a listener; returns the function that removes it. */
  subscribe(listener: EventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  private notify(laneId: string, result: TransitionResult): void {
    if (result.events.some(event => event.type === "GAME_ENDED")) {
      console.log(`Game on lane ${laneId} ended in phase ${result.state.phase.type}`);
    }
    const view = buildGameView(result.state);
    for (const listener of this.listeners) {
      try {
        listener(laneId, result.events, view);
      } catch (err) {
        console.error("Event listener failed", err);
      }
    }
  }
}
