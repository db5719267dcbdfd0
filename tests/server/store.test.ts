import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { GameStore } from "../../src/server/store";
import { createGame } from "../../src/engine/transitions";
import { GameRuleError } from "../../src/engine/types";
import type { GameAction, GameEvent } from "../../src/engine/types";
import type { GameView } from "../../src/shared/messages";

const initialize: GameAction = { type: "INITIALIZE", minigames: ["coin-flip"], randomSeed: 5 };

describe("GameStore", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("refuses two games on one lane", () => {
    const store = new GameStore();
    store.create(createGame("backend", "lane-1"));
    expect(() => store.create(createGame("backend", "lane-1"))).toThrowError(/already exists/);
  });

  it("stores the state produced by an accepted action", () => {
    const store = new GameStore();
    store.create(createGame("backend", "lane-1"));
    const result = store.dispatch("lane-1", { caller: "backend", token: "t1", action: initialize, timestamp: 100 });
    expect(result.events).toEqual([{ type: "GAME_INITIALIZED", randomSeed: 5 }]);
    expect(store.get("lane-1")?.phase).toEqual({ type: "REGISTRATION" });
  });

  it("keeps the stored state and logs when an action is rejected", () => {
    const store = new GameStore();
    const game = store.create(createGame("backend", "lane-1"));
    expect(() =>
      store.dispatch("lane-1", { caller: "backend", token: "t1", action: { type: "START_GAME" }, timestamp: 100 })
    ).toThrowError(GameRuleError);
    expect(store.get("lane-1")).toBe(game);
    expect(console.warn).toHaveBeenCalledWith(
      "Rejected START_GAME on lane lane-1 [PHASE_MISMATCH]: Invalid action START_GAME for phase GAME_OVER"
    );
  });

  it("fails for unknown lanes", () => {
    const store = new GameStore();
    expect(() =>
      store.dispatch("nowhere", { caller: "backend", token: "t1", action: initialize, timestamp: 100 })
    ).toThrowError("Game nowhere not found");
  });

  it("never runs two actions on the same game at once", () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const store = new GameStore();
    store.create(createGame("backend", "lane-1"));
    store.subscribe(() => {
      store.dispatch("lane-1", { caller: "backend", token: "t2", action: { type: "END_GAME" }, timestamp: 200 });
    });

    store.dispatch("lane-1", { caller: "backend", token: "t1", action: initialize, timestamp: 100 });

    expect(errors).toHaveBeenCalledWith("Event listener failed", new Error("Game lane-1 is already processing an action"));
    expect(store.get("lane-1")?.phase).toEqual({ type: "REGISTRATION" });
  });

  it("lets different games progress independently", () => {
    const store = new GameStore();
    store.create(createGame("backend", "lane-1"));
    store.create(createGame("backend", "lane-2"));
    const unsubscribe = store.subscribe(laneId => {
      if (laneId === "lane-1") {
        store.dispatch("lane-2", { caller: "backend", token: "t2", action: initialize, timestamp: 100 });
      }
    });
    store.dispatch("lane-1", { caller: "backend", token: "t1", action: initialize, timestamp: 100 });
    unsubscribe();
    expect(store.get("lane-1")?.phase).toEqual({ type: "REGISTRATION" });
    expect(store.get("lane-2")?.phase).toEqual({ type: "REGISTRATION" });
  });

  it("notifies listeners with the public view until they unsubscribe", () => {
    const store = new GameStore();
    store.create(createGame("backend", "lane-1"));
    const seen: [string, GameEvent[], GameView][] = [];
    const unsubscribe = store.subscribe((laneId, events, view) => seen.push([laneId, events, view]));

    store.dispatch("lane-1", { caller: "backend", token: "t1", action: initialize, timestamp: 100 });
    unsubscribe();
    store.dispatch("lane-1", {
      caller: "alice",
      token: "t2",
      action: { type: "REGISTER_PLAYER", name: "Alice", deposit: 10 },
      timestamp: 200
    });

    expect(seen).toHaveLength(1);
    const [laneId, events, view] = seen[0];
    expect(laneId).toBe("lane-1");
    expect(events).toEqual([{ type: "GAME_INITIALIZED", randomSeed: 5 }]);
    expect(view.phase).toEqual({ type: "REGISTRATION" });
    expect(view.minigames).toEqual(["coin-flip"]);
    expect(view).not.toHaveProperty("dice");
  });

  it("keeps going when a listener throws", () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const store = new GameStore();
    store.create(createGame("backend", "lane-1"));
    store.subscribe(() => {
      throw new Error("indexer down");
    });
    const result = store.dispatch("lane-1", { caller: "backend", token: "t1", action: initialize, timestamp: 100 });
    expect(result.state.phase).toEqual({ type: "REGISTRATION" });
    expect(errors).toHaveBeenCalledTimes(1);
  });
});
