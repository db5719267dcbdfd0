import { describe, it, expect } from "vitest";
import { createDice, nextUint32, roll, shuffleInPlace } from "../../src/engine/dice";

describe("dice", () => {
  it("replays the same sequence from the same seed", () => {
    const a = createDice(1, 10, 1234);
    const b = createDice(1, 10, 1234);
    const first = Array.from({ length: 20 }, () => roll(a));
    const second = Array.from({ length: 20 }, () => roll(b));
    expect(first).toEqual(second);
    expect(a.state).toBe(b.state);
  });

  it("diverges for different seeds", () => {
    const a = createDice(1, 10, 1);
    const b = createDice(1, 10, 2);
    const first = Array.from({ length: 20 }, () => roll(a));
    const second = Array.from({ length: 20 }, () => roll(b));
    expect(first).not.toEqual(second);
  });

  it("keeps rolls inside [min, max]", () => {
    const dice = createDice(1, 10, 99);
    for (let i = 0; i < 500; i++) {
      const value = roll(dice);
      expect(value).toBeGreaterThanOrEqual(1);
      expect(value).toBeLessThanOrEqual(10);
    }
  });

  it("keeps the stored state a 32-bit unsigned integer, even for wide seeds", () => {
    const dice = createDice(1, 10, 2 ** 40 + 17);
    for (let i = 0; i < 50; i++) {
      const raw = nextUint32(dice);
      expect(Number.isInteger(raw)).toBe(true);
      expect(raw).toBeGreaterThanOrEqual(0);
      expect(raw).toBeLessThan(2 ** 32);
      expect(dice.state).toBeGreaterThanOrEqual(0);
      expect(dice.state).toBeLessThan(2 ** 32);
    }
  });

  it("keeps the seed so the stream can be restarted", () => {
    const dice = createDice(1, 10, 77);
    const firstRun = [roll(dice), roll(dice), roll(dice)];
    const restarted = createDice(dice.min, dice.max, dice.seed);
    expect([roll(restarted), roll(restarted), roll(restarted)]).toEqual(firstRun);
  });

  it("shuffles in place into a permutation", () => {
    const dice = createDice(1, 10, 5);
    const items = [0, 1, 2, 3, 4, 5, 6, 7];
    shuffleInPlace(dice, items);
    expect([...items].sort((x, y) => x - y)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
  });

  it("shuffles identically from the same seed", () => {
    const left = [1, 2, 3, 4, 5, 6];
    const right = [1, 2, 3, 4, 5, 6];
    shuffleInPlace(createDice(1, 10, 42), left);
    shuffleInPlace(createDice(1, 10, 42), right);
    expect(left).toEqual(right);
  });

  it("leaves empty and single-item lists alone without consuming the stream", () => {
    const dice = createDice(1, 10, 3);
    const before = dice.state;
    const empty: number[] = [];
    const single = ["only"];
    shuffleInPlace(dice, empty);
    shuffleInPlace(dice, single);
    expect(empty).toEqual([]);
    expect(single).toEqual(["only"]);
    expect(dice.state).toBe(before);
  });
});
