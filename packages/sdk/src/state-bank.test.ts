/**
 * Unit tests for the state bank layout
 */

import { describe, it, expect } from "vitest";
import { generateSlots, slotAddresses, slotCount, slotEnergy } from "./state-bank.js";
import { InvalidConfigurationError } from "./errors.js";

describe("slotCount", () => {
  it("should sum squares up to the level", () => {
    expect(slotCount(1)).toBe(1);
    expect(slotCount(2)).toBe(5);
    expect(slotCount(3)).toBe(14);
    expect(slotCount(15)).toBe(1240);
  });

  it("should reject non-positive and fractional levels", () => {
    expect(() => slotCount(0)).toThrow(InvalidConfigurationError);
    expect(() => slotCount(-3)).toThrow(InvalidConfigurationError);
    expect(() => slotCount(1.5)).toThrow(InvalidConfigurationError);
  });

  it("should cap the level at 50", () => {
    expect(slotCount(50)).toBe(42925);
    expect(() => slotCount(51)).toThrow("Invalid configuration for level: must be at most 50, got 51");
  });
});

describe("slotAddresses", () => {
  it("should enumerate n, then l, then m", () => {
    expect([...slotAddresses(2)]).toEqual([
      { n: 1, l: 0, m: 0 },
      { n: 2, l: 0, m: 0 },
      { n: 2, l: 1, m: -1 },
      { n: 2, l: 1, m: 0 },
      { n: 2, l: 1, m: 1 },
    ]);
  });
});

describe("generateSlots", () => {
  it("should create one empty slot per address", () => {
    const slots = generateSlots(15);
    expect(slots).toHaveLength(1240);
    expect(slots.every((slot) => !slot.occupied && slot.phase === 0)).toBe(true);
  });

  it("should give every slot in a shell the same energy", () => {
    const slots = generateSlots(3);
    const shellTwo = slots.filter((slot) => slot.n === 2);
    expect(shellTwo).toHaveLength(4);
    for (const slot of shellTwo) {
      expect(slot.energy).toBeCloseTo(-3.4);
    }
    expect(slotEnergy(1)).toBe(-13.6);
  });

  it("should throw for level 0", () => {
    expect(() => generateSlots(0)).toThrow(/level/);
  });
});
