/**
 * Encodable unit: an integer stored across the slots of one state bank
 *
 * Invariants:
 * - Slot i holds bit i of the encoded value, least-significant first
 * - propagate() only touches phase, so decode() is unchanged by it
 * - Every public operation bumps the operation counter
 */

import type { Slot, UnitOptions, RandomSource } from "./types.js";
import { generateSlots } from "./state-bank.js";
import { defaultRandom } from "./random.js";
import { toEncodableValue, validateTimeStep } from "./validation.js";
import { DEFAULT_FIELD_STRENGTH, DEFAULT_LEVEL, DEFAULT_TIME_STEP } from "./config.js";

const TWO_PI = 2 * Math.PI;

/**
 * Floored modulo; keeps phases in [0, 2π) when energy is negative
 */
function wrapPhase(phase: number): number {
  return ((phase % TWO_PI) + TWO_PI) % TWO_PI;
}

export class EncodableUnit {
  readonly level: number;
  readonly fieldStrength: number;
  #slots: Slot[];
  #random: RandomSource;
  #operations = 0;

  /**
   * @throws {InvalidConfigurationError} If the level is not a positive integer
   */
  constructor(options: UnitOptions = {}) {
    this.level = options.level ?? DEFAULT_LEVEL;
    this.fieldStrength = options.fieldStrength ?? DEFAULT_FIELD_STRENGTH;
    this.#random = options.random ?? defaultRandom;
    this.#slots = generateSlots(this.level);
  }

  get slotCount(): number {
    return this.#slots.length;
  }

  get operationCount(): number {
    return this.#operations;
  }

  /**
   * Store the low `slotCount` bits of value; higher bits are dropped
   * @throws {InvalidOptionError} If value is negative or not an integer
   */
  encode(value: bigint | number): void {
    let remaining = toEncodableValue(value);
    for (const slot of this.#slots) {
      slot.occupied = (remaining & 1n) === 1n;
      slot.phase = slot.occupied ? this.#random() * TWO_PI : 0;
      remaining >>= 1n;
    }
    this.#operations++;
  }

  /**
   * Rebuild the integer from occupied flags; phase and energy are ignored
   */
  decode(): bigint {
    let value = 0n;
    let bit = 1n;
    for (const slot of this.#slots) {
      if (slot.occupied) {
        value |= bit;
      }
      bit <<= 1n;
    }
    this.#operations++;
    return value;
  }

  /**
   * Advance the phase of every occupied slot by energy × dt × fieldStrength
   */
  propagate(dt: number = DEFAULT_TIME_STEP): void {
    validateTimeStep(dt);
    for (const slot of this.#slots) {
      if (slot.occupied) {
        slot.phase = wrapPhase(slot.phase + slot.energy * dt * this.fieldStrength);
      }
    }
    this.#operations++;
  }

  /**
   * True when the decoded value equals `original`
   */
  verify(original: bigint | number): boolean {
    return this.decode() === toEncodableValue(original);
  }

  occupiedCount(): number {
    let count = 0;
    for (const slot of this.#slots) {
      if (slot.occupied) count++;
    }
    return count;
  }

  /**
   * Copies of the current slots in bit order
   */
  snapshot(): Slot[] {
    return this.#slots.map((slot) => ({ ...slot }));
  }
}
