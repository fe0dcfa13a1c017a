/**
 * State bank: the ordered slot layout for a level
 *
 * Slot order is n ascending, then l, then m. Bit i of an encoded value lives
 * in slot i, so this order must never change.
 */

import type { Slot, SlotAddress } from "./types.js";
import { validateLevel } from "./validation.js";

/** Hydrogen-like ground energy in electron-volts */
export const GROUND_ENERGY = -13.6;

/**
 * Number of slots for a level: 1² + 2² + … + L²
 */
export function slotCount(level: number): number {
  validateLevel(level);
  return (level * (level + 1) * (2 * level + 1)) / 6;
}

/**
 * Energy of every slot in shell n
 */
export function slotEnergy(n: number): number {
  return GROUND_ENERGY / (n * n);
}

/**
 * Enumerate slot addresses in bit order
 */
export function* slotAddresses(level: number): Generator<SlotAddress> {
  validateLevel(level);
  for (let n = 1; n <= level; n++) {
    for (let l = 0; l < n; l++) {
      for (let m = -l; m <= l; m++) {
        yield { n, l, m };
      }
    }
  }
}

/**
 * Generate fresh, unoccupied slots for a level
 * @throws {InvalidConfigurationError} If level is not a positive integer
 */
export function generateSlots(level: number): Slot[] {
  const slots: Slot[] = [];
  for (const { n, l, m } of slotAddresses(level)) {
    slots.push({ n, l, m, occupied: false, energy: slotEnergy(n), phase: 0 });
  }
  return slots;
}
