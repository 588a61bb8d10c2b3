/**
 * Seeded random source for the simulator.
 *
 * Each draw hashes "<seed>:<counter>" and then advances the counter, so a
 * round replays exactly from its seed and no state is shared between rounds.
 */

import { randomUUID } from "node:crypto"
import type { RngState } from "./types.js"
import { InvalidArgumentError } from "./errors.js"

/**
 * Start a stream at draw 0. Every round of a batch gets its own stream.
 */
export function createRng(seed: string): RngState {
  return { seed, counter: 0 }
}

/**
 * Fresh seed for unseeded runs. The seed is reported with the results so any
 * run can be replayed.
 */
export function createRandomSeed(): string {
  return randomUUID()
}

// cyrb53: 53-bit string hash, stable across platforms
function cyrb53(key: string): number {
  let a = 0xdeadbeef
  let b = 0x41c6ce57
  for (let i = 0; i < key.length; i++) {
    const code = key.charCodeAt(i)
    a = Math.imul(a ^ code, 2654435761)
    b = Math.imul(b ^ code, 1597334677)
  }
  a = Math.imul(a ^ (a >>> 16), 2246822507)
  a ^= Math.imul(b ^ (b >>> 13), 3266489909)
  b = Math.imul(b ^ (b >>> 16), 2246822507)
  b ^= Math.imul(a ^ (a >>> 13), 3266489909)
  return 4294967296 * (2097151 & b) + (a >>> 0)
}

const UNIT_STEPS = 1000000

/**
 * Take the next draw from the stream as a value in [0, 1), in steps of
 * one millionth.
 */
function drawUnit(rng: RngState): number {
  const value = (cyrb53(`${rng.seed}:${rng.counter}`) % UNIT_STEPS) / UNIT_STEPS
  rng.counter++
  return value
}

/**
 * Uniform float in [min, max). Consumes one draw.
 */
export function rollFloat(rng: RngState, min: number, max: number): number {
  return min + drawUnit(rng) * (max - min)
}

/**
 * Get a random integer in range [min, max], both ends inclusive.
 */
export function rollInt(rng: RngState, min: number, max: number): number {
  return Math.floor(rollFloat(rng, min, max + 1))
}

/**
 * Pick one item uniformly at random.
 */
export function pickOne<T>(rng: RngState, items: readonly T[]): T {
  if (items.length === 0) {
    throw new InvalidArgumentError("Cannot pick from an empty list")
  }
  return items[rollInt(rng, 0, items.length - 1)]
}

/**
 * Fisher-Yates shuffle. Returns a new array; the input is left untouched.
 * Draws without replacement, so every permutation is equally likely.
 */
export function shuffle<T>(rng: RngState, items: readonly T[]): T[] {
  const result = [...items]
  for (let i = result.length - 1; i > 0; i--) {
    const j = rollInt(rng, 0, i)
    const tmp = result[i]
    result[i] = result[j]
    result[j] = tmp
  }
  return result
}
