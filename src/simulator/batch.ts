/**
 * Batch Simulator (Monte Carlo Harness)
 *
 * Plays many rounds and aggregates the stay/switch outcomes into win
 * proportions. Each round draws from its own seeded stream, so a batch gives
 * the same result however its rounds are split up.
 */

import type { RoundResult } from "../types.js"
import { createRandomSeed, createRng } from "../rng.js"
import { playRound } from "../round.js"
import { InvalidArgumentError } from "../errors.js"
import type { BatchResult, ChunkResult, RoundChunk, SimulateOptions } from "./types.js"
import { computeProportions, createTallyCollector, mergeTallies } from "./metrics.js"

export const DEFAULT_PRECISION = 2
export const MAX_PRECISION = 10

/**
 * Seed for the RNG stream of a single round.
 */
export function roundSeed(seed: string, round: number): string {
  return `${seed}:round-${round}`
}

export function assertGameCount(n: number): void {
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError(`Number of games must be a positive integer, got ${n}`)
  }
}

export function assertPrecision(precision: number): void {
  if (!Number.isInteger(precision) || precision < 0 || precision > MAX_PRECISION) {
    throw new InvalidArgumentError(
      `Precision must be an integer between 0 and ${MAX_PRECISION}, got ${precision}`
    )
  }
}

/**
 * Play a contiguous range of rounds.
 */
export function runChunk(
  chunk: RoundChunk,
  onRound?: (round: number) => void
): ChunkResult {
  const results: RoundResult[] = []
  const collector = createTallyCollector()

  for (let round = chunk.firstRound; round < chunk.firstRound + chunk.roundCount; round++) {
    const record = playRound(createRng(roundSeed(chunk.seed, round)), round)
    for (const result of [record.stay, record.switch]) {
      results.push(result)
      collector.record(result)
    }
    onRound?.(round)
  }

  return {
    firstRound: chunk.firstRound,
    results,
    tallies: collector.finalize(),
  }
}

/**
 * Merge chunk results into a batch result. Chunks may arrive in any order;
 * results are reassembled in round order.
 */
export function combineChunks(
  seed: string,
  gameCount: number,
  precision: number,
  chunks: ChunkResult[]
): BatchResult {
  const ordered = [...chunks].sort((a, b) => a.firstRound - b.firstRound)
  const tallies = mergeTallies(ordered.map((c) => c.tallies))

  return {
    seed,
    gameCount,
    precision,
    results: ordered.flatMap((c) => c.results),
    tallies,
    proportions: computeProportions(tallies, precision),
  }
}

/**
 * Play n rounds and aggregate win proportions per strategy.
 *
 * @param n Number of rounds, at least 1
 */
export function simulate(n: number, options: SimulateOptions = {}): BatchResult {
  assertGameCount(n)
  const precision = options.precision ?? DEFAULT_PRECISION
  assertPrecision(precision)
  const seed = options.seed ?? createRandomSeed()

  const chunk = runChunk({ seed, firstRound: 1, roundCount: n }, options.onProgress)
  return combineChunks(seed, n, precision, [chunk])
}
