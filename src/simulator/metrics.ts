/**
 * Tally Collection and Aggregation
 *
 * Counts wins and losses per strategy during a batch and turns the counts
 * into the proportions table.
 */

import type { RoundResult, Strategy } from "../types.js"
import { STRATEGIES } from "../types.js"
import type { ProportionsTable, StrategyTallies, TallyCollector } from "./types.js"

export function emptyTallies(): StrategyTallies {
  return {
    stay: { wins: 0, losses: 0 },
    switch: { wins: 0, losses: 0 },
  }
}

/**
 * Create a new tally collector for a batch or chunk.
 */
export function createTallyCollector(): TallyCollector {
  const tallies = emptyTallies()

  return {
    record(result: RoundResult): void {
      const tally = tallies[result.strategy]
      switch (result.outcome) {
        case "WIN":
          tally.wins++
          break
        case "LOSE":
          tally.losses++
          break
      }
    },

    finalize(): StrategyTallies {
      return {
        stay: { ...tallies.stay },
        switch: { ...tallies.switch },
      }
    },
  }
}

/**
 * Sum tallies. Order does not matter, so worker results can be merged as
 * they arrive.
 */
export function mergeTallies(parts: StrategyTallies[]): StrategyTallies {
  const merged = emptyTallies()
  for (const part of parts) {
    for (const strategy of STRATEGIES) {
      merged[strategy].wins += part[strategy].wins
      merged[strategy].losses += part[strategy].losses
    }
  }
  return merged
}

/**
 * numerator / denominator rounded to `precision` decimal places, ties to
 * even. Works on the integer counts directly so a tie such as 1/8 is seen
 * exactly. Rounding WIN and LOSE this way keeps each row summing to 1: their
 * fractional parts are complementary, and on a tie the two candidates differ
 * in parity so exactly one rounds up.
 */
export function roundRatio(numerator: number, denominator: number, precision: number): number {
  const scale = 10n ** BigInt(precision)
  const scaled = BigInt(numerator) * scale
  const divisor = BigInt(denominator)

  let quotient = scaled / divisor
  const twiceRemainder = (scaled % divisor) * 2n
  if (twiceRemainder > divisor || (twiceRemainder === divisor && quotient % 2n === 1n)) {
    quotient++
  }
  return Number(quotient) / Number(scale)
}

/**
 * Per-strategy proportion of wins and losses over the rounds played.
 */
export function computeProportions(
  tallies: StrategyTallies,
  precision: number
): ProportionsTable {
  const row = (strategy: Strategy) => {
    const { wins, losses } = tallies[strategy]
    const total = wins + losses
    return {
      WIN: total > 0 ? roundRatio(wins, total, precision) : 0,
      LOSE: total > 0 ? roundRatio(losses, total, precision) : 0,
    }
  }

  return {
    stay: row("stay"),
    switch: row("switch"),
  }
}
