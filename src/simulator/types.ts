/**
 * Type definitions for the batch simulator
 *
 * The simulator sits above the round primitives, playing many rounds and
 * reducing their results to per-strategy win proportions.
 */

import type { Outcome, RoundResult, Strategy } from "../types.js"

// ============================================================================
// Configuration
// ============================================================================

/**
 * Options for a batch run.
 */
export interface SimulateOptions {
  seed?: string // Random seed drawn when omitted
  precision?: number // Decimal places for proportions (default 2)
  onProgress?: (completedRounds: number) => void
}

/**
 * A contiguous range of rounds, the unit of work handed to a worker.
 */
export interface RoundChunk {
  seed: string
  firstRound: number // 1-based
  roundCount: number
}

// ============================================================================
// Results
// ============================================================================

export interface OutcomeTally {
  wins: number
  losses: number
}

export type StrategyTallies = Record<Strategy, OutcomeTally>

/**
 * Rows are strategies, columns are outcomes, cells are rounded proportions.
 */
export type ProportionsTable = Record<Strategy, Record<Outcome, number>>

/**
 * Results for one chunk of rounds, before merging.
 */
export interface ChunkResult {
  firstRound: number
  results: RoundResult[]
  tallies: StrategyTallies
}

export interface BatchResult {
  seed: string
  gameCount: number
  precision: number
  results: RoundResult[] // Round-major: round 1 stay, round 1 switch, round 2 stay, ...
  tallies: StrategyTallies
  proportions: ProportionsTable
}

/**
 * Collects round results as they are played.
 */
export interface TallyCollector {
  record(result: RoundResult): void
  finalize(): StrategyTallies
}
