/**
 * Simulator Public API
 *
 * Plays many rounds and compares the stay and switch strategies:
 * - Sequential and worker-thread batches with identical results per seed
 * - Win/loss tallies and the rounded proportions table
 * - Text reports for the command line
 */

// Core execution
export { simulate, runChunk, combineChunks, roundSeed, DEFAULT_PRECISION } from "./batch.js"
export { simulateParallel, planChunks, runChunksOnWorkers } from "./parallel-batch.js"
export type { ParallelSimulateOptions, WorkerFactory } from "./parallel-batch.js"
export { playGames, DEFAULT_GAME_COUNT } from "./play.js"
export type { PlayGamesOptions } from "./play.js"

// Types
export type {
  SimulateOptions,
  RoundChunk,
  ChunkResult,
  BatchResult,
  OutcomeTally,
  StrategyTallies,
  ProportionsTable,
  TallyCollector,
} from "./types.js"

// Utilities
export {
  createTallyCollector,
  mergeTallies,
  computeProportions,
  emptyTallies,
  roundRatio,
} from "./metrics.js"
export {
  formatProportionsTable,
  formatRoundDetails,
  formatTallies,
  formatDuration,
} from "./report.js"
