/**
 * Parallel Batch Simulator
 *
 * Splits the rounds into contiguous chunks and plays them on worker threads.
 * Per-chunk tallies are summed and results reassembled in round order, so the
 * outcome matches the sequential simulator for the same seed.
 */

import { Worker } from "node:worker_threads"
import { cpus } from "node:os"
import path from "node:path"

import type { BatchResult, ChunkResult, RoundChunk, SimulateOptions } from "./types.js"
import {
  DEFAULT_PRECISION,
  assertGameCount,
  assertPrecision,
  combineChunks,
  simulate,
} from "./batch.js"
import { createRandomSeed } from "../rng.js"
import { InvalidArgumentError } from "../errors.js"
import type { WorkerMessage } from "./simulation-worker.js"

/**
 * Extended options with parallel settings.
 */
export interface ParallelSimulateOptions extends SimulateOptions {
  maxWorkers?: number // Default: number of CPU cores
  chunkSize?: number // Rounds per task (default: spread evenly, at least 1000)
}

export type WorkerFactory = () => Worker

const MIN_CHUNK_SIZE = 1000

/**
 * Check if we're running from TypeScript source (tests/dev) vs compiled JS.
 *
 * Worker threads require compiled JavaScript and can't run TypeScript directly,
 * so from source we fall back to sequential execution.
 */
function isRunningFromSource(): boolean {
  return __filename.endsWith(".ts")
}

/**
 * Path to the compiled worker script, beside this file.
 */
function getWorkerPath(): string {
  return path.join(__dirname, "simulation-worker.js")
}

/**
 * Split rounds 1..gameCount into contiguous chunks.
 */
export function planChunks(
  seed: string,
  gameCount: number,
  workerCount: number,
  chunkSize?: number
): RoundChunk[] {
  const size = chunkSize ?? Math.max(MIN_CHUNK_SIZE, Math.ceil(gameCount / workerCount))
  if (!Number.isInteger(size) || size < 1) {
    throw new InvalidArgumentError(`Chunk size must be a positive integer, got ${size}`)
  }

  const chunks: RoundChunk[] = []
  for (let firstRound = 1; firstRound <= gameCount; firstRound += size) {
    chunks.push({
      seed,
      firstRound,
      roundCount: Math.min(size, gameCount - firstRound + 1),
    })
  }
  return chunks
}

/**
 * Play n rounds in parallel using worker threads.
 */
export async function simulateParallel(
  n: number,
  options: ParallelSimulateOptions = {}
): Promise<BatchResult> {
  assertGameCount(n)
  const precision = options.precision ?? DEFAULT_PRECISION
  assertPrecision(precision)
  const seed = options.seed ?? createRandomSeed()

  const maxWorkers = options.maxWorkers ?? cpus().length
  if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
    throw new InvalidArgumentError(`Worker count must be a positive integer, got ${maxWorkers}`)
  }

  const chunks = planChunks(seed, n, maxWorkers, options.chunkSize)
  const numWorkers = Math.min(maxWorkers, chunks.length)

  // Fall back to sequential execution when:
  // 1. Running from TypeScript source (workers can't run TS directly)
  // 2. Only 1 worker or 1 chunk (overhead not worth it)
  if (isRunningFromSource() || numWorkers <= 1 || chunks.length <= 1) {
    const reasons: string[] = []
    if (isRunningFromSource()) {
      reasons.push("running from TypeScript source; worker threads require compiled JavaScript")
    }
    if (numWorkers <= 1) {
      reasons.push("worker count is 1 or less")
    }
    if (chunks.length <= 1) {
      reasons.push("only one chunk of rounds to play")
    }

    if (!process.env.JEST_WORKER_ID) {
      console.warn(
        `Parallel execution disabled; falling back to sequential (${reasons.join(", ")}).`
      )
    }
    return simulate(n, { seed, precision, onProgress: options.onProgress })
  }

  const workerPath = getWorkerPath()
  let completedRounds = 0
  const chunkResults = await runChunksOnWorkers(
    chunks,
    numWorkers,
    () => new Worker(workerPath),
    (result) => {
      completedRounds += result.results.length / 2
      options.onProgress?.(completedRounds)
    }
  )
  return combineChunks(seed, n, precision, chunkResults)
}

/**
 * Play chunks on a pool of workers, handing each worker the next chunk as
 * soon as it reports back. Results come back in completion order.
 *
 * Rejects on the first worker error, and when a worker exits before every
 * chunk has been returned.
 */
export function runChunksOnWorkers(
  chunks: RoundChunk[],
  workerCount: number,
  createWorker: WorkerFactory,
  onChunk?: (result: ChunkResult) => void
): Promise<ChunkResult[]> {
  const chunkResults: ChunkResult[] = []

  return new Promise((resolve, reject) => {
    let chunkIndex = 0
    let settled = false
    const workers: Worker[] = []

    function fail(error: Error): void {
      if (settled) return
      settled = true
      terminateAllWorkers()
      reject(error)
    }

    function spawnWorker(): Worker {
      const worker = createWorker()

      worker.on("message", (message: WorkerMessage) => {
        if (settled) return

        if (message.type === "error") {
          fail(new Error(`Worker error for rounds from ${message.firstRound}: ${message.error}`))
          return
        }

        chunkResults.push(message.result)
        onChunk?.(message.result)

        if (chunkResults.length === chunks.length) {
          settled = true
          terminateAllWorkers()
          resolve(chunkResults)
          return
        }

        // Dispatch next chunk if available
        if (chunkIndex < chunks.length) {
          worker.postMessage(chunks[chunkIndex++])
        }
      })

      worker.on("error", (err) => fail(err))

      worker.on("exit", (code) => {
        fail(new Error(`Worker exited with code ${code} before all chunks finished`))
      })

      return worker
    }

    function terminateAllWorkers(): void {
      for (const worker of workers) {
        void worker.terminate()
      }
    }

    for (let i = 0; i < Math.min(workerCount, chunks.length); i++) {
      const worker = spawnWorker()
      workers.push(worker)
      worker.postMessage(chunks[chunkIndex++])
    }
  })
}
