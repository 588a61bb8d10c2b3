/**
 * Worker thread for playing chunks of rounds in parallel.
 *
 * Workers receive chunks via parentPort and return per-chunk results.
 */

import { parentPort } from "node:worker_threads"
import { runChunk } from "./batch.js"
import type { ChunkResult, RoundChunk } from "./types.js"

/**
 * Message sent from the worker with the result.
 */
export interface WorkerResult {
  type: "result"
  result: ChunkResult
}

/**
 * Error message sent from the worker.
 */
export interface WorkerError {
  type: "error"
  error: string
  firstRound: number
}

export type WorkerMessage = WorkerResult | WorkerError

const port = parentPort
if (port) {
  port.on("message", (chunk: RoundChunk) => {
    try {
      port.postMessage({
        type: "result",
        result: runChunk(chunk),
      } satisfies WorkerResult)
    } catch (err) {
      port.postMessage({
        type: "error",
        error: err instanceof Error ? err.message : String(err),
        firstRound: chunk.firstRound,
      } satisfies WorkerError)
    }
  })
}
