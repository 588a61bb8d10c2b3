import { describe, it, expect } from "@jest/globals"
import { Worker } from "node:worker_threads"
import { simulateParallel, planChunks, runChunksOnWorkers } from "./parallel-batch.js"
import { combineChunks, runChunk, simulate } from "./batch.js"
import type { ChunkResult } from "./types.js"
import { InvalidArgumentError } from "../errors.js"

describe("parallel-batch", () => {
  describe("planChunks", () => {
    it("splits rounds evenly across workers with a floor of 1000 rounds", () => {
      expect(planChunks("s", 2500, 2)).toEqual([
        { seed: "s", firstRound: 1, roundCount: 1250 },
        { seed: "s", firstRound: 1251, roundCount: 1250 },
      ])
      expect(planChunks("s", 1500, 8)).toEqual([
        { seed: "s", firstRound: 1, roundCount: 1000 },
        { seed: "s", firstRound: 1001, roundCount: 500 },
      ])
    })

    it("honours an explicit chunk size", () => {
      expect(planChunks("s", 10, 4, 3)).toEqual([
        { seed: "s", firstRound: 1, roundCount: 3 },
        { seed: "s", firstRound: 4, roundCount: 3 },
        { seed: "s", firstRound: 7, roundCount: 3 },
        { seed: "s", firstRound: 10, roundCount: 1 },
      ])
    })

    it("rejects a chunk size below one", () => {
      expect(() => planChunks("s", 10, 4, 0)).toThrow(InvalidArgumentError)
    })
  })

  describe("simulateParallel", () => {
    it("matches the sequential simulator when running from source", async () => {
      const result = await simulateParallel(120, { seed: "parallel", maxWorkers: 3 })
      expect(result).toEqual(simulate(120, { seed: "parallel" }))
    })

    it("rejects fewer than one game", async () => {
      await expect(simulateParallel(0)).rejects.toThrow(InvalidArgumentError)
    })

    it("rejects a worker count below one", async () => {
      await expect(simulateParallel(10, { maxWorkers: 0 })).rejects.toThrow(
        "Worker count must be a positive integer, got 0"
      )
    })
  })

  describe("runChunksOnWorkers", () => {
    // Replies to each chunk with the result stored under its first round
    const REPLAY_WORKER = `
      const { parentPort, workerData } = require("node:worker_threads")
      parentPort.on("message", (chunk) => {
        parentPort.postMessage({ type: "result", result: workerData[chunk.firstRound] })
      })
    `
    const FAILING_WORKER = `
      const { parentPort } = require("node:worker_threads")
      parentPort.on("message", (chunk) => {
        parentPort.postMessage({ type: "error", error: "boom", firstRound: chunk.firstRound })
      })
    `
    const EXITING_WORKER = `
      const { parentPort } = require("node:worker_threads")
      parentPort.on("message", () => process.exit(3))
    `
    const CRASHING_WORKER = `throw new Error("worker crashed")`

    function evalWorker(code: string, workerData?: Record<number, ChunkResult>): () => Worker {
      return () => new Worker(code, { eval: true, workerData })
    }

    it("collects every chunk from the pool and combines them like a sequential run", async () => {
      const chunks = planChunks("pool", 10, 2, 3)
      const stored: Record<number, ChunkResult> = {}
      for (const chunk of chunks) {
        stored[chunk.firstRound] = runChunk(chunk)
      }

      const seen: number[] = []
      const results = await runChunksOnWorkers(
        chunks,
        2,
        evalWorker(REPLAY_WORKER, stored),
        (result) => seen.push(result.firstRound)
      )

      expect(results).toHaveLength(4)
      expect([...seen].sort((a, b) => a - b)).toEqual([1, 4, 7, 10])
      expect(combineChunks("pool", 10, 2, results)).toEqual(simulate(10, { seed: "pool" }))
    })

    it("rejects with the message a worker reports", async () => {
      await expect(
        runChunksOnWorkers(planChunks("s", 6, 2, 3), 2, evalWorker(FAILING_WORKER))
      ).rejects.toThrow(/^Worker error for rounds from \d+: boom$/)
    })

    it("rejects when a worker exits before returning its chunk", async () => {
      await expect(
        runChunksOnWorkers(planChunks("s", 6, 2, 3), 2, evalWorker(EXITING_WORKER))
      ).rejects.toThrow("Worker exited with code 3 before all chunks finished")
    })

    it("rejects when a worker throws while starting", async () => {
      await expect(
        runChunksOnWorkers(planChunks("s", 6, 2, 3), 2, evalWorker(CRASHING_WORKER))
      ).rejects.toThrow("worker crashed")
    })
  })
})
