// Statistical behaviour of the full simulation

import { describe, it, expect } from "@jest/globals"
import { simulate } from "../src/simulator/batch.js"

describe("stay vs switch over many rounds", () => {
  const result = simulate(10000, { seed: "statistics-seed" })

  it("should win about a third of the time when staying", () => {
    expect(result.proportions.stay.WIN).toBeGreaterThanOrEqual(0.3)
    expect(result.proportions.stay.WIN).toBeLessThanOrEqual(0.36)
  })

  it("should win about two thirds of the time when switching", () => {
    expect(result.proportions.switch.WIN).toBeGreaterThanOrEqual(0.64)
    expect(result.proportions.switch.WIN).toBeLessThanOrEqual(0.7)
  })

  it("should have exactly one winning strategy in every round", () => {
    for (let i = 0; i < result.results.length; i += 2) {
      expect(result.results[i].strategy).toBe("stay")
      expect(result.results[i + 1].strategy).toBe("switch")
      expect(result.results[i].outcome).not.toBe(result.results[i + 1].outcome)
    }
  })

  it("should reproduce the batch from the same seed", () => {
    expect(simulate(10000, { seed: "statistics-seed" }).tallies).toEqual(result.tallies)
  })
})
