/**
 * Tests for round.ts - invariants that must hold for every round
 */

import { playRound } from "./round.js"
import { createRng } from "./rng.js"

describe("playRound", () => {
  const rng = createRng("round-invariants")
  const rounds = Array.from({ length: 500 }, (_, i) => playRound(rng, i + 1))

  it("numbers the round", () => {
    expect(rounds[0].round).toBe(1)
    expect(rounds[499].round).toBe(500)
  })

  it("never opens the prize door or the initial pick", () => {
    for (const r of rounds) {
      expect(r.revealedDoor).not.toBe(r.prizeDoor)
      expect(r.revealedDoor).not.toBe(r.initialPick)
      expect(r.assignment[r.revealedDoor - 1]).toBe("blank")
    }
  })

  it("switches to a door that is neither picked nor opened", () => {
    for (const r of rounds) {
      expect(r.finalPicks.switch).not.toBe(r.initialPick)
      expect(r.finalPicks.switch).not.toBe(r.revealedDoor)
    }
  })

  it("keeps the initial pick when staying", () => {
    for (const r of rounds) {
      expect(r.finalPicks.stay).toBe(r.initialPick)
    }
  })

  it("has exactly one winning strategy per round", () => {
    for (const r of rounds) {
      expect(r.stay.outcome).not.toBe(r.switch.outcome)
      expect(r.stay.outcome === "WIN").toBe(r.initialPick === r.prizeDoor)
    }
  })

  it("labels each result with its strategy", () => {
    expect(rounds[0].stay.strategy).toBe("stay")
    expect(rounds[0].switch.strategy).toBe("switch")
  })

  it("replays identically from the same seed", () => {
    const a = playRound(createRng("round-replay"))
    const b = playRound(createRng("round-replay"))
    expect(a).toEqual(b)
  })
})
