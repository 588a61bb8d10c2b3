import { describe, it, expect } from "@jest/globals"
import { revealDoor } from "./host.js"
import { createRng } from "./rng.js"
import { InvalidArgumentError, InvalidStateError } from "./errors.js"
import type { Assignment } from "./types.js"

describe("revealDoor", () => {
  const prizeBehindTwo: Assignment = ["blank", "prize", "blank"]

  it("should open the only blank, unpicked door when the pick is blank", () => {
    expect(revealDoor(createRng("host"), prizeBehindTwo, 1)).toBe(3)
    expect(revealDoor(createRng("host"), prizeBehindTwo, 3)).toBe(1)
  })

  it("should not draw from the RNG when the door is forced", () => {
    const rng = createRng("host-forced")
    revealDoor(rng, prizeBehindTwo, 1)
    expect(rng.counter).toBe(0)
  })

  it("should choose between both blanks when the pick holds the prize", () => {
    const rng = createRng("host-random")
    const opened = new Set<number>()
    for (let i = 0; i < 100; i++) {
      const door = revealDoor(rng, prizeBehindTwo, 2)
      expect([1, 3]).toContain(door)
      opened.add(door)
    }
    expect(rng.counter).toBe(100)
    expect(opened.size).toBe(2)
  })

  it("should never open the prize or the picked door with more doors", () => {
    const assignment: Assignment = ["blank", "prize", "blank", "blank"]
    const rng = createRng("host-four")
    for (let i = 0; i < 50; i++) {
      const door = revealDoor(rng, assignment, 1)
      expect([3, 4]).toContain(door)
    }
  })

  it("should reject a pick outside the doors", () => {
    expect(() => revealDoor(createRng("host"), prizeBehindTwo, 4)).toThrow(InvalidArgumentError)
  })

  it("should reject an assignment without exactly one prize", () => {
    expect(() => revealDoor(createRng("host"), ["blank", "blank", "blank"], 1)).toThrow(
      InvalidStateError
    )
    expect(() => revealDoor(createRng("host"), ["prize", "prize", "blank"], 3)).toThrow(
      "Assignment must hold exactly one prize, found 2"
    )
  })
})
