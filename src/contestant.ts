/**
 * Contestant decisions: the blind first pick, then the stay/switch choice
 * once the host has opened a door.
 */

import type { Door, RngState, Strategy } from "./types.js"
import { CLASSIC_DOOR_COUNT } from "./types.js"
import { assertDoorCount, assertDoorInRange, listDoors } from "./doors.js"
import { InvalidArgumentError } from "./errors.js"
import { rollInt } from "./rng.js"

/**
 * Uniformly random first pick. Does not look at the assignment.
 */
export function selectInitialPick(rng: RngState, doorCount: number = CLASSIC_DOOR_COUNT): Door {
  assertDoorCount(doorCount)
  return rollInt(rng, 1, doorCount)
}

/**
 * Final pick for a strategy.
 *
 * `switch` moves to the single door that is neither picked nor opened. That
 * door only exists when exactly one remains (three doors); with more doors
 * there is no single switch target and the call fails.
 */
export function resolveFinalPick(
  strategy: Strategy,
  initialPick: Door,
  revealedDoor: Door,
  doorCount: number = CLASSIC_DOOR_COUNT
): Door {
  assertDoorCount(doorCount)
  assertDoorInRange(initialPick, doorCount, "Initial pick")
  assertDoorInRange(revealedDoor, doorCount, "Revealed door")
  if (initialPick === revealedDoor) {
    throw new InvalidArgumentError(`Revealed door ${revealedDoor} cannot be the initial pick`)
  }

  switch (strategy) {
    case "stay":
      return initialPick
    case "switch": {
      const remaining = listDoors(doorCount).filter(
        (door) => door !== initialPick && door !== revealedDoor
      )
      if (remaining.length !== 1) {
        throw new InvalidArgumentError(
          `Switching needs exactly one remaining door, but ${doorCount} doors leave ${remaining.length}`
        )
      }
      return remaining[0]
    }
  }
}
