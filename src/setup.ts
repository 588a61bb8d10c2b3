import type { Assignment, DoorContent, RngState } from "./types.js"
import { CLASSIC_DOOR_COUNT } from "./types.js"
import { assertDoorCount } from "./doors.js"
import { shuffle } from "./rng.js"

/**
 * Hide one prize and doorCount - 1 blanks behind the doors, as a uniformly
 * random permutation.
 */
export function createAssignment(
  rng: RngState,
  doorCount: number = CLASSIC_DOOR_COUNT
): Assignment {
  assertDoorCount(doorCount)

  const contents: DoorContent[] = [
    "prize",
    ...Array.from({ length: doorCount - 1 }, (): DoorContent => "blank"),
  ]
  return Object.freeze(shuffle(rng, contents))
}
