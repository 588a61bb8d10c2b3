import type { Assignment, Door, RngState } from "./types.js"
import { assertDoorInRange, findPrizeDoor, listDoors } from "./doors.js"
import { pickOne } from "./rng.js"

/**
 * Host opens a blank door the contestant did not pick.
 *
 * If the contestant holds the prize, every other door is blank and the host
 * chooses among them at random. Otherwise the host must avoid both the pick
 * and the prize; with three doors that leaves one door, which is returned
 * without drawing from the RNG.
 */
export function revealDoor(rng: RngState, assignment: Assignment, pick: Door): Door {
  const doorCount = assignment.length
  assertDoorInRange(pick, doorCount, "Pick")
  const prizeDoor = findPrizeDoor(assignment)

  const blankDoors = listDoors(doorCount).filter((door) => assignment[door - 1] === "blank")

  if (pick === prizeDoor) {
    return pickOne(rng, blankDoors)
  }

  const candidates = blankDoors.filter((door) => door !== pick)
  if (candidates.length === 1) {
    return candidates[0]
  }
  return pickOne(rng, candidates)
}
