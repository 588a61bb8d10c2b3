import type { Assignment, Door } from "./types.js"
import { InvalidArgumentError, InvalidStateError } from "./errors.js"

/**
 * Doors 1..doorCount in order.
 */
export function listDoors(doorCount: number): Door[] {
  return Array.from({ length: doorCount }, (_, i) => i + 1)
}

export function assertDoorCount(doorCount: number): void {
  if (!Number.isInteger(doorCount) || doorCount < 3) {
    throw new InvalidArgumentError(`Door count must be an integer of at least 3, got ${doorCount}`)
  }
}

export function assertDoorInRange(door: Door, doorCount: number, label: string): void {
  if (!Number.isInteger(door) || door < 1 || door > doorCount) {
    throw new InvalidArgumentError(`${label} must be a door between 1 and ${doorCount}, got ${door}`)
  }
}

/**
 * The door hiding the prize. Throws if the assignment does not hold exactly one.
 */
export function findPrizeDoor(assignment: Assignment): Door {
  const prizeDoors = listDoors(assignment.length).filter(
    (door) => assignment[door - 1] === "prize"
  )
  if (prizeDoors.length !== 1) {
    throw new InvalidStateError(
      `Assignment must hold exactly one prize, found ${prizeDoors.length}`
    )
  }
  return prizeDoors[0]
}
