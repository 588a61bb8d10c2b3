import type { Assignment, Door, Outcome } from "./types.js"
import { assertDoorInRange } from "./doors.js"

export function determineOutcome(finalPick: Door, assignment: Assignment): Outcome {
  assertDoorInRange(finalPick, assignment.length, "Final pick")
  return assignment[finalPick - 1] === "prize" ? "WIN" : "LOSE"
}
