/**
 * Single Round
 *
 * Plays one round and scores both strategies against the same setup:
 * 1. Hide the prize
 * 2. Contestant picks a door
 * 3. Host opens a blank, unpicked door
 * 4. Resolve the final pick for stay and for switch
 * 5. Score each final pick
 */

import type { RngState, RoundRecord } from "./types.js"
import { CLASSIC_DOOR_COUNT } from "./types.js"
import { createAssignment } from "./setup.js"
import { selectInitialPick, resolveFinalPick } from "./contestant.js"
import { revealDoor } from "./host.js"
import { determineOutcome } from "./outcome.js"
import { findPrizeDoor } from "./doors.js"

export function playRound(rng: RngState, round: number = 1): RoundRecord {
  const assignment = createAssignment(rng, CLASSIC_DOOR_COUNT)
  const initialPick = selectInitialPick(rng, CLASSIC_DOOR_COUNT)
  const revealedDoor = revealDoor(rng, assignment, initialPick)

  const stayPick = resolveFinalPick("stay", initialPick, revealedDoor, CLASSIC_DOOR_COUNT)
  const switchPick = resolveFinalPick("switch", initialPick, revealedDoor, CLASSIC_DOOR_COUNT)

  return {
    round,
    assignment,
    prizeDoor: findPrizeDoor(assignment),
    initialPick,
    revealedDoor,
    finalPicks: { stay: stayPick, switch: switchPick },
    stay: { strategy: "stay", outcome: determineOutcome(stayPick, assignment) },
    switch: { strategy: "switch", outcome: determineOutcome(switchPick, assignment) },
  }
}
