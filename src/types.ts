// ============================================================================
// Core Types
// ============================================================================

/** Door number, 1-based. The classic game has doors 1, 2 and 3. */
export type Door = number

export const CLASSIC_DOOR_COUNT = 3

export type DoorContent = "prize" | "blank"

/**
 * What sits behind each door for one round.
 * Index `door - 1` holds the content of `door`. Frozen once created.
 */
export type Assignment = readonly DoorContent[]

export type Strategy = "stay" | "switch"

export const STRATEGIES: readonly Strategy[] = ["stay", "switch"]

export type Outcome = "WIN" | "LOSE"

export const OUTCOMES: readonly Outcome[] = ["WIN", "LOSE"]

// ============================================================================
// RNG Types
// ============================================================================

/**
 * Seeded, counter-based random source.
 * Every draw hashes `seed:counter` and bumps the counter, so replaying a seed
 * replays the exact sequence of draws.
 */
export interface RngState {
  seed: string
  counter: number
}

// ============================================================================
// Round Types
// ============================================================================

export interface RoundResult {
  readonly strategy: Strategy
  readonly outcome: Outcome
}

/**
 * Full trace of one round. Both strategies are scored against the same
 * assignment, initial pick and revealed door.
 */
export interface RoundRecord {
  round: number
  assignment: Assignment
  prizeDoor: Door
  initialPick: Door
  revealedDoor: Door
  finalPicks: Record<Strategy, Door>
  stay: RoundResult
  switch: RoundResult
}
