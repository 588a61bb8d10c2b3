// Round primitives
export { createAssignment } from "./setup.js"
export { selectInitialPick, resolveFinalPick } from "./contestant.js"
export { revealDoor } from "./host.js"
export { determineOutcome } from "./outcome.js"
export { playRound } from "./round.js"
export { listDoors, findPrizeDoor } from "./doors.js"

// Randomness
export { createRng, createRandomSeed, rollFloat, rollInt, pickOne, shuffle } from "./rng.js"

// Configuration and errors
export { loadSimulationConfig, DEFAULT_SIMULATION_CONFIG, CONFIG_FILE_NAME } from "./config.js"
export type { SimulationConfig } from "./config.js"
export { InvalidArgumentError, InvalidStateError } from "./errors.js"

export { CLASSIC_DOOR_COUNT, STRATEGIES, OUTCOMES } from "./types.js"
export type {
  Door,
  DoorContent,
  Assignment,
  Strategy,
  Outcome,
  RngState,
  RoundResult,
  RoundRecord,
} from "./types.js"

export * from "./simulator/index.js"
