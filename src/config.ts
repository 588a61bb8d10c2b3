import { readFileSync, existsSync } from "fs"
import { resolve } from "path"
import { InvalidArgumentError } from "./errors.js"

export const CONFIG_FILE_NAME = "monty-hall.config.json"

/**
 * Simulation settings loaded from a config file. CLI flags override these.
 */
export interface SimulationConfig {
  gameCount: number
  precision: number
  /** Worker threads for parallel runs. Defaults to the CPU count when unset. */
  maxWorkers?: number
}

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  gameCount: 100,
  precision: 2,
}

function readInteger(
  fields: Map<string, unknown>,
  key: keyof SimulationConfig,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER
): number | undefined {
  const value = fields.get(key)
  if (value === undefined) return undefined
  if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
    throw new InvalidArgumentError(
      `Config field "${key}" must be an integer between ${min} and ${max}, got ${JSON.stringify(value)}`
    )
  }
  return value
}

/**
 * Load simulation configuration from a JSON file.
 * Falls back to defaults if the file doesn't exist; a file that exists but
 * can't be parsed or holds bad values is an error.
 */
export function loadSimulationConfig(configPath?: string): SimulationConfig {
  const path = configPath ?? resolve(process.cwd(), CONFIG_FILE_NAME)

  if (!existsSync(path)) {
    return { ...DEFAULT_SIMULATION_CONFIG }
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"))
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new InvalidArgumentError(`Could not parse config file ${path}: ${reason}`)
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new InvalidArgumentError(`Config file ${path} must contain a JSON object`)
  }
  const fields: Map<string, unknown> = new Map(Object.entries(parsed))

  const config: SimulationConfig = {
    gameCount: readInteger(fields, "gameCount", 1) ?? DEFAULT_SIMULATION_CONFIG.gameCount,
    precision: readInteger(fields, "precision", 0, 10) ?? DEFAULT_SIMULATION_CONFIG.precision,
  }
  const maxWorkers = readInteger(fields, "maxWorkers", 1)
  if (maxWorkers !== undefined) {
    config.maxWorkers = maxWorkers
  }
  return config
}
