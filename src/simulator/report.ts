/**
 * Text reports for the CLI and the playGames entry point.
 * Nothing in the simulation core calls into this module.
 */

import type { RoundRecord, Strategy } from "../types.js"
import { OUTCOMES, STRATEGIES } from "../types.js"
import type { ProportionsTable, StrategyTallies } from "./types.js"

const LABEL_WIDTH = 8

const STRATEGY_LABELS: Record<Strategy, string> = {
  stay: "Stay",
  switch: "Switch",
}

/**
 * Format duration in human-readable form
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`
  return `${(ms / 60000).toFixed(1)}m`
}

/**
 * Proportions table: one row per strategy, WIN and LOSE columns.
 */
export function formatProportionsTable(table: ProportionsTable, precision: number = 2): string[] {
  const width = Math.max(4, precision + 2) + 2
  const header = "strategy".padEnd(LABEL_WIDTH) + OUTCOMES.map((o) => o.padStart(width)).join("")
  const rows = STRATEGIES.map(
    (strategy) =>
      strategy.padEnd(LABEL_WIDTH) +
      OUTCOMES.map((o) => table[strategy][o].toFixed(precision).padStart(width)).join("")
  )
  return [header, ...rows]
}

/**
 * Raw win/loss counts, shown in verbose mode.
 */
export function formatTallies(tallies: StrategyTallies): string[] {
  return STRATEGIES.map(
    (strategy) =>
      `${STRATEGY_LABELS[strategy]}: ${tallies[strategy].wins} wins, ${tallies[strategy].losses} losses`
  )
}

/**
 * Walkthrough of a single round, for both strategies.
 */
export function formatRoundDetails(record: RoundRecord): string[] {
  const lines = [
    `GAME SETUP: ${record.assignment.join(" | ")}`,
    `Initial selection: door ${record.initialPick}`,
    `Opened door: door ${record.revealedDoor}`,
  ]
  for (const strategy of STRATEGIES) {
    lines.push(
      `${STRATEGY_LABELS[strategy]}: final selection door ${record.finalPicks[strategy]} -> ${record[strategy].outcome}`
    )
  }
  return lines
}
