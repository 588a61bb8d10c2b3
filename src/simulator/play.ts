import type { RoundResult } from "../types.js"
import { simulate } from "./batch.js"
import { formatProportionsTable } from "./report.js"

export const DEFAULT_GAME_COUNT = 100

export interface PlayGamesOptions {
  seed?: string
  precision?: number
  output?: (line: string) => void
}

/**
 * Play n games, print the proportions table and return every round result in
 * round-major order.
 */
export function playGames(
  n: number = DEFAULT_GAME_COUNT,
  options: PlayGamesOptions = {}
): RoundResult[] {
  const output = options.output ?? ((line: string) => console.log(line))
  const batch = simulate(n, { seed: options.seed, precision: options.precision })

  for (const line of formatProportionsTable(batch.proportions, batch.precision)) {
    output(line)
  }
  return batch.results
}
