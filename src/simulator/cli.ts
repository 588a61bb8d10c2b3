#!/usr/bin/env node

/**
 * Monty Hall CLI
 *
 * Run stay-vs-switch simulations from the command line.
 */

import { simulate } from "./batch.js"
import { simulateParallel } from "./parallel-batch.js"
import {
  formatDuration,
  formatProportionsTable,
  formatRoundDetails,
  formatTallies,
} from "./report.js"
import { loadSimulationConfig } from "../config.js"
import { createRandomSeed, createRng } from "../rng.js"
import { playRound } from "../round.js"
import { InvalidArgumentError } from "../errors.js"

export interface CliArgs {
  games: number | undefined
  seed: string | undefined
  precision: number | undefined
  round: boolean
  parallel: boolean
  maxWorkers: number | undefined
  configPath: string | undefined
  verbose: boolean
  help: boolean
}

function parseInteger(value: string | undefined, flag: string): number {
  if (value === undefined) {
    throw new InvalidArgumentError(`Missing value for ${flag}`)
  }
  const parsed = Number(value)
  if (value.trim() === "" || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`${flag} expects an integer, got "${value}"`)
  }
  return parsed
}

function requireValue(value: string | undefined, flag: string): string {
  if (value === undefined) {
    throw new InvalidArgumentError(`Missing value for ${flag}`)
  }
  return value
}

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    games: undefined,
    seed: undefined,
    precision: undefined,
    round: false,
    parallel: false,
    maxWorkers: undefined,
    configPath: undefined,
    verbose: false,
    help: false,
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]

    if (arg === "--help" || arg === "-h") {
      parsed.help = true
    } else if (arg === "--games" || arg === "-n") {
      parsed.games = parseInteger(args[++i], arg)
    } else if (arg === "--seed" || arg === "-s") {
      parsed.seed = requireValue(args[++i], arg)
    } else if (arg === "--precision" || arg === "-p") {
      parsed.precision = parseInteger(args[++i], arg)
    } else if (arg === "--round" || arg === "-r") {
      parsed.round = true
    } else if (arg === "--parallel" || arg === "-P") {
      parsed.parallel = true
    } else if (arg === "--max-workers" || arg === "-w") {
      parsed.maxWorkers = parseInteger(args[++i], arg)
    } else if (arg === "--config" || arg === "-c") {
      parsed.configPath = requireValue(args[++i], arg)
    } else if (arg === "--verbose" || arg === "-v") {
      parsed.verbose = true
    } else if (arg.startsWith("-") && !/^-\d/.test(arg)) {
      throw new InvalidArgumentError(`Unknown option: ${arg}`)
    } else if (parsed.games === undefined) {
      parsed.games = parseInteger(arg, "number of games")
    } else {
      throw new InvalidArgumentError(`Unexpected argument: ${arg}`)
    }
  }

  return parsed
}

/**
 * Print usage information
 */
function printHelp(): void {
  console.log(`
Monty Hall CLI - Compare the stay and switch strategies

USAGE:
  monty-hall [n] [options]

OPTIONS:
  -n, --games <n>         Number of rounds to play (default: 100)
  -s, --seed <seed>       Seed for a reproducible run (default: random)
  -p, --precision <n>     Decimal places in the proportions table (default: 2)
  -r, --round             Play and narrate a single round
  -P, --parallel          Play rounds on worker threads
  -w, --max-workers <n>   Maximum worker threads for parallel mode (default: CPU count)
  -c, --config <path>     JSON config file (default: ./monty-hall.config.json)
  -v, --verbose           Also show raw counts and timing
  -h, --help              Show this help message

EXAMPLES:
  # 100 rounds with a random seed
  monty-hall

  # 10000 rounds, reproducible
  monty-hall 10000 --seed demo

  # One round, step by step
  monty-hall --round --seed demo
`)
}

/**
 * Play and narrate one round
 */
function runSingle(args: CliArgs): void {
  const seed = args.seed ?? createRandomSeed()
  const record = playRound(createRng(seed))

  console.log(`Seed: ${seed}`)
  console.log()
  for (const line of formatRoundDetails(record)) {
    console.log(line)
  }
}

/**
 * Play a batch and print the proportions table
 */
async function runBatchMode(args: CliArgs): Promise<void> {
  const config = loadSimulationConfig(args.configPath)
  const games = args.games ?? config.gameCount
  const precision = args.precision ?? config.precision
  const seed = args.seed ?? createRandomSeed()

  const startTime = Date.now()
  const result = args.parallel
    ? await simulateParallel(games, {
        seed,
        precision,
        maxWorkers: args.maxWorkers ?? config.maxWorkers,
      })
    : simulate(games, { seed, precision })
  const elapsed = Date.now() - startTime

  console.log(`Games: ${result.gameCount}`)
  console.log(`Seed: ${result.seed}`)
  console.log()
  for (const line of formatProportionsTable(result.proportions, result.precision)) {
    console.log(line)
  }

  if (args.verbose) {
    console.log()
    for (const line of formatTallies(result.tallies)) {
      console.log(line)
    }
    console.log(`Completed in ${formatDuration(elapsed)}`)
  }
}

/**
 * Main entry point
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const args = parseArgs(argv)

  if (args.help) {
    printHelp()
    return
  }

  if (args.round) {
    runSingle(args)
  } else {
    await runBatchMode(args)
  }
}

// Run only when executed directly (not when imported for testing)
if (require.main === module) {
  main().catch((error: unknown) => {
    if (error instanceof InvalidArgumentError) {
      console.error(`Error: ${error.message}`)
      console.error("Use --help for usage information")
    } else {
      console.error("Fatal error:", error)
    }
    process.exit(1)
  })
}
