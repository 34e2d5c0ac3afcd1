#!/usr/bin/env node
/**
 * CLI entrypoint for the stdio bridge.
 *
 * Usage:
 *   stdio-bridge
 *   stdio-bridge --version
 *
 * Connects to the build server named by `STDIO_BRIDGE_URI`, or by the
 * nearest `project/target/active.json` above the working directory, and
 * relays framed messages between stdin/stdout and the server until either
 * side fails or the process is interrupted.
 *
 * stdout carries protocol frames only. Diagnostics go to stderr.
 *
 * Exit codes:
 * - 0: Relay ran and stopped (connection closed, stream ended, interrupt)
 * - 1: Startup failure (no server found, bad address, connect failure)
 *
 * @module
 */
import { type Bridge, openBridge } from '../bridge.js'
import { readBridgeConfig } from '../config.js'
import { errorMessage } from '../errors.js'
import { createLogger, LOG_TAG, type Logger } from '../log.js'

const USAGE = `Usage: stdio-bridge [--version]

Environment:
  STDIO_BRIDGE_URI               server URI (tcp://host:port or local:/path)
  STDIO_BRIDGE_LOG_LEVEL         debug | info | warn | error | silent
  STDIO_BRIDGE_MAX_MESSAGE_SIZE  per-message limit in bytes (default: none)
  STDIO_BRIDGE_SIGNALS           comma-separated interrupt signals
`

/**
 * Report a startup failure and exit with code 1.
 */
function fatalError(logger: Logger, message: string): never {
  logger.error(message)
  process.stderr.write(`Error: ${message}\n`)
  process.exit(1)
}

async function main(): Promise<never> {
  const args = process.argv.slice(2)
  if (args[0] === '-h' || args[0] === '--help') {
    process.stderr.write(USAGE)
    process.exit(0)
  }
  if (args[0] === '--version') {
    // Replaced at bundle time
    process.stdout.write(`${process.env.STDIO_BRIDGE_VERSION ?? 'dev'}\n`)
    process.exit(0)
  }
  if (args.length > 0) {
    process.stderr.write(`Unexpected argument: ${args[0]}\n${USAGE}`)
    process.exit(1)
  }

  const config = readBridgeConfig(process.env, process.cwd(), (msg) => {
    process.stderr.write(`${LOG_TAG} ${msg}\n`)
  })
  const logger = createLogger({ level: config.logLevel })

  let bridge: Bridge
  try {
    bridge = await openBridge({ config, logger })
  } catch (err) {
    fatalError(logger, errorMessage(err))
  }

  const outcome = await bridge.completion.wait()
  logger.info(`${outcome.name} stopped after ${outcome.frames} frames: ${outcome.error.message}`)
  bridge.interrupts.dispose()
  process.exit(0)
}

main().catch((err) => {
  process.stderr.write(`Unexpected error: ${errorMessage(err)}\n`)
  process.exit(1)
})
