import type { CommandContext } from './cli'
import process from 'node:process'
import { Logger } from '../utils/logger'
import { createCLI, ExitCode } from './cli'

/**
 * Parse arguments and run the matched command. Returns the exit code.
 * `argv` is in `process.argv` form: runtime and script path first.
 */
export async function runCLI(argv: string[], context: CommandContext = {}): Promise<number> {
  const cli = createCLI(context)
  cli.parse(argv, { run: false })

  if (cli.matchedCommand) {
    const code: unknown = await cli.runMatchedCommand()
    return typeof code === 'number' ? code : ExitCode.Success
  }

  if (cli.options.help || cli.options.version)
    return ExitCode.Success

  const logger = context.logger ?? new Logger()
  if (cli.args.length > 0)
    logger.error(`Unknown command: ${cli.args.join(' ')}`)
  cli.outputHelp()
  return cli.args.length > 0 ? ExitCode.InvalidInput : ExitCode.Success
}

/**
 * Run with the current process arguments; Ctrl+C cancels an ongoing scan
 */
export async function runFromProcess(): Promise<number> {
  const controller = new AbortController()
  const onInterrupt = (): void => controller.abort()
  process.once('SIGINT', onInterrupt)

  try {
    return await runCLI(process.argv, { signal: controller.signal })
  }
  finally {
    process.off('SIGINT', onInterrupt)
  }
}
