import { Command, CommanderError, type OutputConfiguration } from 'commander'
import type { Readable, Writable } from 'node:stream'
import { readPackageInfo, resolveConfig, type PackageInfo } from './config.js'
import { AgentConnection } from './json-rpc/connection.js'
import { createRootLogger } from './logger.js'

type CliOptions = {
  acp?: boolean
  logLevel?: string
}

export type ParsedCli = { kind: 'run'; logLevel?: string } | { kind: 'exit'; code: number }

export function createProgram(info: PackageInfo): Command {
  return new Command()
    .name(info.name)
    .description('Agent Client Protocol agent speaking JSON-RPC 2.0 over stdin/stdout')
    .version(info.version)
    .option('--acp', 'run the protocol loop on stdin/stdout (the default)')
    .option('--log-level <level>', 'trace, debug, info, warn, error, fatal or silent (logs go to stderr)')
    .showHelpAfterError()
    .exitOverride()
}

/** Parse user arguments (without the node and script entries). */
export function parseCli(argv: readonly string[], info: PackageInfo, output?: OutputConfiguration): ParsedCli {
  const program = createProgram(info)
  if (output) program.configureOutput(output)

  try {
    program.parse([...argv], { from: 'user' })
  } catch (err) {
    if (err instanceof CommanderError) {
      // --help and --version exit 0; any usage error is 2
      return { kind: 'exit', code: err.exitCode === 0 ? 0 : 2 }
    }
    throw err
  }

  const opts = program.opts<CliOptions>()
  return opts.logLevel === undefined ? { kind: 'run' } : { kind: 'run', logLevel: opts.logLevel }
}

export type CliIo = {
  stdin: Readable
  stdout: Writable
  env: NodeJS.ProcessEnv
}

/** Entry point; resolves with the process exit code. */
export async function runCli(
  argv: readonly string[],
  io: CliIo = { stdin: process.stdin, stdout: process.stdout, env: process.env }
): Promise<number> {
  const info = readPackageInfo()
  const parsed = parseCli(argv, info)
  if (parsed.kind === 'exit') return parsed.code

  const { config, warnings } = resolveConfig({ env: io.env, cliLogLevel: parsed.logLevel })
  const logger = createRootLogger(config.logLevel)
  for (const warning of warnings) logger.warn(warning)
  logger.info({ version: info.version, config }, 'starting')

  const connection = new AgentConnection({ input: io.stdin, output: io.stdout, config, logger, agentInfo: info })
  await connection.run()

  logger.info('stopped')
  return 0
}
