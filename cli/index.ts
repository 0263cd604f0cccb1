/**
 * CLI for drivepath - path operations on the remote drive
 *
 * Commands:
 * - stat <path>            - show object metadata
 * - ls [path]              - list folder contents
 * - mkdir <paths...>       - create folders
 * - mv <src> <dest>        - move or rename
 * - put <local> <dest>     - upload a local file
 * - get <src> <local>      - download to a local file
 * - cat <paths...>         - print file contents
 * - touch <path>           - set the modification time
 *
 * Arguments are parsed with cac; execution is injected through
 * {@link CLIContext} so the commands run against any DrivePath.
 */

import { cac } from 'cac'
import type { DrivePath } from '../core/drive-path.js'
import { EINVAL, isObjectNotFound } from '../core/errors.js'
import { isDir } from '../core/object-info.js'
import { collectBytes } from '../storage/content.js'
import { COMMAND_HELP, COMMAND_NAMES, getCommandHelp, isCommandName, mainHelp, type CommandName } from './help.js'
import type { CLIContext, CommandResult } from './types.js'
import { formatError, formatLsOutput, formatObject, missingArgumentError, unknownCommandError } from './utils/index.js'
import { VERSION } from './version.js'

export { formatLsOutput } from './utils/index.js'
export { createDriveFromEnv } from './drive.js'
export type { CLIContext, CommandResult } from './types.js'

type Options = Record<string, unknown>

/**
 * Positional arguments each command requires, by name
 */
const REQUIRED_ARGS: Record<CommandName, readonly string[]> = {
  stat: ['path'],
  ls: [],
  mkdir: ['path'],
  mv: ['source', 'destination'],
  put: ['local file', 'destination'],
  get: ['source', 'local file'],
  cat: ['file'],
  touch: ['path'],
}

/**
 * Create and return the CLI instance with all commands registered
 */
export function createCLI(): {
  name: string
  parse: ReturnType<typeof cac>['parse']
  commands: readonly CommandName[]
  cli: ReturnType<typeof cac>
} {
  const cli = cac('drivepath')

  cli.option('--memory', 'Use an empty in-memory drive')

  cli.command(COMMAND_HELP.stat.usage, COMMAND_HELP.stat.description)
  cli.command(COMMAND_HELP.ls.usage, COMMAND_HELP.ls.description).option('-l, --long', 'Use long listing format')
  cli
    .command(COMMAND_HELP.mkdir.usage, COMMAND_HELP.mkdir.description)
    .option('-p, --parents', 'Create parent folders as needed')
  cli.command(COMMAND_HELP.mv.usage, COMMAND_HELP.mv.description)
  cli
    .command(COMMAND_HELP.put.usage, COMMAND_HELP.put.description)
    .option('--in-place', 'Replace the destination directly')
  cli.command(COMMAND_HELP.get.usage, COMMAND_HELP.get.description)
  cli.command(COMMAND_HELP.cat.usage, COMMAND_HELP.cat.description)
  cli.command(COMMAND_HELP.touch.usage, COMMAND_HELP.touch.description).option('--date <iso>', 'Use this time')

  return {
    name: 'drivepath',
    parse: cli.parse.bind(cli),
    commands: COMMAND_NAMES,
    cli,
  }
}

const isHelpFlag = (arg: string | undefined) => arg === '--help' || arg === '-h'

/**
 * Execute a CLI command with the given arguments and context
 */
export async function runCLI(args: string[], context: CLIContext): Promise<CommandResult> {
  const { stdout, stderr } = context

  const commandIndex = args.findIndex((arg) => !arg.startsWith('-'))
  const leading = commandIndex === -1 ? args : args.slice(0, commandIndex)

  if (leading.includes('--version') || leading.includes('-v')) {
    stdout(VERSION)
    return { exitCode: 0 }
  }

  if (args.length === 0 || (args.length === 1 && isHelpFlag(args[0]))) {
    stdout(mainHelp())
    return { exitCode: 0 }
  }

  const command = args[commandIndex] ?? ''

  if (args.some(isHelpFlag)) {
    const helpText = getCommandHelp(command)
    if (helpText) {
      stdout(helpText)
      return { exitCode: 0 }
    }
  }

  if (!isCommandName(command)) {
    const message = unknownCommandError(command)
    stderr(message)
    return { exitCode: 1, error: message }
  }

  const parsed = createCLI().parse(['node', 'drivepath', ...args], { run: false })
  const positional = [...parsed.args]
  const options: Options = parsed.options

  const missing = REQUIRED_ARGS[command][positional.length]
  if (missing !== undefined) {
    const message = missingArgumentError(command, missing)
    stderr(message)
    return { exitCode: 1, error: message }
  }

  try {
    const drive = context.createDrive({ memory: options['memory'] === true })
    const output = await execute(command, positional, options, drive)
    if (output !== undefined && output !== '') {
      stdout(output)
    }
    return { exitCode: 0, ...(output ? { output } : {}) }
  } catch (err: unknown) {
    const message = formatError(command, err)
    stderr(message)
    return { exitCode: 1, error: message }
  }
}

// =============================================================================
// Commands
// =============================================================================

function stringOption(options: Options, name: string): string | undefined {
  const value = options[name]
  if (typeof value === 'string' || typeof value === 'number') return String(value)
  return undefined
}

/**
 * Run one command; resolves to the text to print, if any.
 */
async function execute(
  command: CommandName,
  args: readonly string[],
  options: Options,
  drive: DrivePath
): Promise<string | undefined> {
  const [first = '', second = ''] = args

  switch (command) {
    case 'stat':
      return formatObject(await drive.stat(first))

    case 'ls': {
      const target = await drive.stat(first || '/')
      const entries = isDir(target) ? await drive.listDir(first) : [target]
      return formatLsOutput(entries, { long: options['long'] === true })
    }

    case 'mkdir':
      for (const path of args) {
        await drive.mkdir(path, { recursive: options['parents'] === true })
      }
      return undefined

    case 'mv':
      await drive.move(first, second)
      return undefined

    case 'put':
      await drive.insertFile(first, second, { inPlace: options['inPlace'] === true })
      return undefined

    case 'get':
      await drive.downloadToFile(first, second)
      return undefined

    case 'cat': {
      const decoder = new TextDecoder()
      const contents: string[] = []
      for (const path of args) {
        contents.push(decoder.decode(await collectBytes(await drive.download(path))))
      }
      return contents.join('')
    }

    case 'touch': {
      const date = stringOption(options, 'date')
      const time = date === undefined ? new Date() : new Date(date)
      if (Number.isNaN(time.getTime())) {
        throw new EINVAL('touch', date, undefined, 'invalid date')
      }
      await drive.stat(first).catch((error: unknown) => {
        if (!isObjectNotFound(error)) throw error
        return drive.insert(first, '')
      })
      await drive.setModifiedDate(first, time)
      return undefined
    }
  }
}
