/**
 * Help text for CLI commands
 */

import { VERSION } from './version.js'

interface CommandHelp {
  usage: string
  description: string
  options: Array<[flags: string, description: string]>
}

const HELP_OPTION: [string, string] = ['-h, --help', 'Display this message']
const MEMORY_OPTION: [string, string] = ['--memory', 'Use an empty in-memory drive']

/**
 * Per-command help, in the order commands are listed
 */
export const COMMAND_HELP = {
  stat: {
    usage: 'stat <path>',
    description: 'show the metadata of a file or folder',
    options: [],
  },
  ls: {
    usage: 'ls [path]',
    description: 'list folder contents',
    options: [['-l, --long', 'Use long listing format']],
  },
  mkdir: {
    usage: 'mkdir <paths...>',
    description: 'create folders',
    options: [['-p, --parents', 'Create parent folders as needed']],
  },
  mv: {
    usage: 'mv <source> <dest>',
    description: 'move or rename, replacing a file at the destination',
    options: [],
  },
  put: {
    usage: 'put <local> <dest>',
    description: 'upload a local file, keeping its modification time',
    options: [['--in-place', 'Replace the destination directly instead of uploading to the temporary folder']],
  },
  get: {
    usage: 'get <source> <local>',
    description: 'download a file to the local filesystem',
    options: [],
  },
  cat: {
    usage: 'cat <paths...>',
    description: 'print file contents',
    options: [],
  },
  touch: {
    usage: 'touch <path>',
    description: 'set the modification time, creating an empty file if needed',
    options: [['--date <iso>', 'Use this time instead of now']],
  },
} satisfies Record<string, CommandHelp>

export type CommandName = keyof typeof COMMAND_HELP

export const COMMAND_NAMES: readonly CommandName[] = ['stat', 'ls', 'mkdir', 'mv', 'put', 'get', 'cat', 'touch']

export function isCommandName(value: string): value is CommandName {
  return COMMAND_NAMES.some((name) => name === value)
}

function table(rows: ReadonlyArray<readonly [string, string]>): string {
  const width = Math.max(...rows.map(([left]) => left.length))
  return rows.map(([left, right]) => `  ${left.padEnd(width)}  ${right}`).join('\n')
}

/**
 * Main help text shown with --help or no arguments
 */
export function mainHelp(): string {
  const commands = table(COMMAND_NAMES.map((name): [string, string] => [COMMAND_HELP[name].usage, COMMAND_HELP[name].description]))
  return `drivepath/${VERSION}

Usage:
  $ drivepath <command> [options]

Commands:
${commands}

For more info, run any command with the --help flag:
  $ drivepath ls --help

Options:
${table([MEMORY_OPTION, ['-v, --version', 'Display version number'], HELP_OPTION])}

Environment:
  DRIVEPATH_ACCESS_TOKEN  OAuth access token for the remote service
  DRIVEPATH_LOG_LEVEL     silent, error, warn, info or debug
`
}

/**
 * Get help text for a specific command
 */
export function getCommandHelp(command: string): string | null {
  if (!isCommandName(command)) return null
  const help: CommandHelp = COMMAND_HELP[command]
  return `drivepath/${VERSION}

Usage:
  $ drivepath ${help.usage}

Options:
${table([...help.options, MEMORY_OPTION, HELP_OPTION])}

Description:
  ${help.description}
`
}
