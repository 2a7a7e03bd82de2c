export interface PollerCommand {
  /** Run a single cycle and exit */
  once: boolean
  /** Validate configuration and exit */
  checkConfig: boolean
  inventoryPath?: string
  profilesPath?: string
  catalogPath?: string
}

const SWITCHES = {
  once: 'once',
  'check-config': 'checkConfig',
  help: 'help',
} as const

const PATH_FLAGS = {
  inventory: 'inventoryPath',
  profiles: 'profilesPath',
  catalog: 'catalogPath',
} as const

type Switch = keyof typeof SWITCHES
type PathFlag = keyof typeof PATH_FLAGS

function isSwitch(key: string): key is Switch {
  return Object.hasOwn(SWITCHES, key)
}

function isPathFlag(key: string): key is PathFlag {
  return Object.hasOwn(PATH_FLAGS, key)
}

export const USAGE =
  'Usage: fieldpoll [--once] [--check-config] [--inventory PATH] [--profiles PATH] [--catalog PATH]'

/**
 * @throws Error on unknown flags, stray arguments, a value after a switch, or a path flag without a value
 */
export function parseCommand(argv: string[]): PollerCommand & { help: boolean } {
  const command: PollerCommand & { help: boolean } = { once: false, checkConfig: false, help: false }

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      throw new Error(`Unexpected argument ${token}`)
    }

    const key = token.slice(2)
    const next: string | undefined = argv[i + 1]

    if (isSwitch(key)) {
      if (next !== undefined && !next.startsWith('--')) {
        throw new Error(`--${key} does not take a value`)
      }
      command[SWITCHES[key]] = true
    } else if (isPathFlag(key)) {
      if (next === undefined || next.startsWith('--')) {
        throw new Error(`--${key} requires a path`)
      }
      command[PATH_FLAGS[key]] = next
      i++
    } else {
      throw new Error(`Unknown flag --${key}`)
    }
  }

  return command
}
