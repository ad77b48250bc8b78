export type Command =
  | { kind: 'help' }
  | { kind: 'platform' }
  | { kind: 'versions'; dist: string; descending: boolean }
  | { kind: 'latest'; dist: string }
  | {
      kind: 'fetch'
      dist: string
      /** `undefined` means the latest stable version. */
      version: string | undefined
      output: string
      archiveName: string | undefined
      binaryName: string | undefined
    }

export type CliOptions = {
  command: Command
  gatewayUrl: string | undefined
  daemon: boolean
  verbose: boolean
}

export const USAGE = `
Usage: distfetch <command> [options]

Commands:
  versions <dist>              List published versions (ascending)
  latest <dist>                Print the newest non-dev version
  fetch <dist> [version]       Download and install a binary (default: latest)
  platform                     Print the platform identifier of this host

Options:
  --desc                       List versions newest first
  --out <path>                 Output file or directory (default: .)
  --archive <name>             Archive base name, if not the dist name
  --binary <name>              Binary name inside the archive
  --gateway <url>              HTTP gateway to fall back to
  --no-daemon                  Do not try the local daemon
  --verbose                    Log debug output
  --help, -h                   Show this help
`

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} requires a value`)
  }
  return value
}

export function parseArgs(argv: string[]): CliOptions {
  const positional: string[] = []
  let descending = false
  let output = '.'
  let archiveName: string | undefined
  let binaryName: string | undefined
  let gatewayUrl: string | undefined
  let daemon = true
  let verbose = false
  let help = false

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    switch (arg) {
      case '--desc':
        descending = true
        break
      case '--out':
        output = requireValue(arg, argv[++i])
        break
      case '--archive':
        archiveName = requireValue(arg, argv[++i])
        break
      case '--binary':
        binaryName = requireValue(arg, argv[++i])
        break
      case '--gateway':
        gatewayUrl = requireValue(arg, argv[++i])
        break
      case '--no-daemon':
        daemon = false
        break
      case '--verbose':
        verbose = true
        break
      case '--help':
      case '-h':
        help = true
        break
      default:
        if (arg === undefined) break
        if (arg.startsWith('-')) {
          throw new UsageError(`Unknown option: ${arg}`)
        }
        positional.push(arg)
    }
  }

  const base = { gatewayUrl, daemon, verbose }
  const [name, dist, version] = positional

  if (help || name === undefined) {
    return { ...base, command: { kind: 'help' } }
  }

  if (name === 'platform') {
    return { ...base, command: { kind: 'platform' } }
  }

  if (name !== 'versions' && name !== 'latest' && name !== 'fetch') {
    throw new UsageError(`Unknown command: ${name}`)
  }
  if (dist === undefined) {
    throw new UsageError(`${name} requires a distribution name`)
  }

  switch (name) {
    case 'versions':
      return { ...base, command: { kind: 'versions', dist, descending } }
    case 'latest':
      return { ...base, command: { kind: 'latest', dist } }
    case 'fetch':
      return {
        ...base,
        command: { kind: 'fetch', dist, version, output, archiveName, binaryName },
      }
  }
}
