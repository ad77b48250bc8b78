import { exec } from 'node:child_process'
import { endianness } from 'node:os'
import { DEFAULT_DIST_ROOT } from './config.js'
import { ExecError, errorMessage } from './errors.js'

export type ArchiveType = 'tar.gz' | 'zip'

/**
 * Host identity in distribution naming: `linux`/`darwin`/`windows` and
 * `amd64`/`arm64`/`386`. `variant` is `linux-musl` on musl-based Linux and
 * the OS name everywhere else.
 */
export type PlatformID = {
  os: string
  arch: string
  variant: string
}

export type CommandResult = {
  /** stdout and stderr, interleaved. */
  output: string
  /** True when the command exited non-zero and the status was discarded. */
  exitIgnored: boolean
}

export type CommandRunner = (
  command: string,
  signal?: AbortSignal,
) => Promise<CommandResult>

const OS_NAMES: Partial<Record<NodeJS.Platform, string>> = {
  win32: 'windows',
  darwin: 'darwin',
  linux: 'linux',
  freebsd: 'freebsd',
  openbsd: 'openbsd',
  netbsd: 'netbsd',
  sunos: 'solaris',
  aix: 'aix',
  android: 'android',
}

const ARCH_NAMES: Partial<Record<NodeJS.Architecture, string>> = {
  x64: 'amd64',
  ia32: '386',
  arm64: 'arm64',
  arm: 'arm',
  s390x: 's390x',
  riscv64: 'riscv64',
  mips: 'mips',
  mipsel: 'mipsle',
}

// ldd prints its version on stdout with glibc; musl does not know the flag,
// prints its banner on stderr and exits 1
const LIBC_PROBE = 'ldd --version 2>&1'

export function osName(platform: NodeJS.Platform = process.platform): string {
  return OS_NAMES[platform] ?? platform
}

export function archName(arch: NodeJS.Architecture = process.arch): string {
  if (arch === 'ppc64') {
    return endianness() === 'LE' ? 'ppc64le' : 'ppc64'
  }
  return ARCH_NAMES[arch] ?? arch
}

/**
 * Run a shell command, capturing combined output. A non-zero exit status is
 * reported through `exitIgnored` instead of rejecting; only a command that
 * cannot be started (or is aborted) rejects.
 */
export const runIgnoringExitStatus: CommandRunner = (command, signal) =>
  new Promise((resolve, reject) => {
    exec(command, { signal, encoding: 'utf8' }, (error, stdout, stderr) => {
      const output = `${stdout}${stderr}`
      if (!error) {
        resolve({ output, exitIgnored: false })
        return
      }
      if (error.name === 'AbortError') {
        reject(error)
        return
      }
      if (typeof error.code === 'number') {
        resolve({ output, exitIgnored: true })
        return
      }
      reject(
        new ExecError(`Failed to run "${command}": ${errorMessage(error)}`, {
          cause: error,
        }),
      )
    })
  })

export type PlatformOptions = {
  platform?: NodeJS.Platform
  arch?: NodeJS.Architecture
  runner?: CommandRunner
  signal?: AbortSignal
}

export async function platformID(
  options: PlatformOptions = {},
): Promise<PlatformID> {
  const {
    platform = process.platform,
    arch = process.arch,
    runner = runIgnoringExitStatus,
    signal,
  } = options

  const os = osName(platform)
  const result: PlatformID = { os, arch: archName(arch), variant: os }

  if (platform !== 'linux') {
    return result
  }

  const { output } = await runner(LIBC_PROBE, signal)
  for (const line of output.split(/\r?\n/)) {
    if (line.includes('musl')) {
      return { ...result, variant: 'linux-musl' }
    }
  }

  return result
}

export function isWindows(platform: PlatformID): boolean {
  return platform.os === 'windows'
}

export function archiveTypeFor(platform: PlatformID): ArchiveType {
  return isWindows(platform) ? 'zip' : 'tar.gz'
}

export function exeName(name: string, platform: PlatformID): string {
  return isWindows(platform) ? `${name}.exe` : name
}

/**
 * Compose the archive file name of a distribution release. Releases are
 * named by OS alone; the libc variant does not appear.
 *
 * @example archiveName('ipfs-10-to-11', 'v1.8.0', 'tar.gz', platform)
 *   // => 'ipfs-10-to-11_v1.8.0_linux-amd64.tar.gz'
 */
export function archiveName(
  base: string,
  version: string,
  archiveType: ArchiveType,
  platform: PlatformID,
): string {
  return `${base}_${version}_${platform.os}-${platform.arch}.${archiveType}`
}

export function distPath(
  dist: string,
  version: string,
  archive: string,
  distRoot: string = DEFAULT_DIST_ROOT,
): string {
  return `${distRoot}/${dist}/${version}/${archive}`
}

export function versionsPath(
  dist: string,
  distRoot: string = DEFAULT_DIST_ROOT,
): string {
  return `${distRoot}/${dist}/versions`
}
