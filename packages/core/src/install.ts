import { createWriteStream, type Stats } from 'node:fs'
import { chmod, copyFile, mkdtemp, rm, stat } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { pipeline } from 'node:stream/promises'
import { AlreadyExistsError, ExtractError, toIOError } from './errors.js'
import { entryCandidates, extractEntry } from './extract.js'
import type { FetchStream } from './limited-stream.js'
import { silentLogger, type Logger } from './logger.js'
import {
  archiveName,
  archiveTypeFor,
  exeName,
  isWindows,
  type PlatformID,
} from './platform.js'

/** One fetch+install operation. */
export type DistTarget = {
  dist: string
  version: string
  /** Base name of the archive file; usually the distribution name. */
  archiveBase: string
  /** Name of the binary inside the archive, platform suffix included. */
  binaryName: string
  /** Output file, or an existing directory to place the binary in. */
  output: string
}

export type DistTargetInput = {
  dist: string
  version: string
  archiveName?: string
  binaryName?: string
  output: string
}

export function createDistTarget(
  input: DistTargetInput,
  platform: PlatformID,
): DistTarget {
  const archiveBase = input.archiveName || input.dist
  const binaryBase = input.binaryName || archiveBase

  return {
    dist: input.dist,
    version: input.version,
    archiveBase,
    binaryName: exeName(binaryBase, platform),
    output: input.output,
  }
}

/**
 * Decide where the binary goes. An existing directory receives
 * `output/binaryName`; a missing path is used as is; anything else already
 * at `output` is refused.
 */
export async function resolveOutputPath(
  output: string,
  binaryName: string,
): Promise<string> {
  let info: Stats
  try {
    info = await stat(output)
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return output
    }
    throw toIOError('stat', output, error)
  }

  if (!info.isDirectory()) {
    throw new AlreadyExistsError(`${output} already exists`, { path: output })
  }
  return join(output, binaryName)
}

export async function makeExecutable(
  filePath: string,
  platform: PlatformID,
): Promise<void> {
  if (isWindows(platform)) return
  await chmod(filePath, 0o755)
}

export type InstallOptions = {
  signal?: AbortSignal
  onProgress?: (downloaded: number, total: number) => void
}

export type ArchiveInstallerOptions = {
  platform: PlatformID
  /** Parent of the per-install staging directories. */
  tempDir?: string
  logger?: Logger
}

/**
 * Stages a downloaded archive in a private temporary directory, pulls the
 * one expected binary out of it and places it at the output path.
 */
export class ArchiveInstaller {
  private readonly platform: PlatformID
  private readonly tempDir: string
  private readonly logger: Logger

  constructor(options: ArchiveInstallerOptions) {
    this.platform = options.platform
    this.tempDir = options.tempDir ?? tmpdir()
    this.logger = options.logger ?? silentLogger
  }

  async install(
    archive: FetchStream,
    target: DistTarget,
    options: InstallOptions = {},
  ): Promise<string> {
    const { signal, onProgress } = options

    try {
      const out = await resolveOutputPath(target.output, target.binaryName)
      const archiveType = archiveTypeFor(this.platform)
      const fileName = archiveName(
        target.archiveBase,
        target.version,
        archiveType,
        this.platform,
      )

      const staging = await this.createStagingDir(target.archiveBase)
      try {
        const archivePath = join(staging, fileName)
        await this.stageArchive(archive, archivePath, signal, onProgress)
        archive.close()

        const extracted = await extractEntry({
          archivePath,
          archiveType,
          destination: join(staging, 'extract'),
          candidates: entryCandidates(target.dist, target.binaryName),
        })
        if (extracted === null) {
          throw new ExtractError(
            `${target.binaryName} not found in ${fileName}`,
            { path: archivePath },
          )
        }

        await copyFile(extracted, out).catch((error: unknown) => {
          throw toIOError('copy', out, error)
        })
        await makeExecutable(out, this.platform).catch((error: unknown) => {
          throw toIOError('chmod', out, error)
        })
      } finally {
        await rm(staging, { recursive: true, force: true })
      }

      this.logger.info('Installed binary', { path: out, version: target.version })
      return out
    } finally {
      archive.close()
    }
  }

  private async createStagingDir(prefix: string): Promise<string> {
    try {
      return await mkdtemp(join(this.tempDir, `${prefix}-`))
    } catch (error) {
      throw toIOError('mkdtemp', this.tempDir, error)
    }
  }

  private async stageArchive(
    archive: FetchStream,
    archivePath: string,
    signal?: AbortSignal,
    onProgress?: (downloaded: number, total: number) => void,
  ): Promise<void> {
    const total = archive.length ?? 0
    let downloaded = 0

    try {
      await pipeline(
        archive.body,
        async function* (source: AsyncIterable<Buffer>) {
          for await (const chunk of source) {
            downloaded += chunk.length
            onProgress?.(downloaded, total)
            yield chunk
          }
        },
        createWriteStream(archivePath),
        { signal },
      )
    } catch (error) {
      signal?.throwIfAborted()
      throw toIOError('write', archivePath, error)
    }

    this.logger.debug('Staged archive', { path: archivePath, bytes: downloaded })
  }
}
