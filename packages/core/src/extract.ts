import { createWriteStream } from 'node:fs'
import { chmod, mkdir, stat } from 'node:fs/promises'
import { join } from 'node:path'
import { pipeline } from 'node:stream/promises'
import { extract as tarExtract } from 'tar'
import * as yauzl from 'yauzl'
import { ExtractError, errorMessage } from './errors.js'
import type { ArchiveType } from './platform.js'

export type ExtractEntryOptions = {
  archivePath: string
  archiveType: ArchiveType
  /** Directory the single matching entry is written into. */
  destination: string
  /** Accepted entry names, in archive form (`/` separated, no leading `./`). */
  candidates: string[]
}

const FILE_TYPES = new Set<string>(['File', 'OldFile', 'ContiguousFile'])

export function entryCandidates(dist: string, binaryName: string): string[] {
  return [binaryName, `${dist}/${binaryName}`]
}

export function normalizeEntryName(name: string): string {
  return name.replace(/\\/g, '/').replace(/^(\.\/)+/, '')
}

/**
 * Extract the first entry whose name is one of `candidates` and return the
 * path it was written to, or `null` when the archive has no such entry.
 * No other member is written.
 */
export async function extractEntry(
  options: ExtractEntryOptions,
): Promise<string | null> {
  const { archiveType } = options

  switch (archiveType) {
    case 'tar.gz':
      return extractTarGzEntry(options)
    case 'zip':
      return extractZipEntry(options)
  }
}

export async function extractTarGzEntry(
  options: ExtractEntryOptions,
): Promise<string | null> {
  const { archivePath, destination, candidates } = options
  const matches: string[] = []

  await mkdir(destination, { recursive: true })

  try {
    await tarExtract({
      file: archivePath,
      cwd: destination,
      strict: true,
      filter: (path, entry) => {
        if (matches.length > 0) return false
        if ('type' in entry && !FILE_TYPES.has(entry.type)) return false
        if (!candidates.includes(normalizeEntryName(path))) return false
        matches.push(path)
        return true
      },
    })
  } catch (error) {
    throw new ExtractError(
      `Failed to extract ${archivePath}: ${errorMessage(error)}`,
      { path: archivePath, cause: error },
    )
  }

  const [matched] = matches
  if (matched === undefined) return null

  const extracted = join(destination, normalizeEntryName(matched))
  const info = await stat(extracted).catch(() => null)
  return info?.isFile() ? extracted : null
}

export function extractZipEntry(
  options: ExtractEntryOptions,
): Promise<string | null> {
  const { archivePath, destination, candidates } = options

  const fail = (message: string, cause: unknown) =>
    new ExtractError(`Failed to extract ${archivePath}: ${message}`, {
      path: archivePath,
      cause,
    })

  return new Promise((resolve, reject) => {
    yauzl.open(archivePath, { lazyEntries: true, autoClose: false }, (openError, zipfile) => {
      if (openError || !zipfile) {
        reject(fail(openError ? openError.message : 'no zip file', openError))
        return
      }

      let done = false
      const finish = (error: unknown, result: string | null) => {
        if (done) return
        done = true
        zipfile.close()
        if (error) reject(error)
        else resolve(result)
      }

      zipfile.on('entry', (entry: yauzl.Entry) => {
        const name = normalizeEntryName(entry.fileName)
        if (name.endsWith('/') || !candidates.includes(name)) {
          zipfile.readEntry()
          return
        }

        zipfile.openReadStream(entry, (streamError, readStream) => {
          if (streamError || !readStream) {
            finish(fail(streamError ? streamError.message : 'no entry stream', streamError), null)
            return
          }

          const target = join(destination, name)
          mkdir(join(target, '..'), { recursive: true })
            .then(() => pipeline(readStream, createWriteStream(target)))
            .then(async () => {
              // Unix mode lives in the upper 16 bits of the external attributes
              const mode = (entry.externalFileAttributes >>> 16) & 0o777
              if (mode !== 0) {
                await chmod(target, mode)
              }
            })
            .then(
              () => finish(null, target),
              (error: unknown) => finish(error, null),
            )
        })
      })

      zipfile.on('end', () => finish(null, null))
      zipfile.on('error', (error: Error) => finish(fail(error.message, error), null))

      zipfile.readEntry()
    })
  })
}
