import { createInterface } from 'node:readline'
import * as semver from 'semver'
import type { SemVer } from 'semver'
import { DEFAULT_DIST_ROOT } from './config.js'
import { DistError, NotFoundError, ReadError, errorMessage } from './errors.js'
import type { FetchStream } from './limited-stream.js'
import { versionsPath } from './platform.js'
import type { ContentFetcher } from './transport.js'

export const DEFAULT_VERSION_PREFIX = 'v'

const DEV_MARKER = '-dev'

export type VersionCatalogOptions = {
  distRoot?: string
  prefix?: string
}

function versionString(version: SemVer): string {
  return version.build.length > 0
    ? `${version.version}+${version.build.join('.')}`
    : version.version
}

/**
 * Parse version lines, dropping any that are not semantic versions once one
 * leading `prefix` is removed. Output is sorted by semver precedence (stable
 * for equal precedence) and every entry carries `prefix` again.
 */
export function parseVersions(
  lines: Iterable<string>,
  prefix: string = DEFAULT_VERSION_PREFIX,
  descending = false,
): string[] {
  const versions: SemVer[] = []

  for (const raw of lines) {
    const line = raw.trim()
    const text = prefix && line.startsWith(prefix) ? line.slice(prefix.length) : line
    const version = semver.parse(text)
    if (version) {
      versions.push(version)
    }
  }

  versions.sort((a, b) => semver.compare(a, b))
  if (descending) {
    versions.reverse()
  }

  return versions.map((version) => `${prefix}${versionString(version)}`)
}

/**
 * Lists the versions a distribution publishes in its `versions` file.
 */
export class VersionCatalog {
  private readonly distRoot: string
  private readonly prefix: string

  constructor(
    private readonly fetcher: ContentFetcher,
    options: VersionCatalogOptions = {},
  ) {
    this.distRoot = options.distRoot ?? DEFAULT_DIST_ROOT
    this.prefix = options.prefix ?? DEFAULT_VERSION_PREFIX
  }

  async listVersions(
    dist: string,
    descending = false,
    signal?: AbortSignal,
  ): Promise<string[]> {
    const path = versionsPath(dist, this.distRoot)

    let stream: FetchStream
    try {
      stream = await this.fetcher.fetch(path, signal)
    } catch (error) {
      signal?.throwIfAborted()
      throw new ReadError(`Could not fetch versions of ${dist}: ${errorMessage(error)}`, {
        path,
        cause: error,
      })
    }

    const lines: string[] = []
    try {
      const reader = createInterface({ input: stream.body, crlfDelay: Infinity })
      for await (const line of reader) {
        lines.push(line)
      }
    } catch (error) {
      if (error instanceof DistError) throw error
      throw new ReadError(`Could not read versions of ${dist}: ${errorMessage(error)}`, {
        path,
        cause: error,
      })
    } finally {
      stream.close()
    }

    return parseVersions(lines, this.prefix, descending)
  }

  /** Newest version whose text does not carry the `-dev` marker. */
  async latestStable(dist: string, signal?: AbortSignal): Promise<string> {
    const versions = await this.listVersions(dist, false, signal)

    for (let i = versions.length - 1; i >= 0; i--) {
      const version = versions[i]
      if (version !== undefined && !version.includes(DEV_MARKER)) {
        return version
      }
    }

    throw new NotFoundError(`Could not find a non-dev version of ${dist}`, {
      path: versionsPath(dist, this.distRoot),
    })
  }
}
