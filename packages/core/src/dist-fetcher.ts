import { resolveConfig, type DistConfig } from './config.js'
import { HttpDaemonClient, type DaemonClient, type FetchFn } from './daemon.js'
import { createDistTarget, resolveOutputPath, ArchiveInstaller } from './install.js'
import { silentLogger, type Logger } from './logger.js'
import {
  archiveName,
  archiveTypeFor,
  distPath,
  platformID,
  type PlatformOptions,
} from './platform.js'
import { DistTransport, type ContentFetcher } from './transport.js'
import { VersionCatalog } from './versions.js'

export type DistFetcherOptions = Partial<DistConfig> & {
  /** Daemon to try first. Defaults to the daemon found under `ipfsPath`; `null` disables it. */
  daemon?: DaemonClient | null
  fetch?: FetchFn
  /** Replaces the whole transport, e.g. with an in-memory fake. */
  transport?: ContentFetcher
  platform?: Omit<PlatformOptions, 'signal'>
  tempDir?: string
  logger?: Logger
  env?: Record<string, string | undefined>
}

export type FetchBinaryOptions = {
  dist: string
  version: string
  /** Archive base name, when it differs from the distribution name. */
  archiveName?: string
  /** Binary name inside the archive, when it differs from the archive base name. */
  binaryName?: string
  /** Output file path, or an existing directory. */
  output: string
  signal?: AbortSignal
  onProgress?: (downloaded: number, total: number) => void
}

export class DistFetcher {
  readonly config: DistConfig
  private readonly transport: ContentFetcher
  private readonly catalog: VersionCatalog
  private readonly options: DistFetcherOptions
  private readonly logger: Logger

  constructor(options: DistFetcherOptions = {}) {
    this.options = options
    this.config = resolveConfig(options, options.env)
    this.logger = options.logger ?? silentLogger

    const daemon =
      options.daemon === undefined
        ? new HttpDaemonClient({
            ipfsPath: this.config.ipfsPath,
            timeoutMs: this.config.requestTimeoutMs,
            userAgent: this.config.userAgent,
            fetch: options.fetch,
          })
        : options.daemon

    this.transport =
      options.transport ??
      new DistTransport({
        gatewayUrl: this.config.gatewayUrl,
        daemon,
        fetch: options.fetch,
        sizeLimit: this.config.sizeLimit,
        userAgent: this.config.userAgent,
        logger: this.logger,
      })

    this.catalog = new VersionCatalog(this.transport, {
      distRoot: this.config.distRoot,
    })
  }

  listVersions(dist: string, descending = false, signal?: AbortSignal): Promise<string[]> {
    return this.catalog.listVersions(dist, descending, signal)
  }

  latestVersion(dist: string, signal?: AbortSignal): Promise<string> {
    return this.catalog.latestStable(dist, signal)
  }

  /**
   * Download the release archive of `dist` at `version` for this host and
   * install the binary it contains. Returns the path of the installed binary.
   *
   * @example
   * // archive "kubo_v0.7.0_linux-amd64.tar.gz" holds a binary named "ipfs"
   * await fetcher.fetchBinary({ dist: 'kubo', version: 'v0.7.0', binaryName: 'ipfs', output: dir })
   */
  async fetchBinary(options: FetchBinaryOptions): Promise<string> {
    const { signal, onProgress } = options
    const platform = await platformID({ ...this.options.platform, signal })
    const target = createDistTarget(options, platform)

    // Refuse an occupied output before touching the network
    await resolveOutputPath(target.output, target.binaryName)

    const archive = archiveName(
      target.archiveBase,
      target.version,
      archiveTypeFor(platform),
      platform,
    )
    const path = distPath(target.dist, target.version, archive, this.config.distRoot)
    this.logger.info('Fetching', { dist: target.dist, version: target.version, archive })

    const stream = await this.transport.fetch(path, signal)
    const installer = new ArchiveInstaller({
      platform,
      tempDir: this.options.tempDir,
      logger: this.logger,
    })
    return installer.install(stream, target, { signal, onProgress })
  }
}
