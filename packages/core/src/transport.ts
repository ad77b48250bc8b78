import { Readable } from 'node:stream'
import { FETCH_SIZE_LIMIT, USER_AGENT } from './config.js'
import type { DaemonClient, FetchFn } from './daemon.js'
import { TransportError, errorMessage } from './errors.js'
import { limitStream, type FetchStream } from './limited-stream.js'
import { silentLogger, type Logger } from './logger.js'

/** Anything that can open a logical distribution path as a byte stream. */
export type ContentFetcher = {
  fetch(logicalPath: string, signal?: AbortSignal): Promise<FetchStream>
}

export type TransportOptions = {
  gatewayUrl: string
  /** `null` skips the daemon and goes straight to the gateway. */
  daemon: DaemonClient | null
  fetch?: FetchFn
  sizeLimit?: number
  userAgent?: string
  logger?: Logger
}

function contentLength(response: Response): number | null {
  const header = response.headers.get('content-length')
  if (header === null) return null
  const length = Number(header)
  return Number.isFinite(length) && length >= 0 ? length : null
}

/**
 * Fetches logical paths through the local daemon when one is running,
 * falling back once to the HTTP gateway.
 */
export class DistTransport implements ContentFetcher {
  private readonly gatewayUrl: string
  private readonly daemon: DaemonClient | null
  private readonly fetchFn: FetchFn
  private readonly sizeLimit: number
  private readonly userAgent: string
  private readonly logger: Logger

  constructor(options: TransportOptions) {
    this.gatewayUrl = options.gatewayUrl
    this.daemon = options.daemon
    this.fetchFn = options.fetch ?? fetch
    this.sizeLimit = options.sizeLimit ?? FETCH_SIZE_LIMIT
    this.userAgent = options.userAgent ?? USER_AGENT
    this.logger = options.logger ?? silentLogger
  }

  async fetch(logicalPath: string, signal?: AbortSignal): Promise<FetchStream> {
    if (this.daemon) {
      try {
        const stream = await this.fetchFromDaemon(this.daemon, logicalPath, signal)
        this.logger.info('Using local daemon for transfer', { path: logicalPath })
        return stream
      } catch (error) {
        signal?.throwIfAborted()
        this.logger.debug('Daemon transfer unavailable', {
          path: logicalPath,
          reason: errorMessage(error),
        })
      }
    }

    try {
      const stream = await this.fetchFromGateway(logicalPath, signal)
      this.logger.info('Using HTTP gateway for transfer', { url: this.gatewayUrl })
      return stream
    } catch (error) {
      signal?.throwIfAborted()
      throw new TransportError(errorMessage(error), {
        path: logicalPath,
        cause: error,
      })
    }
  }

  private async fetchFromDaemon(
    daemon: DaemonClient,
    logicalPath: string,
    signal?: AbortSignal,
  ): Promise<FetchStream> {
    const endpoint = await daemon.resolveEndpoint()
    if (!(await daemon.isReachable(endpoint, signal))) {
      throw new Error(`daemon at ${endpoint} is not up`)
    }

    const { output, error } = await daemon.requestContent(endpoint, logicalPath, signal)
    if (error) {
      output?.destroy()
      throw error
    }
    if (!output) {
      throw new Error(`daemon returned no content for ${logicalPath}`)
    }

    return limitStream(output, this.sizeLimit)
  }

  private async fetchFromGateway(
    logicalPath: string,
    signal?: AbortSignal,
  ): Promise<FetchStream> {
    const url = `${this.gatewayUrl}${logicalPath}`
    const response = await this.fetchFn(url, {
      headers: { 'User-Agent': this.userAgent },
      signal,
    })

    if (response.status >= 400) {
      const body = await response.text()
      throw new Error(`GET ${url} error: ${response.status} ${response.statusText}: ${body}`)
    }

    if (!response.body) {
      throw new Error(`No response body received from ${url}`)
    }

    return limitStream(
      Readable.fromWeb(response.body),
      this.sizeLimit,
      contentLength(response),
    )
  }
}
