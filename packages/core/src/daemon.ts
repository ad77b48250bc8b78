import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { Readable } from 'node:stream'
import { DEFAULT_REQUEST_TIMEOUT_MS, USER_AGENT } from './config.js'
import { IOError, errorMessage } from './errors.js'

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>

export type DaemonResponse = {
  output: Readable | null
  /** Set when the daemon accepted the request but reported a failure. */
  error: Error | null
}

/**
 * Local daemon able to serve content by logical path. Tried before the
 * public gateway.
 */
export type DaemonClient = {
  resolveEndpoint(): Promise<string>
  isReachable(endpoint: string, signal?: AbortSignal): Promise<boolean>
  requestContent(
    endpoint: string,
    path: string,
    signal?: AbortSignal,
  ): Promise<DaemonResponse>
}

export type HttpDaemonClientOptions = {
  /** Repository directory holding the `api` file. */
  ipfsPath: string
  timeoutMs?: number
  userAgent?: string
  fetch?: FetchFn
}

const API_FILE = 'api'

/**
 * Turn the multiaddr a daemon writes to its `api` file into an HTTP base URL.
 *
 * @example multiaddrToUrl('/ip4/127.0.0.1/tcp/5001') // => 'http://127.0.0.1:5001'
 */
export function multiaddrToUrl(addr: string): string {
  const parts = addr.trim().split('/').filter(Boolean)
  const [proto, host, transport, port] = parts

  if (
    proto === undefined ||
    host === undefined ||
    transport !== 'tcp' ||
    port === undefined ||
    !/^\d+$/.test(port)
  ) {
    throw new Error(`Unsupported API address: ${addr.trim()}`)
  }

  switch (proto) {
    case 'ip4':
    case 'dns':
    case 'dns4':
    case 'dns6':
      return `http://${host}:${port}`
    case 'ip6':
      return `http://[${host}]:${port}`
    default:
      throw new Error(`Unsupported API address: ${addr.trim()}`)
  }
}

function readDaemonMessage(text: string): string {
  try {
    const parsed: unknown = JSON.parse(text)
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'Message' in parsed &&
      typeof parsed.Message === 'string'
    ) {
      return parsed.Message
    }
  } catch {
    // plain-text error body
  }
  return text.trim()
}

/**
 * Client for the daemon's HTTP RPC API. Every request carries a timeout in
 * addition to the caller's signal.
 */
export class HttpDaemonClient implements DaemonClient {
  private readonly ipfsPath: string
  private readonly timeoutMs: number
  private readonly userAgent: string
  private readonly fetchFn: FetchFn

  constructor(options: HttpDaemonClientOptions) {
    this.ipfsPath = options.ipfsPath
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
    this.userAgent = options.userAgent ?? USER_AGENT
    this.fetchFn = options.fetch ?? fetch
  }

  async resolveEndpoint(): Promise<string> {
    const apiFile = join(this.ipfsPath, API_FILE)
    let content: string
    try {
      content = await readFile(apiFile, 'utf-8')
    } catch (error) {
      throw new IOError(
        `Cannot read daemon API file ${apiFile}: ${errorMessage(error)}`,
        { path: apiFile, cause: error },
      )
    }
    return multiaddrToUrl(content)
  }

  async isReachable(endpoint: string, signal?: AbortSignal): Promise<boolean> {
    try {
      const response = await this.post(`${endpoint}/api/v0/id`, signal)
      await response.arrayBuffer()
      return response.ok
    } catch (error) {
      if (signal?.aborted) throw error
      return false
    }
  }

  async requestContent(
    endpoint: string,
    path: string,
    signal?: AbortSignal,
  ): Promise<DaemonResponse> {
    const url = `${endpoint}/api/v0/cat?arg=${encodeURIComponent(path)}`
    const response = await this.post(url, signal)

    if (!response.ok) {
      const message = readDaemonMessage(await response.text())
      return {
        output: null,
        error: new Error(
          `daemon cat ${path}: ${response.status}${message ? `: ${message}` : ''}`,
        ),
      }
    }

    if (!response.body) {
      return { output: null, error: new Error(`daemon cat ${path}: empty response`) }
    }

    return { output: Readable.fromWeb(response.body), error: null }
  }

  private post(url: string, signal?: AbortSignal): Promise<Response> {
    const timeout = AbortSignal.timeout(this.timeoutMs)
    return this.fetchFn(url, {
      method: 'POST',
      headers: { 'User-Agent': this.userAgent },
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    })
  }
}
