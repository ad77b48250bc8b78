import { homedir } from 'node:os'
import { join } from 'node:path'

export const DEFAULT_GATEWAY_URL = 'https://ipfs.io'
export const DEFAULT_DIST_ROOT = '/ipns/dist.ipfs.tech'

// Daemon requests cover the whole body transfer, not just the headers
export const DEFAULT_REQUEST_TIMEOUT_MS = 5 * 60 * 1000

export const FETCH_SIZE_LIMIT = 512 * 1024 * 1024

export const USER_AGENT = 'distfetch/0.1.0'

export type DistConfig = {
  /** HTTPS origin that logical paths are appended to verbatim. */
  gatewayUrl: string
  /** Root of the distribution layout, e.g. `/ipns/dist.ipfs.tech`. */
  distRoot: string
  /** Repository directory holding the daemon's `api` file. */
  ipfsPath: string
  requestTimeoutMs: number
  sizeLimit: number
  userAgent: string
}

export type Env = Record<string, string | undefined>

export function getIpfsPath(env: Env = process.env): string {
  if (env['IPFS_PATH']) {
    return env['IPFS_PATH']
  }
  return join(homedir(), '.ipfs')
}

/**
 * Build a config from explicit options, then the environment, then the
 * built-in defaults. Trailing slashes are trimmed from the gateway URL and
 * the dist root so paths can be joined with a single `/`.
 */
export function resolveConfig(
  options: Partial<DistConfig> = {},
  env: Env = process.env,
): DistConfig {
  const gatewayUrl =
    options.gatewayUrl ?? env['DISTFETCH_GATEWAY_URL'] ?? DEFAULT_GATEWAY_URL
  const distRoot =
    options.distRoot ?? env['DISTFETCH_DIST_ROOT'] ?? DEFAULT_DIST_ROOT

  return {
    gatewayUrl: trimTrailingSlash(gatewayUrl),
    distRoot: trimTrailingSlash(distRoot),
    ipfsPath: options.ipfsPath ?? getIpfsPath(env),
    requestTimeoutMs: options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    sizeLimit: options.sizeLimit ?? FETCH_SIZE_LIMIT,
    userAgent: options.userAgent ?? USER_AGENT,
  }
}

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '')
}
