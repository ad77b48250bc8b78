import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Readable } from 'node:stream'
import { vi } from 'vitest'
import { FETCH_SIZE_LIMIT } from './config.js'
import type { DaemonClient, DaemonResponse } from './daemon.js'
import { TransportError } from './errors.js'
import { limitStream, type FetchStream } from './limited-stream.js'
import type { Logger } from './logger.js'
import type { CommandRunner, PlatformID } from './platform.js'

export const LINUX_AMD64: PlatformID = { os: 'linux', arch: 'amd64', variant: 'linux' }
export const WINDOWS_AMD64: PlatformID = { os: 'windows', arch: 'amd64', variant: 'windows' }

export function streamOf(content: string | Buffer): FetchStream {
  const data = typeof content === 'string' ? Buffer.from(content) : content
  return limitStream(Readable.from([data]), FETCH_SIZE_LIMIT, data.length)
}

export async function readAll(body: Readable): Promise<Buffer> {
  const chunks: Buffer[] = []
  for await (const chunk of body) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }
  return Buffer.concat(chunks)
}

/**
 * In-memory content fetcher keyed by logical path. Unknown paths fail the
 * way an exhausted transport does.
 */
export function createFakeFetcher(files: Record<string, string | Buffer>) {
  const streams: FetchStream[] = []
  const fetch = vi.fn(async (logicalPath: string, _signal?: AbortSignal) => {
    const content = files[logicalPath]
    if (content === undefined) {
      throw new TransportError(`GET ${logicalPath} error: 404 Not Found`, {
        path: logicalPath,
      })
    }
    const stream = streamOf(content)
    streams.push(stream)
    return stream
  })
  return { fetch, streams }
}

export function createFakeDaemon(
  response: () => DaemonResponse = () => ({
    output: Readable.from([Buffer.from('from-daemon')]),
    error: null,
  }),
) {
  return {
    resolveEndpoint: vi.fn(async () => 'http://127.0.0.1:5001'),
    isReachable: vi.fn(async (_endpoint: string, _signal?: AbortSignal) => true),
    requestContent: vi.fn(
      async (_endpoint: string, _path: string, _signal?: AbortSignal) => response(),
    ),
  } satisfies DaemonClient
}

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger
}

export function fakeRunner(output: string, exitIgnored = false): CommandRunner {
  return vi.fn(async () => ({ output, exitIgnored }))
}

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'distfetch-test-'))
  try {
    return await fn(dir)
  } finally {
    await rm(dir, { recursive: true, force: true })
  }
}
