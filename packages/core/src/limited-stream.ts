import { Readable } from 'node:stream'

/**
 * An open, size-bounded byte source. The caller owns it once it is returned
 * and must call `close()` on every path; `close()` may be called any number
 * of times.
 */
export type FetchStream = {
  body: Readable
  /** Advertised size in bytes, when the transport knows it. */
  length: number | null
  close(): void
}

async function* take(source: Readable, limit: number): AsyncGenerator<Buffer> {
  let remaining = limit
  if (remaining <= 0) return

  for await (const chunk of source) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))
    if (buf.length >= remaining) {
      yield buf.subarray(0, remaining)
      return
    }
    remaining -= buf.length
    yield buf
  }
}

/**
 * Wrap `source` so that at most `limit` bytes can be read before the body
 * reports end-of-data, however much the source still holds.
 */
export function limitStream(
  source: Readable,
  limit: number,
  length: number | null = null,
): FetchStream {
  const body = Readable.from(take(source, limit), { objectMode: false })
  let closed = false

  return {
    body,
    length: length === null ? null : Math.min(length, limit),
    close() {
      if (closed) return
      closed = true
      body.destroy()
      source.destroy()
    },
  }
}
