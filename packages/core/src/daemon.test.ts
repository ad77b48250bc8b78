import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { describe, it, expect, vi } from 'vitest'
import { HttpDaemonClient, multiaddrToUrl } from './daemon.js'
import { IOError } from './errors.js'
import { readAll, withTempDir } from './test-utils.js'

const ENDPOINT = 'http://127.0.0.1:5001'

describe('multiaddrToUrl', () => {
  it('converts ip4, ip6 and dns addresses', () => {
    expect(multiaddrToUrl('/ip4/127.0.0.1/tcp/5001')).toBe('http://127.0.0.1:5001')
    expect(multiaddrToUrl('/ip6/::1/tcp/5001\n')).toBe('http://[::1]:5001')
    expect(multiaddrToUrl('/dns4/localhost/tcp/8080')).toBe('http://localhost:8080')
  })

  it('rejects addresses without a tcp port', () => {
    expect(() => multiaddrToUrl('/ip4/127.0.0.1/udp/5001')).toThrow(
      'Unsupported API address: /ip4/127.0.0.1/udp/5001',
    )
    expect(() => multiaddrToUrl('/unix/tmp/api.sock')).toThrow('Unsupported API address')
    expect(() => multiaddrToUrl('')).toThrow('Unsupported API address')
  })
})

describe('HttpDaemonClient', () => {
  it('resolves the endpoint from the api file', async () => {
    await withTempDir(async (dir) => {
      await writeFile(join(dir, 'api'), '/ip4/127.0.0.1/tcp/5001\n')
      const client = new HttpDaemonClient({ ipfsPath: dir })

      expect(await client.resolveEndpoint()).toBe(ENDPOINT)
    })
  })

  it('fails with IOError when there is no api file', async () => {
    await withTempDir(async (dir) => {
      const client = new HttpDaemonClient({ ipfsPath: dir })

      await expect(client.resolveEndpoint()).rejects.toBeInstanceOf(IOError)
    })
  })

  it('probes reachability with the id call', async () => {
    const fetch = vi.fn(async (_url: string, _init: RequestInit) => new Response('{"ID":"peer"}'))
    const client = new HttpDaemonClient({ ipfsPath: '/unused', fetch })

    expect(await client.isReachable(ENDPOINT)).toBe(true)
    expect(fetch).toHaveBeenCalledWith(
      `${ENDPOINT}/api/v0/id`,
      expect.objectContaining({ method: 'POST' }),
    )
  })

  it('reports an unreachable daemon as false', async () => {
    const fetch = vi.fn(async (_url: string, _init: RequestInit): Promise<Response> => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:5001')
    })
    const client = new HttpDaemonClient({ ipfsPath: '/unused', fetch })

    expect(await client.isReachable(ENDPOINT)).toBe(false)
  })

  it('streams content for a path', async () => {
    const fetch = vi.fn(async (_url: string, _init: RequestInit) => new Response('v1.0.0\n'))
    const client = new HttpDaemonClient({ ipfsPath: '/unused', fetch })

    const { output, error } = await client.requestContent(ENDPOINT, '/ipns/dist.ipfs.tech/kubo/versions')

    expect(error).toBeNull()
    expect(output).not.toBeNull()
    if (output) {
      expect((await readAll(output)).toString()).toBe('v1.0.0\n')
    }
    expect(fetch).toHaveBeenCalledWith(
      `${ENDPOINT}/api/v0/cat?arg=%2Fipns%2Fdist.ipfs.tech%2Fkubo%2Fversions`,
      expect.objectContaining({ method: 'POST', headers: { 'User-Agent': 'distfetch/0.1.0' } }),
    )
  })

  it('returns the daemon message as the error field', async () => {
    const fetch = vi.fn(
      async (_url: string, _init: RequestInit) =>
        new Response('{"Message":"no link named \\"kubo\\"","Code":0,"Type":"error"}', {
          status: 500,
        }),
    )
    const client = new HttpDaemonClient({ ipfsPath: '/unused', fetch })

    const { output, error } = await client.requestContent(ENDPOINT, '/ipns/x/kubo')

    expect(output).toBeNull()
    expect(error?.message).toBe('daemon cat /ipns/x/kubo: 500: no link named "kubo"')
  })
})
