import { describe, it, expect, vi } from 'vitest'
import { ExecError } from './errors.js'
import {
  archName,
  archiveName,
  archiveTypeFor,
  distPath,
  exeName,
  osName,
  platformID,
  versionsPath,
} from './platform.js'
import { LINUX_AMD64, WINDOWS_AMD64, fakeRunner } from './test-utils.js'

describe('platformID', () => {
  it('maps darwin without probing', async () => {
    const runner = fakeRunner('')

    const id = await platformID({ platform: 'darwin', arch: 'arm64', runner })

    expect(id).toEqual({ os: 'darwin', arch: 'arm64', variant: 'darwin' })
    expect(runner).not.toHaveBeenCalled()
  })

  it('maps win32/x64 to windows/amd64', async () => {
    const id = await platformID({ platform: 'win32', arch: 'x64', runner: fakeRunner('') })

    expect(id).toEqual({ os: 'windows', arch: 'amd64', variant: 'windows' })
  })

  it('reports linux-musl when the libc probe mentions musl', async () => {
    const runner = fakeRunner('musl libc (x86_64)\nVersion 1.2.4\n', true)

    const id = await platformID({ platform: 'linux', arch: 'x64', runner })

    expect(id).toEqual({ os: 'linux', arch: 'amd64', variant: 'linux-musl' })
    expect(runner).toHaveBeenCalledWith('ldd --version 2>&1', undefined)
  })

  it('reports plain linux for glibc', async () => {
    const runner = fakeRunner('ldd (GNU libc) 2.36\nCopyright (C) 2022\n')

    const id = await platformID({ platform: 'linux', arch: 'arm64', runner })

    expect(id).toEqual({ os: 'linux', arch: 'arm64', variant: 'linux' })
  })

  it('fails with ExecError when the probe cannot be launched', async () => {
    const runner = vi.fn(async () => {
      throw new ExecError('Failed to run "ldd --version 2>&1": spawn sh ENOENT')
    })

    await expect(platformID({ platform: 'linux', arch: 'x64', runner })).rejects.toBeInstanceOf(
      ExecError,
    )
  })
})

describe('osName / archName', () => {
  it('uses distribution names', () => {
    expect(osName('win32')).toBe('windows')
    expect(osName('linux')).toBe('linux')
    expect(archName('x64')).toBe('amd64')
    expect(archName('ia32')).toBe('386')
    expect(archName('mipsel')).toBe('mipsle')
  })

  it('passes unknown names through', () => {
    expect(osName('haiku')).toBe('haiku')
    expect(archName('s390')).toBe('s390')
  })
})

describe('archiveName', () => {
  it('formats base_version_os-arch.type', () => {
    expect(archiveName('ipfs-10-to-11', 'v1.8.0', 'tar.gz', LINUX_AMD64)).toBe(
      'ipfs-10-to-11_v1.8.0_linux-amd64.tar.gz',
    )
  })

  it('is stable across calls', () => {
    const first = archiveName('ipfs-10-to-11', 'v1.8.0', 'tar.gz', LINUX_AMD64)
    expect(archiveName('ipfs-10-to-11', 'v1.8.0', 'tar.gz', LINUX_AMD64)).toBe(first)
  })

  it('names musl hosts by OS only', () => {
    const musl = { os: 'linux', arch: 'arm64', variant: 'linux-musl' }
    expect(archiveName('kubo', 'v0.20.0', 'tar.gz', musl)).toBe(
      'kubo_v0.20.0_linux-arm64.tar.gz',
    )
  })
})

describe('paths', () => {
  it('builds the archive path under the distribution root', () => {
    expect(distPath('ipfs-10-to-11', 'v1.8.0', 'a.tar.gz')).toBe(
      '/ipns/dist.ipfs.tech/ipfs-10-to-11/v1.8.0/a.tar.gz',
    )
    expect(distPath('kubo', 'v0.20.0', 'a.zip', '/dist')).toBe('/dist/kubo/v0.20.0/a.zip')
  })

  it('builds the versions path', () => {
    expect(versionsPath('kubo')).toBe('/ipns/dist.ipfs.tech/kubo/versions')
  })
})

describe('windows naming', () => {
  it('uses zip archives and .exe binaries on windows only', () => {
    expect(archiveTypeFor(WINDOWS_AMD64)).toBe('zip')
    expect(archiveTypeFor(LINUX_AMD64)).toBe('tar.gz')
    expect(exeName('ipfs', WINDOWS_AMD64)).toBe('ipfs.exe')
    expect(exeName('ipfs', LINUX_AMD64)).toBe('ipfs')
  })
})
