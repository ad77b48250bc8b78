import { describe, it, expect } from 'vitest'
import { UsageError, parseArgs } from './args.js'

describe('parseArgs', () => {
  it('shows help without a command', () => {
    expect(parseArgs([]).command).toEqual({ kind: 'help' })
    expect(parseArgs(['fetch', 'kubo', '-h']).command).toEqual({ kind: 'help' })
  })

  it('parses versions with --desc', () => {
    expect(parseArgs(['versions', 'kubo', '--desc'])).toEqual({
      command: { kind: 'versions', dist: 'kubo', descending: true },
      gatewayUrl: undefined,
      daemon: true,
      verbose: false,
    })
  })

  it('parses fetch with every option', () => {
    const options = parseArgs([
      'fetch',
      'kubo',
      'v0.7.0',
      '--out',
      '/usr/local/bin',
      '--archive',
      'go-ipfs',
      '--binary',
      'ipfs',
      '--gateway',
      'https://gateway.test',
      '--no-daemon',
      '--verbose',
    ])

    expect(options).toEqual({
      command: {
        kind: 'fetch',
        dist: 'kubo',
        version: 'v0.7.0',
        output: '/usr/local/bin',
        archiveName: 'go-ipfs',
        binaryName: 'ipfs',
      },
      gatewayUrl: 'https://gateway.test',
      daemon: false,
      verbose: true,
    })
  })

  it('leaves the version open and writes to the working directory by default', () => {
    expect(parseArgs(['fetch', 'fs-repo-migrations']).command).toEqual({
      kind: 'fetch',
      dist: 'fs-repo-migrations',
      version: undefined,
      output: '.',
      archiveName: undefined,
      binaryName: undefined,
    })
  })

  it('parses latest and platform', () => {
    expect(parseArgs(['latest', 'kubo']).command).toEqual({ kind: 'latest', dist: 'kubo' })
    expect(parseArgs(['platform']).command).toEqual({ kind: 'platform' })
  })

  it('rejects bad input with UsageError', () => {
    expect(() => parseArgs(['install', 'kubo'])).toThrow(new UsageError('Unknown command: install'))
    expect(() => parseArgs(['versions', '--force'])).toThrow('Unknown option: --force')
    expect(() => parseArgs(['latest'])).toThrow('latest requires a distribution name')
    expect(() => parseArgs(['fetch', 'kubo', '--out'])).toThrow('--out requires a value')
    expect(() => parseArgs(['fetch', 'kubo', '--out', '--verbose'])).toThrow(UsageError)
  })
})
