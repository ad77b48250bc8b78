#!/usr/bin/env tsx
/**
 * distfetch - fetch migration binaries from the distribution site
 *
 * Usage:
 *   distfetch versions fs-repo-migrations --desc
 *   distfetch latest fs-repo-15-to-16
 *   distfetch fetch fs-repo-15-to-16 v1.0.1 --out ./bin
 */

import {
  DistFetcher,
  createConsoleLogger,
  createProgressLogger,
  errorMessage,
  platformID,
} from '@distfetch/core'
import { USAGE, UsageError, parseArgs, type CliOptions } from './args.js'

async function run(options: CliOptions, signal: AbortSignal): Promise<void> {
  const { command } = options

  if (command.kind === 'help') {
    console.log(USAGE)
    return
  }

  if (command.kind === 'platform') {
    const { variant, arch } = await platformID({ signal })
    console.log(`${variant}-${arch}`)
    return
  }

  const logger = createConsoleLogger({ verbose: options.verbose })
  const fetcher = new DistFetcher({
    gatewayUrl: options.gatewayUrl,
    daemon: options.daemon ? undefined : null,
    logger,
  })

  switch (command.kind) {
    case 'versions': {
      const versions = await fetcher.listVersions(command.dist, command.descending, signal)
      for (const version of versions) {
        console.log(version)
      }
      return
    }
    case 'latest':
      console.log(await fetcher.latestVersion(command.dist, signal))
      return
    case 'fetch': {
      const version = command.version ?? (await fetcher.latestVersion(command.dist, signal))
      const onProgress = process.stderr.isTTY ? createProgressLogger() : undefined
      const installed = await fetcher.fetchBinary({
        dist: command.dist,
        version,
        archiveName: command.archiveName,
        binaryName: command.binaryName,
        output: command.output,
        signal,
        onProgress,
      })
      if (onProgress) process.stderr.write('\n')
      console.log(installed)
      return
    }
  }
}

async function main() {
  let options: CliOptions
  try {
    options = parseArgs(process.argv.slice(2))
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message)
      console.error(USAGE)
      process.exit(2)
    }
    throw error
  }

  const controller = new AbortController()
  process.once('SIGINT', () => controller.abort())

  await run(options, controller.signal)
}

main().catch((err: unknown) => {
  console.error('Error:', errorMessage(err))
  process.exit(1)
})
