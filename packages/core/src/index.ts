// Configuration
export {
  type DistConfig,
  type Env,
  resolveConfig,
  getIpfsPath,
  DEFAULT_GATEWAY_URL,
  DEFAULT_DIST_ROOT,
  DEFAULT_REQUEST_TIMEOUT_MS,
  FETCH_SIZE_LIMIT,
  USER_AGENT,
} from './config.js'

// Errors
export {
  type DistErrorCode,
  type DistErrorOptions,
  DistError,
  ReadError,
  NotFoundError,
  TransportError,
  AlreadyExistsError,
  IOError,
  ExtractError,
  ExecError,
  errorMessage,
} from './errors.js'

// Logging
export {
  type Logger,
  type LogContext,
  type ConsoleLoggerOptions,
  createConsoleLogger,
  silentLogger,
} from './logger.js'

// Platform naming
export {
  type ArchiveType,
  type PlatformID,
  type PlatformOptions,
  type CommandResult,
  type CommandRunner,
  platformID,
  osName,
  archName,
  archiveName,
  archiveTypeFor,
  distPath,
  versionsPath,
  exeName,
  isWindows,
  runIgnoringExitStatus,
} from './platform.js'

// Transport
export { type FetchStream, limitStream } from './limited-stream.js'
export {
  type DaemonClient,
  type DaemonResponse,
  type FetchFn,
  type HttpDaemonClientOptions,
  HttpDaemonClient,
  multiaddrToUrl,
} from './daemon.js'
export {
  type ContentFetcher,
  type TransportOptions,
  DistTransport,
} from './transport.js'

// Versions
export {
  type VersionCatalogOptions,
  VersionCatalog,
  parseVersions,
  DEFAULT_VERSION_PREFIX,
} from './versions.js'

// Install
export {
  type ExtractEntryOptions,
  extractEntry,
  entryCandidates,
} from './extract.js'
export {
  type DistTarget,
  type DistTargetInput,
  type InstallOptions,
  type ArchiveInstallerOptions,
  ArchiveInstaller,
  createDistTarget,
  resolveOutputPath,
  makeExecutable,
} from './install.js'

// Progress
export {
  type ProgressLoggerOptions,
  formatBytes,
  createProgressLogger,
} from './progress.js'

export {
  type DistFetcherOptions,
  type FetchBinaryOptions,
  DistFetcher,
} from './dist-fetcher.js'
