export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 B'
  const k = 1024
  const sizes = ['B', 'KB', 'MB', 'GB']
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1)
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`
}

export type ProgressLoggerOptions = {
  prefix?: string
  write?: (text: string) => void
}

/**
 * Returns an `onProgress` callback that redraws a single status line each
 * time the percentage (or, without a known total, the size) changes.
 */
export function createProgressLogger(
  options: ProgressLoggerOptions = {},
): (downloaded: number, total: number) => void {
  const { prefix = '', write = (text) => process.stderr.write(text) } = options
  let last = ''

  return (downloaded: number, total: number) => {
    const percent = total > 0 ? Math.round((downloaded / total) * 100) : null
    const downloadedStr = formatBytes(downloaded)
    const line =
      percent === null
        ? `\r${prefix}Downloading... ${downloadedStr}`
        : `\r${prefix}Downloading... ${percent}% (${downloadedStr}/${formatBytes(total)})`

    const key = percent === null ? downloadedStr : String(percent)
    if (key !== last) {
      last = key
      write(line)
    }
  }
}
