import { Logger, type LoggerOptions } from './logger'
import type { LoggerSettingsInput } from './settings'
import { FileWriter, stdoutWriter } from './writers'

function tryOpen(path: string): FileWriter | Error {
  try {
    return FileWriter.open(path)
  } catch (err) {
    return err instanceof Error ? err : new Error(String(err))
  }
}

/**
 * Logger writing to a file, truncated on open.
 *
 * If the file cannot be opened the logger falls back to `options.out`
 * (stdout by default), turns colors on and reports the failure there.
 */
export class FileLogger extends Logger {
  private readonly file: FileWriter | null
  /** Why the file could not be opened, when falling back. */
  readonly openError: Error | null

  constructor(name: string, path: string, settings: LoggerSettingsInput = {}, options: LoggerOptions = {}) {
    const opened = tryOpen(path)
    const file = opened instanceof FileWriter ? opened : null
    super(name, settings, { ...options, out: file ?? options.out ?? stdoutWriter })
    this.file = file
    this.openError = opened instanceof Error ? opened : null
    if (this.openError) {
      this.color(true)
      this.error("Could not open file '%s'!\nFallback to console logging!", path)
    }
  }

  /** Whether output goes to the file rather than the fallback. */
  isFileBacked(): boolean {
    return this.file !== null
  }

  close(): void {
    this.file?.close()
  }
}
