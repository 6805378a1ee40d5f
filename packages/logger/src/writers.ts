import { closeSync, openSync, writeSync } from 'node:fs'

/** Destination for formatted log text. */
export interface TextWriter {
  write(text: string): void
}

export const stdoutWriter: TextWriter = {
  write: (text) => {
    process.stdout.write(text)
  },
}

/** Synchronous file writer, so lines land in order even on process exit. */
export class FileWriter implements TextWriter {
  private fd: number | null

  private constructor(fd: number, readonly path: string) {
    this.fd = fd
  }

  /** Open (and truncate) a file for writing. Throws if it cannot be opened. */
  static open(path: string): FileWriter {
    return new FileWriter(openSync(path, 'w'), path)
  }

  write(text: string): void {
    if (this.fd === null) throw new Error(`Cannot write to closed log file '${this.path}'`)
    writeSync(this.fd, text)
  }

  get closed(): boolean {
    return this.fd === null
  }

  close(): void {
    if (this.fd === null) return
    closeSync(this.fd)
    this.fd = null
  }
}
