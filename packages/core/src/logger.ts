import type { Logger } from '@qsearch/shared'

/** Console logger that tags every line, e.g. `[Ingester] Indexed 42 question(s)`. */
export function consoleLogger(tag: string): Logger {
  return {
    info: msg => console.log(`[${tag}] ${msg}`),
    warn: msg => console.warn(`[${tag}] ${msg}`),
    error: msg => console.error(`[${tag}] ${msg}`),
  }
}

/** Discards everything; for tests and quiet CLI output. */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
}
