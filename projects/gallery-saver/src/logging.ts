import log from "electron-log/node"
import type { LogLevel } from "./config.js"

/** Subset of electron-log's functions the library calls; tests may pass their own */
export interface Logger {
    error(...params: unknown[]): void
    warn(...params: unknown[]): void
    info(...params: unknown[]): void
    debug(...params: unknown[]): void
}

// Console only
log.transports.file.level = false

export function configureLogging(level: LogLevel | false): void {
    log.transports.console.level = level
}

export const logger: Logger = log
