import { tmpdir, homedir } from "node:os"
import { join } from "node:path"

export type LogLevel = "error" | "warn" | "info" | "verbose" | "debug" | "silly"

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "verbose", "debug", "silly"]

export const CACHE_DIR_NAME = "gallery_saver"

export interface GallerySaverConfig {
    /** Scratch directory for staged byte buffers */
    cacheDir: string
    /** Root under which the file-system writer resolves relative paths */
    mediaRoot: string
    logLevel: LogLevel | false
}

function parseLogLevel(value: string | undefined): LogLevel | false {
    if (!value) return "info"
    const lower = value.trim().toLowerCase()
    if (lower === "false" || lower === "off") return false
    const match = LOG_LEVELS.find((level) => level === lower)
    return match ?? "info"
}

/**
 * Reads configuration from environment variables:
 * - GALLERY_SAVER_CACHE_DIR  (default: <tmpdir>/gallery_saver)
 * - GALLERY_SAVER_MEDIA_ROOT (default: home directory)
 * - GALLERY_SAVER_LOG_LEVEL  (default: info; "false" or "off" silences)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GallerySaverConfig {
    return {
        cacheDir: env.GALLERY_SAVER_CACHE_DIR || join(tmpdir(), CACHE_DIR_NAME),
        mediaRoot: env.GALLERY_SAVER_MEDIA_ROOT || homedir(),
        logLevel: parseLogLevel(env.GALLERY_SAVER_LOG_LEVEL),
    }
}
