import { join } from "node:path"
import { randomUUID } from "node:crypto"
import { mkdir, writeFile, unlink, rm } from "node:fs/promises"
import { StagingError } from "./errors.js"
import { logger as defaultLogger, type Logger } from "./logging.js"

export interface TempStagingOptions {
    directory: string
    logger?: Logger
}

/**
 * Writes byte buffers to a process-wide scratch directory so writers that only
 * accept file paths can consume them. Every `stage` must be paired with one `unstage`.
 *
 * Calling `clear` while another call holds staged files deletes them from under it.
 */
export class TempStaging {
    readonly directory: string
    private logger: Logger

    constructor(options: TempStagingOptions) {
        this.directory = options.directory
        this.logger = options.logger ?? defaultLogger
    }

    async stage(extension: string, bytes: Uint8Array): Promise<string> {
        if (/[\\/]/.test(extension) || extension.includes("..")) {
            throw new StagingError(extension, new Error("extension must not contain a path"))
        }
        const fileName = extension ? `${randomUUID()}.${extension}` : randomUUID()
        const filePath = join(this.directory, fileName)
        try {
            await mkdir(this.directory, { recursive: true })
            await writeFile(filePath, bytes)
        } catch (error) {
            throw new StagingError(extension, error instanceof Error ? error : undefined)
        }
        this.logger.debug("[Staging] Staged", { path: filePath, size: bytes.byteLength })
        return filePath
    }

    async unstage(filePath: string): Promise<void> {
        try {
            await unlink(filePath)
        } catch (error) {
            // Already gone counts as removed
            if (isNotFound(error)) return
            this.logger.debug("[Staging] Failed to remove staged file:", filePath, error)
        }
    }

    /**
     * Removes the whole scratch directory. A missing directory counts as cleared;
     * any other failure is logged and reported as `false`.
     */
    async clear(): Promise<boolean> {
        try {
            await rm(this.directory, { recursive: true, force: true })
            this.logger.info("[Staging] Cleared cache directory:", this.directory)
            return true
        } catch (error) {
            this.logger.warn("[Staging] Failed to clear cache directory:", this.directory, error)
            return false
        }
    }
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT"
}
