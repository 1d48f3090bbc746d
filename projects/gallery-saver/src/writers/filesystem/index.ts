import { randomUUID } from "node:crypto"
import { homedir } from "node:os"
import { basename, extname, isAbsolute, join } from "node:path"
import fse from "fs-extra"

import type { GalleryWriter } from "../../writer.js"
import type { GalleryWriterCapabilities, SaveFileRequest, SaveFilesRequest, SaveImageRequest, SaveResult } from "../../types.js"
import { GallerySaverError, InvalidRelativePathError } from "../../errors.js"
import { aggregateBatchResult, collectBatchOutcomes } from "../../batch.js"
import { logger as defaultLogger, type Logger } from "../../logging.js"

export interface FileSystemGalleryWriterConfig {
    /** Directory the relative paths (Pictures, Movies, ...) live under. Defaults to the home directory */
    rootDir?: string
    logger?: Logger
}

/**
 * Gallery writer for desktop hosts: media lands in the user's shared folders
 * as plain files, `<rootDir>/<relativePath>/<fileName>`.
 *
 * Existing files are never overwritten. With `skipIfExists` the save is a
 * no-op; otherwise the new file gets a " (n)" suffix.
 */
export class FileSystemGalleryWriter implements GalleryWriter {
    readonly rootDir: string
    private logger: Logger

    constructor(config?: FileSystemGalleryWriterConfig) {
        this.rootDir = config?.rootDir ?? homedir()
        this.logger = config?.logger ?? defaultLogger
    }

    capabilities(): GalleryWriterCapabilities {
        return { preservesAnimatedGif: true, supportsSkipIfExists: true }
    }

    async saveImageBytes(req: SaveImageRequest): Promise<SaveResult> {
        // Bytes are stored as given; quality only applies to writers that re-encode
        return this.write(req.relativePath, req.fileName, req.skipIfExists, (target) => fse.writeFile(target, req.image))
    }

    async saveFile(req: SaveFileRequest): Promise<SaveResult> {
        if (!(await fse.pathExists(req.filePath))) {
            return { isSuccess: false, errorMessage: `Source file not found: ${req.filePath}` }
        }
        return this.write(req.relativePath, req.fileName, req.skipIfExists, (target) => fse.copyFile(req.filePath, target))
    }

    async saveFiles(req: SaveFilesRequest): Promise<SaveResult> {
        const outcomes = await collectBatchOutcomes(req.files, (file) => this.saveFile({ ...file, skipIfExists: req.skipIfExists }))
        return aggregateBatchResult(outcomes)
    }

    // ── Internals ──

    private resolveDir(relativePath: string): string {
        const segments = relativePath.split(/[\\/]/)
        if (isAbsolute(relativePath) || segments.includes("..")) {
            throw new InvalidRelativePathError(relativePath)
        }
        return join(this.rootDir, relativePath)
    }

    private async write(relativePath: string, fileName: string, skipIfExists: boolean, writeTo: (target: string) => Promise<void>): Promise<SaveResult> {
        if (!fileName || basename(fileName) !== fileName || fileName === "..") {
            throw new GallerySaverError(`Invalid file name: ${fileName}`, "invalid_path")
        }

        const dir = this.resolveDir(relativePath)
        await fse.ensureDir(dir)

        if (skipIfExists && (await fse.pathExists(join(dir, fileName)))) {
            this.logger.debug("[FileSystemWriter] Skipped existing file:", join(dir, fileName))
            return { isSuccess: true }
        }

        // Per-call temp name; the final name is claimed with link(), which fails on EEXIST
        const tempPath = join(dir, `${fileName}.${randomUUID()}.tmp`)
        try {
            await writeTo(tempPath)
            const target = await this.claim(dir, fileName, tempPath, skipIfExists)
            if (target === undefined) {
                this.logger.debug("[FileSystemWriter] Skipped existing file:", join(dir, fileName))
            } else {
                this.logger.info("[FileSystemWriter] Saved", { path: target })
            }
            return { isSuccess: true }
        } finally {
            try {
                await fse.remove(tempPath)
            } catch {
                // Ignore cleanup errors
            }
        }
    }

    /** Links the temp file under the first free name; undefined when skipping an existing file */
    private async claim(dir: string, fileName: string, tempPath: string, skipIfExists: boolean): Promise<string | undefined> {
        const ext = extname(fileName)
        const stem = fileName.slice(0, fileName.length - ext.length)
        for (let n = 0; ; n++) {
            const candidate = join(dir, n === 0 ? fileName : `${stem} (${n})${ext}`)
            try {
                await fse.link(tempPath, candidate)
                return candidate
            } catch (error) {
                if (!isAlreadyExists(error)) throw error
                if (skipIfExists) return undefined
            }
        }
    }
}

function isAlreadyExists(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "EEXIST"
}
