import { loadConfig } from "./config.js"
import { describeError } from "./errors.js"
import { defaultRelativePath } from "./folders.js"
import { logger as defaultLogger, type Logger } from "./logging.js"
import { extractFileExtension, lookupMimeType, readHeaderBytes } from "./mime/resolver.js"
import { TempStaging } from "./staging.js"
import type { GalleryWriter } from "./writer.js"
import type {
    BatchFileEntry,
    GalleryWriterCapabilities,
    SaveFileData,
    SaveFileOptions,
    SaveFilesOptions,
    SaveImageData,
    SaveImageOptions,
    SaveImagesOptions,
    SaveResult,
} from "./types.js"

export interface GallerySaverOptions {
    writer: GalleryWriter
    /** Defaults to a staging area in the configured cache directory */
    staging?: TempStaging
    logger?: Logger
}

const DEFAULT_QUALITY = 100

function normalizeQuality(quality: number): number {
    if (!Number.isFinite(quality)) return DEFAULT_QUALITY
    return Math.min(100, Math.max(0, Math.round(quality)))
}

function withExtension(fileName: string, extension: string): string {
    return fileName.includes(".") ? fileName : `${fileName}.${extension}`
}

/**
 * Saves images and media files into the platform gallery through a `GalleryWriter`.
 *
 * Every public method resolves to a result; writer and staging faults are
 * converted into failed `SaveResult`s. Byte buffers that must go through the
 * writer's file path are staged to temporary files, and those files are
 * removed before the call returns.
 */
export class GallerySaver {
    private writer: GalleryWriter
    private staging: TempStaging
    private logger: Logger

    constructor(options: GallerySaverOptions) {
        this.writer = options.writer
        this.logger = options.logger ?? defaultLogger
        this.staging = options.staging ?? new TempStaging({ directory: loadConfig().cacheDir, logger: this.logger })
    }

    capabilities(): GalleryWriterCapabilities {
        return this.writer.capabilities()
    }

    /**
     * Saves image bytes. The extension is inferred from the bytes and `fileName`
     * unless given. GIFs are routed through the file path when the writer would
     * re-encode them.
     */
    async saveImage(bytes: Uint8Array, options: SaveImageOptions): Promise<SaveResult> {
        const { androidRelativePath, skipIfExists } = options
        try {
            const mimeType = lookupMimeType(options.fileName, bytes)
            const extension = options.extension ?? extractFileExtension(mimeType, options.fileName)
            const relativePath = androidRelativePath ?? defaultRelativePath(mimeType)

            if (extension.toLowerCase() === "gif" && !this.writer.capabilities().preservesAnimatedGif) {
                return await this.saveGifThroughFile(bytes, options.fileName, relativePath, skipIfExists)
            }

            this.warnIfSkipUnsupported("saveImage", skipIfExists)
            const fileName = withExtension(options.fileName, extension)
            const result = await this.writer.saveImageBytes({
                image: bytes,
                quality: normalizeQuality(options.quality ?? DEFAULT_QUALITY),
                fileName,
                extension,
                relativePath,
                skipIfExists,
            })
            this.logResult("saveImage", fileName, result)
            return result
        } catch (error) {
            return this.failure("saveImage", error)
        }
    }

    async saveFile(options: SaveFileOptions): Promise<SaveResult> {
        const { filePath, fileName, androidRelativePath, skipIfExists } = options
        try {
            this.warnIfSkipUnsupported("saveFile", skipIfExists)
            const relativePath = androidRelativePath ?? (await this.defaultRelativePathForFile(filePath))
            const result = await this.writer.saveFile({ filePath, fileName, relativePath, skipIfExists })
            this.logResult("saveFile", fileName, result)
            return result
        } catch (error) {
            return this.failure("saveFile", error)
        }
    }

    /**
     * Stages every image to a temporary file and saves them as one file batch.
     * `quality` is accepted for parity with `saveImage`; the file path copies bytes unmodified.
     */
    async saveImages(images: SaveImageData[], options: SaveImagesOptions): Promise<SaveResult> {
        if (images.length === 0) {
            return { isSuccess: false, errorMessage: "Image list is empty" }
        }

        const staged: string[] = []
        try {
            const files: SaveFileData[] = []
            for (const image of images) {
                const mimeType = lookupMimeType(image.fileName, image.bytes)
                const extension = image.extension ?? extractFileExtension(mimeType, image.fileName)
                const filePath = await this.staging.stage(extension, image.bytes)
                staged.push(filePath)
                files.push({
                    filePath,
                    fileName: withExtension(image.fileName, extension),
                    androidRelativePath: image.androidRelativePath,
                })
            }
            return await this.saveFiles(files, { skipIfExists: options.skipIfExists })
        } catch (error) {
            return this.failure("saveImages", error)
        } finally {
            for (const filePath of staged) {
                await this.staging.unstage(filePath)
            }
        }
    }

    async saveFiles(files: SaveFileData[], options: SaveFilesOptions): Promise<SaveResult> {
        if (files.length === 0) {
            return { isSuccess: false, errorMessage: "File list is empty" }
        }

        try {
            this.warnIfSkipUnsupported("saveFiles", options.skipIfExists)
            const entries: BatchFileEntry[] = []
            for (const file of files) {
                entries.push({
                    filePath: file.filePath,
                    fileName: file.fileName,
                    relativePath: file.androidRelativePath ?? (await this.defaultRelativePathForFile(file.filePath)),
                })
            }
            const result = await this.writer.saveFiles({ files: entries, skipIfExists: options.skipIfExists })
            this.logResult("saveFiles", `${entries.length} files`, result)
            return result
        } catch (error) {
            return this.failure("saveFiles", error)
        }
    }

    /**
     * Deletes the staging directory. Do not call while saves are in flight.
     */
    async clearCache(): Promise<boolean> {
        return this.staging.clear()
    }

    // ── Internals ──

    private async saveGifThroughFile(bytes: Uint8Array, fileName: string, relativePath: string, skipIfExists: boolean): Promise<SaveResult> {
        const filePath = await this.staging.stage("gif", bytes)
        try {
            return await this.saveFile({ filePath, fileName, androidRelativePath: relativePath, skipIfExists })
        } finally {
            await this.staging.unstage(filePath)
        }
    }

    private async defaultRelativePathForFile(filePath: string): Promise<string> {
        const header = await readHeaderBytes(filePath)
        return defaultRelativePath(lookupMimeType(filePath, header))
    }

    private warnIfSkipUnsupported(operation: string, skipIfExists: boolean): void {
        if (skipIfExists && !this.writer.capabilities().supportsSkipIfExists) {
            this.logger.warn(`[GallerySaver] ${operation}: writer ignores skipIfExists`)
        }
    }

    private logResult(operation: string, target: string, result: SaveResult): void {
        if (result.isSuccess) {
            this.logger.debug(`[GallerySaver] ${operation} saved ${target}`)
        } else {
            this.logger.warn(`[GallerySaver] ${operation} failed for ${target}:`, result.errorMessage)
        }
    }

    private failure(operation: string, error: unknown): SaveResult {
        const errorMessage = describeError(error)
        this.logger.warn(`[GallerySaver] ${operation} error:`, errorMessage)
        return { isSuccess: false, errorMessage }
    }
}
