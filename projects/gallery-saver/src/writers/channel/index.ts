import { exhaustive } from "exhaustive"

import type { GalleryWriter } from "../../writer.js"
import type { GalleryPlatform, GalleryWriterCapabilities, SaveFileRequest, SaveFilesRequest, SaveImageRequest, SaveResult } from "../../types.js"
import { logger as defaultLogger, type Logger } from "../../logging.js"
import { saveResultFromMap } from "../../model.js"

/**
 * A request/response transport into native code, e.g. a native method
 * channel, a Capacitor plugin bridge, or an Electron IPC invoke.
 */
export interface MethodChannel {
    invokeMethod(method: string, args: Record<string, unknown>): Promise<unknown>
}

export type ChannelMethod = "saveImageToGallery" | "saveFileToGallery" | "saveFilesToGallery"

export interface ChannelGalleryWriterConfig {
    channel: MethodChannel
    platform: GalleryPlatform
    logger?: Logger
}

/**
 * Forwards saves across a method channel as key-value payloads and validates
 * the `{ isSuccess, errorMessage }` map that comes back.
 */
export class ChannelGalleryWriter implements GalleryWriter {
    readonly platform: GalleryPlatform
    private channel: MethodChannel
    private logger: Logger

    constructor(config: ChannelGalleryWriterConfig) {
        this.channel = config.channel
        this.platform = config.platform
        this.logger = config.logger ?? defaultLogger
    }

    capabilities(): GalleryWriterCapabilities {
        return exhaustive(this.platform, {
            // UIImage round-trips image bytes through JPEG compression
            ios: () => ({ preservesAnimatedGif: false, supportsSkipIfExists: false }),
            android: () => ({ preservesAnimatedGif: true, supportsSkipIfExists: true }),
            macos: () => ({ preservesAnimatedGif: true, supportsSkipIfExists: false }),
        })
    }

    async saveImageBytes(req: SaveImageRequest): Promise<SaveResult> {
        return this.invoke("saveImageToGallery", {
            image: req.image,
            quality: req.quality,
            fileName: req.fileName,
            extension: req.extension,
            relativePath: req.relativePath,
            skipIfExists: req.skipIfExists,
        })
    }

    async saveFile(req: SaveFileRequest): Promise<SaveResult> {
        return this.invoke("saveFileToGallery", {
            filePath: req.filePath,
            fileName: req.fileName,
            relativePath: req.relativePath,
            skipIfExists: req.skipIfExists,
        })
    }

    async saveFiles(req: SaveFilesRequest): Promise<SaveResult> {
        return this.invoke("saveFilesToGallery", {
            files: req.files.map((f) => ({ filePath: f.filePath, fileName: f.fileName, relativePath: f.relativePath })),
            skipIfExists: req.skipIfExists,
        })
    }

    private async invoke(method: ChannelMethod, args: Record<string, unknown>): Promise<SaveResult> {
        this.logger.debug(`[ChannelWriter] Invoking ${method}`, { platform: this.platform })
        const response = await this.channel.invokeMethod(method, args)
        return saveResultFromMap(response, method)
    }
}
