import { loadConfig, type GallerySaverConfig } from "./config.js"
import { configureLogging, logger } from "./logging.js"
import { GallerySaver } from "./saver.js"
import { TempStaging } from "./staging.js"
import { FileSystemGalleryWriter } from "./writers/filesystem/index.js"
import type { GalleryWriter } from "./writer.js"

export interface CreateGallerySaverOptions {
    config?: Partial<GallerySaverConfig>
    /** Defaults to a FileSystemGalleryWriter rooted at `config.mediaRoot` */
    writer?: GalleryWriter
}

/**
 * Builds a saver from environment config, with explicit values taking precedence.
 */
export function createGallerySaver(options?: CreateGallerySaverOptions): GallerySaver {
    const env = loadConfig()
    const overrides = options?.config
    // An override left undefined keeps the environment value
    const config: GallerySaverConfig = {
        cacheDir: overrides?.cacheDir ?? env.cacheDir,
        mediaRoot: overrides?.mediaRoot ?? env.mediaRoot,
        logLevel: overrides?.logLevel ?? env.logLevel,
    }
    configureLogging(config.logLevel)

    return new GallerySaver({
        writer: options?.writer ?? new FileSystemGalleryWriter({ rootDir: config.mediaRoot, logger }),
        staging: new TempStaging({ directory: config.cacheDir, logger }),
        logger,
    })
}
