// ── Core types ──
export type {
    SaveImageData,
    SaveFileData,
    SaveResult,
    SaveImageRequest,
    SaveFileRequest,
    SaveFilesRequest,
    BatchFileEntry,
    GalleryWriterCapabilities,
    GalleryPlatform,
    SaveImageOptions,
    SaveFileOptions,
    SaveImagesOptions,
    SaveFilesOptions,
} from "./types.js"

// ── Core interface ──
export type { GalleryWriter } from "./writer.js"

// ── Facade ──
export { GallerySaver } from "./saver.js"
export type { GallerySaverOptions } from "./saver.js"
export { createGallerySaver } from "./create.js"
export type { CreateGallerySaverOptions } from "./create.js"

// ── Errors ──
export { GallerySaverError, StagingError, ChannelResponseError, InvalidRelativePathError, describeError } from "./errors.js"
export type { GallerySaverErrorCode } from "./errors.js"

// ── Model helpers ──
export { saveResultFromMap, formatSaveResult, saveFileDataFromPath } from "./model.js"
export { aggregateBatchResult, collectBatchOutcomes } from "./batch.js"
export type { BatchItemOutcome } from "./batch.js"

// ── Writers ──
export { ChannelGalleryWriter } from "./writers/channel/index.js"
export type { MethodChannel, ChannelMethod, ChannelGalleryWriterConfig } from "./writers/channel/index.js"

export { FileSystemGalleryWriter } from "./writers/filesystem/index.js"
export type { FileSystemGalleryWriterConfig } from "./writers/filesystem/index.js"

// ── Utilities ──
export { lookupMimeType, extensionFromMime, extractFileExtension, resolveMimeAndExtension, readHeaderBytes } from "./mime/resolver.js"
export type { ResolvedMedia } from "./mime/resolver.js"
export { sniffMimeType } from "./mime/sniff.js"
export { defaultRelativePath } from "./folders.js"
export type { DefaultFolder } from "./folders.js"
export { TempStaging } from "./staging.js"
export type { TempStagingOptions } from "./staging.js"
export { loadConfig } from "./config.js"
export type { GallerySaverConfig, LogLevel } from "./config.js"
export { configureLogging } from "./logging.js"
export type { Logger } from "./logging.js"
