// ============================================================================
// Save Inputs
// ============================================================================

/** One pending image for a batch save. Consumed once by `saveImages`. */
export interface SaveImageData {
    readonly bytes: Uint8Array
    readonly fileName: string
    readonly extension?: string
    readonly androidRelativePath?: string
}

/** A file the caller already owns on disk, to be copied into the gallery. */
export interface SaveFileData {
    readonly filePath: string
    readonly fileName: string
    readonly androidRelativePath?: string
}

// ============================================================================
// SaveResult
// ============================================================================

export interface SaveResult {
    readonly isSuccess: boolean
    readonly errorMessage?: string
}

// ============================================================================
// Writer Requests (keys match the native method-channel payloads)
// ============================================================================

export interface SaveImageRequest {
    image: Uint8Array
    quality: number
    fileName: string
    extension: string
    relativePath: string
    skipIfExists: boolean
}

export interface SaveFileRequest {
    filePath: string
    fileName: string
    relativePath: string
    skipIfExists: boolean
}

export interface BatchFileEntry {
    filePath: string
    fileName: string
    relativePath: string
}

export interface SaveFilesRequest {
    files: BatchFileEntry[]
    skipIfExists: boolean
}

// ============================================================================
// Capabilities
// ============================================================================

export interface GalleryWriterCapabilities {
    /** False when the native image path re-encodes bytes, which flattens animated GIFs */
    preservesAnimatedGif: boolean
    supportsSkipIfExists: boolean
}

export type GalleryPlatform = "ios" | "android" | "macos"

// ============================================================================
// Facade Options
// ============================================================================

export interface SaveImageOptions {
    fileName: string
    quality?: number
    extension?: string
    androidRelativePath?: string
    skipIfExists: boolean
}

export interface SaveFileOptions {
    filePath: string
    fileName: string
    androidRelativePath?: string
    skipIfExists: boolean
}

export interface SaveImagesOptions {
    quality?: number
    skipIfExists: boolean
}

export interface SaveFilesOptions {
    skipIfExists: boolean
}
