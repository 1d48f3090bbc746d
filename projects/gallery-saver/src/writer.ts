import type { GalleryWriterCapabilities, SaveImageRequest, SaveFileRequest, SaveFilesRequest, SaveResult } from "./types.js"

/**
 * The platform side of a save: performs the OS-level gallery write.
 * Batch saves must give each entry an independent outcome and fold them
 * into one result (see `aggregateBatchResult`).
 */
export interface GalleryWriter {
    // ── Discovery (sync, cheap, no I/O) ──
    capabilities(): GalleryWriterCapabilities

    // ── Saving ──
    saveImageBytes(req: SaveImageRequest): Promise<SaveResult>
    saveFile(req: SaveFileRequest): Promise<SaveResult>
    saveFiles(req: SaveFilesRequest): Promise<SaveResult>
}
