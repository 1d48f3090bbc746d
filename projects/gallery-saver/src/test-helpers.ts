import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import type { Logger } from "./logging.js"
import type { GalleryWriter } from "./writer.js"
import type { GalleryWriterCapabilities, SaveFileRequest, SaveFilesRequest, SaveImageRequest, SaveResult } from "./types.js"

export async function makeTmpDir(prefix = "gallery-saver-test-"): Promise<{ path: string; cleanup: () => Promise<void> }> {
    const path = await mkdtemp(join(tmpdir(), prefix))
    return {
        path,
        cleanup: async () => {
            try {
                await rm(path, { recursive: true, force: true })
            } catch {
                // Ignore cleanup errors
            }
        },
    }
}

export const silentLogger: Logger = {
    error: () => {},
    warn: () => {},
    info: () => {},
    debug: () => {},
}

// ── Sample content ──

export const PNG_HEADER = Uint8Array.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d])
export const JPEG_HEADER = Uint8Array.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46])
export const GIF_HEADER = Uint8Array.from([0x47, 0x49, 0x46, 0x38, 0x39, 0x61, 0x01, 0x00, 0x01, 0x00])
export const UNKNOWN_BYTES = Uint8Array.from([0x01, 0x02, 0x03, 0x04, 0x05])

// ── Fake writer ──

export interface FakeWriterCalls {
    saveImageBytes: SaveImageRequest[]
    saveFile: SaveFileRequest[]
    saveFiles: SaveFilesRequest[]
}

export interface FakeWriterOptions {
    capabilities?: Partial<GalleryWriterCapabilities>
    saveImageBytes?: (req: SaveImageRequest) => Promise<SaveResult>
    saveFile?: (req: SaveFileRequest) => Promise<SaveResult>
    saveFiles?: (req: SaveFilesRequest) => Promise<SaveResult>
}

/**
 * In-process GalleryWriter that records every request and succeeds unless told otherwise.
 */
export function makeFakeWriter(options: FakeWriterOptions = {}): GalleryWriter & { calls: FakeWriterCalls } {
    const calls: FakeWriterCalls = { saveImageBytes: [], saveFile: [], saveFiles: [] }
    const ok = async (): Promise<SaveResult> => ({ isSuccess: true })

    return {
        calls,
        capabilities(): GalleryWriterCapabilities {
            return { preservesAnimatedGif: true, supportsSkipIfExists: true, ...options.capabilities }
        },
        async saveImageBytes(req) {
            calls.saveImageBytes.push(req)
            return (options.saveImageBytes ?? ok)(req)
        },
        async saveFile(req) {
            calls.saveFile.push(req)
            return (options.saveFile ?? ok)(req)
        },
        async saveFiles(req) {
            calls.saveFiles.push(req)
            return (options.saveFiles ?? ok)(req)
        },
    }
}
