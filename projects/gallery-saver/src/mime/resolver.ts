import { readFileSync } from "node:fs"
import { open } from "node:fs/promises"
import { z } from "zod"
import { MAX_MAGIC_LENGTH, sniffMimeType } from "./sniff.js"

const MimeDbSchema = z.object({
    extensions: z.record(z.string()),
    preferredExtensions: z.record(z.string()),
})

type MimeDb = z.infer<typeof MimeDbSchema>

let mimeDb: MimeDb | null = null

function getMimeDb(): MimeDb {
    if (mimeDb) return mimeDb
    const raw = readFileSync(new URL("./mime-db.json", import.meta.url), "utf-8")
    mimeDb = MimeDbSchema.parse(JSON.parse(raw))
    return mimeDb
}

/**
 * Text after the last "." of the final path segment, without the dot.
 * Empty when the name has no extension.
 */
export function fileNameExtension(fileName: string): string {
    const base = fileName.slice(Math.max(fileName.lastIndexOf("/"), fileName.lastIndexOf("\\")) + 1)
    const dot = base.lastIndexOf(".")
    if (dot <= 0) return ""
    return base.slice(dot + 1)
}

/**
 * Detects a MIME type. Header bytes, when given, are sniffed first;
 * otherwise (or when nothing matches) the name's extension is looked up.
 */
export function lookupMimeType(fileNameOrPath: string, headerBytes?: Uint8Array): string | undefined {
    if (headerBytes) {
        const sniffed = sniffMimeType(headerBytes)
        if (sniffed) return sniffed
    }
    const ext = fileNameExtension(fileNameOrPath).toLowerCase()
    if (!ext) return undefined
    return getMimeDb().extensions[ext]
}

export function extensionFromMime(mimeType: string): string | undefined {
    const normalized = mimeType.toLowerCase().split(";")[0]?.trim() ?? ""
    return getMimeDb().preferredExtensions[normalized]
}

/**
 * Canonical extension for the MIME type, falling back to the name's own extension.
 */
export function extractFileExtension(mimeType: string | undefined, fileName: string): string {
    if (mimeType) {
        const ext = extensionFromMime(mimeType)
        if (ext) return ext
    }
    return fileNameExtension(fileName)
}

export interface ResolvedMedia {
    mimeType?: string
    extension: string
}

export function resolveMimeAndExtension(fileName: string, headerBytes?: Uint8Array): ResolvedMedia {
    const mimeType = lookupMimeType(fileName, headerBytes)
    return { mimeType, extension: extractFileExtension(mimeType, fileName) }
}

/**
 * Reads the leading bytes of a file for sniffing. Unreadable files yield undefined.
 */
export async function readHeaderBytes(filePath: string): Promise<Uint8Array | undefined> {
    try {
        const handle = await open(filePath, "r")
        try {
            const buffer = Buffer.alloc(MAX_MAGIC_LENGTH)
            const { bytesRead } = await handle.read(buffer, 0, MAX_MAGIC_LENGTH, 0)
            return buffer.subarray(0, bytesRead)
        } finally {
            await handle.close()
        }
    } catch {
        return undefined
    }
}
