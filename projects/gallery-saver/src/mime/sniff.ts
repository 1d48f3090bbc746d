interface MagicNumber {
    mimeType: string
    /** Byte pattern; `null` matches any byte */
    pattern: (number | null)[]
}

const ascii = (text: string): number[] => Array.from(text, (c) => c.charCodeAt(0))
const any = (count: number): null[] => new Array<null>(count).fill(null)

// Longer/more specific patterns first: RIFF and ftyp containers share prefixes
const MAGIC_NUMBERS: MagicNumber[] = [
    { mimeType: "image/png", pattern: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
    { mimeType: "image/jpeg", pattern: [0xff, 0xd8, 0xff] },
    { mimeType: "image/gif", pattern: ascii("GIF87a") },
    { mimeType: "image/gif", pattern: ascii("GIF89a") },
    { mimeType: "image/webp", pattern: [...ascii("RIFF"), ...any(4), ...ascii("WEBP")] },
    { mimeType: "audio/wav", pattern: [...ascii("RIFF"), ...any(4), ...ascii("WAVE")] },
    { mimeType: "video/x-msvideo", pattern: [...ascii("RIFF"), ...any(4), ...ascii("AVI ")] },
    { mimeType: "image/heic", pattern: [...any(4), ...ascii("ftypheic")] },
    { mimeType: "image/heic", pattern: [...any(4), ...ascii("ftypheix")] },
    { mimeType: "image/heif", pattern: [...any(4), ...ascii("ftypmif1")] },
    { mimeType: "image/avif", pattern: [...any(4), ...ascii("ftypavif")] },
    { mimeType: "video/quicktime", pattern: [...any(4), ...ascii("ftypqt  ")] },
    { mimeType: "audio/mp4", pattern: [...any(4), ...ascii("ftypM4A ")] },
    { mimeType: "video/3gpp", pattern: [...any(4), ...ascii("ftyp3gp")] },
    { mimeType: "video/mp4", pattern: [...any(4), ...ascii("ftyp")] },
    { mimeType: "image/bmp", pattern: ascii("BM") },
    { mimeType: "image/tiff", pattern: [0x49, 0x49, 0x2a, 0x00] },
    { mimeType: "image/tiff", pattern: [0x4d, 0x4d, 0x00, 0x2a] },
    { mimeType: "image/x-icon", pattern: [0x00, 0x00, 0x01, 0x00] },
    { mimeType: "video/webm", pattern: [0x1a, 0x45, 0xdf, 0xa3] },
    { mimeType: "audio/mpeg", pattern: ascii("ID3") },
    { mimeType: "audio/flac", pattern: ascii("fLaC") },
    { mimeType: "audio/ogg", pattern: ascii("OggS") },
    { mimeType: "application/pdf", pattern: ascii("%PDF") },
    { mimeType: "application/zip", pattern: [0x50, 0x4b, 0x03, 0x04] },
    { mimeType: "application/gzip", pattern: [0x1f, 0x8b] },
]

/** Length of the longest pattern; reading this many bytes is enough to sniff */
export const MAX_MAGIC_LENGTH = Math.max(...MAGIC_NUMBERS.map((m) => m.pattern.length))

function matches(bytes: Uint8Array, pattern: (number | null)[]): boolean {
    if (bytes.length < pattern.length) return false
    return pattern.every((expected, i) => expected === null || bytes[i] === expected)
}

/**
 * Identifies content by its leading bytes. Returns undefined when nothing matches.
 */
export function sniffMimeType(headerBytes: Uint8Array): string | undefined {
    for (const magic of MAGIC_NUMBERS) {
        if (matches(headerBytes, magic.pattern)) return magic.mimeType
    }
    return undefined
}
