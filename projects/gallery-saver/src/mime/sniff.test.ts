import { describe, it, expect } from "vitest"
import { MAX_MAGIC_LENGTH, sniffMimeType } from "./sniff.js"
import { GIF_HEADER, JPEG_HEADER, PNG_HEADER, UNKNOWN_BYTES } from "../test-helpers.js"

const latin1 = (text: string): Uint8Array => Buffer.from(text, "latin1")

describe("sniffMimeType", () => {
    it("recognizes common image signatures", () => {
        expect(sniffMimeType(PNG_HEADER)).toBe("image/png")
        expect(sniffMimeType(JPEG_HEADER)).toBe("image/jpeg")
        expect(sniffMimeType(GIF_HEADER)).toBe("image/gif")
        expect(sniffMimeType(latin1("GIF87a\x01\x00"))).toBe("image/gif")
    })

    it("tells RIFF containers apart", () => {
        expect(sniffMimeType(latin1("RIFF\x24\x00\x00\x00WEBPVP8 "))).toBe("image/webp")
        expect(sniffMimeType(latin1("RIFF\x24\x00\x00\x00WAVEfmt "))).toBe("audio/wav")
        expect(sniffMimeType(latin1("RIFF\x24\x00\x00\x00AVI LIST"))).toBe("video/x-msvideo")
    })

    it("tells ftyp brands apart", () => {
        expect(sniffMimeType(latin1("\x00\x00\x00\x18ftypheic"))).toBe("image/heic")
        expect(sniffMimeType(latin1("\x00\x00\x00\x14ftypqt  "))).toBe("video/quicktime")
        expect(sniffMimeType(latin1("\x00\x00\x00\x18ftypisom"))).toBe("video/mp4")
    })

    it("recognizes audio and document signatures", () => {
        expect(sniffMimeType(latin1("ID3\x04\x00"))).toBe("audio/mpeg")
        expect(sniffMimeType(latin1("OggS\x00\x02"))).toBe("audio/ogg")
        expect(sniffMimeType(latin1("%PDF-1.7"))).toBe("application/pdf")
    })

    it("returns undefined for unknown or truncated content", () => {
        expect(sniffMimeType(UNKNOWN_BYTES)).toBeUndefined()
        expect(sniffMimeType(Uint8Array.from([0xff, 0xd8]))).toBeUndefined()
        expect(sniffMimeType(new Uint8Array(0))).toBeUndefined()
    })

    it("needs at most twelve bytes", () => {
        expect(MAX_MAGIC_LENGTH).toBe(12)
    })
})
