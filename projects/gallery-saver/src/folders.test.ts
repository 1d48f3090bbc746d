import { describe, it, expect } from "vitest"
import { defaultRelativePath } from "./folders.js"

describe("defaultRelativePath", () => {
    it("uses Download when the MIME type is unknown", () => {
        expect(defaultRelativePath(undefined)).toBe("Download")
        expect(defaultRelativePath("")).toBe("Download")
    })

    it.each([
        ["image/png", "Pictures"],
        ["image/gif", "Pictures"],
        ["video/mp4", "Movies"],
        ["video/quicktime", "Movies"],
        ["audio/mpeg", "Music"],
        ["audio/flac", "Music"],
        ["application/pdf", "Documents"],
        ["text/plain", "Documents"],
    ])("maps %s to %s", (mimeType, folder) => {
        expect(defaultRelativePath(mimeType)).toBe(folder)
    })

    it("only matches the top-level category prefix", () => {
        expect(defaultRelativePath("application/image")).toBe("Documents")
    })
})
