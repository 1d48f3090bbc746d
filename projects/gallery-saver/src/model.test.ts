import { describe, it, expect } from "vitest"
import { formatSaveResult, saveFileDataFromPath, saveResultFromMap } from "./model.js"
import { ChannelResponseError } from "./errors.js"

describe("saveResultFromMap", () => {
    it("reads a successful result", () => {
        expect(saveResultFromMap({ isSuccess: true })).toEqual({ isSuccess: true })
    })

    it("drops a null error message", () => {
        const result = saveResultFromMap({ isSuccess: true, errorMessage: null })

        expect(result).toEqual({ isSuccess: true })
        expect("errorMessage" in result).toBe(false)
    })

    it("keeps an error message", () => {
        expect(saveResultFromMap({ isSuccess: false, errorMessage: "denied" })).toEqual({ isSuccess: false, errorMessage: "denied" })
    })

    it("throws ChannelResponseError for a missing result", () => {
        expect(() => saveResultFromMap(null, "saveFileToGallery")).toThrow(ChannelResponseError)
        expect(() => saveResultFromMap(undefined, "saveFileToGallery")).toThrow("Invalid response from saveFileToGallery: no result returned")
    })

    it("throws ChannelResponseError for a malformed result", () => {
        expect(() => saveResultFromMap({ isSuccess: "yes" }, "saveImageToGallery")).toThrow(ChannelResponseError)
        expect(() => saveResultFromMap({ isSuccess: "yes" }, "saveImageToGallery")).toThrow(/^Invalid response from saveImageToGallery: isSuccess: /)
    })
})

describe("formatSaveResult", () => {
    it("renders both fields", () => {
        expect(formatSaveResult({ isSuccess: false, errorMessage: "denied" })).toBe("SaveResult{isSuccess: false, errorMessage: denied}")
    })

    it("renders a missing message as null", () => {
        expect(formatSaveResult({ isSuccess: true })).toBe("SaveResult{isSuccess: true, errorMessage: null}")
    })
})

describe("saveFileDataFromPath", () => {
    it("names the file after its last path segment", () => {
        expect(saveFileDataFromPath("/data/media/clip.mp4")).toEqual({ filePath: "/data/media/clip.mp4", fileName: "clip.mp4" })
    })

    it("carries the folder override", () => {
        expect(saveFileDataFromPath("/data/a.png", { androidRelativePath: "Pictures/Exports" })).toEqual({
            filePath: "/data/a.png",
            fileName: "a.png",
            androidRelativePath: "Pictures/Exports",
        })
    })
})
