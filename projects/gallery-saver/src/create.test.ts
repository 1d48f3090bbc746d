import { describe, it, expect, afterEach, beforeEach, vi } from "vitest"
import { existsSync } from "node:fs"
import { readdir } from "node:fs/promises"
import { join } from "node:path"
import { createGallerySaver } from "./create.js"
import { FileSystemGalleryWriter } from "./writers/filesystem/index.js"
import { PNG_HEADER, makeFakeWriter, makeTmpDir } from "./test-helpers.js"

describe("createGallerySaver", () => {
    let tmp: { path: string; cleanup: () => Promise<void> }

    beforeEach(async () => {
        tmp = await makeTmpDir()
    })

    afterEach(async () => {
        vi.unstubAllEnvs()
        await tmp.cleanup()
    })

    it("saves into the configured media root by default", async () => {
        const saver = createGallerySaver({
            config: { mediaRoot: join(tmp.path, "media"), cacheDir: join(tmp.path, "cache"), logLevel: false },
        })

        const result = await saver.saveImage(PNG_HEADER, { fileName: "photo", skipIfExists: false })

        expect(result).toEqual({ isSuccess: true })
        expect(await readdir(join(tmp.path, "media", "Pictures"))).toEqual(["photo.png"])
        expect(saver.capabilities()).toEqual(new FileSystemGalleryWriter().capabilities())
    })

    it("stages into the configured cache directory", async () => {
        const writer = makeFakeWriter({ capabilities: { preservesAnimatedGif: false } })
        const cacheDir = join(tmp.path, "cache")
        const saver = createGallerySaver({ writer, config: { cacheDir, logLevel: false } })

        await saver.saveImages([{ bytes: PNG_HEADER, fileName: "a" }], { skipIfExists: false })

        expect(writer.calls.saveFiles[0]?.files[0]?.filePath.startsWith(cacheDir)).toBe(true)
        expect(await saver.clearCache()).toBe(true)
        expect(existsSync(cacheDir)).toBe(false)
    })

    it("keeps environment values for overrides left undefined", async () => {
        const cacheDir = join(tmp.path, "env-cache")
        vi.stubEnv("GALLERY_SAVER_CACHE_DIR", cacheDir)
        const writer = makeFakeWriter()
        const saver = createGallerySaver({ writer, config: { cacheDir: undefined, logLevel: false } })

        const result = await saver.saveImages([{ bytes: PNG_HEADER, fileName: "a" }], { skipIfExists: false })

        expect(result).toEqual({ isSuccess: true })
        expect(writer.calls.saveFiles[0]?.files[0]?.filePath.startsWith(cacheDir)).toBe(true)
    })
})
