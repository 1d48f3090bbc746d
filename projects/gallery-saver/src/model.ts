import { basename } from "node:path"
import { z } from "zod"
import { ChannelResponseError } from "./errors.js"
import type { SaveFileData, SaveResult } from "./types.js"

export const SaveResultSchema = z.object({
    isSuccess: z.boolean(),
    errorMessage: z.string().nullish(),
})

/**
 * Validates a `{ isSuccess, errorMessage }` map returned across the native boundary.
 * A null `errorMessage` is dropped.
 */
export function saveResultFromMap(value: unknown, method = "writer"): SaveResult {
    if (value === null || value === undefined) {
        throw new ChannelResponseError(method, "no result returned")
    }
    const parsed = SaveResultSchema.safeParse(value)
    if (!parsed.success) {
        const detail = parsed.error.issues.map((issue) => `${issue.path.join(".") || "result"}: ${issue.message}`).join(", ")
        throw new ChannelResponseError(method, detail)
    }
    const { isSuccess, errorMessage } = parsed.data
    return errorMessage == null ? { isSuccess } : { isSuccess, errorMessage }
}

export function formatSaveResult(result: SaveResult): string {
    return `SaveResult{isSuccess: ${result.isSuccess}, errorMessage: ${result.errorMessage ?? "null"}}`
}

/**
 * Builds a `SaveFileData` for an existing file, named after its last path segment.
 */
export function saveFileDataFromPath(filePath: string, options?: { androidRelativePath?: string }): SaveFileData {
    return {
        filePath,
        fileName: basename(filePath),
        androidRelativePath: options?.androidRelativePath,
    }
}
