export type GallerySaverErrorCode = "staging_failed" | "invalid_response" | "invalid_path"

export class GallerySaverError extends Error {
    constructor(
        message: string,
        public code: GallerySaverErrorCode,
        public override cause?: Error
    ) {
        super(message)
        this.name = "GallerySaverError"
    }
}

export class StagingError extends GallerySaverError {
    constructor(extension: string, cause?: Error) {
        super(`Failed to stage temporary .${extension} file${cause ? `: ${cause.message}` : ""}`, "staging_failed", cause)
        this.name = "StagingError"
    }
}

export class ChannelResponseError extends GallerySaverError {
    method: string
    constructor(method: string, detail: string) {
        super(`Invalid response from ${method}: ${detail}`, "invalid_response")
        this.name = "ChannelResponseError"
        this.method = method
    }
}

export class InvalidRelativePathError extends GallerySaverError {
    relativePath: string
    constructor(relativePath: string) {
        super(`Invalid relative path: ${relativePath}`, "invalid_path")
        this.name = "InvalidRelativePathError"
        this.relativePath = relativePath
    }
}

/**
 * Text placed in `SaveResult.errorMessage` for a thrown value.
 */
export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message
    return String(err)
}
