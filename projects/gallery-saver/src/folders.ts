export type DefaultFolder = "Download" | "Pictures" | "Movies" | "Music" | "Documents"

/**
 * Default destination folder for a MIME type's top-level category.
 * Names follow the shared-storage directories of Android's Environment.
 */
export function defaultRelativePath(mimeType: string | undefined): DefaultFolder {
    if (!mimeType) return "Download"
    if (mimeType.startsWith("image/")) return "Pictures"
    if (mimeType.startsWith("video/")) return "Movies"
    if (mimeType.startsWith("audio/")) return "Music"
    return "Documents"
}
