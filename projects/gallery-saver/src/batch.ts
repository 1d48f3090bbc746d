import { describeError } from "./errors.js"
import type { SaveResult } from "./types.js"

export interface BatchItemOutcome {
    fileName: string
    isSuccess: boolean
    errorMessage?: string
}

/**
 * Folds per-item outcomes into one result. With any failure, the batch
 * succeeds when at least one item was saved, and the message lists every
 * failure in input order.
 */
export function aggregateBatchResult(outcomes: BatchItemOutcome[]): SaveResult {
    const failures = outcomes.filter((o) => !o.isSuccess)
    if (failures.length === 0) {
        return { isSuccess: true }
    }

    const successCount = outcomes.length - failures.length
    const errors = failures.map((o) => `${o.fileName}: ${o.errorMessage ?? "Unknown error"}`)
    return {
        isSuccess: successCount > 0,
        errorMessage: `Saved ${successCount} files, failed ${failures.length} files. Errors: ${errors.join("; ")}`,
    }
}

/**
 * Runs `saveOne` over every item in order. A throw is recorded as that
 * item's failure; the remaining items still run.
 */
export async function collectBatchOutcomes<T extends { fileName: string }>(
    items: T[],
    saveOne: (item: T) => Promise<SaveResult>
): Promise<BatchItemOutcome[]> {
    const outcomes: BatchItemOutcome[] = []
    for (const item of items) {
        try {
            const result = await saveOne(item)
            outcomes.push({ fileName: item.fileName, isSuccess: result.isSuccess, errorMessage: result.errorMessage })
        } catch (error) {
            outcomes.push({ fileName: item.fileName, isSuccess: false, errorMessage: describeError(error) })
        }
    }
    return outcomes
}
