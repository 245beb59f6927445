/**
 * Bounded-concurrency driver for processing many documents.
 * Documents share no state, so any number may run at once; the limit exists
 * for the downstream collaborators (embedding service, storage).
 */

import { errorMessage } from "./errors";

export type BatchOutcome<R> =
    | { status: "done"; result: R }
    | { status: "failed"; error: string }
    | { status: "cancelled" };

export type BatchItemResult<J, R> = BatchOutcome<R> & { job: J; index: number };

export interface BatchOptions {
    maxConcurrent?: number;
    /** Aborting cancels jobs not yet started; running jobs finish */
    signal?: AbortSignal;
    /** Called as each job settles */
    onSettled?: (index: number, outcome: BatchOutcome<unknown>) => void;
}

const DEFAULT_MAX_CONCURRENT = 4;
const CANCELLED = { status: "cancelled" } as const;

/**
 * Run `worker` over `jobs` with at most `maxConcurrent` in flight.
 * Results come back in job order. A failing job is reported, never rethrown,
 * so one bad document does not stop the batch.
 */
export async function processBatch<J, R>(
    jobs: J[],
    worker: (job: J, index: number) => Promise<R>,
    options: BatchOptions = {}
): Promise<Array<BatchItemResult<J, R>>> {
    const { maxConcurrent = DEFAULT_MAX_CONCURRENT, signal, onSettled } = options;

    if (!Number.isInteger(maxConcurrent) || maxConcurrent <= 0) {
        throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }

    const outcomes: Array<BatchOutcome<R>> = jobs.map(() => CANCELLED);
    let next = 0;

    const runJob = async (index: number, job: J): Promise<void> => {
        let outcome: BatchOutcome<R>;
        try {
            outcome = { status: "done", result: await worker(job, index) };
        } catch (error) {
            outcome = { status: "failed", error: errorMessage(error) };
        }
        outcomes[index] = outcome;
        onSettled?.(index, outcome);
    };

    const lane = async (): Promise<void> => {
        while (next < jobs.length) {
            if (signal?.aborted) return;
            const index = next++;
            const job = jobs[index];
            if (job === undefined) continue;
            await runJob(index, job);
        }
    };

    const lanes: Promise<void>[] = [];
    for (let i = 0; i < Math.min(maxConcurrent, jobs.length); i++) {
        lanes.push(lane());
    }
    await Promise.all(lanes);

    return jobs.map((job, index) => ({
        ...(outcomes[index] ?? CANCELLED),
        job,
        index,
    }));
}
