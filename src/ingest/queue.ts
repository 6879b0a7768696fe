import pLimit from "p-limit";
import type { Logger } from "pino";
import { getErrorMessage } from "../utils/errors";
import { childLogger } from "../utils/logger";
import type { IngestionJob, IngestionOutcome } from "./pipeline";

export type IngestionHandler = (job: IngestionJob) => Promise<IngestionOutcome>;

export interface IngestionQueueOptions {
    concurrency: number;
    logger?: Logger;
    /** Called once per job after its outcome is known. */
    onSettled?: (outcome: IngestionOutcome) => void;
}

export interface IngestionQueueStats {
    queued: number;
    active: number;
    completed: number;
    failed: number;
}

/**
 * Accepts ingestion jobs without waiting for them and runs them on a bounded
 * worker pool. Outcomes are counted and reported through `onSettled`.
 */
export class IngestionQueue {
    private readonly limit: ReturnType<typeof pLimit>;
    private readonly pending = new Set<Promise<void>>();
    private readonly logger: Logger;
    private counters: IngestionQueueStats = { queued: 0, active: 0, completed: 0, failed: 0 };

    constructor(
        private readonly handler: IngestionHandler,
        private readonly options: IngestionQueueOptions
    ) {
        this.limit = pLimit(Math.max(1, options.concurrency));
        this.logger = childLogger(options.logger, { module: "ingest-queue" });
    }

    enqueue(job: IngestionJob): void {
        this.counters.queued++;
        this.logger.debug({ documentId: job.documentId, queued: this.counters.queued }, "Queued ingestion job.");

        const run = this.limit(() => this.execute(job));
        this.pending.add(run);
        void run.finally(() => {
            this.pending.delete(run);
        });
    }

    /** Resolves once every queued job, including ones enqueued meanwhile, has settled. */
    async onIdle(): Promise<void> {
        while (this.pending.size > 0) {
            await Promise.all([...this.pending]);
        }
    }

    stats(): IngestionQueueStats {
        return { ...this.counters };
    }

    private async execute(job: IngestionJob): Promise<void> {
        this.counters.queued--;
        this.counters.active++;

        let outcome: IngestionOutcome;
        try {
            outcome = await this.handler(job);
        } catch (error) {
            this.logger.error({ err: error, documentId: job.documentId }, "Ingestion handler rejected.");
            outcome = {
                documentId: job.documentId,
                status: "failed",
                chunkCount: 0,
                error: getErrorMessage(error),
            };
        } finally {
            this.counters.active--;
        }

        if (outcome.status === "completed") {
            this.counters.completed++;
        } else {
            this.counters.failed++;
        }
        try {
            this.options.onSettled?.(outcome);
        } catch (error) {
            this.logger.error({ err: error, documentId: job.documentId }, "Ingestion listener failed.");
        }
    }
}
