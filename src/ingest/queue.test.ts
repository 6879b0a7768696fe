import { describe, expect, it } from "vitest";
import { silentLogger } from "../testing/fakes";
import type { IngestionJob, IngestionOutcome } from "./pipeline";
import { IngestionQueue } from "./queue";

function completed(job: IngestionJob): IngestionOutcome {
    return { documentId: job.documentId, status: "completed", chunkCount: 1 };
}

function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("IngestionQueue", () => {
    it("accepts jobs immediately and runs them later", async () => {
        const started: string[] = [];
        const queue = new IngestionQueue(
            async (job) => {
                started.push(job.documentId);
                return completed(job);
            },
            { concurrency: 2, logger: silentLogger }
        );

        queue.enqueue({ documentId: "doc_1" });
        queue.enqueue({ documentId: "doc_2" });

        expect(started).toEqual([]);
        expect(queue.stats()).toEqual({ queued: 2, active: 0, completed: 0, failed: 0 });

        await queue.onIdle();

        expect(started).toEqual(["doc_1", "doc_2"]);
        expect(queue.stats()).toEqual({ queued: 0, active: 0, completed: 2, failed: 0 });
    });

    it("never runs more jobs at once than its concurrency", async () => {
        let active = 0;
        let peak = 0;
        const queue = new IngestionQueue(
            async (job) => {
                active++;
                peak = Math.max(peak, active);
                await delay(5);
                active--;
                return completed(job);
            },
            { concurrency: 2, logger: silentLogger }
        );

        for (let i = 0; i < 5; i++) {
            queue.enqueue({ documentId: `doc_${i}` });
        }
        await queue.onIdle();

        expect(peak).toBe(2);
        expect(queue.stats().completed).toBe(5);
    });

    it("reports failed outcomes and rejected handlers", async () => {
        const settled: IngestionOutcome[] = [];
        const queue = new IngestionQueue(
            async (job) => {
                if (job.documentId === "doc_throws") {
                    throw new Error("handler crashed");
                }
                return { documentId: job.documentId, status: "failed", chunkCount: 0, error: "parse failed" };
            },
            { concurrency: 1, logger: silentLogger, onSettled: (outcome) => settled.push(outcome) }
        );

        queue.enqueue({ documentId: "doc_fails" });
        queue.enqueue({ documentId: "doc_throws" });
        await queue.onIdle();

        expect(settled).toEqual([
            { documentId: "doc_fails", status: "failed", chunkCount: 0, error: "parse failed" },
            { documentId: "doc_throws", status: "failed", chunkCount: 0, error: "handler crashed" },
        ]);
        expect(queue.stats()).toEqual({ queued: 0, active: 0, completed: 0, failed: 2 });
    });

    it("keeps running when a listener throws", async () => {
        const queue = new IngestionQueue(async (job) => completed(job), {
            concurrency: 1,
            logger: silentLogger,
            onSettled: () => {
                throw new Error("listener bug");
            },
        });

        queue.enqueue({ documentId: "doc_1" });
        queue.enqueue({ documentId: "doc_2" });
        await queue.onIdle();

        expect(queue.stats().completed).toBe(2);
    });

    it("waits for jobs enqueued while draining", async () => {
        const seen: string[] = [];
        const queue: IngestionQueue = new IngestionQueue(
            async (job) => {
                seen.push(job.documentId);
                if (job.documentId === "doc_first") {
                    queue.enqueue({ documentId: "doc_follow_up" });
                }
                return completed(job);
            },
            { concurrency: 1, logger: silentLogger }
        );

        queue.enqueue({ documentId: "doc_first" });
        await queue.onIdle();

        expect(seen).toEqual(["doc_first", "doc_follow_up"]);
    });
});
