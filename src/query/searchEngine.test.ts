import { describe, expect, it, vi } from "vitest";
import { InMemoryStore } from "../database/memory";
import type { ChunkRecord, DocumentRecord, NearestChunk } from "../database/types";
import { FakeEmbeddingGateway, silentLogger } from "../testing/fakes";
import { ConfigurationError, RetrievalError, ValidationError } from "../utils/errors";
import { countOccurrences, normalizeWeights, SearchEngine, type SearchStore } from "./searchEngine";

const uploadedAt = new Date("2026-01-05T10:00:00.000Z");

function chunk(chunkId: string, text: string, chunkIndex = 0, documentId = "doc_1"): ChunkRecord {
    return {
        chunkId,
        documentId,
        text,
        chunkIndex,
        chunkSize: text.length,
        hasEmbedding: true,
        createdAt: uploadedAt,
    };
}

const knownDocument: DocumentRecord = {
    documentId: "doc_1",
    filename: "handbook.md",
    fileType: "md",
    fileSize: 100,
    fileHash: "hash",
    filePath: "memory://doc_1.md",
    chunkCount: 2,
    processingStatus: "completed",
    uploadedAt,
    updatedAt: uploadedAt,
};

function stubStore(nearest: NearestChunk[], containing: ChunkRecord[]) {
    const store = {
        queryNearest: vi.fn(async () => nearest),
        findContaining: vi.fn(async () => containing),
        getDocument: vi.fn(async (documentId: string) => (documentId === "doc_1" ? knownDocument : undefined)),
        countDocuments: vi.fn(async () => 0),
        getChunksByDocument: vi.fn(async () => []),
        countChunks: vi.fn(async () => ({ total: 0, withEmbedding: 0 })),
    } satisfies SearchStore;
    return store;
}

function engineFor(store: SearchStore): SearchEngine {
    return new SearchEngine({ embedding: new FakeEmbeddingGateway(), store, logger: silentLogger });
}

describe("countOccurrences", () => {
    it("counts non-overlapping matches", () => {
        expect(countOccurrences("aaaa", "aa")).toBe(2);
        expect(countOccurrences("banana", "ana")).toBe(1);
        expect(countOccurrences("banana", "x")).toBe(0);
    });
});

describe("normalizeWeights", () => {
    it("scales weights to sum to one", () => {
        expect(normalizeWeights(7, 3)).toEqual({ semantic: 0.7, keyword: 0.3 });
    });

    it("rejects negative or all-zero weights", () => {
        expect(() => normalizeWeights(-1, 1)).toThrow(ConfigurationError);
        expect(() => normalizeWeights(0, 0)).toThrow(ConfigurationError);
    });
});

describe("SearchEngine.hybridSearch", () => {
    const semanticOnly = chunk("chunk_a", "Vectors describe meaning.", 0);
    const keywordOnly = chunk("chunk_b", "alpha ".repeat(10).trim(), 1);

    it("ranks fused results by weighted score", async () => {
        const store = stubStore([{ chunk: semanticOnly, distance: 0.1 }], [keywordOnly]);

        const results = await engineFor(store).hybridSearch("alpha", { topK: 5 });

        expect(results.map((result) => result.chunkId)).toEqual(["chunk_a", "chunk_b"]);
        expect(results[0]).toMatchObject({ kind: "hybrid", semanticScore: 0.9, keywordScore: 0, combinedScore: 0.63 });
        expect(results[1]).toMatchObject({ semanticScore: 0, keywordScore: 1, combinedScore: 0.3 });
    });

    it("gives the same scores for proportional weights", async () => {
        const store = stubStore([{ chunk: semanticOnly, distance: 0.1 }], [keywordOnly]);

        const results = await engineFor(store).hybridSearch("alpha", { topK: 5, semanticWeight: 7, keywordWeight: 3 });

        expect(results.map((result) => result.combinedScore)).toEqual([0.63, 0.3]);
    });

    it("merges a chunk found by both legs into one result", async () => {
        const both = chunk("chunk_c", "alpha alpha", 0);
        const store = stubStore([{ chunk: both, distance: 0.5 }], [both]);

        const results = await engineFor(store).hybridSearch("alpha", { topK: 5 });

        expect(results).toHaveLength(1);
        expect(results[0]).toMatchObject({ semanticScore: 0.5, keywordScore: 0.2, combinedScore: 0.41 });
    });

    it("asks each leg for twice as many candidates and trims to topK", async () => {
        const store = stubStore(
            [
                { chunk: chunk("chunk_1", "one", 0), distance: 0.1 },
                { chunk: chunk("chunk_2", "two", 1), distance: 0.2 },
                { chunk: chunk("chunk_3", "three", 2), distance: 0.3 },
            ],
            []
        );

        const results = await engineFor(store).hybridSearch("query", { topK: 2 });

        expect(results.map((result) => result.chunkId)).toEqual(["chunk_1", "chunk_2"]);
        expect(store.queryNearest).toHaveBeenCalledWith(expect.any(Array), 8, undefined);
        expect(store.findContaining).toHaveBeenCalledWith("query", { documentId: undefined, limit: 8 });
    });

    it("rejects all-zero weights", async () => {
        const store = stubStore([], []);

        await expect(
            engineFor(store).hybridSearch("alpha", { topK: 5, semanticWeight: 0, keywordWeight: 0 })
        ).rejects.toBeInstanceOf(ConfigurationError);
    });
});

describe("SearchEngine.semanticSearch", () => {
    it("drops hits below the similarity floor and keeps at most topK", async () => {
        const store = stubStore(
            [
                { chunk: chunk("chunk_1", "one", 0), distance: 0.05 },
                { chunk: chunk("chunk_2", "two", 1), distance: 0.6 },
                { chunk: chunk("chunk_3", "three", 2), distance: 0.2 },
                { chunk: chunk("chunk_4", "four", 3), distance: 0.25 },
            ],
            []
        );

        const hits = await engineFor(store).semanticSearch("numbers", { topK: 2, minSimilarity: 0.5 });

        expect(hits.map((hit) => [hit.chunkId, hit.similarityScore])).toEqual([
            ["chunk_1", 0.95],
            ["chunk_3", 0.8],
        ]);
    });

    it("describes chunks of missing documents as unknown", async () => {
        const orphan = chunk("chunk_x", "orphaned text", 0, "doc_gone");
        const store = stubStore([{ chunk: orphan, distance: 0 }], []);

        const [hit] = await engineFor(store).semanticSearch("orphaned", { topK: 1 });

        expect(hit.documentName).toBe("Unknown");
        expect(hit.metadata).toEqual({ fileType: "unknown", uploadedAt: undefined });
    });

    it("attaches document metadata", async () => {
        const store = stubStore([{ chunk: chunk("chunk_1", "one"), distance: 0 }], []);

        const [hit] = await engineFor(store).semanticSearch("one", { topK: 1 });

        expect(hit.documentName).toBe("handbook.md");
        expect(hit.metadata).toEqual({ fileType: "md", uploadedAt });
    });

    it("wraps unexpected store failures", async () => {
        const store = stubStore([], []);
        store.queryNearest.mockRejectedValueOnce(new Error("connection reset"));

        const failure = engineFor(store).semanticSearch("query", { topK: 3 });

        await expect(failure).rejects.toBeInstanceOf(RetrievalError);
        await expect(failure).rejects.toThrow("semantic search failed: connection reset");
    });

    it.each([
        ["an empty query", "   ", 3],
        ["a zero topK", "query", 0],
        ["a fractional topK", "query", 1.5],
    ])("rejects %s", async (_label, query, topK) => {
        const store = stubStore([], []);

        await expect(engineFor(store).semanticSearch(query, { topK })).rejects.toBeInstanceOf(ValidationError);
        expect(store.queryNearest).not.toHaveBeenCalled();
    });
});

describe("SearchEngine.keywordSearch", () => {
    it("scores by match count and keeps retrieval order", async () => {
        const store = stubStore(
            [],
            [
                chunk("chunk_1", "Apple pie", 0),
                chunk("chunk_2", "apple, APPLE and apple", 1),
                chunk("chunk_3", "apple ".repeat(12), 2),
            ]
        );

        const hits = await engineFor(store).keywordSearch("APPLE", { topK: 2 });

        expect(store.findContaining).toHaveBeenCalledWith("apple", { documentId: undefined, limit: 4 });
        expect(hits.map((hit) => [hit.chunkId, hit.matchCount, hit.relevanceScore])).toEqual([
            ["chunk_1", 1, 0.1],
            ["chunk_2", 3, 0.3],
        ]);
    });

    it("caps the relevance score at one", async () => {
        const store = stubStore([], [chunk("chunk_3", "apple ".repeat(12), 2)]);

        const [hit] = await engineFor(store).keywordSearch("apple", { topK: 1 });

        expect(hit.matchCount).toBe(12);
        expect(hit.relevanceScore).toBe(1);
    });
});

describe("SearchEngine with the in-memory store", () => {
    async function seededStore(): Promise<InMemoryStore> {
        const store = new InMemoryStore(silentLogger);
        await store.createDocument({
            documentId: "doc_1",
            filename: "notes.txt",
            fileType: "txt",
            fileSize: 64,
            fileHash: "hash-1",
            filePath: "memory://doc_1.txt",
        });
        await store.transitionStatus("doc_1", "processing");
        await store.completeDocument("doc_1", {
            characterCount: 64,
            wordCount: 12,
            chunks: [
                { chunkId: "c0", text: "intro words", chunkIndex: 0, embedding: [0, 1] },
                { chunkId: "c1", text: "the target paragraph", chunkIndex: 1, embedding: [1, 0] },
                { chunkId: "c2", text: "closing words", chunkIndex: 2, embedding: [0, 1] },
                { chunkId: "c3", text: "appendix", chunkIndex: 3 },
            ],
        });
        return store;
    }

    function engine(store: InMemoryStore): SearchEngine {
        const embedding = new FakeEmbeddingGateway(new Map([["target", [1, 0]]]));
        return new SearchEngine({ embedding, store, logger: silentLogger });
    }

    it("returns neighbouring chunks around each hit", async () => {
        const store = await seededStore();

        const [top] = await engine(store).searchWithContext("target", { topK: 1, contextWindow: 1 });

        expect(top.chunkId).toBe("c1");
        expect(top.context).toEqual([
            { chunkIndex: 0, text: "intro words", position: "before" },
            { chunkIndex: 2, text: "closing words", position: "after" },
        ]);
    });

    it("returns no neighbours for a zero window", async () => {
        const store = await seededStore();

        const [top] = await engine(store).searchWithContext("target", { topK: 1, contextWindow: 0 });

        expect(top.chunkId).toBe("c1");
        expect(top.context).toEqual([]);
    });

    it("rejects a negative window", async () => {
        const store = await seededStore();

        await expect(engine(store).searchWithContext("target", { topK: 1, contextWindow: -1 }))
            .rejects.toBeInstanceOf(ValidationError);
    });

    it("reports corpus statistics", async () => {
        const store = await seededStore();
        await store.createDocument({
            documentId: "doc_2",
            filename: "pending.txt",
            fileType: "txt",
            fileSize: 1,
            fileHash: "hash-2",
            filePath: "memory://doc_2.txt",
        });

        expect(await engine(store).getStatistics()).toEqual({
            totalDocuments: 1,
            totalChunks: 4,
            chunksWithEmbeddings: 3,
            searchablePercentage: 75,
            averageChunksPerDocument: 4,
        });
    });
});
