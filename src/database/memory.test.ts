import { describe, expect, it } from "vitest";
import { cosineDistance, InMemoryStore } from "./memory";
import type { NewDocument } from "./types";
import { DocumentStateError, NotFoundError } from "../utils/errors";
import { silentLogger } from "../testing/fakes";

function newDocument(id: string, hash = `hash-${id}`): NewDocument {
    return {
        documentId: id,
        filename: `${id}.txt`,
        fileType: "txt",
        fileSize: 10,
        fileHash: hash,
        filePath: `memory://${id}.txt`,
    };
}

async function completedStore(): Promise<InMemoryStore> {
    const store = new InMemoryStore(silentLogger);
    await store.createDocument(newDocument("doc_a"));
    await store.createDocument(newDocument("doc_b"));
    await store.transitionStatus("doc_a", "processing");
    await store.completeDocument("doc_a", {
        characterCount: 30,
        wordCount: 6,
        chunks: [
            { chunkId: "chunk_doc_a_1", text: "Second apple chunk", chunkIndex: 1, embedding: [0, 1] },
            { chunkId: "chunk_doc_a_0", text: "First apple chunk", chunkIndex: 0, embedding: [1, 0] },
            { chunkId: "chunk_doc_a_2", text: "Apple without vector", chunkIndex: 2 },
        ],
    });
    await store.transitionStatus("doc_b", "processing");
    await store.completeDocument("doc_b", {
        characterCount: 10,
        wordCount: 2,
        chunks: [{ chunkId: "chunk_doc_b_0", text: "banana apple", chunkIndex: 0, embedding: [1, 1] }],
    });
    return store;
}

describe("cosineDistance", () => {
    it("is 0 for identical directions, 1 for orthogonal and 2 for opposite vectors", () => {
        expect(cosineDistance([2, 0], [5, 0])).toBe(0);
        expect(cosineDistance([1, 0], [0, 1])).toBe(1);
        expect(cosineDistance([1, 0], [-1, 0])).toBe(2);
    });

    it("treats a zero vector as unrelated", () => {
        expect(cosineDistance([0, 0], [1, 0])).toBe(1);
    });
});

describe("InMemoryStore documents", () => {
    it("lists newest documents first and filters by status", async () => {
        const store = new InMemoryStore(silentLogger);
        await store.createDocument(newDocument("doc_1"));
        await store.createDocument(newDocument("doc_2"));
        await store.createDocument(newDocument("doc_3"));
        await store.transitionStatus("doc_2", "processing");

        const all = await store.listDocuments({ skip: 0, limit: 10 });
        expect(all.map((doc) => doc.documentId)).toEqual(["doc_3", "doc_2", "doc_1"]);

        const page = await store.listDocuments({ skip: 1, limit: 1 });
        expect(page.map((doc) => doc.documentId)).toEqual(["doc_2"]);

        const pending = await store.listDocuments({ skip: 0, limit: 10, status: "pending" });
        expect(pending.map((doc) => doc.documentId)).toEqual(["doc_3", "doc_1"]);
        expect(await store.countDocuments("pending")).toBe(2);
        expect(await store.countDocuments()).toBe(3);
    });

    it("finds a document by content hash", async () => {
        const store = new InMemoryStore(silentLogger);
        await store.createDocument(newDocument("doc_1", "same"));

        expect((await store.findDocumentByHash("same"))?.documentId).toBe("doc_1");
        expect(await store.findDocumentByHash("other")).toBeUndefined();
    });

    it("enforces the processing status machine", async () => {
        const store = new InMemoryStore(silentLogger);
        await store.createDocument(newDocument("doc_1"));

        await expect(store.completeDocument("doc_1", { chunks: [], characterCount: 0, wordCount: 0 }))
            .rejects.toBeInstanceOf(DocumentStateError);

        const processing = await store.transitionStatus("doc_1", "processing");
        expect(processing.processingStatus).toBe("processing");

        const failed = await store.transitionStatus("doc_1", "failed", "parser crashed");
        expect(failed).toMatchObject({ processingStatus: "failed", errorMessage: "parser crashed" });

        await expect(store.transitionStatus("doc_1", "processing")).rejects.toBeInstanceOf(DocumentStateError);
        await expect(store.transitionStatus("doc_missing", "processing")).rejects.toBeInstanceOf(NotFoundError);
    });

    it("completes a document with its chunks in one step", async () => {
        const store = await completedStore();

        const document = await store.getDocument("doc_a");
        expect(document).toMatchObject({
            processingStatus: "completed",
            chunkCount: 3,
            characterCount: 30,
            wordCount: 6,
        });
        expect(document?.processedAt).toBeInstanceOf(Date);

        const chunks = await store.getChunksByDocument("doc_a");
        expect(chunks.map((chunk) => chunk.chunkIndex)).toEqual([0, 1, 2]);
        expect(chunks.map((chunk) => chunk.hasEmbedding)).toEqual([true, true, false]);
        expect(chunks[0].chunkSize).toBe("First apple chunk".length);

        const page = await store.getChunksByDocument("doc_a", { skip: 1, limit: 1 });
        expect(page.map((chunk) => chunk.chunkId)).toEqual(["chunk_doc_a_1"]);

        expect(await store.countChunks()).toEqual({ total: 4, withEmbedding: 3 });
    });

    it("deletes a document together with its chunks", async () => {
        const store = await completedStore();

        expect(await store.deleteDocument("doc_a")).toBe(true);
        expect(await store.getDocument("doc_a")).toBeUndefined();
        expect(await store.getChunksByDocument("doc_a")).toEqual([]);
        expect(await store.countChunks()).toEqual({ total: 1, withEmbedding: 1 });
        expect(await store.deleteDocument("doc_a")).toBe(false);
    });
});

describe("InMemoryStore indices", () => {
    it("returns embedded chunks by ascending cosine distance", async () => {
        const store = await completedStore();

        const nearest = await store.queryNearest([1, 0], 10);

        expect(nearest.map((hit) => hit.chunk.chunkId)).toEqual(["chunk_doc_a_0", "chunk_doc_b_0", "chunk_doc_a_1"]);
        expect(nearest[0].distance).toBe(0);
        expect(nearest[2].distance).toBe(1);
    });

    it("limits and filters nearest neighbours by document", async () => {
        const store = await completedStore();

        const nearest = await store.queryNearest([1, 0], 1, "doc_b");

        expect(nearest.map((hit) => hit.chunk.chunkId)).toEqual(["chunk_doc_b_0"]);
    });

    it("finds substring matches ordered by chunk index", async () => {
        const store = await completedStore();

        const matches = await store.findContaining("apple", { limit: 3 });

        expect(matches.map((chunk) => chunk.chunkId)).toEqual(["chunk_doc_a_0", "chunk_doc_b_0", "chunk_doc_a_1"]);
    });

    it("filters substring matches by document", async () => {
        const store = await completedStore();

        const matches = await store.findContaining("vector", { documentId: "doc_a", limit: 10 });

        expect(matches.map((chunk) => chunk.chunkId)).toEqual(["chunk_doc_a_2"]);
    });
});
