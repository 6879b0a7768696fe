import { describe, expect, it } from "vitest";
import { InMemoryStore } from "../database/memory";
import type { EmbeddingGateway } from "../llm/types";
import { FakeEmbeddingGateway, MemoryFileStorage, silentLogger } from "../testing/fakes";
import type { Chunker } from "./chunker";
import { buildChunkId, processDocument, type IngestionDependencies } from "./pipeline";

const splitOnBars: Chunker = (text) => text.split("|").map((piece) => piece.trim()).filter(Boolean);

async function setup(filename: string, content: string, embedding: EmbeddingGateway = new FakeEmbeddingGateway()) {
    const store = new InMemoryStore(silentLogger);
    const storage = new MemoryFileStorage();
    const extension = filename.slice(filename.lastIndexOf("."));
    const filePath = await storage.save("doc_1", extension, Buffer.from(content));
    await store.createDocument({
        documentId: "doc_1",
        filename,
        fileType: extension.slice(1),
        fileSize: content.length,
        fileHash: "hash-1",
        filePath,
    });
    const deps: IngestionDependencies = { store, storage, chunker: splitOnBars, embedding, logger: silentLogger };
    return { store, deps };
}

describe("buildChunkId", () => {
    it("combines the document id and chunk index", () => {
        expect(buildChunkId("doc_ab12", 3)).toBe("chunk_doc_ab12_3");
    });
});

describe("processDocument", () => {
    it("stores embedded chunks and completes the document", async () => {
        const embedding = new FakeEmbeddingGateway();
        const { store, deps } = await setup("notes.txt", "alpha beta | gamma delta", embedding);

        const outcome = await processDocument({ documentId: "doc_1" }, deps);

        expect(outcome).toEqual({ documentId: "doc_1", status: "completed", chunkCount: 2 });
        expect(embedding.batches).toEqual([["alpha beta", "gamma delta"]]);

        const chunks = await store.getChunksByDocument("doc_1");
        expect(chunks.map((chunk) => [chunk.chunkId, chunk.chunkIndex, chunk.text, chunk.hasEmbedding])).toEqual([
            ["chunk_doc_1_0", 0, "alpha beta", true],
            ["chunk_doc_1_1", 1, "gamma delta", true],
        ]);
        expect(await store.getDocument("doc_1")).toMatchObject({
            processingStatus: "completed",
            chunkCount: 2,
            characterCount: 24,
            wordCount: 5,
        });
    });

    it("marks documents without an extractor as failed", async () => {
        const { store, deps } = await setup("scan.pdf", "%PDF-1.7");

        const outcome = await processDocument({ documentId: "doc_1" }, deps);

        const message = 'No text extractor is available for "pdf" files.';
        expect(outcome).toEqual({ documentId: "doc_1", status: "failed", chunkCount: 0, error: message });
        expect(await store.getDocument("doc_1")).toMatchObject({ processingStatus: "failed", errorMessage: message });
        expect(await store.getChunksByDocument("doc_1")).toEqual([]);
    });

    it("marks the document failed when embedding fails", async () => {
        const embedding = new FakeEmbeddingGateway();
        embedding.failWith = new Error("quota exceeded");
        const { store, deps } = await setup("notes.txt", "one | two", embedding);

        const outcome = await processDocument({ documentId: "doc_1" }, deps);

        expect(outcome.status).toBe("failed");
        expect(outcome.error).toBe("quota exceeded");
        expect((await store.getDocument("doc_1"))?.processingStatus).toBe("failed");
    });

    it("rejects an embedding response with the wrong number of vectors", async () => {
        const shortGateway: EmbeddingGateway = {
            embedBatch: async () => [[1, 0]],
            embedOne: async () => [1, 0],
        };
        const { deps } = await setup("notes.txt", "one | two", shortGateway);

        const outcome = await processDocument({ documentId: "doc_1" }, deps);

        expect(outcome.error).toBe("Expected 2 embeddings, received 1.");
    });

    it("reports a missing document without throwing", async () => {
        const { deps } = await setup("notes.txt", "text");

        const outcome = await processDocument({ documentId: "doc_missing" }, deps);

        expect(outcome).toEqual({
            documentId: "doc_missing",
            status: "failed",
            chunkCount: 0,
            error: "Document not found: doc_missing",
        });
    });

    it("refuses to process a document twice", async () => {
        const { store, deps } = await setup("notes.txt", "one");
        await processDocument({ documentId: "doc_1" }, deps);

        const second = await processDocument({ documentId: "doc_1" }, deps);

        expect(second.status).toBe("failed");
        expect(second.error).toBe("Document doc_1 cannot move from completed to processing.");
        expect((await store.getDocument("doc_1"))?.processingStatus).toBe("completed");
    });
});
