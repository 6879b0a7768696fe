import type { Logger } from "pino";
import type { RetrievalConfig } from "../config/types";
import type { ChunkRecord, ChunkStore, DocumentRecord, DocumentStore, KeywordIndex, VectorIndex } from "../database/types";
import type { EmbeddingGateway } from "../llm/types";
import { ConfigurationError, RagwellError, RetrievalError, ValidationError } from "../utils/errors";
import { childLogger } from "../utils/logger";
import {
    UNKNOWN_DOCUMENT_NAME,
    type ContextSearchOptions,
    type ContextualSearchResult,
    type HybridSearchOptions,
    type KeywordHit,
    type NeighborChunk,
    type SearchOptions,
    type SearchResult,
    type SearchStatistics,
    type SemanticHit,
    type SemanticSearchOptions,
} from "./types";

export type SearchStore = VectorIndex &
    KeywordIndex &
    Pick<DocumentStore, "getDocument" | "countDocuments"> &
    Pick<ChunkStore, "getChunksByDocument" | "countChunks">;

export type SearchDefaults = Pick<RetrievalConfig, "minSimilarity" | "semanticWeight" | "keywordWeight">;

export interface SearchEngineOptions {
    embedding: EmbeddingGateway;
    store: SearchStore;
    defaults?: Partial<SearchDefaults>;
    logger?: Logger;
}

const KEYWORD_SATURATION = 10;
const DEFAULT_CONTEXT_WINDOW = 1;

export function roundTo(value: number, decimals: number): number {
    const factor = 10 ** decimals;
    return Math.round(value * factor) / factor;
}

/** Non-overlapping occurrences of `needle` in `haystack`. */
export function countOccurrences(haystack: string, needle: string): number {
    if (!needle) {
        return 0;
    }
    let count = 0;
    let from = haystack.indexOf(needle);
    while (from !== -1) {
        count++;
        from = haystack.indexOf(needle, from + needle.length);
    }
    return count;
}

export function normalizeWeights(semanticWeight: number, keywordWeight: number): { semantic: number; keyword: number } {
    if (!Number.isFinite(semanticWeight) || !Number.isFinite(keywordWeight) || semanticWeight < 0 || keywordWeight < 0) {
        throw new ConfigurationError(
            `Hybrid weights must be non-negative numbers, got: ${semanticWeight}, ${keywordWeight}`
        );
    }
    const total = semanticWeight + keywordWeight;
    if (total === 0) {
        throw new ConfigurationError("Hybrid weights must not both be zero.");
    }
    return { semantic: semanticWeight / total, keyword: keywordWeight / total };
}

type DocumentLookup = (documentId: string) => Promise<DocumentRecord | undefined>;

export class SearchEngine {
    private readonly embedding: EmbeddingGateway;
    private readonly store: SearchStore;
    private readonly defaults: SearchDefaults;
    private readonly logger: Logger;

    constructor(options: SearchEngineOptions) {
        this.embedding = options.embedding;
        this.store = options.store;
        this.defaults = {
            minSimilarity: options.defaults?.minSimilarity ?? 0,
            semanticWeight: options.defaults?.semanticWeight ?? 0.7,
            keywordWeight: options.defaults?.keywordWeight ?? 0.3,
        };
        this.logger = childLogger(options.logger, { module: "search" });
    }

    async semanticSearch(query: string, options: SemanticSearchOptions): Promise<SemanticHit[]> {
        const text = requireQuery(query);
        requireTopK(options.topK);
        const minSimilarity = options.minSimilarity ?? this.defaults.minSimilarity;

        return this.guard("semantic search", async () => {
            const vector = await this.embedding.embedOne(text);
            const neighbors = await this.store.queryNearest(vector, options.topK * 2, options.documentId);
            const lookup = this.documentLookup();

            const hits: SemanticHit[] = [];
            for (const { chunk, distance } of neighbors) {
                const similarityScore = roundTo(1 - distance, 4);
                if (similarityScore < minSimilarity) {
                    continue;
                }
                hits.push({
                    kind: "semantic",
                    ...(await this.describeChunk(chunk, lookup)),
                    similarityScore,
                });
                if (hits.length === options.topK) {
                    break;
                }
            }

            this.logger.debug({ topK: options.topK, hits: hits.length }, "Semantic search finished.");
            return hits;
        });
    }

    async keywordSearch(query: string, options: SearchOptions): Promise<KeywordHit[]> {
        const needle = requireQuery(query).toLowerCase();
        requireTopK(options.topK);

        return this.guard("keyword search", async () => {
            const candidates = await this.store.findContaining(needle, {
                documentId: options.documentId,
                limit: options.topK * 2,
            });
            const lookup = this.documentLookup();

            const hits: KeywordHit[] = [];
            for (const chunk of candidates.slice(0, options.topK)) {
                const matchCount = countOccurrences(chunk.text.toLowerCase(), needle);
                hits.push({
                    kind: "keyword",
                    ...(await this.describeChunk(chunk, lookup)),
                    relevanceScore: Math.min(matchCount / KEYWORD_SATURATION, 1),
                    matchCount,
                });
            }

            this.logger.debug({ topK: options.topK, hits: hits.length }, "Keyword search finished.");
            return hits;
        });
    }

    async hybridSearch(query: string, options: HybridSearchOptions): Promise<SearchResult[]> {
        requireQuery(query);
        requireTopK(options.topK);
        const weights = normalizeWeights(
            options.semanticWeight ?? this.defaults.semanticWeight,
            options.keywordWeight ?? this.defaults.keywordWeight
        );

        const legOptions = { topK: options.topK * 2, documentId: options.documentId };
        const [semanticHits, keywordHits] = await Promise.all([
            this.semanticSearch(query, { ...legOptions, minSimilarity: options.minSimilarity }),
            this.keywordSearch(query, legOptions),
        ]);

        const merged = new Map<string, SearchResult>();
        for (const hit of semanticHits) {
            const { kind: _kind, similarityScore, ...base } = hit;
            merged.set(hit.chunkId, { ...base, kind: "hybrid", semanticScore: similarityScore, keywordScore: 0, combinedScore: 0 });
        }
        for (const hit of keywordHits) {
            const existing = merged.get(hit.chunkId);
            if (existing) {
                existing.keywordScore = hit.relevanceScore;
                continue;
            }
            const { kind: _kind, relevanceScore, matchCount: _matchCount, ...base } = hit;
            merged.set(hit.chunkId, { ...base, kind: "hybrid", semanticScore: 0, keywordScore: relevanceScore, combinedScore: 0 });
        }

        const results = [...merged.values()].map((result) => ({
            ...result,
            combinedScore: roundTo(result.semanticScore * weights.semantic + result.keywordScore * weights.keyword, 4),
        }));

        // Array.prototype.sort is stable, so equal scores keep merge order.
        results.sort((a, b) => b.combinedScore - a.combinedScore);

        this.logger.debug(
            { semantic: semanticHits.length, keyword: keywordHits.length, merged: results.length },
            "Hybrid search merged result sets."
        );
        return results.slice(0, options.topK);
    }

    async searchWithContext(query: string, options: ContextSearchOptions): Promise<ContextualSearchResult[]> {
        const window = options.contextWindow ?? DEFAULT_CONTEXT_WINDOW;
        if (!Number.isInteger(window) || window < 0) {
            throw new ValidationError(`contextWindow must be a non-negative integer, got: ${window}`);
        }

        const results = await this.hybridSearch(query, options);
        if (window === 0) {
            return results.map((result) => ({ ...result, context: [] }));
        }

        return this.guard("context expansion", async () => {
            const documentChunks = new Map<string, Promise<ChunkRecord[]>>();
            const chunksOf = (documentId: string): Promise<ChunkRecord[]> => {
                let pending = documentChunks.get(documentId);
                if (!pending) {
                    pending = this.store.getChunksByDocument(documentId);
                    documentChunks.set(documentId, pending);
                }
                return pending;
            };

            const expanded: ContextualSearchResult[] = [];
            for (const result of results) {
                const context: NeighborChunk[] = (await chunksOf(result.documentId))
                    .filter((chunk) =>
                        chunk.chunkIndex !== result.chunkIndex &&
                        Math.abs(chunk.chunkIndex - result.chunkIndex) <= window
                    )
                    .sort((a, b) => a.chunkIndex - b.chunkIndex)
                    .map((chunk) => ({
                        chunkIndex: chunk.chunkIndex,
                        text: chunk.text,
                        position: chunk.chunkIndex < result.chunkIndex ? "before" : "after",
                    }));
                expanded.push({ ...result, context });
            }
            return expanded;
        });
    }

    async getStatistics(): Promise<SearchStatistics> {
        return this.guard("search statistics", async () => {
            const [totalDocuments, counts] = await Promise.all([
                this.store.countDocuments("completed"),
                this.store.countChunks(),
            ]);

            return {
                totalDocuments,
                totalChunks: counts.total,
                chunksWithEmbeddings: counts.withEmbedding,
                searchablePercentage: counts.total > 0 ? roundTo((counts.withEmbedding / counts.total) * 100, 2) : 0,
                averageChunksPerDocument: totalDocuments > 0 ? roundTo(counts.total / totalDocuments, 2) : 0,
            };
        });
    }

    private documentLookup(): DocumentLookup {
        const cache = new Map<string, Promise<DocumentRecord | undefined>>();
        return (documentId) => {
            let pending = cache.get(documentId);
            if (!pending) {
                pending = this.store.getDocument(documentId);
                cache.set(documentId, pending);
            }
            return pending;
        };
    }

    private async describeChunk(chunk: ChunkRecord, lookup: DocumentLookup) {
        const document = await lookup(chunk.documentId);
        return {
            chunkId: chunk.chunkId,
            documentId: chunk.documentId,
            documentName: document?.filename ?? UNKNOWN_DOCUMENT_NAME,
            text: chunk.text,
            chunkIndex: chunk.chunkIndex,
            chunkSize: chunk.chunkSize,
            metadata: {
                fileType: document?.fileType ?? "unknown",
                uploadedAt: document?.uploadedAt,
            },
        };
    }

    private async guard<T>(operation: string, task: () => Promise<T>): Promise<T> {
        try {
            return await task();
        } catch (error) {
            if (error instanceof RagwellError) {
                throw error;
            }
            this.logger.error({ err: error, operation }, "Search operation failed.");
            throw new RetrievalError(operation, error);
        }
    }
}

function requireQuery(query: string): string {
    const text = query.trim();
    if (!text) {
        throw new ValidationError("Query must not be empty.");
    }
    return text;
}

function requireTopK(topK: number): void {
    if (!Number.isInteger(topK) || topK < 1) {
        throw new ValidationError(`topK must be a positive integer, got: ${topK}`);
    }
}
