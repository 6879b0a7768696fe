import type { ChatRole } from "../llm/types";

export const UNKNOWN_DOCUMENT_NAME = "Unknown";

export interface ChunkMetadata {
    fileType: string;
    uploadedAt?: Date;
}

interface HitBase {
    chunkId: string;
    documentId: string;
    documentName: string;
    text: string;
    chunkIndex: number;
    chunkSize: number;
    metadata: ChunkMetadata;
}

export interface SemanticHit extends HitBase {
    kind: "semantic";
    /** 1 - cosine distance, rounded to 4 decimals. */
    similarityScore: number;
}

export interface KeywordHit extends HitBase {
    kind: "keyword";
    /** min(matchCount / 10, 1). */
    relevanceScore: number;
    matchCount: number;
}

export interface SearchResult extends HitBase {
    kind: "hybrid";
    semanticScore: number;
    keywordScore: number;
    combinedScore: number;
}

export type SearchHit = SemanticHit | KeywordHit | SearchResult;

export interface NeighborChunk {
    chunkIndex: number;
    text: string;
    position: "before" | "after";
}

export type ContextualSearchResult = SearchResult & {
    context: NeighborChunk[];
};

export interface SearchOptions {
    topK: number;
    documentId?: string;
}

export interface SemanticSearchOptions extends SearchOptions {
    minSimilarity?: number;
}

export interface HybridSearchOptions extends SemanticSearchOptions {
    semanticWeight?: number;
    keywordWeight?: number;
}

export interface ContextSearchOptions extends HybridSearchOptions {
    contextWindow?: number;
}

export interface SearchStatistics {
    totalDocuments: number;
    totalChunks: number;
    chunksWithEmbeddings: number;
    searchablePercentage: number;
    averageChunksPerDocument: number;
}

export interface RetrievedContext {
    results: SearchResult[];
    context: string;
    /** Number of result blocks that fit into the context budget. */
    includedCount: number;
}

export interface Source {
    sourceNumber: number;
    documentName: string;
    documentId: string;
    chunkIndex: number;
    relevanceScore: number;
    textPreview: string;
}

export interface ConversationTurn {
    role: Exclude<ChatRole, "system">;
    content: string;
}

export interface GenerateRequest {
    query: string;
    conversationHistory?: ConversationTurn[];
    documentId?: string;
    topK: number;
    temperature: number;
    maxTokens: number;
}

export interface GenerateResult {
    answer: string;
    sources: Source[];
    contextUsed: number;
    model: string;
    tokensUsed: number;
}

export interface QualityMetrics {
    hasSources: boolean;
    sourceCount: number;
    responseLength: number;
    averageSourceRelevance: number;
    containsSourceReference: boolean;
}

export interface QualityEvaluation {
    metrics: QualityMetrics;
    qualityScore: number;
}
