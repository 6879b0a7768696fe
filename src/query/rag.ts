import type { Logger } from "pino";
import type { RetrievalConfig } from "../config/types";
import { buildSystemPrompt, NO_DOCUMENTS_ANSWER } from "../llm/prompt";
import type { ChatGateway, ChatMessage } from "../llm/types";
import { ValidationError } from "../utils/errors";
import { childLogger } from "../utils/logger";
import { assembleContext } from "./context";
import type { SearchEngine } from "./searchEngine";
import type {
    GenerateRequest,
    GenerateResult,
    QualityEvaluation,
    RetrievedContext,
    SearchResult,
    Source,
} from "./types";

export type RagSettings = Pick<
    RetrievalConfig,
    "maxContextChars" | "maxSources" | "historyTurns" | "semanticWeight" | "keywordWeight"
>;

export interface RagOrchestratorOptions {
    search: Pick<SearchEngine, "hybridSearch" | "semanticSearch">;
    chat: ChatGateway;
    settings?: Partial<RagSettings>;
    logger?: Logger;
}

export interface RetrieveContextOptions {
    topK: number;
    documentId?: string;
    useHybrid?: boolean;
}

const TEXT_PREVIEW_LENGTH = 200;
const NO_MODEL = "N/A";

const DEFAULT_SETTINGS: RagSettings = {
    maxContextChars: 6000,
    maxSources: 10,
    historyTurns: 5,
    semanticWeight: 0.7,
    keywordWeight: 0.3,
};

export function extractSources(results: SearchResult[], maxSources: number): Source[] {
    return results.slice(0, maxSources).map((result, index) => ({
        sourceNumber: index + 1,
        documentName: result.documentName,
        documentId: result.documentId,
        chunkIndex: result.chunkIndex,
        relevanceScore: result.combinedScore || result.semanticScore,
        textPreview: result.text.slice(0, TEXT_PREVIEW_LENGTH),
    }));
}

/** Diagnostic heuristic in [0, 1]; not part of answer generation. */
export function evaluateResponseQuality(
    answer: string,
    sources: ReadonlyArray<Pick<Source, "relevanceScore">>
): QualityEvaluation {
    const sourceCount = sources.length;
    const averageSourceRelevance = sourceCount > 0
        ? sources.reduce((sum, source) => sum + source.relevanceScore, 0) / sourceCount
        : 0;
    const containsSourceReference = Array.from({ length: sourceCount }, (_, i) => `Source ${i + 1}`)
        .some((reference) => answer.includes(reference));

    let score = 0;
    if (sourceCount > 0) score += 0.3;
    if (sourceCount >= 3) score += 0.2;
    if (averageSourceRelevance > 0.5) score += 0.3;
    if (containsSourceReference) score += 0.2;

    return {
        metrics: {
            hasSources: sourceCount > 0,
            sourceCount,
            responseLength: answer.length,
            averageSourceRelevance,
            containsSourceReference,
        },
        qualityScore: Math.round(score * 100) / 100,
    };
}

export class RagOrchestrator {
    private readonly search: RagOrchestratorOptions["search"];
    private readonly chat: ChatGateway;
    private readonly settings: RagSettings;
    private readonly logger: Logger;

    constructor(options: RagOrchestratorOptions) {
        this.search = options.search;
        this.chat = options.chat;
        this.settings = { ...DEFAULT_SETTINGS, ...options.settings };
        this.logger = childLogger(options.logger, { module: "rag" });
    }

    async retrieveContext(query: string, options: RetrieveContextOptions): Promise<RetrievedContext> {
        const results = (options.useHybrid ?? true)
            ? await this.search.hybridSearch(query, {
                topK: options.topK,
                documentId: options.documentId,
                semanticWeight: this.settings.semanticWeight,
                keywordWeight: this.settings.keywordWeight,
            })
            : (await this.search.semanticSearch(query, { topK: options.topK, documentId: options.documentId }))
                .map((hit): SearchResult => {
                    const { kind: _kind, similarityScore, ...base } = hit;
                    return { ...base, kind: "hybrid", semanticScore: similarityScore, keywordScore: 0, combinedScore: similarityScore };
                });

        const { context, includedCount } = assembleContext(results, this.settings.maxContextChars);
        this.logger.debug({ results: results.length, includedCount, contextLength: context.length }, "Assembled retrieval context.");

        return { results, context, includedCount };
    }

    async generate(request: GenerateRequest): Promise<GenerateResult> {
        const query = request.query.trim();
        if (!query) {
            throw new ValidationError("Query must not be empty.");
        }

        const { results, context } = await this.retrieveContext(query, {
            topK: request.topK,
            documentId: request.documentId,
        });

        if (results.length === 0) {
            this.logger.warn({ documentId: request.documentId }, "No indexed chunks matched the query; returning fallback answer.");
            return {
                answer: NO_DOCUMENTS_ANSWER,
                sources: [],
                contextUsed: 0,
                model: NO_MODEL,
                tokensUsed: 0,
            };
        }

        const turns = this.settings.historyTurns;
        const history = turns > 0 ? (request.conversationHistory ?? []).slice(-turns) : [];
        const messages: ChatMessage[] = [
            { role: "system", content: buildSystemPrompt(context) },
            ...history.map((turn): ChatMessage => ({ role: turn.role, content: turn.content })),
            { role: "user", content: query },
        ];

        this.logger.info({ results: results.length, historyTurns: history.length }, "Generating answer with retrieved context.");
        const completion = await this.chat.complete({
            messages,
            temperature: request.temperature,
            maxTokens: request.maxTokens,
        });

        return {
            answer: completion.text,
            sources: extractSources(results, this.settings.maxSources),
            contextUsed: results.length,
            model: completion.modelName,
            tokensUsed: completion.totalTokens,
        };
    }
}
