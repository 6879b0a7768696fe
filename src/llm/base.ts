import Bottleneck from "bottleneck";
import pLimit from "p-limit";
import pRetry from "p-retry";
import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import { batchItems } from "../utils/batchItems";
import { EmbeddingGatewayError, GenerationGatewayError, RagwellError, ValidationError, getErrorMessage } from "../utils/errors";
import { countTokens, countTokensInBatch } from "../utils/tokenEncoder";
import type { ChatProvider, CompletionRequest, CompletionResult, EmbedOptions, EmbeddingProvider } from "./types";

export interface ProviderRateLimits {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
}

interface ScheduleOptions {
    logPrefix: string;
}

const ONE_MINUTE_MS = 60_000;

/** A limiter whose reservoir refills to `perMinute` every minute; unlimited without one. */
function perMinuteLimiter(maxConcurrent: number, perMinute?: number): Bottleneck {
    if (!perMinute || !Number.isFinite(perMinute)) {
        return new Bottleneck({ maxConcurrent });
    }
    const amount = Math.max(1, Math.floor(perMinute));
    return new Bottleneck({
        maxConcurrent,
        reservoir: amount,
        reservoirRefreshAmount: amount,
        reservoirRefreshInterval: ONE_MINUTE_MS,
    });
}

class ProviderScheduler {
    private readonly requestLimiter: Bottleneck;
    private readonly tokenLimiter?: Bottleneck;

    constructor(
        concurrency: number,
        limits: ProviderRateLimits,
        private readonly retries: number,
        private readonly logger?: Logger
    ) {
        this.requestLimiter = perMinuteLimiter(concurrency, limits.maxRequestsPerMinute);

        // Token reservations finish instantly, so only the reservoir bounds them.
        if (limits.maxTokensPerMinute && Number.isFinite(limits.maxTokensPerMinute)) {
            this.tokenLimiter = perMinuteLimiter(Math.max(concurrency, Math.ceil(limits.maxTokensPerMinute)), limits.maxTokensPerMinute);
        }
    }

    async schedule<T>(tokens: number, task: () => Promise<T>, { logPrefix }: ScheduleOptions): Promise<T> {
        await this.reserveTokens(tokens);
        return this.requestLimiter.schedule(() =>
            pRetry(task, {
                retries: this.retries,
                onFailedAttempt: (error) => {
                    this.logger?.warn(
                        {
                            attemptNumber: error.attemptNumber,
                            retriesLeft: error.retriesLeft,
                            error: error.message,
                        },
                        `${logPrefix} failed attempt`
                    );
                },
            })
        );
    }

    private async reserveTokens(tokens: number): Promise<void> {
        if(!this.tokenLimiter || tokens <= 0) {
            return;
        }

        const weight = Math.max(1, Math.ceil(tokens));
        await this.tokenLimiter.schedule({ weight }, async () => undefined);
    }
}

export abstract class BaseEmbeddingProvider implements EmbeddingProvider {
    protected readonly concurrencyLimit: number;
    protected readonly batchSize: number;
    private readonly scheduler: ProviderScheduler;

    constructor(
        public readonly config: EmbeddingModelConfig,
        limits: ProviderRateLimits,
        protected readonly logger?: Logger
    ) {
        this.batchSize = Math.max(1, limits.batchSize ?? 100);
        this.concurrencyLimit = Math.max(1, limits.concurrency ?? 4);
        this.scheduler = new ProviderScheduler(this.concurrencyLimit, limits, limits.retries ?? 5, logger);
    }

    async embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]> {
        if(texts.length === 0) {
            return [];
        }

        const batches = batchItems(texts, this.batchSize)
            .map((batch, idx) => ({
                idx, batch, tokens: countTokensInBatch(batch, this.config.model)
            }));

        this.logger?.debug({ texts: texts.length, batches: batches.length }, "Embedding batch request.");

        const limit = pLimit(this.concurrencyLimit);
        const logPrefix = `${this.config.provider}:embed`;

        try {
            const results = await Promise.all(
                batches.map(({ batch, idx, tokens }) =>
                    limit(async () => {
                        const embeddings = await this.scheduler.schedule(
                            tokens,
                            async () => this.checkVectors(batch, await this.sendEmbeddingRequest(batch, options)),
                            { logPrefix }
                        );
                        return { idx, embeddings };
                    })
                )
            );

            const ordered = results.sort((a, b) => a.idx - b.idx);
            return ordered.flatMap((entry) => entry.embeddings);
        } catch (error) {
            if (error instanceof RagwellError) {
                throw error;
            }
            throw new EmbeddingGatewayError(
                this.config.provider,
                `${this.config.provider} embedding request failed: ${getErrorMessage(error)}`,
                { cause: error }
            );
        }
    }

    async embedOne(text: string, options?: EmbedOptions): Promise<number[]> {
        const [embedding] = await this.embedBatch([text], options);
        if (!embedding) {
            throw new EmbeddingGatewayError(this.config.provider, `${this.config.provider} returned no embedding.`);
        }
        return embedding;
    }

    protected abstract sendEmbeddingRequest(texts: string[], options?: EmbedOptions): Promise<number[][]>;

    private checkVectors(batch: string[], vectors: number[][]): number[][] {
        if (vectors.length !== batch.length) {
            throw new Error(`expected ${batch.length} embeddings, received ${vectors.length}`);
        }

        const expected = this.config.dimensions;
        if (expected !== undefined) {
            const mismatch = vectors.find((vector) => vector.length !== expected);
            if (mismatch) {
                throw new Error(`expected ${expected}-dimensional embeddings, received ${mismatch.length}`);
            }
        }

        return vectors;
    }
}

export abstract class BaseChatProvider implements ChatProvider {
    protected readonly concurrencyLimit: number;
    private readonly scheduler: ProviderScheduler;

    constructor(
        public readonly config: ChatModelConfig,
        limits: ProviderRateLimits,
        protected readonly logger?: Logger
    ) {
        this.concurrencyLimit = Math.max(1, limits.concurrency ?? 3);
        this.scheduler = new ProviderScheduler(this.concurrencyLimit, limits, limits.retries ?? 5, logger);
    }

    async complete(request: CompletionRequest): Promise<CompletionResult> {
        validateCompletionRequest(request);

        const tokens = this.estimateChatTokens(request);
        try {
            const result = await this.scheduler.schedule(tokens, () => this.sendCompletion(request), {
                logPrefix: `${this.config.provider}:chat`,
            });
            this.logger?.info({ model: result.modelName, tokensUsed: result.totalTokens }, "Chat completion finished.");
            return result;
        } catch (error) {
            if (error instanceof RagwellError) {
                throw error;
            }
            throw new GenerationGatewayError(
                this.config.provider,
                `${this.config.provider} chat completion failed: ${getErrorMessage(error)}`,
                { cause: error }
            );
        }
    }

    protected estimateChatTokens(request: CompletionRequest): number {
        const model = this.config.model;
        const promptTokens = request.messages.reduce((sum, message) => sum + countTokens(message.content, model), 0);
        return promptTokens + request.maxTokens;
    }

    protected abstract sendCompletion(request: CompletionRequest): Promise<CompletionResult>;
}

export function validateCompletionRequest(request: CompletionRequest): void {
    if (request.messages.length === 0) {
        throw new ValidationError("A completion needs at least one message.");
    }
    if (!Number.isFinite(request.temperature) || request.temperature < 0 || request.temperature > 2) {
        throw new ValidationError(`temperature must be within [0, 2], got: ${request.temperature}`);
    }
    if (!Number.isInteger(request.maxTokens) || request.maxTokens < 1) {
        throw new ValidationError(`maxTokens must be a positive integer, got: ${request.maxTokens}`);
    }
}
