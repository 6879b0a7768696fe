import type { Logger } from "pino";
import { createAnthropic } from "@ai-sdk/anthropic";
import { generateText } from "ai";
import { BaseChatProvider } from "../base";
import type { ChatModelConfig } from "../../config/types";
import type { CompletionRequest, CompletionResult } from "../types";
import { toCompletionResult, toCoreMessages } from "../messages";
import { resolveBaseUrl, mergeLimits } from "../../utils/providerUtils";
import { ConfigurationError } from "../../utils/errors";

const ANTHROPIC_DEFAULT_BASE_URL = "https://api.anthropic.com/v1/";

export class AnthropicChatProvider extends BaseChatProvider {
    private readonly sdk: ReturnType<typeof createAnthropic>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new ConfigurationError("Anthropic API key is required for chat completions.");
        }

        super(
            config,
            mergeLimits(
                {
                    concurrency: 4,
                    maxRequestsPerMinute: 200,
                    maxTokensPerMinute: 200_000,
                    retries: 5,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createAnthropic({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, ANTHROPIC_DEFAULT_BASE_URL),
        });
    }

    protected async sendCompletion(request: CompletionRequest): Promise<CompletionResult> {
        const result = await generateText({
            model: this.sdk(this.config.model),
            messages: toCoreMessages(request.messages),
            temperature: request.temperature,
            maxTokens: request.maxTokens,
            maxRetries: 0,
            abortSignal: request.signal,
        });

        return toCompletionResult(result, this.config.model);
    }
}
