import type { CoreMessage } from "ai";
import type { ChatMessage, CompletionResult } from "./types";

export function toCoreMessages(messages: ChatMessage[]): CoreMessage[] {
    return messages.map((message): CoreMessage => {
        switch (message.role) {
            case "system":
                return { role: "system", content: message.content };
            case "assistant":
                return { role: "assistant", content: message.content };
            case "user":
                return { role: "user", content: message.content };
        }
    });
}

/** The subset of a `generateText` result the gateways report back. */
export interface GeneratedText {
    text: string;
    finishReason: string;
    usage: { totalTokens: number };
    response: { modelId: string };
}

export function toCompletionResult(result: GeneratedText, configuredModel: string): CompletionResult {
    const totalTokens = result.usage.totalTokens;
    return {
        text: result.text.trim(),
        modelName: result.response.modelId || configuredModel,
        totalTokens: Number.isFinite(totalTokens) ? totalTokens : 0,
        finishReason: result.finishReason,
    };
}
