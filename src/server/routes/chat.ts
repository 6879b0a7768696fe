import type { Request, Response } from "express";
import type { Logger } from "pino";
import { ASSISTANT_SYSTEM_PROMPT } from "../../llm/prompt";
import type { ChatGateway, ChatMessage } from "../../llm/types";
import { chatSchema } from "../schemas";
import { parseRequest, sendError } from "../utils/respond";

export interface ChatRouteContext {
    chat: ChatGateway;
}

/** Plain assistant chat: the conversation goes to the model without any retrieval. */
export async function handleChatRequest(
    req: Request,
    res: Response,
    context: ChatRouteContext,
    logger: Logger
): Promise<void> {
    try {
        const body = parseRequest(chatSchema, req.body);
        const messages: ChatMessage[] = [
            { role: "system", content: ASSISTANT_SYSTEM_PROMPT },
            ...body.conversation_history,
            { role: "user", content: body.message },
        ];

        logger.info({ messageCount: messages.length }, "Processing chat request.");
        const completion = await context.chat.complete({
            messages,
            temperature: body.temperature,
            maxTokens: body.max_tokens,
        });

        res.json({
            status: "ok",
            response: completion.text,
            message_count: messages.length,
            tokens_used: completion.totalTokens,
            model: completion.modelName,
        });
    } catch (error) {
        sendError(res, error, logger, "Chat");
    }
}
