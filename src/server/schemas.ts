import { z } from "zod";

const processingStatus = z.enum(["pending", "processing", "completed", "failed"]);

const query = z.string().trim().min(1, "query must not be empty");
const documentId = z.string().trim().min(1).optional();
const topK = z.coerce.number().int().min(1).max(20).optional();
const weight = z.coerce.number().min(0).max(1);

export const uploadDocumentSchema = z.object({
    filename: z.string().trim().min(1, "filename is required"),
    content: z.string(),
    encoding: z.enum(["utf8", "base64"]).default("utf8"),
});

export const listDocumentsSchema = z.object({
    skip: z.coerce.number().int().min(0).default(0),
    limit: z.coerce.number().int().min(1).max(100).default(100),
    status: processingStatus.optional(),
});

export const listChunksSchema = z.object({
    skip: z.coerce.number().int().min(0).optional(),
    limit: z.coerce.number().int().min(1).max(1000).optional(),
});

export const keywordSearchSchema = z.object({
    query,
    top_k: topK,
    document_id: documentId,
});

export const semanticSearchSchema = keywordSearchSchema.extend({
    min_similarity: z.coerce.number().min(0).max(1).optional(),
});

export const hybridSearchSchema = semanticSearchSchema.extend({
    semantic_weight: weight.optional(),
    keyword_weight: weight.optional(),
});

export const contextSearchSchema = hybridSearchSchema.extend({
    context_window: z.coerce.number().int().min(0).max(5).default(1),
});

export const ragChatSchema = z.object({
    query: z.string().trim().min(1, "query must not be empty").max(2000),
    conversation_history: z
        .array(
            z.object({
                role: z.enum(["user", "assistant"]),
                content: z.string(),
            })
        )
        .optional(),
    document_id: documentId,
    top_k: z.number().int().min(1).max(20).default(8),
    temperature: z.number().min(0).max(2).default(0.7),
    max_tokens: z.number().int().min(50).max(2000).default(500),
});

export const chatSchema = z.object({
    message: z.string().trim().min(1, "message must not be empty").max(4000),
    conversation_history: z
        .array(
            z.object({
                role: z.enum(["system", "user", "assistant"]),
                content: z.string(),
            })
        )
        .default([]),
    temperature: z.number().min(0).max(2).default(0.7),
    max_tokens: z.number().int().min(1).max(4000).default(500),
});

export const ragEvaluateSchema = z.object({
    query: z.string().optional(),
    answer: z.string(),
    sources: z.array(z.object({ relevanceScore: z.number() }).passthrough()),
});

export type UploadDocumentBody = z.infer<typeof uploadDocumentSchema>;
export type RagChatBody = z.infer<typeof ragChatSchema>;
