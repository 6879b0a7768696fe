export const NO_DOCUMENTS_ANSWER =
    "I don't have any documents to answer your question. Please upload documents first using the POST /api/v1/documents endpoint.";

export const INSUFFICIENT_CONTEXT_ANSWER =
    "I don't have enough information in the available documents to answer that question.";

export const ASSISTANT_SYSTEM_PROMPT =
    "You are a helpful AI assistant. Provide clear, accurate, and helpful responses.";

export function buildSystemPrompt(context: string): string {
    return [
        "You are a helpful assistant that answers questions based strictly on the provided document context.",
        "",
        "Rules:",
        "1. Answer only with information from the CONTEXT below. Do not use general knowledge.",
        `2. If the context does not contain the answer, respond: "${INSUFFICIENT_CONTEXT_ANSWER}"`,
        "3. Cite your sources with the pattern \"Source N\", for example \"According to Source 1...\" or \"Source 2 states...\".",
        "4. When asked to list or summarize several documents, identify each source separately.",
        "5. Never make up document names, content or facts that are not in the CONTEXT.",
        "6. If the CONTEXT is empty or insufficient, say so instead of guessing.",
        "",
        "CONTEXT FROM UPLOADED DOCUMENTS:",
        context,
        "",
        "If it is not in the CONTEXT above, you cannot answer it.",
    ].join("\n");
}
