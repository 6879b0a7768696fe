import type { SearchResult } from "./types";

export const DEFAULT_MAX_CONTEXT_CHARS = 6000;

// Each block ends with a newline, so joining with one more leaves a blank line between blocks.
const BLOCK_SEPARATOR = "\n";

export interface AssembledContext {
    context: string;
    includedCount: number;
}

export function formatContextBlock(result: Pick<SearchResult, "documentName" | "text">, position: number): string {
    return `[Source ${position + 1}: ${result.documentName}]\n${result.text}\n`;
}

/**
 * Appends blocks in rank order and stops at the first one that would push the
 * context past `maxChars`; later, smaller blocks are not tried.
 */
export function assembleContext(
    results: ReadonlyArray<Pick<SearchResult, "documentName" | "text">>,
    maxChars: number = DEFAULT_MAX_CONTEXT_CHARS
): AssembledContext {
    const blocks: string[] = [];
    let length = 0;

    for (const [index, result] of results.entries()) {
        const block = formatContextBlock(result, index);
        const added = blocks.length === 0 ? block.length : BLOCK_SEPARATOR.length + block.length;
        if (length + added > maxChars) {
            break;
        }
        blocks.push(block);
        length += added;
    }

    return {
        context: blocks.join(BLOCK_SEPARATOR),
        includedCount: blocks.length,
    };
}
