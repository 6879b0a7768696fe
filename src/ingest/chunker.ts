import type { ChunkingConfig } from "../config/types";
import { ConfigurationError } from "../utils/errors";

export interface ChunkOptions {
    chunkSize: number;
    overlap: number;
    preserveParagraphs: boolean;
    /**
     * Sentence and newline boundaries are only taken from the last `sentenceWindow`
     * characters of a window, spaces from the last `spaceWindow`. Tunable, not load-bearing.
     */
    sentenceWindow?: number;
    spaceWindow?: number;
}

const DEFAULT_SENTENCE_WINDOW = 200;
const DEFAULT_SPACE_WINDOW = 100;
const PARAGRAPH_SEPARATOR = "\n\n";
const SENTENCE_TERMINATORS = [". ", "! ", "? "] as const;

interface ResolvedOptions {
    chunkSize: number;
    overlap: number;
    preserveParagraphs: boolean;
    sentenceWindow: number;
    spaceWindow: number;
}

function resolveOptions(options: ChunkOptions): ResolvedOptions {
    const { chunkSize, overlap } = options;

    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
        throw new ConfigurationError(`chunkSize must be a positive integer, got: ${chunkSize}`);
    }
    if (!Number.isInteger(overlap) || overlap < 0) {
        throw new ConfigurationError(`overlap must be a non-negative integer, got: ${overlap}`);
    }
    if (overlap >= chunkSize) {
        throw new ConfigurationError(`overlap (${overlap}) must be smaller than chunkSize (${chunkSize})`);
    }

    return {
        chunkSize,
        overlap,
        preserveParagraphs: options.preserveParagraphs,
        sentenceWindow: options.sentenceWindow ?? DEFAULT_SENTENCE_WINDOW,
        spaceWindow: options.spaceWindow ?? DEFAULT_SPACE_WINDOW,
    };
}

function lastSentenceEnd(window: string): number {
    return Math.max(...SENTENCE_TERMINATORS.map((terminator) => window.lastIndexOf(terminator)));
}

/**
 * Picks the cut offset (relative to the window start) for a full-size window.
 * A candidate must lie inside its search window and leave more than `overlap`
 * characters behind it, otherwise the next start would not move forward.
 */
function findCut(window: string, options: ResolvedOptions): number {
    const { chunkSize, overlap, sentenceWindow, spaceWindow } = options;
    const usable = (index: number, searchWindow: number, cut: number): boolean =>
        index >= 0 && index > chunkSize - searchWindow && cut > overlap;

    const sentence = lastSentenceEnd(window);
    if (usable(sentence, sentenceWindow, sentence + 1)) {
        return sentence + 1;
    }

    const newline = window.lastIndexOf("\n");
    if (usable(newline, sentenceWindow, newline)) {
        return newline;
    }

    const space = window.lastIndexOf(" ");
    if (usable(space, spaceWindow, space)) {
        return space;
    }

    return chunkSize;
}

/** True when `index` falls between the two halves of a surrogate pair. */
function splitsSurrogatePair(text: string, index: number): boolean {
    if (index <= 0 || index >= text.length) {
        return false;
    }
    const before = text.charCodeAt(index - 1);
    const after = text.charCodeAt(index);
    return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

function splitOversized(text: string, options: ResolvedOptions): string[] {
    const pieces: string[] = [];
    let start = 0;

    while (start < text.length) {
        const end = start + options.chunkSize;

        if (end >= text.length) {
            pieces.push(text.slice(start).trim());
            break;
        }

        let cut = start + findCut(text.slice(start, end), options);
        if (splitsSurrogatePair(text, cut)) {
            cut = cut - 1 - options.overlap > start ? cut - 1 : cut + 1;
        }
        pieces.push(text.slice(start, cut).trim());
        start = cut - options.overlap;
        if (splitsSurrogatePair(text, start)) {
            start += 1;
        }
    }

    return pieces.filter((piece) => piece.length > 0);
}

function overlapSeed(chunk: string, overlap: number): string {
    if (overlap === 0 || chunk.length <= overlap) {
        return "";
    }
    const from = chunk.length - overlap;
    return chunk.slice(splitsSurrogatePair(chunk, from) ? from + 1 : from);
}

function chunkParagraphs(text: string, options: ResolvedOptions): string[] {
    const chunks: string[] = [];
    let buffer = "";

    const flush = (): string => {
        const chunk = buffer.trim();
        buffer = "";
        if (!chunk) {
            return "";
        }
        chunks.push(chunk);
        return overlapSeed(chunk, options.overlap);
    };

    for (const rawParagraph of text.split(PARAGRAPH_SEPARATOR)) {
        const paragraph = rawParagraph.trim();
        if (!paragraph) {
            continue;
        }

        const projected = buffer ? buffer.length + PARAGRAPH_SEPARATOR.length + paragraph.length : paragraph.length;
        if (projected <= options.chunkSize) {
            buffer = buffer ? `${buffer}${PARAGRAPH_SEPARATOR}${paragraph}` : paragraph;
            continue;
        }

        const seed = flush();

        if (paragraph.length > options.chunkSize) {
            const pieces = splitOversized(paragraph, options);
            chunks.push(...pieces.slice(0, -1));
            buffer = pieces[pieces.length - 1] ?? "";
        } else {
            buffer = seed ? `${seed}${PARAGRAPH_SEPARATOR}${paragraph}` : paragraph;
        }
    }

    flush();
    return chunks;
}

/**
 * Splits document text into ordered, overlapping chunks. Chunk `i` of the result
 * is stored with index `i`.
 */
export function chunkText(text: string, options: ChunkOptions): string[] {
    const resolved = resolveOptions(options);

    if (!text || text.trim().length === 0) {
        return [];
    }

    if (text.length <= resolved.chunkSize) {
        return [text.trim()];
    }

    return resolved.preserveParagraphs
        ? chunkParagraphs(text, resolved)
        : splitOversized(text, resolved);
}

export type Chunker = (text: string) => string[];

export function createChunker(config: ChunkingConfig): Chunker {
    const options = resolveOptions({
        chunkSize: config.chunkSize,
        overlap: config.chunkOverlap,
        preserveParagraphs: config.preserveParagraphs,
    });
    return (text) => chunkText(text, options);
}
