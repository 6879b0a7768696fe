import { ParseFailureError } from "../../utils/errors";

export interface ParsedDocument {
    text: string;
    characterCount: number;
    wordCount: number;
}

type Parser = (content: Buffer) => ParsedDocument;

const BYTE_ORDER_MARK = "﻿";

export function parseTextDocument(content: Buffer): ParsedDocument {
    let text: string;
    try {
        text = new TextDecoder("utf-8", { fatal: true }).decode(content);
    } catch (error) {
        throw new ParseFailureError("File is not valid UTF-8 text.", { cause: error });
    }

    if (text.startsWith(BYTE_ORDER_MARK)) {
        text = text.slice(BYTE_ORDER_MARK.length);
    }

    return {
        text,
        characterCount: text.length,
        wordCount: text.split(/\s+/).filter(Boolean).length,
    };
}

const PARSERS = new Map<string, Parser>([
    ["txt", parseTextDocument],
    ["md", parseTextDocument],
]);

export function normalizeFileType(fileType: string): string {
    return fileType.trim().toLowerCase().replace(/^\./, "");
}

export function parseDocument(fileType: string, content: Buffer): ParsedDocument {
    const parser = PARSERS.get(normalizeFileType(fileType));
    if (!parser) {
        throw new ParseFailureError(`No text extractor is available for "${fileType}" files.`);
    }
    return parser(content);
}
