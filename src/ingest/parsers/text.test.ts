import { describe, expect, it } from "vitest";
import { ParseFailureError } from "../../utils/errors";
import { normalizeFileType, parseDocument, parseTextDocument } from "./text";

describe("parseTextDocument", () => {
    it("decodes UTF-8 and strips the byte order mark", () => {
        const parsed = parseTextDocument(Buffer.from("﻿hello world\nsecond line", "utf8"));

        expect(parsed).toEqual({
            text: "hello world\nsecond line",
            characterCount: 23,
            wordCount: 4,
        });
    });

    it("reports zero counts for empty text", () => {
        expect(parseTextDocument(Buffer.alloc(0))).toEqual({ text: "", characterCount: 0, wordCount: 0 });
    });

    it("rejects bytes that are not UTF-8", () => {
        expect(() => parseTextDocument(Buffer.from([0xff, 0xfe, 0xfd]))).toThrow(ParseFailureError);
    });
});

describe("parseDocument", () => {
    it("routes markdown and text through the text extractor", () => {
        expect(parseDocument("md", Buffer.from("# Title")).text).toBe("# Title");
        expect(parseDocument(".TXT", Buffer.from("plain")).text).toBe("plain");
    });

    it("fails for types without an extractor", () => {
        expect(() => parseDocument("pdf", Buffer.from("%PDF-1.7"))).toThrow(
            'No text extractor is available for "pdf" files.'
        );
    });

    it("does not treat object prototype keys as file types", () => {
        expect(() => parseDocument("constructor", Buffer.from("text"))).toThrow(
            'No text extractor is available for "constructor" files.'
        );
    });
});

describe("file type helpers", () => {
    it("normalizes extensions", () => {
        expect(normalizeFileType(" .Md ")).toBe("md");
    });
});
