import { describe, expect, it } from "vitest";
import { assembleContext, formatContextBlock } from "./context";

const first = { documentName: "a.txt", text: "hello" };
const second = { documentName: "b.txt", text: "world" };

describe("formatContextBlock", () => {
    it("labels the block with its one-based source number", () => {
        expect(formatContextBlock(first, 0)).toBe("[Source 1: a.txt]\nhello\n");
    });
});

describe("assembleContext", () => {
    it("joins blocks with a blank line between them", () => {
        const assembled = assembleContext([first, second]);

        expect(assembled).toEqual({
            context: "[Source 1: a.txt]\nhello\n\n[Source 2: b.txt]\nworld\n",
            includedCount: 2,
        });
    });

    it("counts the separator toward the budget", () => {
        // Each block is 24 characters; both together with the separator are 49.
        expect(assembleContext([first, second], 49).includedCount).toBe(2);
        expect(assembleContext([first, second], 48)).toEqual({
            context: "[Source 1: a.txt]\nhello\n",
            includedCount: 1,
        });
    });

    it("stops at the first block that does not fit", () => {
        const large = { documentName: "big.txt", text: "x".repeat(100) };

        const assembled = assembleContext([first, large, second], 60);

        expect(assembled.includedCount).toBe(1);
        expect(assembled.context).not.toContain("Source 3");
    });

    it("returns an empty context when the first block overflows", () => {
        expect(assembleContext([first], 10)).toEqual({ context: "", includedCount: 0 });
    });

    it("returns an empty context for no results", () => {
        expect(assembleContext([])).toEqual({ context: "", includedCount: 0 });
    });
});
