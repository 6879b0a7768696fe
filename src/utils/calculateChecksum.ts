import crypto from "node:crypto";

export function calculateChecksum(content: string | Buffer): string {
    const hash = crypto.createHash("sha256");
    if (typeof content === "string") {
        hash.update(content, "utf-8");
    } else {
        hash.update(content);
    }
    return hash.digest("hex");
}
