import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";

/** Where uploaded files live between acceptance and ingestion. */
export interface FileStorage {
    save(documentId: string, extension: string, content: Buffer): Promise<string>;
    read(filePath: string): Promise<Buffer>;
    remove(filePath: string): Promise<void>;
}

export class LocalFileStorage implements FileStorage {
    constructor(private readonly directory: string) {}

    async save(documentId: string, extension: string, content: Buffer): Promise<string> {
        await mkdir(this.directory, { recursive: true });
        const filePath = path.join(this.directory, `${documentId}${extension}`);
        await writeFile(filePath, content);
        return filePath;
    }

    async read(filePath: string): Promise<Buffer> {
        return readFile(filePath);
    }

    async remove(filePath: string): Promise<void> {
        await rm(filePath, { force: true });
    }
}
