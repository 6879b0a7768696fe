import { DocumentStateError } from "../utils/errors";
import type { ProcessingStatus } from "./types";

const ALLOWED_SOURCES: Record<ProcessingStatus, readonly ProcessingStatus[]> = {
    pending: [],
    processing: ["pending"],
    completed: ["processing"],
    failed: ["pending", "processing"],
};

export function allowedSources(target: ProcessingStatus): readonly ProcessingStatus[] {
    return ALLOWED_SOURCES[target];
}

export function canTransition(from: ProcessingStatus, to: ProcessingStatus): boolean {
    return ALLOWED_SOURCES[to].includes(from);
}

export function assertTransition(documentId: string, from: ProcessingStatus, to: ProcessingStatus): void {
    if (!canTransition(from, to)) {
        throw new DocumentStateError(`Document ${documentId} cannot move from ${from} to ${to}.`);
    }
}
