import type { EntryState, UploadEntry } from "../types/upload.types";

/**
 * Legal lifecycle moves of an UploadEntry
 */
const TRANSITIONS: Record<EntryState, readonly EntryState[]> = {
    "pending": ["validated", "rejected"],
    "validated": ["destination-resolved", "rejected"],
    "destination-resolved": ["materialized", "rejected"],
    "materialized": ["transformed", "recorded", "rejected"],
    "transformed": ["transformed", "recorded"],
    "recorded": [],
    "rejected": []
};

export function canTransition(from: EntryState, to: EntryState): boolean {
    return TRANSITIONS[from].includes(to);
}

/**
 * Move an entry to `to`; an illegal move is a programming error and throws
 */
export function transition(entry: UploadEntry, to: EntryState): void {
    if (!canTransition(entry.state, to)) {
        throw new Error(`Illegal entry transition ${entry.state} -> ${to} for ${entry.field}`);
    }
    entry.state = to;
}
