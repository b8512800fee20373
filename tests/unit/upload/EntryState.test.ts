/**
 * Unit tests for the entry lifecycle
 */

import { describe, test, expect } from "vitest";
import { canTransition, transition } from "../../../upload/EntryState";
import type { UploadEntry } from "../../../types/upload.types";

function pendingEntry(): UploadEntry {
    return {
        field: "file",
        name: "a.txt",
        ext: "txt",
        type: "text/plain",
        size: 1,
        source: "form",
        sourceLocation: "/tmp/a",
        transferError: 0,
        transforms: {},
        state: "pending"
    };
}

describe("EntryState", () => {
    test("walks the happy path", () => {
        const entry = pendingEntry();

        for (const state of ["validated", "destination-resolved", "materialized", "transformed", "transformed", "recorded"] as const) {
            transition(entry, state);
        }

        expect(entry.state).toBe("recorded");
    });

    test("allows rejection until materialization ends", () => {
        expect(canTransition("pending", "rejected")).toBe(true);
        expect(canTransition("validated", "rejected")).toBe(true);
        expect(canTransition("destination-resolved", "rejected")).toBe(true);
        expect(canTransition("materialized", "rejected")).toBe(true);
        expect(canTransition("transformed", "rejected")).toBe(false);
    });

    test("throws on illegal moves", () => {
        const entry = pendingEntry();

        expect(() => transition(entry, "materialized")).toThrow("Illegal entry transition pending -> materialized for file");
        expect(entry.state).toBe("pending");
    });

    test("treats recorded and rejected as terminal", () => {
        expect(canTransition("recorded", "rejected")).toBe(false);
        expect(canTransition("rejected", "validated")).toBe(false);
    });
});
