import { existsSync } from "node:fs";
import * as z from "zod";
import defaultMimeTable from "../config/mimeTypes.json";
import { detectMimeType, isContainerOf, readSignature } from "./FileSignature";
import { logger as MainLogger } from "./Logger";
import type { MimeTable } from "../types/upload.types";

const logger = MainLogger.child({ scope: "MimeRegistry" });

const DEFAULT_GROUP = "misc";

const mimeTableSchema = z.record(
    z.string().min(1),
    z.record(
        z.string().min(1),
        z.union([z.string().min(1), z.array(z.string().min(1)).min(1)])
    )
);

/**
 * MimeRegistry - accepted extensions and mime types, grouped by category.
 *
 * Built once at startup and shared by every pipeline. An extension may accept
 * several mime types; insertion order is kept so the first registered mime is
 * the extension's canonical one.
 */
export class MimeRegistry {
    private readonly groupsByName = new Map<string, Map<string, Set<string>>>();

    /**
     * Build a registry from a group -> ext -> mime(s) table
     */
    public static fromTable(table: MimeTable): MimeRegistry {
        const parsed = mimeTableSchema.parse(table);
        const registry = new MimeRegistry();

        for (const [group, extensions] of Object.entries(parsed)) {
            for (const [ext, mimes] of Object.entries(extensions)) {
                for (const mime of Array.isArray(mimes) ? mimes : [mimes]) {
                    registry.register(group, ext, mime);
                }
            }
        }

        return registry;
    }

    /**
     * Registry built from the shipped mime table
     */
    public static withDefaults(): MimeRegistry {
        return MimeRegistry.fromTable(defaultMimeTable);
    }

    public register(group: string | null | undefined, ext: string, mimeType: string): this {
        const groupName = group || DEFAULT_GROUP;
        const extension = normalizeExtension(ext);
        const mime = mimeType.trim().toLowerCase();

        if (!extension || !mime) {
            return this;
        }

        let extensions = this.groupsByName.get(groupName);
        if (!extensions) {
            extensions = new Map();
            this.groupsByName.set(groupName, extensions);
        }

        let mimes = extensions.get(extension);
        if (!mimes) {
            mimes = new Set();
            extensions.set(extension, mimes);
        }
        mimes.add(mime);

        return this;
    }

    /**
     * Group accepting both the extension and the mime type, or null.
     * The mime must be registered for that extension within the same group.
     */
    public lookup(ext: string, mimeType: string): string | null {
        const extension = normalizeExtension(ext);
        const mime = mimeType.trim().toLowerCase();

        for (const [group, extensions] of this.groupsByName) {
            if (extensions.get(extension)?.has(mime)) {
                return group;
            }
        }

        return null;
    }

    /**
     * Mime types accepted for an extension across all groups
     */
    public acceptedMimeTypes(ext: string): string[] {
        const extension = normalizeExtension(ext);
        const accepted: string[] = [];

        for (const extensions of this.groupsByName.values()) {
            for (const mime of extensions.get(extension) ?? []) {
                if (!accepted.includes(mime)) {
                    accepted.push(mime);
                }
            }
        }

        return accepted;
    }

    /**
     * Canonical mime for an extension from the table (first registered)
     */
    public mimeTypeForExtension(ext: string): string | null {
        return this.acceptedMimeTypes(ext)[0] ?? null;
    }

    /**
     * Best-effort mime type of a path or URL: the file's signature when it
     * exists locally and is recognised, otherwise the extension table.
     * A container signature (zip) holding the extension's own format yields
     * that format.
     */
    public async mimeTypeOf(path: string): Promise<string | null> {
        const canonical = this.mimeTypeForExtension(this.extensionOf(path));

        if (existsSync(path)) {
            try {
                const detected = detectMimeType(await readSignature(path));
                if (detected) {
                    return canonical !== null && isContainerOf(detected, canonical) ? canonical : detected;
                }
            } catch (error) {
                logger.debug(`Could not read signature of ${path}: ${error instanceof Error ? error.message : 'Unknown error'}`);
            }
        }

        return canonical;
    }

    /**
     * Lower-cased extension of a file name, path or URL
     */
    public extensionOf(name: string): string {
        const withoutQuery = name.split(/[?#]/)[0] ?? "";
        const base = withoutQuery.slice(withoutQuery.lastIndexOf("/") + 1);
        const lastDot = base.lastIndexOf(".");
        return lastDot >= 0 ? normalizeExtension(base.slice(lastDot + 1)) : "";
    }

    public groups(): string[] {
        return [...this.groupsByName.keys()];
    }

    public hasGroup(group: string): boolean {
        return this.groupsByName.has(group);
    }

    /**
     * A new registry holding only the given groups
     */
    public restrictTo(groups: string[]): MimeRegistry {
        const restricted = new MimeRegistry();

        for (const group of groups) {
            for (const [ext, mimes] of this.groupsByName.get(group) ?? []) {
                for (const mime of mimes) {
                    restricted.register(group, ext, mime);
                }
            }
        }

        return restricted;
    }

    public toTable(): MimeTable {
        const table: MimeTable = {};

        for (const [group, extensions] of this.groupsByName) {
            table[group] = {};
            for (const [ext, mimes] of extensions) {
                table[group][ext] = [...mimes];
            }
        }

        return table;
    }
}

function normalizeExtension(ext: string): string {
    return ext.trim().replace(/^\.+/, "").toLowerCase();
}
