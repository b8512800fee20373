import { resolve } from "node:path";
import { logger as MainLogger } from "./Logger";

const logger = MainLogger.child({ scope: "DirectoryLock" });

/**
 * In-process mutual exclusion keyed by directory.
 *
 * Work for the same directory runs strictly one after another, in the order it
 * was requested; different directories do not wait on each other. Used around
 * collision probing so two entries can never reserve the same name.
 */
export class DirectoryLock {
    private tails = new Map<string, Promise<void>>();

    /**
     * Run `task` while holding the lock for `directory`
     */
    public async withLock<T>(directory: string, task: () => Promise<T>): Promise<T> {
        const key = resolve(directory);
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const current = new Promise<void>((resolveRelease) => {
            release = resolveRelease;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        logger.trace(`Acquired lock for ${key}`);

        try {
            return await task();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
            logger.trace(`Released lock for ${key}`);
        }
    }

    /**
     * Whether any work is queued or running for the directory
     */
    public isLocked(directory: string): boolean {
        return this.tails.has(resolve(directory));
    }
}
