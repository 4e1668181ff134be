// src/fact_store/store.ts

import * as fs from "fs";
import { createLogger, Logger } from "../logger";
import { errorMessage } from "../structured_error";
import { errnoCode, writeFileAtomic } from "./atomic_write";
import { acquireFileLock, LockHandle, releaseFileLock } from "./file_lock";
import {
    Fact,
    factSchema,
    HistoryEntry,
    historyEntrySchema,
    ProfileDocument,
    RememberResult,
} from "./types";

export const DEFAULT_HISTORY_LIMIT = 100;
const PROFILE_MODE = 0o600;

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === "object" && v !== null && !Array.isArray(v);
}

function emptyDocument(): ProfileDocument {
    return { facts: {}, history: [], extras: {} };
}

/**
 * Lenient read: malformed facts and history entries are dropped one by one
 * so a single bad record never costs the whole profile.
 */
export function readProfileDocument(filePath: string, log: Logger): ProfileDocument {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    } catch (e) {
        if (errnoCode(e) !== "ENOENT") {
            log.warn("Profile unreadable, starting empty", { file: filePath, error: errorMessage(e) });
        }
        return emptyDocument();
    }
    if (!isRecord(raw)) {
        log.warn("Profile is not an object, starting empty", { file: filePath });
        return emptyDocument();
    }

    const { facts: rawFacts, history: rawHistory, ...extras } = raw;

    const facts: Record<string, Fact> = {};
    if (isRecord(rawFacts)) {
        for (const [key, entry] of Object.entries(rawFacts)) {
            const parsed = factSchema.safeParse(entry);
            if (parsed.success) facts[key] = parsed.data;
            else log.warn("Dropping malformed fact", { key });
        }
    }

    const history: HistoryEntry[] = [];
    if (Array.isArray(rawHistory)) {
        for (const entry of rawHistory) {
            const parsed = historyEntrySchema.safeParse(entry);
            if (parsed.success) history.push(parsed.data);
        }
    }

    return { facts, history, extras };
}

export interface LocalFactStoreOptions {
    filePath: string;
    now?: () => Date;
    historyLimit?: number;
    lockTimeoutMs?: number;
    logger?: Logger;
}

export class LocalFactStore {
    private readonly filePath: string;
    private readonly now: () => Date;
    private readonly historyLimit: number;
    private readonly lockTimeoutMs: number;
    private readonly log: Logger;
    private tail: Promise<unknown> = Promise.resolve();

    constructor(opts: LocalFactStoreOptions) {
        this.filePath = opts.filePath;
        this.now = opts.now ?? (() => new Date());
        this.historyLimit = opts.historyLimit ?? DEFAULT_HISTORY_LIMIT;
        this.lockTimeoutMs = opts.lockTimeoutMs ?? 2000;
        this.log = opts.logger ?? createLogger("fact-store");
    }

    get path(): string {
        return this.filePath;
    }

    load(): ProfileDocument {
        return readProfileDocument(this.filePath, this.log);
    }

    getFacts(): Record<string, Fact> {
        return this.load().facts;
    }

    getHistory(): HistoryEntry[] {
        return this.load().history;
    }

    /**
     * Upsert a fact. A value equal to the stored one is a no-op: no write,
     * no history entry, updated_count untouched.
     */
    remember(key: string, value: string, context: string): Promise<RememberResult> {
        // Serialize in-process so we never contend with our own lock file.
        const run = this.tail.then(() => this.rememberLocked(key, value, context));
        this.tail = run.catch(() => undefined);
        return run;
    }

    private async rememberLocked(key: string, value: string, context: string): Promise<RememberResult> {
        const warnings: string[] = [];
        let handle: LockHandle;
        try {
            handle = await acquireFileLock({
                lockPath: `${this.filePath}.lock`,
                timeoutMs: this.lockTimeoutMs,
                warnings,
            });
        } catch (e) {
            this.log.error("Could not lock profile", { key, error: errorMessage(e) });
            return { status: "failed", key, error: errorMessage(e) };
        }

        try {
            const doc = this.load();
            const previous = doc.facts[key];
            if (previous && previous.value === value) {
                this.log.debug("Fact unchanged", { key });
                return { status: "unchanged", key, fact: previous };
            }

            const timestamp = this.now().toISOString();
            const fact: Fact = {
                value,
                context,
                timestamp,
                updated_count: (previous?.updated_count ?? 0) + 1,
            };
            const history = [...doc.history, { key, value, context, timestamp }].slice(-this.historyLimit);

            const body = { ...doc.extras, facts: { ...doc.facts, [key]: fact }, history };
            warnings.push(...writeFileAtomic(this.filePath, JSON.stringify(body, null, 2), PROFILE_MODE));

            this.log.info("Memorized fact", { key, updated_count: fact.updated_count });
            return { status: "stored", key, fact };
        } catch (e) {
            this.log.error("Profile write failed", { key, error: errorMessage(e) });
            return { status: "failed", key, error: errorMessage(e) };
        } finally {
            releaseFileLock(handle, warnings);
            for (const w of warnings) this.log.warn(w);
        }
    }
}
