// src/fact_store/file_lock.ts

import * as fs from "fs";
import * as path from "path";
import { errnoCode } from "./atomic_write";

export interface LockHandle {
    fd: number;
    lockPath: string;
}

function sleep(ms: number): Promise<void> {
    return new Promise((r) => setTimeout(r, ms));
}

function backoff(attempt: number): number {
    // 10,20,40,80,... capped at 200; profile writes are short
    return Math.min(10 * Math.pow(2, attempt), 200);
}

// started_ms is null while the owner has created the file but not yet written it
function readLockOwner(lockPath: string): { pid: number | null; startedMs: number | null } {
    try {
        const parsed: unknown = JSON.parse(fs.readFileSync(lockPath, "utf8"));
        if (typeof parsed === "object" && parsed !== null) {
            const pid = "pid" in parsed && typeof parsed.pid === "number" ? parsed.pid : null;
            const startedMs = "started_ms" in parsed && typeof parsed.started_ms === "number" ? parsed.started_ms : null;
            return { pid, startedMs };
        }
    } catch (e) {
        if (errnoCode(e) === "ENOENT") return { pid: null, startedMs: Date.now() };
    }
    return { pid: null, startedMs: null };
}

function lockAgeMs(lockPath: string, startedMs: number | null): number {
    if (startedMs !== null) return Date.now() - startedMs;
    try {
        return Date.now() - fs.statSync(lockPath).mtimeMs;
    } catch (e) {
        if (errnoCode(e) === "ENOENT") return 0;
        throw e;
    }
}

function isPidAlive(pid: number): boolean {
    try {
        // signal 0 checks existence without delivering anything
        process.kill(pid, 0);
        return true;
    } catch (e) {
        return errnoCode(e) === "EPERM";
    }
}

/**
 * Exclusive lock file next to the profile (O_CREAT | O_EXCL).
 * Stale locks (dead PID or older than staleTtlMs) are broken and retried.
 * A lock with no readable owner is aged by its mtime.
 */
export async function acquireFileLock(params: {
    lockPath: string;
    timeoutMs: number;
    warnings: string[];
    staleTtlMs?: number;
}): Promise<LockHandle> {
    const { lockPath, timeoutMs, warnings } = params;
    const staleTtlMs = params.staleTtlMs ?? 30_000;

    fs.mkdirSync(path.dirname(lockPath), { recursive: true, mode: 0o755 });

    const started = Date.now();
    let attempt = 0;

    while (true) {
        try {
            const fd = fs.openSync(lockPath, "wx");
            fs.writeSync(fd, JSON.stringify({ pid: process.pid, started_ms: Date.now() }));
            return { fd, lockPath };
        } catch (e) {
            if (errnoCode(e) !== "EEXIST") throw e;
        }

        const owner = readLockOwner(lockPath);
        const age = lockAgeMs(lockPath, owner.startedMs);
        let stale = false;
        if (owner.pid !== null && owner.pid !== process.pid && !isPidAlive(owner.pid)) {
            stale = true;
            warnings.push(`STALE_LOCK(PID_DEAD) ${lockPath} pid=${owner.pid}`);
        } else if (age > staleTtlMs) {
            stale = true;
            warnings.push(`STALE_LOCK(AGE) ${lockPath} age=${age}ms`);
        }

        if (stale) {
            try {
                fs.unlinkSync(lockPath);
            } catch (e) {
                // someone else broke it first
                if (errnoCode(e) !== "ENOENT") throw e;
            }
            continue;
        }

        if (Date.now() - started >= timeoutMs) {
            throw new Error(`LOCK_HELD ${lockPath}`);
        }
        await sleep(backoff(attempt++));
    }
}

export function releaseFileLock(handle: LockHandle, warnings: string[]): void {
    try {
        fs.closeSync(handle.fd);
    } catch (e) {
        warnings.push(`LOCK_CLOSE_FAILED ${handle.lockPath}: ${String(e)}`);
    }
    try {
        fs.unlinkSync(handle.lockPath);
    } catch (e) {
        if (errnoCode(e) !== "ENOENT") warnings.push(`LOCK_UNLINK_FAILED ${handle.lockPath}: ${String(e)}`);
    }
}
