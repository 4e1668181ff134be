// src/fact_store/atomic_write.ts

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";

export function errnoCode(e: unknown): string | undefined {
    if (e instanceof Error && "code" in e && typeof e.code === "string") return e.code;
    return undefined;
}

// Out of space or a failing disk is never just a warning.
function syncBestEffort(target: string, flags: "r" | "r+", warnings: string[]): void {
    try {
        const fd = fs.openSync(target, flags);
        try {
            fs.fsyncSync(fd);
        } finally {
            fs.closeSync(fd);
        }
    } catch (e) {
        const code = errnoCode(e);
        if (code === "ENOSPC" || code === "EIO") throw e;
        warnings.push(`FSYNC_WARN(${code ?? "UNKNOWN"}) on ${target}`);
    }
}

/**
 * Write `content` to a private temp file beside `filePath`, sync it and
 * rename it over the target. Readers see the old file or the new one.
 * Returns the sync warnings (directories cannot be synced on every platform).
 */
export function writeFileAtomic(filePath: string, content: string, mode: number): string[] {
    const warnings: string[] = [];
    const dir = path.dirname(filePath);
    const tmp = `${filePath}.tmp.${crypto.randomBytes(4).toString("hex")}`;

    fs.mkdirSync(dir, { recursive: true, mode: 0o755 });
    try {
        fs.writeFileSync(tmp, content, { mode: 0o600 });
        syncBestEffort(tmp, "r+", warnings);
        fs.renameSync(tmp, filePath);
    } catch (e) {
        fs.rmSync(tmp, { force: true });
        throw e;
    }
    fs.chmodSync(filePath, mode);
    syncBestEffort(dir, "r", warnings);
    return warnings;
}
