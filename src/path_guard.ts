/**
 * Path Sandbox Guard
 *
 * A path is safe iff it is relative and, once resolved (symlinks included),
 * stays inside the sandbox root. Any resolution error means unsafe.
 */

import * as fs from 'fs';
import * as path from 'path';

function isAbsoluteAnywhere(p: string): boolean {
    // Drive letters, UNC shares and rooted paths count on every host.
    return path.posix.isAbsolute(p) || path.win32.isAbsolute(p) || /^[a-zA-Z]:/.test(p);
}

/**
 * realpath of the longest existing prefix, with the missing tail re-appended.
 * Uses lstat so a dangling symlink still counts as existing and gets resolved.
 */
function resolveExisting(candidate: string): string {
    let current = candidate;
    const tail: string[] = [];
    while (true) {
        try {
            fs.lstatSync(current);
            break;
        } catch {
            const parent = path.dirname(current);
            if (parent === current) return candidate;
            tail.unshift(path.basename(current));
            current = parent;
        }
    }
    return path.join(fs.realpathSync(current), ...tail);
}

export function isInside(root: string, target: string): boolean {
    const rel = path.relative(root, target);
    return rel === '' || (rel !== '..' && !rel.startsWith('..' + path.sep) && !path.isAbsolute(rel));
}

export function isSafePath(p: string, root: string = process.cwd()): boolean {
    if (typeof p !== 'string' || p.trim() === '' || p.includes('\0')) return false;
    if (isAbsoluteAnywhere(p)) return false;

    try {
        const realRoot = fs.realpathSync(root);
        const candidate = path.resolve(realRoot, p.replace(/\\/g, '/'));
        if (!isInside(realRoot, candidate)) return false;
        return isInside(realRoot, resolveExisting(candidate));
    } catch {
        return false;
    }
}

/** Absolute location of a path already known to be safe. */
export function resolveInSandbox(p: string, root: string): string {
    return path.resolve(fs.realpathSync(root), p.replace(/\\/g, '/'));
}
