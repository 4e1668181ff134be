/**
 * Librarian
 *
 * File actions (LIST / READ / SEARCH / WRITE / EDIT) confined to the sandbox
 * root. The validator already rejected unsafe paths at plan time; every path
 * is checked again here because the filesystem may have changed since.
 * Each call returns the record that becomes the planner's file context.
 */

import fg from 'fast-glob';
import * as fs from 'fs';
import * as path from 'path';
import { assertNever, FileAction } from './action_schema';
import { createLogger, Logger } from './logger';
import { isSafePath, resolveInSandbox } from './path_guard';
import { DeskpilotError, ErrorFactory, errorMessage } from './structured_error';

export const READ_MAX_CHARS = 5000;
export const SEARCH_MAX_RESULTS = 200;

export interface DirEntry {
    name: string;
    type: 'file' | 'dir';
}

export type FileContext =
    | { operation: 'LIST'; path: string; entries: DirEntry[] }
    | { operation: 'READ'; path: string; content: string; truncated: boolean; size: number }
    | { operation: 'SEARCH'; directory: string; pattern: string; matches: string[]; truncated: boolean }
    | { operation: 'WRITE'; path: string; bytes: number }
    | { operation: 'EDIT'; path: string; bytes: number };

export class Librarian {
    private readonly log: Logger;

    constructor(private readonly root: string, logger?: Logger) {
        this.log = logger ?? createLogger('librarian');
    }

    async perform(action: FileAction): Promise<FileContext> {
        switch (action.type) {
            case 'LIST': return this.list(action.path);
            case 'READ': return this.read(action.path);
            case 'SEARCH': return this.search(action.directory, action.pattern);
            case 'WRITE': return this.write(action.path, action.content);
            case 'EDIT': return this.edit(action.path, action.find, action.replace);
            default: return assertNever(action);
        }
    }

    async list(p: string): Promise<FileContext> {
        const abs = this.locate(p);
        const dirents = await this.fsCall('LIST', p, () => fs.promises.readdir(abs, { withFileTypes: true }));
        const entries: DirEntry[] = dirents
            .map((d): DirEntry => ({ name: d.name, type: d.isDirectory() ? 'dir' : 'file' }))
            .sort((a, b) => a.name.localeCompare(b.name));
        this.log.info(`Listed ${p}`, { entries: entries.length });
        return { operation: 'LIST', path: p, entries };
    }

    async read(p: string): Promise<FileContext> {
        const abs = this.locate(p);
        const text = await this.fsCall('READ', p, () => fs.promises.readFile(abs, 'utf-8'));
        const truncated = text.length > READ_MAX_CHARS;
        this.log.info(`Read ${p}`, { chars: text.length, truncated });
        return {
            operation: 'READ',
            path: p,
            content: truncated ? text.slice(0, READ_MAX_CHARS) : text,
            truncated,
            size: Buffer.byteLength(text, 'utf-8'),
        };
    }

    async search(directory: string, pattern: string): Promise<FileContext> {
        const abs = this.locate(directory);
        const found = await this.fsCall('SEARCH', directory, () =>
            fg(pattern, { cwd: abs, dot: false, onlyFiles: true, followSymbolicLinks: false, suppressErrors: true })
        );
        const safe = found
            .filter((rel) => isSafePath(path.posix.join(directory.replace(/\\/g, '/'), rel), this.root))
            .sort();
        const truncated = safe.length > SEARCH_MAX_RESULTS;
        const matches = safe.slice(0, SEARCH_MAX_RESULTS);
        this.log.info(`Searched ${directory} for ${pattern}`, { matches: matches.length, truncated });
        return { operation: 'SEARCH', directory, pattern, matches, truncated };
    }

    async write(p: string, content: string): Promise<FileContext> {
        const abs = this.locate(p);
        await this.fsCall('WRITE', p, async () => {
            await fs.promises.mkdir(path.dirname(abs), { recursive: true });
            await fs.promises.writeFile(abs, content, 'utf-8');
        });
        const bytes = Buffer.byteLength(content, 'utf-8');
        this.log.info(`Wrote ${p}`, { bytes });
        return { operation: 'WRITE', path: p, bytes };
    }

    /** Replaces the first occurrence only. */
    async edit(p: string, find: string, replace: string): Promise<FileContext> {
        const abs = this.locate(p);
        const original = await this.fsCall('EDIT', p, () => fs.promises.readFile(abs, 'utf-8'));
        const at = original.indexOf(find);
        if (at < 0) {
            throw new DeskpilotError(ErrorFactory.filesystem('EDIT', p, 'find text not present'));
        }
        const updated = original.slice(0, at) + replace + original.slice(at + find.length);
        await this.fsCall('EDIT', p, () => fs.promises.writeFile(abs, updated, 'utf-8'));
        const bytes = Buffer.byteLength(updated, 'utf-8');
        this.log.info(`Edited ${p}`, { bytes });
        return { operation: 'EDIT', path: p, bytes };
    }

    /* ------------------------------- internals ----------------------------- */

    private locate(p: string): string {
        if (!isSafePath(p, this.root)) {
            throw new DeskpilotError(ErrorFactory.unsafePath(p));
        }
        return resolveInSandbox(p, this.root);
    }

    private async fsCall<T>(op: string, p: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (e) {
            if (e instanceof DeskpilotError) throw e;
            throw new DeskpilotError(ErrorFactory.filesystem(op, p, errorMessage(e)));
        }
    }
}
