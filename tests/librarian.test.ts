import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { Librarian, READ_MAX_CHARS } from '../src/librarian';
import { DeskpilotError } from '../src/structured_error';
import { createRecordingLogger } from './helpers/recording_logger';

function withSandbox(fn: (root: string, lib: Librarian) => Promise<void>): Promise<void> {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'librarian-'));
    return fn(root, new Librarian(root, createRecordingLogger())).finally(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });
}

function hasCode(code: string, message?: string) {
    return (e: unknown): boolean => e instanceof DeskpilotError && e.code === code && (message === undefined || e.message === message);
}

test('WRITE creates parent directories and reports bytes', async () => {
    await withSandbox(async (root, lib) => {
        const res = await lib.perform({ type: 'WRITE', path: 'notes/today.txt', content: 'hello wörld' });
        assert.deepEqual(res, { operation: 'WRITE', path: 'notes/today.txt', bytes: 12 });
        assert.equal(fs.readFileSync(path.join(root, 'notes', 'today.txt'), 'utf-8'), 'hello wörld');
    });
});

test('LIST returns sorted entries with their kind', async () => {
    await withSandbox(async (root, lib) => {
        fs.mkdirSync(path.join(root, 'notes'));
        fs.writeFileSync(path.join(root, 'b.txt'), '');
        fs.writeFileSync(path.join(root, 'a.md'), '');
        assert.deepEqual(await lib.perform({ type: 'LIST', path: '.' }), {
            operation: 'LIST',
            path: '.',
            entries: [
                { name: 'a.md', type: 'file' },
                { name: 'b.txt', type: 'file' },
                { name: 'notes', type: 'dir' },
            ],
        });
    });
});

test('READ truncates long files and keeps the full size', async () => {
    await withSandbox(async (root, lib) => {
        fs.writeFileSync(path.join(root, 'big.txt'), 'x'.repeat(READ_MAX_CHARS + 1000));
        const res = await lib.perform({ type: 'READ', path: 'big.txt' });
        assert.equal(res.operation, 'READ');
        if (res.operation !== 'READ') return;
        assert.equal(res.content.length, READ_MAX_CHARS);
        assert.equal(res.truncated, true);
        assert.equal(res.size, READ_MAX_CHARS + 1000);

        fs.writeFileSync(path.join(root, 'small.txt'), 'short');
        assert.deepEqual(await lib.perform({ type: 'READ', path: 'small.txt' }), {
            operation: 'READ',
            path: 'small.txt',
            content: 'short',
            truncated: false,
            size: 5,
        });
    });
});

test('SEARCH globs below the directory and sorts matches', async () => {
    await withSandbox(async (root, lib) => {
        fs.mkdirSync(path.join(root, 'notes', 'old'), { recursive: true });
        fs.writeFileSync(path.join(root, 'z.txt'), '');
        fs.writeFileSync(path.join(root, 'notes', 'today.txt'), '');
        fs.writeFileSync(path.join(root, 'notes', 'old', 'may.txt'), '');
        fs.writeFileSync(path.join(root, 'notes', 'todo.md'), '');

        assert.deepEqual(await lib.perform({ type: 'SEARCH', directory: '.', pattern: '**/*.txt' }), {
            operation: 'SEARCH',
            directory: '.',
            pattern: '**/*.txt',
            matches: ['notes/old/may.txt', 'notes/today.txt', 'z.txt'],
            truncated: false,
        });
        const scoped = await lib.perform({ type: 'SEARCH', directory: 'notes', pattern: '*.md' });
        assert.equal(scoped.operation === 'SEARCH' && scoped.matches.join(','), 'todo.md');
    });
});

test('EDIT replaces the first occurrence only', async () => {
    await withSandbox(async (root, lib) => {
        const file = path.join(root, 'list.txt');
        fs.writeFileSync(file, 'a-a-a');
        assert.deepEqual(await lib.perform({ type: 'EDIT', path: 'list.txt', find: 'a', replace: 'bb' }), {
            operation: 'EDIT',
            path: 'list.txt',
            bytes: 6,
        });
        assert.equal(fs.readFileSync(file, 'utf-8'), 'bb-a-a');

        await assert.rejects(
            lib.perform({ type: 'EDIT', path: 'list.txt', find: 'zzz', replace: '' }),
            hasCode('FILESYSTEM_ERROR', 'EDIT failed for list.txt: find text not present')
        );
        assert.equal(fs.readFileSync(file, 'utf-8'), 'bb-a-a');
    });
});

test('filesystem errors surface as FILESYSTEM_ERROR', async () => {
    await withSandbox(async (_root, lib) => {
        await assert.rejects(lib.perform({ type: 'READ', path: 'missing.txt' }), hasCode('FILESYSTEM_ERROR'));
        await assert.rejects(lib.perform({ type: 'LIST', path: 'nowhere' }), (e: unknown) =>
            e instanceof DeskpilotError && e.message.startsWith('LIST failed for nowhere: ')
        );
    });
});

test('paths are re-checked against the sandbox at execution time', async () => {
    const outside = fs.mkdtempSync(path.join(os.tmpdir(), 'librarian-outside-'));
    try {
        fs.writeFileSync(path.join(outside, 'secret.txt'), 'test-secret');
        await withSandbox(async (root, lib) => {
            await assert.rejects(
                lib.perform({ type: 'READ', path: '../secret.txt' }),
                hasCode('UNSAFE_PATH', 'Path escapes sandbox: ../secret.txt')
            );

            // A symlink planted after validation still cannot leave the root.
            fs.symlinkSync(outside, path.join(root, 'link'));
            await assert.rejects(lib.perform({ type: 'READ', path: 'link/secret.txt' }), hasCode('UNSAFE_PATH'));
            await assert.rejects(lib.perform({ type: 'WRITE', path: 'link/new.txt', content: 'x' }), hasCode('UNSAFE_PATH'));
            assert.equal(fs.existsSync(path.join(outside, 'new.txt')), false);
        });
    } finally {
        fs.rmSync(outside, { recursive: true, force: true });
    }
});
