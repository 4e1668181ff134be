import test from 'node:test';
import assert from 'node:assert/strict';

import { KernelClient } from '../src/kernel_client';
import { createRecordingLogger } from './helpers/recording_logger';
import { FakeHandler, startFakeKernel, unusedPort } from './helpers/fake_kernel';

const TOKEN = 'a'.repeat(64);

function client(port: number, timeoutMs = 500): KernelClient {
    return new KernelClient({ host: '127.0.0.1', port, authToken: TOKEN, timeoutMs, logger: createRecordingLogger() });
}

async function withKernel(handler: FakeHandler, fn: (port: number, exchanges: { auth: unknown; request: unknown }[]) => Promise<void>): Promise<void> {
    const kernel = await startFakeKernel(handler);
    try {
        await fn(kernel.port, kernel.exchanges);
    } finally {
        await kernel.close();
    }
}

test('each transaction sends the auth frame then the request frame', async () => {
    await withKernel(() => ({ ok: true }), async (port, exchanges) => {
        const res = await client(port).transact({ type: 'ping' });
        assert.deepEqual(res, { ok: true });
        assert.deepEqual(exchanges, [{ auth: { auth_token: TOKEN }, request: { type: 'ping' } }]);
    });
});

test('unreachable, silent or garbled kernels resolve to null', async () => {
    assert.equal(await client(await unusedPort()).transact({ type: 'ping' }), null);

    await withKernel(() => ({ hang: true }), async (port) => {
        assert.equal(await client(port, 100).transact({ type: 'ping' }), null);
    });
    await withKernel(() => ({ raw: 'not json\n' }), async (port) => {
        assert.equal(await client(port).transact({ type: 'ping' }), null);
    });
    await withKernel(() => ({ close: true }), async (port) => {
        assert.equal(await client(port).transact({ type: 'ping' }), null);
    });
});

test('a response without a trailing newline is read until the peer closes', async () => {
    await withKernel(() => ({ raw: '{"found":false}' }), async (port) => {
        assert.deepEqual(await client(port).transact({ type: 'reflex_query', intent: 'x' }), { found: false });
    });
});

test('queryReflex applies the trust threshold and decodes string plans', async () => {
    const plan = { intent: 'open_notepad', plan: ['open'], actions: [{ type: 'KEY', key: 'gui' }] };
    const replies = [
        { found: true, cached_plan: plan, trust_score: 5 },
        { found: true, cached_plan: JSON.stringify(plan), trust_score: 6 },
        { found: false },
        { found: true, cached_plan: '{broken', trust_score: 9 },
        { found: true, cached_plan: plan },
    ];
    await withKernel((_req, i) => replies[i], async (port, exchanges) => {
        const kernel = client(port);
        assert.equal(await kernel.queryReflex('open notepad'), null);
        assert.deepEqual(await kernel.queryReflex('open notepad'), { plan, trustScore: 6 });
        assert.equal(await kernel.queryReflex('open notepad'), null);
        assert.equal(await kernel.queryReflex('open notepad'), null);
        assert.equal(await kernel.queryReflex('open notepad'), null);
        assert.deepEqual(exchanges[0].request, { type: 'reflex_query', intent: 'open notepad' });
    });
});

test('storeMemory frames the fact and accepts approved or success', async () => {
    const replies = [{ approved: true }, { success: true }, { approved: false }, { error: 'nope' }];
    await withKernel((_req, i) => replies[i], async (port, exchanges) => {
        const kernel = client(port);
        const req = { key: 'city', value: 'Porto', context: 'I moved to Porto', traceId: 'abcd1234' };
        assert.equal(await kernel.storeMemory({ ...req, vector: [0.5, 0.25] }), true);
        assert.equal(await kernel.storeMemory(req), true);
        assert.equal(await kernel.storeMemory(req), false);
        assert.equal(await kernel.storeMemory(req), false);
        assert.deepEqual(exchanges[0].request, {
            type: 'memory_store',
            key: 'city',
            value: 'Porto',
            context: 'I moved to Porto',
            trace_id: 'abcd1234',
            vector: [0.5, 0.25],
        });
        assert.deepEqual(exchanges[1].request, {
            type: 'memory_store',
            key: 'city',
            value: 'Porto',
            context: 'I moved to Porto',
            trace_id: 'abcd1234',
        });
    });
});

test('searchMemory keeps well-formed artifacts and fills defaults', async () => {
    await withKernel(
        () => ({
            artifacts: [
                { content: 'likes green', timestamp: '2026-01-01', classification: 'FACT', summary: 'color' },
                { content: 'bare' },
                { summary: 'no content' },
            ],
        }),
        async (port, exchanges) => {
            const found = await client(port).searchMemory([0.1, 0.2], 3);
            assert.deepEqual(found, [
                { content: 'likes green', timestamp: '2026-01-01', classification: 'FACT', summary: 'color' },
                { content: 'bare', timestamp: '', classification: 'OTHER', summary: '' },
            ]);
            assert.deepEqual(exchanges[0].request, { type: 'memory_search', vector: [0.1, 0.2], limit: 3 });
        }
    );
    assert.deepEqual(await client(await unusedPort()).searchMemory([1]), []);
});

test('invalidateReflex reports whether the kernel answered', async () => {
    await withKernel(() => ({ ok: true }), async (port, exchanges) => {
        assert.equal(await client(port).invalidateReflex('open notepad'), true);
        assert.deepEqual(exchanges[0].request, { type: 'invalidate_reflex', intent: 'open notepad' });
    });
    assert.equal(await client(await unusedPort()).invalidateReflex('x'), false);
});

test('requestPermission parses the verdict and rejects malformed ones', async () => {
    const replies = [
        { id: 'r1', approved: false, reason: 'Blocked keyword', error_code: 'SAFETY' },
        { approved: 'yes' },
    ];
    await withKernel((_req, i) => replies[i], async (port) => {
        const kernel = client(port);
        const req = { id: 'r1', intent: 'x', trace_id: 't', actions: [{ type: 'TYPE', payload: { text: 'rm -rf' } }] };
        assert.deepEqual(await kernel.requestPermission(req), {
            id: 'r1',
            approved: false,
            reason: 'Blocked keyword',
            error_code: 'SAFETY',
        });
        assert.equal(await kernel.requestPermission(req), null);
    });
});
