import test from 'node:test';
import assert from 'node:assert/strict';

import type { Action, FileAction } from '../src/action_schema';
import { DEFAULT_CONFIG } from '../src/config';
import { ContextSlots, ContextSnapshot } from '../src/context_slots';
import { EngineGate, EnginePlanner, ExecutionEngine, FileWorker, ReflexInvalidator } from '../src/engine';
import type { FileContext } from '../src/librarian';
import type { GateResult } from '../src/permission_gate';
import type { Decision } from '../src/planner';
import type { FocusEvent, Sentinel } from '../src/sentinel';
import { SingleFlightLock } from '../src/single_flight';
import type { Speaker } from '../src/speech';
import { LoggingStatusIndicator } from '../src/status';
import { createRecordingLogger } from './helpers/recording_logger';

/* ---------------------------------- fakes --------------------------------- */

const T0 = new Date('2026-02-03T04:05:06.000Z');

function planned(intent: string, actions: Action[]): Decision {
    return { ok: true, plan: { intent, plan: ['step'], actions }, source: 'generated', memorized: [] };
}

class FakePlanner implements EnginePlanner {
    decisions: Decision[] = [];
    recoveries: Decision[] = [];
    decideCalls: string[] = [];
    recoverCalls: Array<[string, string, unknown]> = [];
    files: unknown[] = [];
    throwOnDecide = false;
    private readonly slots = new ContextSlots(() => T0);

    async decide(userInput: string): Promise<Decision> {
        this.decideCalls.push(userInput);
        if (this.throwOnDecide) throw new Error('planner exploded');
        return this.decisions.shift() ?? { ok: false, error: 'no decision scripted' };
    }
    async recover(intent: string, reason: string, vision: unknown): Promise<Decision> {
        this.recoverCalls.push([intent, reason, vision]);
        return this.recoveries.shift() ?? { ok: false, error: 'no recovery scripted' };
    }
    updateVisionContext(data: unknown): void {
        this.slots.updateVision(data);
    }
    updateFileContext(data: unknown): void {
        this.files.push(data);
    }
    snapshotContext(): ContextSnapshot {
        return this.slots.snapshot();
    }
}

const APPROVED: GateResult = { approved: true, reason: 'ok', attempts: 1, failOpen: false };

class FakeGate implements EngineGate {
    verdicts: GateResult[] = [];
    calls: Array<{ intent: string; type: string; traceId: string; window: string | null | undefined }> = [];

    async request(intent: string, action: Action, traceId: string, expectedWindow?: string | null): Promise<GateResult> {
        this.calls.push({ intent, type: action.type, traceId, window: expectedWindow });
        return this.verdicts.shift() ?? APPROVED;
    }
}

class FakeSentinel implements Sentinel {
    calls: string[] = [];
    failKey: string | null = null;
    scanResult: unknown = { name: 'Untitled - Notepad', control_type: 'Window' };

    async pressKey(key: string): Promise<void> {
        if (key === this.failKey) throw new Error('sentinel crashed');
        this.calls.push(`key:${key}`);
    }
    async typeText(text: string): Promise<void> {
        this.calls.push(`type:${text}`);
    }
    async click(x: number, y: number): Promise<void> {
        this.calls.push(`click:${x},${y}`);
    }
    async scanFullTree(): Promise<unknown> {
        this.calls.push('scan');
        return this.scanResult;
    }
    async waitUntilReady(): Promise<boolean> {
        return true;
    }
    drainFocusEvents(): FocusEvent[] {
        return [];
    }
    kill(): void {
        this.calls.push('kill');
    }
}

class FakeSpeaker implements Speaker {
    said: string[] = [];
    async say(text: string): Promise<void> {
        this.said.push(text);
    }
}

class FakeLibrarian implements FileWorker {
    performed: FileAction[] = [];
    async perform(action: FileAction): Promise<FileContext> {
        this.performed.push(action);
        return { operation: 'LIST', path: '.', entries: [{ name: 'notes.txt', type: 'file' }] };
    }
}

class FakeKernel implements ReflexInvalidator {
    invalidated: string[] = [];
    async invalidateReflex(intent: string): Promise<boolean> {
        this.invalidated.push(intent);
        return true;
    }
}

function build(opts: { recovery?: boolean } = {}) {
    const planner = new FakePlanner();
    const gate = new FakeGate();
    const sentinel = new FakeSentinel();
    const speaker = new FakeSpeaker();
    const librarian = new FakeLibrarian();
    const kernel = new FakeKernel();
    const lock = new SingleFlightLock();
    const statusLog = createRecordingLogger();
    const status = new LoggingStatusIndicator(statusLog);
    const logger = createRecordingLogger();
    const sleeps: number[] = [];

    const engine = new ExecutionEngine({
        planner,
        gate,
        kernel,
        sentinel,
        librarian,
        speaker,
        lock,
        config: {
            delays: { action_pacing_ms: 10, enter_pacing_ms: 1000 },
            speech: { ...DEFAULT_CONFIG.speech, chars_per_second: 4, tail_seconds: 0.5 },
            recovery: { enabled: opts.recovery ?? true },
        },
        status,
        sleep: async (ms) => { sleeps.push(ms); },
        traceIdFactory: () => 'trace-01',
        logger,
    });
    return { engine, planner, gate, sentinel, speaker, librarian, kernel, lock, status, statusLog, logger, sleeps };
}

/* ------------------------------- happy path ------------------------------- */

test('a plan runs in order with permission, pacing and context updates', async () => {
    const t = build();
    t.planner.decisions.push(planned('type_note', [
        { type: 'TYPE', text: 'hello' },
        { type: 'KEY', key: 'enter' },
        { type: 'SPEAK', text: 'Done' },
        { type: 'SCAN' },
    ]));

    const report = await t.engine.execute('type hello in notepad');

    assert.deepEqual(report, {
        status: 'completed',
        traceId: 'trace-01',
        intent: 'type_note',
        source: 'generated',
        executed: 4,
        reason: undefined,
    });
    assert.deepEqual(t.sentinel.calls, ['type:hello', 'key:enter', 'scan']);
    assert.deepEqual(t.speaker.said, ['Done']);
    assert.deepEqual(t.gate.calls.map((c) => [c.type, c.window]), [
        ['TYPE', 'Notepad'],
        ['KEY', 'Notepad'],
        ['SPEAK', null],
        ['SCAN', null],
    ]);
    assert.ok(t.gate.calls.every((c) => c.intent === 'type_note' && c.traceId === 'trace-01'));
    // TYPE pacing, enter pacing, speech (4 chars / 4 cps + 0.5 s), SPEAK pacing, SCAN pacing
    assert.deepEqual(t.sleeps, [10, 1000, 1500, 10, 10]);
    assert.deepEqual(t.planner.snapshotContext().vision?.data, { name: 'Untitled - Notepad', control_type: 'Window' });

    assert.equal(t.lock.isLocked(), false);
    assert.equal(t.status.current(), 'idle');
    assert.deepEqual(t.statusLog.entries.map((e) => e.msg), ['Status idle -> busy', 'Status busy -> idle']);
});

test('file actions go through the librarian into the file context', async () => {
    const t = build();
    t.planner.decisions.push(planned('list_files', [{ type: 'LIST', path: '.' }]));

    const report = await t.engine.execute('list my files');
    assert.equal(report.status, 'completed');
    assert.deepEqual(t.librarian.performed, [{ type: 'LIST', path: '.' }]);
    assert.deepEqual(t.planner.files, [{ operation: 'LIST', path: '.', entries: [{ name: 'notes.txt', type: 'file' }] }]);
});

test('an empty scan leaves the vision context unchanged', async () => {
    const t = build();
    t.sentinel.scanResult = null;
    t.planner.decisions.push(planned('look', [{ type: 'SCAN' }]));

    const report = await t.engine.execute('what is on screen');
    assert.equal(report.status, 'completed');
    assert.equal(report.executed, 1);
    assert.equal(t.planner.snapshotContext().vision, null);
    assert.ok(t.logger.entries.some((e) => e.level === 'warn' && e.msg === 'Scan returned no data, vision context unchanged'));
});

/* ------------------------------ single flight ----------------------------- */

test('a second utterance is rejected while one is in flight', async () => {
    const t = build();
    assert.equal(t.lock.tryAcquire('utterance:other'), true);

    const report = await t.engine.execute('open notepad');
    assert.deepEqual(report, { status: 'busy', traceId: 'trace-01', executed: 0, reason: 'Another utterance is executing' });
    assert.deepEqual(t.planner.decideCalls, []);
    assert.equal(t.lock.holder(), 'utterance:other');
    assert.ok(t.logger.entries.some((e) => e.msg === 'Rejected: Another utterance is executing'));
});

test('the lock is released when planning fails or throws', async () => {
    const t = build();
    t.planner.decisions.push({ ok: false, error: 'LLM unavailable' });
    assert.deepEqual(await t.engine.execute('open notepad'), {
        status: 'error',
        traceId: 'trace-01',
        executed: 0,
        reason: 'LLM unavailable',
    });
    assert.equal(t.lock.isLocked(), false);

    t.planner.throwOnDecide = true;
    await assert.rejects(t.engine.execute('open notepad'), /planner exploded/);
    assert.equal(t.lock.isLocked(), false);
    assert.equal(t.status.current(), 'idle');
});

/* ------------------------------ gate outcomes ----------------------------- */

test('a denied action stops the plan without recovery', async () => {
    const t = build();
    t.planner.decisions.push(planned('format_disk', [{ type: 'KEY', key: 'gui' }, { type: 'TYPE', text: 'format c:' }, { type: 'KEY', key: 'enter' }]));
    t.gate.verdicts.push(APPROVED, { approved: false, reason: "Blocked keyword 'format'", attempts: 1, errorCode: 'SAFETY' });

    const report = await t.engine.execute('format my disk');
    assert.equal(report.status, 'rejected');
    assert.equal(report.executed, 1);
    assert.equal(report.reason, "Blocked keyword 'format'");
    assert.equal(report.recovery, undefined);
    assert.deepEqual(t.sentinel.calls, ['key:gui']);
    assert.deepEqual(t.kernel.invalidated, []);
});

test('a focus timeout invalidates the reflex and runs one recovery plan', async () => {
    const t = build();
    const timeoutReason = "Focus verification timeout: 'Notepad' not detected";
    t.planner.decisions.push(planned('type_note', [{ type: 'SCAN' }, { type: 'TYPE', text: 'hello' }]));
    t.planner.recoveries.push(planned('Recovery: refocus', [{ type: 'KEY', key: 'escape' }]));
    t.gate.verdicts.push(APPROVED, { approved: false, reason: timeoutReason, attempts: 50, errorCode: 'FOCUS_TIMEOUT' });

    const report = await t.engine.execute('type hello in notepad');

    assert.equal(report.status, 'timeout');
    assert.equal(report.executed, 1);
    assert.equal(report.reason, timeoutReason);
    assert.deepEqual(report.recovery, { status: 'completed', intent: 'Recovery: refocus', executed: 1, reason: undefined });
    assert.deepEqual(t.kernel.invalidated, ['type hello in notepad']);
    assert.deepEqual(t.planner.recoverCalls, [['type_note', timeoutReason, { name: 'Untitled - Notepad', control_type: 'Window' }]]);
    assert.deepEqual(t.gate.calls[2], { intent: 'Recovery: refocus', type: 'KEY', traceId: 'trace-01', window: 'Notepad' });
    assert.deepEqual(t.sentinel.calls, ['scan', 'key:escape']);
});

/* ----------------------------- dispatch failure ---------------------------- */

test('a dispatch failure reports the step and a failed recovery is not retried', async () => {
    const t = build();
    t.sentinel.failKey = 'enter';
    t.planner.decisions.push(planned('submit', [{ type: 'TYPE', text: 'x' }, { type: 'KEY', key: 'enter' }, { type: 'SPEAK', text: 'sent' }]));
    t.planner.recoveries.push(planned('Recovery: retry', [{ type: 'KEY', key: 'enter' }]));

    const report = await t.engine.execute('submit the form');

    assert.equal(report.status, 'failed');
    assert.equal(report.executed, 1);
    assert.equal(report.reason, 'KEY (step 2) failed: sentinel crashed');
    assert.deepEqual(report.recovery, {
        status: 'failed',
        intent: 'Recovery: retry',
        executed: 0,
        reason: 'KEY (step 1) failed: sentinel crashed',
    });
    assert.equal(t.planner.recoverCalls.length, 1);
    assert.deepEqual(t.speaker.said, []);
});

test('an unavailable recovery is reported as an error', async () => {
    const t = build();
    t.sentinel.failKey = 'tab';
    t.planner.decisions.push(planned('next_field', [{ type: 'KEY', key: 'tab' }]));
    t.planner.recoveries.push({ ok: false, error: 'Recovery produced no actions' });

    const report = await t.engine.execute('go to the next field');
    assert.deepEqual(report.recovery, { status: 'error', executed: 0, reason: 'Recovery produced no actions' });
});

test('with recovery disabled the reflex is still invalidated', async () => {
    const t = build({ recovery: false });
    t.sentinel.failKey = 'tab';
    t.planner.decisions.push(planned('next_field', [{ type: 'KEY', key: 'tab' }]));

    const report = await t.engine.execute('go to the next field');
    assert.equal(report.status, 'failed');
    assert.equal(report.recovery, undefined);
    assert.deepEqual(t.kernel.invalidated, ['go to the next field']);
    assert.deepEqual(t.planner.recoverCalls, []);
});

/* ---------------------------------- speech -------------------------------- */

test('mute silences SPEAK across utterances until unmute', async () => {
    const t = build();
    t.planner.decisions.push(
        planned('mute_voice', [{ type: 'SPEAK', text: 'Going quiet' }]),
        planned('greet', [{ type: 'SPEAK', text: 'Hello' }]),
        planned('unmute_voice', [{ type: 'SPEAK', text: 'I am back' }])
    );

    await t.engine.execute('be quiet');
    assert.equal(t.engine.isMuted(), true);
    await t.engine.execute('say hello');
    assert.deepEqual(t.speaker.said, []);
    assert.ok(t.logger.entries.some((e) => e.msg === '(muted) Hello'));

    await t.engine.execute('you can talk again');
    assert.equal(t.engine.isMuted(), false);
    assert.deepEqual(t.speaker.said, ['I am back']);
});

test('WAIT sleeps for its duration before pacing', async () => {
    const t = build();
    t.planner.decisions.push(planned('pause', [{ type: 'WAIT', duration: 2.5 }]));
    await t.engine.execute('wait a moment');
    assert.deepEqual(t.sleeps, [2500, 10]);
});
