/**
 * Execution Engine
 *
 * Drives one utterance end to end under the single-flight lock:
 *
 *   acquire -> decide -> for each action: permission (focus retry) -> dispatch
 *           -> on failure: invalidate reflex, one recovery attempt
 *           -> release (always)
 *
 * There is no mid-plan cancellation. A plan runs to completion, to the first
 * rejection, to a focus timeout or to the first dispatch failure.
 */

import { v4 as uuidv4 } from 'uuid';
import { Action, assertNever, describeAction, FileAction, isPhysical, PhysicalAction } from './action_schema';
import type { DeskpilotConfig } from './config';
import type { ContextSnapshot } from './context_slots';
import type { FileContext } from './librarian';
import { clearTraceContext, createLogger, Logger, setTraceContext } from './logger';
import { FOCUS_TIMEOUT, GateResult } from './permission_gate';
import type { Decision, DecideOptions, PlanSource } from './planner';
import type { Sentinel } from './sentinel';
import type { SingleFlightLock } from './single_flight';
import { speechDuration, Speaker } from './speech';
import type { StatusIndicator } from './status';
import { ErrorFactory, errorMessage } from './structured_error';
import { inferExpectedWindow } from './window_focus';

/* -------------------------------------------------------------------------- */
/* Collaborator contracts                                                     */
/* -------------------------------------------------------------------------- */

export interface EnginePlanner {
    decide(userInput: string, opts: DecideOptions): Promise<Decision>;
    recover(originalIntent: string, failureReason: string, vision: unknown): Promise<Decision>;
    updateVisionContext(data: unknown): void;
    updateFileContext(data: unknown): void;
    snapshotContext(): ContextSnapshot;
}

export interface EngineGate {
    request(intent: string, action: Action, traceId: string, expectedWindow?: string | null): Promise<GateResult>;
}

export interface ReflexInvalidator {
    invalidateReflex(intent: string): Promise<boolean>;
}

export interface FileWorker {
    perform(action: FileAction): Promise<FileContext>;
}

export interface ExecutionEngineOptions {
    planner: EnginePlanner;
    gate: EngineGate;
    kernel: ReflexInvalidator;
    sentinel: Sentinel;
    librarian: FileWorker;
    speaker: Speaker;
    lock: SingleFlightLock;
    config: Pick<DeskpilotConfig, 'delays' | 'speech' | 'recovery'>;
    status?: StatusIndicator;
    sleep?: (ms: number) => Promise<void>;
    traceIdFactory?: () => string;
    logger?: Logger;
}

/* -------------------------------------------------------------------------- */
/* Reports                                                                    */
/* -------------------------------------------------------------------------- */

export type ExecutionStatus = 'busy' | 'error' | 'completed' | 'rejected' | 'timeout' | 'failed';

type RunStatus = 'completed' | 'rejected' | 'timeout' | 'failed';

interface RunOutcome {
    status: RunStatus;
    executed: number;
    reason?: string;
}

export interface RecoveryReport {
    status: RunStatus | 'error';
    intent?: string;
    executed: number;
    reason?: string;
}

export interface ExecutionReport {
    status: ExecutionStatus;
    traceId: string;
    intent?: string;
    source?: PlanSource;
    executed: number;
    reason?: string;
    recovery?: RecoveryReport;
}

const ENTER_KEYS: ReadonlySet<string> = new Set(['enter', 'return']);
const FOCUS_KINDS: ReadonlySet<Action['type']> = new Set(['KEY', 'TYPE', 'CLICK']);

function defaultSleep(ms: number): Promise<void> {
    return new Promise((r) => setTimeout(r, ms));
}

/* -------------------------------------------------------------------------- */
/* Engine                                                                     */
/* -------------------------------------------------------------------------- */

export class ExecutionEngine {
    private readonly planner: EnginePlanner;
    private readonly gate: EngineGate;
    private readonly kernel: ReflexInvalidator;
    private readonly sentinel: Sentinel;
    private readonly librarian: FileWorker;
    private readonly speaker: Speaker;
    private readonly lock: SingleFlightLock;
    private readonly config: ExecutionEngineOptions['config'];
    private readonly status?: StatusIndicator;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly traceIdFactory: () => string;
    private readonly log: Logger;
    private muted = false;

    constructor(opts: ExecutionEngineOptions) {
        this.planner = opts.planner;
        this.gate = opts.gate;
        this.kernel = opts.kernel;
        this.sentinel = opts.sentinel;
        this.librarian = opts.librarian;
        this.speaker = opts.speaker;
        this.lock = opts.lock;
        this.config = opts.config;
        this.status = opts.status;
        this.sleep = opts.sleep ?? defaultSleep;
        this.traceIdFactory = opts.traceIdFactory ?? (() => uuidv4().slice(0, 8));
        this.log = opts.logger ?? createLogger('engine');
    }

    isMuted(): boolean {
        return this.muted;
    }

    async execute(userInput: string): Promise<ExecutionReport> {
        const traceId = this.traceIdFactory();

        if (!this.lock.tryAcquire(`utterance:${traceId}`)) {
            const busy = ErrorFactory.busy(this.lock.holder());
            this.log.warn(`Rejected: ${busy.message}`, { ...busy.context, trace_id: traceId });
            return { status: 'busy', traceId, executed: 0, reason: busy.message };
        }

        try {
            setTraceContext({ traceId, intent: '' });
            this.status?.set('busy');
            this.log.info('Thinking...', { chars: userInput.length });

            const decision = await this.planner.decide(userInput, { traceId });
            if (!decision.ok) {
                this.log.error(`Planner error: ${decision.error}`);
                return { status: 'error', traceId, executed: 0, reason: decision.error };
            }

            const { intent, actions } = decision.plan;
            setTraceContext({ traceId, intent });
            this.applyMute(intent);
            this.log.info(`Intent: ${intent}`, { source: decision.source, actions: actions.length });

            const expectedWindow = inferExpectedWindow(userInput);
            const run = await this.runActions(intent, actions, traceId, expectedWindow);
            const report: ExecutionReport = {
                status: run.status,
                traceId,
                intent,
                source: decision.source,
                executed: run.executed,
                reason: run.reason,
            };

            if (run.status === 'failed' || run.status === 'timeout') {
                report.recovery = await this.recoverOnce(userInput, intent, run.reason ?? run.status, traceId, expectedWindow);
            }

            this.log.info(`Finished: ${report.status}`, { executed: report.executed });
            return report;
        } finally {
            this.lock.release();
            clearTraceContext();
            this.status?.set('idle');
        }
    }

    /* ------------------------------- internals ----------------------------- */

    private applyMute(intent: string): void {
        const lowered = intent.toLowerCase();
        if (lowered.includes('unmute')) {
            this.muted = false;
        } else if (lowered.includes('mute')) {
            this.muted = true;
        }
    }

    private async runActions(
        intent: string,
        actions: Action[],
        traceId: string,
        expectedWindow: string | null
    ): Promise<RunOutcome> {
        let executed = 0;

        for (let i = 0; i < actions.length; i++) {
            const action = actions[i];
            if (!isPhysical(action)) continue;

            const window = FOCUS_KINDS.has(action.type) ? expectedWindow : null;
            const verdict = await this.gate.request(intent, action, traceId, window);
            if (!verdict.approved) {
                const status: RunStatus = verdict.errorCode === FOCUS_TIMEOUT ? 'timeout' : 'rejected';
                this.log.warn(`Step ${i + 1} blocked: ${verdict.reason}`, { action: action.type, status });
                return { status, executed, reason: verdict.reason };
            }

            this.log.info(`[${i + 1}/${actions.length}] ${describeAction(action)}`);
            try {
                await this.dispatch(action);
            } catch (e) {
                const failure = ErrorFactory.actionFailed(action.type, i + 1, errorMessage(e));
                this.log.error(failure.message, failure.context);
                return { status: 'failed', executed, reason: failure.message };
            }
            executed++;

            const enter = action.type === 'KEY' && ENTER_KEYS.has(action.key);
            await this.sleep(enter ? this.config.delays.enter_pacing_ms : this.config.delays.action_pacing_ms);
        }

        return { status: 'completed', executed };
    }

    private async dispatch(action: PhysicalAction): Promise<void> {
        switch (action.type) {
            case 'KEY':
                await this.sentinel.pressKey(action.key);
                return;
            case 'TYPE':
                await this.sentinel.typeText(action.text);
                return;
            case 'CLICK':
                await this.sentinel.click(action.x, action.y);
                return;
            case 'SCAN': {
                const tree = await this.sentinel.scanFullTree();
                if (tree === null || tree === undefined) {
                    this.log.warn('Scan returned no data, vision context unchanged');
                    return;
                }
                this.planner.updateVisionContext(tree);
                this.log.info(`Snapshot: ${JSON.stringify(tree).length} chars`);
                return;
            }
            case 'WAIT':
                await this.sleep(action.duration * 1000);
                return;
            case 'SPEAK':
                if (this.muted) {
                    this.log.info(`(muted) ${action.text}`);
                    return;
                }
                await this.speaker.say(action.text);
                await this.sleep(speechDuration(action.text, this.config.speech.chars_per_second, this.config.speech.tail_seconds) * 1000);
                return;
            case 'LIST':
            case 'READ':
            case 'SEARCH':
            case 'WRITE':
            case 'EDIT':
                this.planner.updateFileContext(await this.librarian.perform(action));
                return;
            default:
                assertNever(action);
        }
    }

    /** A single corrective attempt; its own failure is reported, never retried. */
    private async recoverOnce(
        userInput: string,
        intent: string,
        reason: string,
        traceId: string,
        expectedWindow: string | null
    ): Promise<RecoveryReport | undefined> {
        const invalidated = await this.kernel.invalidateReflex(userInput);
        this.log.info('Cached plan invalidated after failure', { acknowledged: invalidated });

        if (!this.config.recovery.enabled) return undefined;

        const vision = this.planner.snapshotContext().vision?.data ?? null;
        const decision = await this.planner.recover(intent, reason, vision);
        if (!decision.ok) {
            this.log.warn(`Recovery unavailable: ${decision.error}`);
            return { status: 'error', executed: 0, reason: decision.error };
        }

        this.log.info(`Recovering: ${decision.plan.intent}`, { actions: decision.plan.actions.length });
        const run = await this.runActions(decision.plan.intent, decision.plan.actions, traceId, expectedWindow);
        return { status: run.status, intent: decision.plan.intent, executed: run.executed, reason: run.reason };
    }
}
