/**
 * Planner
 *
 * Turns one user utterance into a validated plan:
 *   reflex cache -> context assembly -> LLM generation -> normalization
 *   -> validation -> mental-action filtering.
 *
 * The Kernel, fact store and embedder are all best-effort. Only the language
 * model is required, and even its absence is reported as a value, not thrown.
 * Vision and file context slots live here for the whole process lifetime.
 */

import {
    Action,
    Plan,
    parseActions,
    validateActions,
} from './action_schema';
import { ContextSlots, ContextSnapshot, formatFileContext, formatVisionContext } from './context_slots';
import type { Embedder } from './embedder';
import type { Fact, Identity, RememberResult, RememberStatus } from './fact_store';
import type { MemoryArtifact, MemoryStoreRequest, ReflexHit } from './kernel_client';
import type { ChatMessage, ChatModel } from './llm_client';
import { createLogger, Logger } from './logger';
import { formatMemories, formatUserFacts, getPlannerPrompt, getRecoveryPrompt } from './prompts';
import { ErrorFactory } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Collaborator contracts                                                     */
/* -------------------------------------------------------------------------- */

/** The slice of the Kernel client the planner needs. */
export interface PlannerKernel {
    queryReflex(intent: string): Promise<ReflexHit | null>;
    searchMemory(vector: number[], limit?: number): Promise<MemoryArtifact[]>;
    storeMemory(req: MemoryStoreRequest): Promise<boolean>;
    invalidateReflex(intent: string): Promise<boolean>;
}

export interface FactSink {
    getFacts(): Record<string, Fact>;
    remember(key: string, value: string, context: string): Promise<RememberResult>;
}

export interface PlannerOptions {
    kernel: PlannerKernel;
    llm: ChatModel;
    facts: FactSink;
    identity: Identity;
    sandboxRoot: string;
    embedder?: Embedder;
    now?: () => Date;
    logger?: Logger;
    memorySearchLimit?: number;
}

/* -------------------------------------------------------------------------- */
/* Results                                                                    */
/* -------------------------------------------------------------------------- */

export type PlanSource = 'reflex' | 'generated' | 'fallback';

export interface MemorizeOutcome {
    key: string;
    local: RememberStatus;
    kernel: boolean;
}

export type Decision =
    | { ok: true; plan: Plan; source: PlanSource; memorized: MemorizeOutcome[] }
    | { ok: false; error: string };

export interface DecideOptions {
    traceId: string;
}

/* -------------------------------------------------------------------------- */
/* Constants                                                                  */
/* -------------------------------------------------------------------------- */

export const LLM_UNAVAILABLE = 'LLM unavailable';
export const FALLBACK_TEXT = "I heard you, but I don't see a clear action. Could you rephrase or be more specific?";
export const MEMORIZE_ACK_TEXT = "Got it. I'll remember that.";
const DEFAULT_INTENT = 'clarification_needed';
const DEFAULT_STEP = 'Inform the user and request clarification';

export function buildFallbackPlan(): Plan {
    return {
        intent: DEFAULT_INTENT,
        plan: [DEFAULT_STEP],
        actions: [{ type: 'SPEAK', text: FALLBACK_TEXT }],
    };
}

/* -------------------------------------------------------------------------- */
/* Completion parsing                                                         */
/* -------------------------------------------------------------------------- */

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Strip markdown fences, take the outermost {...}, parse. undefined when nothing parses. */
export function extractJsonObject(text: string): unknown {
    const unfenced = text.replace(/```(?:json)?/gi, '').trim();
    const start = unfenced.indexOf('{');
    const end = unfenced.lastIndexOf('}');
    if (start < 0 || end <= start) return undefined;
    try {
        return JSON.parse(unfenced.slice(start, end + 1));
    } catch {
        return undefined;
    }
}

export interface RawPlan {
    intent: string;
    plan: string[];
    actions: unknown[];
}

/** Minimum structure or nothing: callers substitute the fallback on null. */
export function normalizePlan(parsed: unknown): RawPlan | null {
    if (!isRecord(parsed)) return null;
    const actions = parsed.actions;
    if (!Array.isArray(actions) || actions.length === 0) return null;

    const intent = typeof parsed.intent === 'string' && parsed.intent.trim() ? parsed.intent.trim() : DEFAULT_INTENT;
    const steps = Array.isArray(parsed.plan)
        ? parsed.plan.filter((s): s is string => typeof s === 'string' && s.trim().length > 0)
        : [];

    return { intent, plan: steps.length > 0 ? steps : [DEFAULT_STEP], actions };
}

/* -------------------------------------------------------------------------- */
/* Planner                                                                    */
/* -------------------------------------------------------------------------- */

export class Planner {
    private readonly kernel: PlannerKernel;
    private readonly llm: ChatModel;
    private readonly facts: FactSink;
    private readonly identity: Identity;
    private readonly sandboxRoot: string;
    private readonly embedder?: Embedder;
    private readonly now: () => Date;
    private readonly log: Logger;
    private readonly memorySearchLimit: number;
    private readonly slots: ContextSlots;

    constructor(opts: PlannerOptions) {
        this.kernel = opts.kernel;
        this.llm = opts.llm;
        this.facts = opts.facts;
        this.identity = opts.identity;
        this.sandboxRoot = opts.sandboxRoot;
        this.embedder = opts.embedder;
        this.now = opts.now ?? (() => new Date());
        this.log = opts.logger ?? createLogger('planner');
        this.memorySearchLimit = opts.memorySearchLimit ?? 5;
        this.slots = new ContextSlots(this.now);
    }

    /* ---------------------------- context slots ---------------------------- */

    updateVisionContext(data: unknown): void {
        this.slots.updateVision(data);
        this.log.debug('Vision context updated', { chars: JSON.stringify(data)?.length ?? 0 });
    }

    clearVisionContext(): void {
        this.slots.clearVision();
    }

    updateFileContext(data: unknown): void {
        this.slots.updateFile(data);
        this.log.debug('File context updated');
    }

    clearFileContext(): void {
        this.slots.clearFile();
    }

    snapshotContext(): ContextSnapshot {
        return this.slots.snapshot();
    }

    /* -------------------------------- decide ------------------------------- */

    async decide(userInput: string, opts: DecideOptions): Promise<Decision> {
        const input = userInput.trim();
        if (!input) {
            this.log.info('Empty input, asking for clarification');
            return { ok: true, plan: buildFallbackPlan(), source: 'fallback', memorized: [] };
        }

        // 1. Reflex: a trusted cached plan skips the model entirely.
        const reflex = await this.tryReflex(input, opts.traceId);
        if (reflex) return reflex;

        // 2. Context
        const contextBlock = await this.assembleContext(input, this.slots.snapshot());

        // 3. Generation
        const messages: ChatMessage[] = [
            { role: 'system', content: getPlannerPrompt({ identity: this.identity, contextBlock, userInput: input, now: this.now() }) },
            { role: 'user', content: input },
        ];
        const completion = await this.llm.complete(messages, { format: 'json' });
        if (!completion.ok) {
            const detail = ErrorFactory.llmUnavailable(`${completion.errorCode}: ${completion.message}`);
            this.log.error(detail.message, detail.context);
            return { ok: false, error: LLM_UNAVAILABLE };
        }

        // 4. Normalization
        let source: PlanSource = 'generated';
        let raw = normalizePlan(extractJsonObject(completion.completion));
        if (!raw) {
            const bad = ErrorFactory.llmBadOutput(completion.completion.length);
            this.log.warn(`${bad.message}, falling back to SPEAK`, { ...bad.context, error_code: bad.code });
            raw = buildFallbackPlan();
            source = 'fallback';
        }

        // 5. Validation
        let plan: Plan;
        const parsed = parseActions(raw.actions, this.sandboxRoot);
        if (parsed.ok) {
            plan = { intent: raw.intent, plan: raw.plan, actions: parsed.actions };
        } else {
            const invalid = ErrorFactory.validationFailed(parsed.reason, source);
            this.log.warn('Action validation failed, falling back to SPEAK', {
                reason: invalid.message,
                ...invalid.context,
                error_code: invalid.code,
            });
            plan = buildFallbackPlan();
            source = 'fallback';
            const fallbackError = validateActions(plan.actions, this.sandboxRoot);
            if (fallbackError) return { ok: false, error: `Fallback validation failed: ${fallbackError}` };
        }

        // 6. Mental actions
        const { actions, memorized } = await this.processMentalActions(plan.actions, input, opts.traceId);
        return { ok: true, plan: { ...plan, actions }, source, memorized };
    }

    /* ------------------------------- recover ------------------------------- */

    /** Corrective 2-4 step plan after an execution failure. No fallback: an unusable answer is an error. */
    async recover(originalIntent: string, failureReason: string, vision: unknown): Promise<Decision> {
        const messages: ChatMessage[] = [
            { role: 'system', content: getRecoveryPrompt(this.identity.name, originalIntent, failureReason, vision) },
            { role: 'user', content: `Recover from: ${failureReason}` },
        ];

        const completion = await this.llm.complete(messages, { format: 'json' });
        if (!completion.ok) {
            this.log.error('Recovery generation failed', { error_code: completion.errorCode });
            return { ok: false, error: LLM_UNAVAILABLE };
        }

        const raw = normalizePlan(extractJsonObject(completion.completion));
        if (!raw) return { ok: false, error: 'Recovery produced no actions' };

        const parsed = parseActions(raw.actions, this.sandboxRoot);
        if (!parsed.ok) return { ok: false, error: `Recovery action validation failed: ${parsed.reason}` };

        this.log.info('Recovery plan ready', { intent: raw.intent, actions: parsed.actions.length });
        return { ok: true, plan: { intent: raw.intent, plan: raw.plan, actions: parsed.actions }, source: 'generated', memorized: [] };
    }

    /* ------------------------------- internals ----------------------------- */

    private async tryReflex(input: string, traceId: string): Promise<Decision | null> {
        const hit = await this.kernel.queryReflex(input);
        if (!hit) return null;

        const parsed = parseActions(hit.plan.actions, this.sandboxRoot);
        if (!parsed.ok || parsed.actions.length === 0) {
            // A cached plan gets no exemption: drop it and generate afresh.
            const reason = parsed.ok ? 'no actions' : parsed.reason;
            this.log.warn('Cached plan rejected, regenerating', { reason, trust_score: hit.trustScore });
            const invalidated = await this.kernel.invalidateReflex(input);
            if (!invalidated) this.log.debug('Reflex invalidation not acknowledged');
            return null;
        }

        this.log.info('Reflex hit, skipping model', { trust_score: hit.trustScore });
        const normalized = normalizePlan(hit.plan);
        const plan: Plan = {
            intent: normalized ? normalized.intent : DEFAULT_INTENT,
            plan: normalized ? normalized.plan : [DEFAULT_STEP],
            actions: parsed.actions,
        };
        const { actions, memorized } = await this.processMentalActions(plan.actions, input, traceId);
        return { ok: true, plan: { ...plan, actions }, source: 'reflex', memorized };
    }

    private async assembleContext(input: string, snapshot: ContextSnapshot): Promise<string> {
        let memoryBlock = '';
        if (this.embedder) {
            const vector = await this.embedder.embed(input);
            if (vector) {
                const artifacts = await this.kernel.searchMemory(vector, this.memorySearchLimit);
                memoryBlock = formatMemories(artifacts);
                if (artifacts.length > 0) this.log.debug('Memories retrieved', { count: artifacts.length });
            }
        }

        const facts = this.facts.getFacts();
        const factsBlock = formatUserFacts(facts);
        if (factsBlock) this.log.debug('Injecting user facts', { count: Object.keys(facts).length });

        return factsBlock + memoryBlock + formatVisionContext(snapshot.vision) + formatFileContext(snapshot.file);
    }

    /**
     * MEMORIZE never reaches execution. Each one is written locally (no-op when
     * unchanged) and, independently, to the Kernel with a vector when one can
     * be computed. The two writes share no transaction.
     */
    private async processMentalActions(
        actions: Action[],
        userInput: string,
        traceId: string
    ): Promise<{ actions: Action[]; memorized: MemorizeOutcome[] }> {
        const physical: Action[] = [];
        const memorized: MemorizeOutcome[] = [];

        for (const action of actions) {
            if (action.type !== 'MEMORIZE') {
                physical.push(action);
                continue;
            }

            const local = await this.facts.remember(action.key, action.value, userInput);
            const vector = this.embedder
                ? await this.embedder.embed(`${action.key}: ${action.value}. Context: ${userInput}`)
                : null;
            const kernel = await this.kernel.storeMemory({
                key: action.key,
                value: action.value,
                context: userInput,
                traceId,
                vector: vector ?? undefined,
            });

            if (local.status === 'failed') this.log.warn('Local memorize failed', { key: action.key, error: local.error });
            if (!kernel) this.log.debug('Kernel memory store not acknowledged', { key: action.key });
            memorized.push({ key: action.key, local: local.status, kernel });
        }

        if (physical.length === 0 && memorized.length > 0) {
            physical.push({ type: 'SPEAK', text: MEMORIZE_ACK_TEXT });
        }
        return { actions: physical, memorized };
    }
}
