/**
 * Permission Gate
 *
 * Asks the Kernel to approve one action, with visual focus verification:
 * while the Kernel answers FOCUS_MISMATCH the identical frame is re-sent at a
 * fixed interval (fresh connection each time) up to the retry budget.
 * "Waiting for user" answers are polled outside that budget. An unreachable
 * Kernel fails open with a warning.
 */

import { v4 as uuidv4 } from 'uuid';
import { Action, toWireAction } from './action_schema';
import type { PermissionRequest, PermissionResponse } from './kernel_client';
import { createLogger, Logger } from './logger';
import { ErrorFactory } from './structured_error';

export interface PermissionTransport {
    requestPermission(req: PermissionRequest): Promise<PermissionResponse | null>;
}

export interface PermissionGateOptions {
    transport: PermissionTransport;
    retryLimit: number;
    retryDelayMs: number;
    progressEvery: number;
    pendingPollMs: number;
    sleep?: (ms: number) => Promise<void>;
    idFactory?: () => string;
    logger?: Logger;
}

export type GateResult =
    | { approved: true; reason: string; attempts: number; failOpen: boolean; trustScore?: number }
    | { approved: false; reason: string; attempts: number; errorCode?: string };

export const FOCUS_MISMATCH = 'FOCUS_MISMATCH';
export const FOCUS_TIMEOUT = 'FOCUS_TIMEOUT';
export const PENDING_APPROVAL = 'PENDING_APPROVAL';
export const KERNEL_UNAVAILABLE_REASON = 'Kernel unavailable';

export function trustLabel(score: number): 'High' | 'Medium' | 'Low' {
    if (score > 10) return 'High';
    if (score > 5) return 'Medium';
    return 'Low';
}

function defaultSleep(ms: number): Promise<void> {
    return new Promise((r) => setTimeout(r, ms));
}

export class PermissionGate {
    private readonly transport: PermissionTransport;
    private readonly retryLimit: number;
    private readonly retryDelayMs: number;
    private readonly progressEvery: number;
    private readonly pendingPollMs: number;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly idFactory: () => string;
    private readonly log: Logger;

    constructor(opts: PermissionGateOptions) {
        this.transport = opts.transport;
        this.retryLimit = Math.max(1, opts.retryLimit);
        this.retryDelayMs = opts.retryDelayMs;
        this.progressEvery = Math.max(1, opts.progressEvery);
        this.pendingPollMs = opts.pendingPollMs;
        this.sleep = opts.sleep ?? defaultSleep;
        this.idFactory = opts.idFactory ?? uuidv4;
        this.log = opts.logger ?? createLogger('permission-gate');
    }

    buildRequest(intent: string, action: Action, traceId: string, expectedWindow?: string | null): PermissionRequest {
        const req: PermissionRequest = {
            id: this.idFactory(),
            intent,
            trace_id: traceId,
            actions: [toWireAction(action)],
        };
        if (expectedWindow) req.expected_window = expectedWindow;
        return req;
    }

    async request(intent: string, action: Action, traceId: string, expectedWindow?: string | null): Promise<GateResult> {
        const frame = this.buildRequest(intent, action, traceId, expectedWindow);
        const target = expectedWindow ?? 'unknown';
        let attempts = 0;
        let mismatches = 0;
        let pendingNoted = false;

        while (true) {
            attempts++;
            const res = await this.transport.requestPermission(frame);

            if (res === null) {
                const down = ErrorFactory.kernelUnavailable(action.type);
                this.log.warn(`${down.message}. Proceeding without safety checks.`, { ...down.context, error_code: down.code });
                return { approved: true, reason: KERNEL_UNAVAILABLE_REASON, attempts, failOpen: true };
            }

            if (res.error_code === PENDING_APPROVAL) {
                if (!pendingNoted) {
                    pendingNoted = true;
                    this.log.info('Waiting for user approval', { action: action.type });
                }
                await this.sleep(this.pendingPollMs);
                continue;
            }

            if (res.error_code === FOCUS_MISMATCH) {
                mismatches++;
                if (mismatches === 1) this.log.info(`Waiting for focus: '${target}'`);
                if (mismatches % this.progressEvery === 0) {
                    const pending = ErrorFactory.focusMismatch(target, mismatches, mismatches * this.retryDelayMs);
                    this.log.info('Still waiting for focus', { ...pending.context, error_code: pending.code });
                }
                if (mismatches >= this.retryLimit) break;
                await this.sleep(this.retryDelayMs);
                continue;
            }

            if (res.approved) {
                if (res.trust_score !== undefined && res.trust_score > 0) {
                    this.log.info(`Trust Score: ${res.trust_score} (${trustLabel(res.trust_score)} confidence)`);
                }
                if (mismatches > 0) {
                    this.log.info(`Focus confirmed: '${target}'`, { attempts, elapsed_ms: mismatches * this.retryDelayMs });
                }
                return { approved: true, reason: res.reason, attempts, failOpen: false, trustScore: res.trust_score };
            }

            const denied = ErrorFactory.permissionDenied(res.reason, action.type);
            this.log.warn(`Permission denied: ${denied.message}`, { ...denied.context, error_code: res.error_code });
            return { approved: false, reason: res.reason, attempts, errorCode: res.error_code };
        }

        const timeout = ErrorFactory.focusTimeout(target, attempts);
        this.log.error(timeout.message, timeout.context);
        return { approved: false, reason: timeout.message, attempts, errorCode: FOCUS_TIMEOUT };
    }
}
