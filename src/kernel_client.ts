// kernel_client.ts - transactional line-JSON client for the permission/memory Kernel

import * as net from 'net';
import { z } from 'zod';
import { createLogger, Logger } from './logger';

// ============================================================================
// Types
// ============================================================================

export interface KernelClientOptions {
    host: string;
    port: number;
    authToken: string;
    timeoutMs?: number;
    maxResponseBytes?: number;
    logger?: Logger;
}

export interface WireAction {
    type: string;
    payload: Record<string, unknown>;
}

/** Permission frames carry no `type`; the Kernel treats an untyped frame as a permission request. */
export interface PermissionRequest {
    id: string;
    intent: string;
    trace_id: string;
    actions: WireAction[];
    expected_window?: string;
}

export interface ReflexHit {
    plan: Record<string, unknown>;
    trustScore: number;
}

export interface MemoryStoreRequest {
    key: string;
    value: string;
    context: string;
    traceId: string;
    vector?: number[];
}

// ============================================================================
// Response schemas
// ============================================================================

const reflexResponseSchema = z.object({
    found: z.boolean(),
    cached_plan: z.union([z.string(), z.record(z.unknown())]).nullish(),
    trust_score: z.number().optional(),
});

const storeResponseSchema = z.object({
    success: z.boolean().optional(),
    approved: z.boolean().optional(),
});

export const memoryArtifactSchema = z.object({
    timestamp: z.string().default(''),
    content: z.string(),
    classification: z.string().default('OTHER'),
    summary: z.string().default(''),
});

export type MemoryArtifact = z.infer<typeof memoryArtifactSchema>;

const searchResponseSchema = z.object({
    artifacts: z.array(z.unknown()).nullish(),
});

export const permissionResponseSchema = z.object({
    id: z.string().optional(),
    approved: z.boolean(),
    reason: z.string().default(''),
    error_code: z.string().optional(),
    trust_score: z.number().optional(),
});

export type PermissionResponse = z.infer<typeof permissionResponseSchema>;

// ============================================================================
// Constants
// ============================================================================

export const REFLEX_TRUST_THRESHOLD = 5;

const DEFAULTS = {
    TIMEOUT_MS: 2000,
    MAX_RESPONSE_BYTES: 8192,
    SEARCH_RESPONSE_BYTES: 65536,
    SEARCH_LIMIT: 5,
} as const;

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function parseFrame(buf: Buffer): unknown | null {
    const text = buf.toString('utf-8').trim();
    if (!text) return null;
    try {
        return JSON.parse(text);
    } catch {
        return null;
    }
}

// ============================================================================
// KernelClient
// ============================================================================

/**
 * One connection per call: connect, auth frame, request frame, one response
 * frame, close. Every failure (refused, timeout, reset, garbage) resolves to
 * null; nothing here rejects, so callers can always carry on degraded.
 */
export class KernelClient {
    private readonly host: string;
    private readonly port: number;
    private readonly authToken: string;
    private readonly timeoutMs: number;
    private readonly maxResponseBytes: number;
    private readonly log: Logger;

    constructor(opts: KernelClientOptions) {
        this.host = opts.host;
        this.port = opts.port;
        this.authToken = opts.authToken;
        this.timeoutMs = opts.timeoutMs ?? DEFAULTS.TIMEOUT_MS;
        this.maxResponseBytes = opts.maxResponseBytes ?? DEFAULTS.MAX_RESPONSE_BYTES;
        this.log = opts.logger ?? createLogger('kernel-client');
    }

    transact(request: object, opts: { maxBytes?: number } = {}): Promise<unknown | null> {
        const maxBytes = opts.maxBytes ?? this.maxResponseBytes;

        return new Promise((resolve) => {
            let settled = false;
            let size = 0;
            const chunks: Buffer[] = [];
            const socket = net.createConnection({ host: this.host, port: this.port });

            const finish = (value: unknown | null, failure?: string): void => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                socket.destroy();
                if (failure) this.log.debug('Kernel transaction failed', { reason: failure, port: this.port });
                resolve(value);
            };

            const timer = setTimeout(() => finish(null, `timeout after ${this.timeoutMs}ms`), this.timeoutMs);

            socket.on('connect', () => {
                socket.write(JSON.stringify({ auth_token: this.authToken }) + '\n');
                socket.write(JSON.stringify(request) + '\n');
            });

            socket.on('data', (chunk: Buffer) => {
                chunks.push(chunk);
                size += chunk.length;
                const buf = Buffer.concat(chunks);
                const nl = buf.indexOf(0x0a);
                if (nl >= 0) {
                    finish(parseFrame(buf.subarray(0, Math.min(nl, maxBytes))));
                } else if (size >= maxBytes) {
                    finish(parseFrame(buf.subarray(0, maxBytes)));
                }
            });

            socket.on('end', () => {
                const value = parseFrame(Buffer.concat(chunks));
                finish(value, value === null ? 'empty or malformed response' : undefined);
            });
            socket.on('error', (err) => finish(null, err.message));
            socket.on('close', () => finish(null, 'connection closed before response'));
        });
    }

    /** Cached plan for an intent, only when the Kernel trusts it (score > 5). */
    async queryReflex(intent: string): Promise<ReflexHit | null> {
        const res = reflexResponseSchema.safeParse(await this.transact({ type: 'reflex_query', intent }));
        if (!res.success || !res.data.found || res.data.cached_plan == null) return null;

        const trustScore = res.data.trust_score ?? 0;
        if (trustScore <= REFLEX_TRUST_THRESHOLD) {
            this.log.debug('Reflex below trust threshold', { trust_score: trustScore });
            return null;
        }

        let plan: unknown = res.data.cached_plan;
        if (typeof plan === 'string') {
            try {
                plan = JSON.parse(plan);
            } catch {
                this.log.warn('Reflex cached_plan is not valid JSON');
                return null;
            }
        }
        return isRecord(plan) ? { plan, trustScore } : null;
    }

    async storeMemory(req: MemoryStoreRequest): Promise<boolean> {
        const frame: Record<string, unknown> = {
            type: 'memory_store',
            key: req.key,
            value: req.value,
            context: req.context,
            trace_id: req.traceId,
        };
        if (req.vector) frame.vector = req.vector;

        const res = storeResponseSchema.safeParse(await this.transact(frame));
        return res.success && (res.data.approved === true || res.data.success === true);
    }

    async searchMemory(vector: number[], limit: number = DEFAULTS.SEARCH_LIMIT): Promise<MemoryArtifact[]> {
        const raw = await this.transact(
            { type: 'memory_search', vector, limit },
            { maxBytes: DEFAULTS.SEARCH_RESPONSE_BYTES }
        );
        const res = searchResponseSchema.safeParse(raw);
        if (!res.success || !res.data.artifacts) return [];

        const out: MemoryArtifact[] = [];
        for (const item of res.data.artifacts) {
            const a = memoryArtifactSchema.safeParse(item);
            if (a.success) out.push(a.data);
        }
        return out;
    }

    async invalidateReflex(intent: string): Promise<boolean> {
        const ack = await this.transact({ type: 'invalidate_reflex', intent });
        return ack !== null;
    }

    async requestPermission(req: PermissionRequest): Promise<PermissionResponse | null> {
        const raw = await this.transact(req);
        if (raw === null) return null;
        const res = permissionResponseSchema.safeParse(raw);
        if (!res.success) {
            this.log.warn('Malformed permission response', { issues: res.error.issues.length });
            return null;
        }
        return res.data;
    }
}
