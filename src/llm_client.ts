// llm_client.ts - offline chat client for a local Ollama server

import { z } from "zod";
import { createLogger, Logger } from "./logger";
import { DeskpilotError, ErrorFactory, errorMessage } from "./structured_error";

// ============================================================================
// Types
// ============================================================================

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
    role: ChatRole;
    content: string;
}

export interface ChatOptions {
    format?: "json";
    numCtx?: number;
}

export type ChatErrorCode =
    | "INVALID_REQUEST"
    | "CIRCUIT_OPEN"
    | "NETWORK_ERROR"
    | "MODEL_ERROR"
    | "BAD_RESPONSE";

export interface ChatSuccess {
    ok: true;
    completion: string;
    model: string;
    latencyMs: number;
}

export interface ChatFailure {
    ok: false;
    errorCode: ChatErrorCode;
    message: string;
    httpStatus: number | null;
}

export type ChatResult = ChatSuccess | ChatFailure;

/** Anything that turns a message list into a completion. The Planner depends only on this. */
export interface ChatModel {
    complete(messages: ChatMessage[], opts?: ChatOptions): Promise<ChatResult>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface OllamaClientConfig {
    baseUrl: string;
    model: string;
    timeoutMs?: number;
    /** Remote hosts are refused unless this is set; the agent is offline-only. */
    allowRemote?: boolean;
    fetchImpl?: FetchLike;
    logger?: Logger;
}

// ============================================================================
// Constants
// ============================================================================

const LIMITS = {
    DEFAULT_TIMEOUT_MS: 60_000,
    NUM_CTX: 8192,

    CIRCUIT_BREAKER: {
        MAX_FAILURES: 5,
        WINDOW_MS: 60_000,
        COOLDOWN_MS: 10_000,
    },

    SANITIZE: {
        ERROR_SNIPPET_MAX_CHARS: 300,
        STRIP_PATTERNS: [
            /[a-fA-F0-9]{32,}/g,
            /Authorization:\s*Bearer\s+[A-Za-z0-9._-]+/gi,
        ],
    },
} as const;

const LOOPBACK_HOSTS = new Set(["localhost", "127.0.0.1", "::1", "[::1]"]);

const chatResponseSchema = z.object({
    model: z.string().optional(),
    message: z.object({
        role: z.string().optional(),
        content: z.string(),
    }),
    done: z.boolean().optional(),
});

// ============================================================================
// Circuit Breaker
// ============================================================================

export class CircuitBreaker {
    private failures: number[] = [];
    private openUntilMs = 0;

    constructor(
        private readonly maxFailures: number = LIMITS.CIRCUIT_BREAKER.MAX_FAILURES,
        private readonly windowMs: number = LIMITS.CIRCUIT_BREAKER.WINDOW_MS,
        private readonly cooldownMs: number = LIMITS.CIRCUIT_BREAKER.COOLDOWN_MS
    ) { }

    isOpen(nowMs: number): boolean {
        return nowMs < this.openUntilMs;
    }

    recordFailure(nowMs: number): void {
        this.failures.push(nowMs);
        const cutoff = nowMs - this.windowMs;
        this.failures = this.failures.filter((t) => t >= cutoff);

        if (this.failures.length >= this.maxFailures) {
            this.openUntilMs = nowMs + this.cooldownMs;
        }
    }

    recordSuccess(): void {
        this.failures = [];
    }
}

// ============================================================================
// Helpers
// ============================================================================

export function sanitizeErrorSnippet(input: string): string {
    let out = input || "";
    for (const re of LIMITS.SANITIZE.STRIP_PATTERNS) {
        out = out.replace(re, "[REDACTED]");
    }
    out = out.replace(/[^\x20-\x7E]+/g, " ");
    if (out.length > LIMITS.SANITIZE.ERROR_SNIPPET_MAX_CHARS) {
        out = out.slice(0, LIMITS.SANITIZE.ERROR_SNIPPET_MAX_CHARS);
    }
    return out;
}

export function isLoopbackUrl(url: string): boolean {
    try {
        const host = new URL(url).hostname.toLowerCase();
        return LOOPBACK_HOSTS.has(host) || host.startsWith("127.");
    } catch {
        return false;
    }
}

export function assertLocalEndpoint(url: string, allowRemote: boolean): void {
    if (!allowRemote && !isLoopbackUrl(url)) {
        throw new DeskpilotError(
            ErrorFactory.configInvalid([`model endpoint must be local (got ${url})`], "network.ollama_url")
        );
    }
}

function validateMessages(messages: ChatMessage[]): string | null {
    if (messages.length === 0) return "messages must be a non-empty array";
    for (const m of messages) {
        if (m.content.trim().length === 0) return `message.content for role ${m.role} is empty`;
    }
    return null;
}

/** POST JSON with an abort deadline. Shared by the chat and embedding clients. */
export async function postJson(
    fetchImpl: FetchLike,
    url: string,
    body: unknown,
    timeoutMs: number
): Promise<{ ok: true; status: number; json: unknown } | { ok: false; status: number | null; message: string }> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
        const res = await fetchImpl(url, {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify(body),
            signal: controller.signal,
        });
        const text = await res.text();
        if (!res.ok) {
            return { ok: false, status: res.status, message: sanitizeErrorSnippet(text) };
        }
        try {
            return { ok: true, status: res.status, json: JSON.parse(text) };
        } catch {
            return { ok: false, status: res.status, message: `non-JSON body: ${sanitizeErrorSnippet(text)}` };
        }
    } catch (e) {
        const message = controller.signal.aborted ? `timeout after ${timeoutMs}ms` : errorMessage(e);
        return { ok: false, status: null, message: sanitizeErrorSnippet(message) };
    } finally {
        clearTimeout(timer);
    }
}

// ============================================================================
// OllamaChatClient
// ============================================================================

export class OllamaChatClient implements ChatModel {
    private readonly breaker = new CircuitBreaker();
    private readonly endpoint: string;
    private readonly model: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: FetchLike;
    private readonly log: Logger;

    constructor(config: OllamaClientConfig) {
        assertLocalEndpoint(config.baseUrl, config.allowRemote ?? false);
        this.endpoint = `${config.baseUrl.replace(/\/+$/, "")}/api/chat`;
        this.model = config.model;
        this.timeoutMs = config.timeoutMs ?? LIMITS.DEFAULT_TIMEOUT_MS;
        this.fetchImpl = config.fetchImpl ?? fetch;
        this.log = config.logger ?? createLogger("llm-client");
    }

    async complete(messages: ChatMessage[], opts: ChatOptions = {}): Promise<ChatResult> {
        const invalid = validateMessages(messages);
        if (invalid) return this.err("INVALID_REQUEST", invalid, null);

        const started = Date.now();
        if (this.breaker.isOpen(started)) {
            return this.err("CIRCUIT_OPEN", "Circuit breaker open (too many recent failures)", null);
        }

        const payload: Record<string, unknown> = {
            model: this.model,
            messages,
            stream: false,
            options: { num_ctx: opts.numCtx ?? LIMITS.NUM_CTX },
        };
        if (opts.format) payload.format = opts.format;

        this.log.debug("Chat request", { model: this.model, messages: messages.length });
        const res = await postJson(this.fetchImpl, this.endpoint, payload, this.timeoutMs);
        const now = Date.now();

        if (!res.ok) {
            this.breaker.recordFailure(now);
            const code: ChatErrorCode = res.status === null ? "NETWORK_ERROR" : "MODEL_ERROR";
            return this.err(code, res.message, res.status);
        }

        const parsed = chatResponseSchema.safeParse(res.json);
        if (!parsed.success) {
            this.breaker.recordFailure(now);
            return this.err("BAD_RESPONSE", "Response missing message.content", res.status);
        }

        this.breaker.recordSuccess();
        const latencyMs = now - started;
        this.log.debug("Chat response", { model: this.model, latency_ms: latencyMs, chars: parsed.data.message.content.length });
        return {
            ok: true,
            completion: parsed.data.message.content,
            model: parsed.data.model ?? this.model,
            latencyMs,
        };
    }

    private err(errorCode: ChatErrorCode, message: string, httpStatus: number | null): ChatFailure {
        this.log.warn(`Chat failed: ${errorCode}`, { message, http_status: httpStatus });
        return { ok: false, errorCode, message, httpStatus };
    }
}
