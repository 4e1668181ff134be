/**
 * Sentinel Bridge
 *
 * The Sentinel is the external UI process that presses keys, types, clicks
 * and reads the accessibility tree. It is driven over its stdin/stdout with
 * one JSON object per line:
 *
 *   -> { "id": "...", "cmd": "press_key", "args": { "key": "enter" } }
 *   <- { "id": "...", "ok": true, "result": ... }
 *   <- { "event": "ready" }
 *   <- { "event": "focus", "name": "Untitled - Notepad", "control_type": "Window" }
 *
 * Unsolicited focus events are queued (bounded) for the CLI `scan` command.
 */

import { spawn } from 'child_process';
import * as readline from 'readline';
import type { Readable, Writable } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { DeskpilotConfig } from './config';
import { createLogger, Logger } from './logger';
import { DeskpilotError, ErrorFactory, errorMessage } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Contract                                                                   */
/* -------------------------------------------------------------------------- */

export interface FocusEvent {
    name: string;
    controlType: string | null;
    at: Date;
}

export interface Sentinel {
    pressKey(key: string): Promise<void>;
    typeText(text: string): Promise<void>;
    click(x: number, y: number): Promise<void>;
    /** Full accessibility tree of the foreground window; null when nothing was captured. */
    scanFullTree(): Promise<unknown>;
    waitUntilReady(): Promise<boolean>;
    drainFocusEvents(): FocusEvent[];
    kill(): void;
}

export const FOCUS_QUEUE_LIMIT = 100;

/* -------------------------------------------------------------------------- */
/* Wire schemas                                                               */
/* -------------------------------------------------------------------------- */

const responseSchema = z.object({
    id: z.string(),
    ok: z.boolean(),
    result: z.unknown().optional(),
    error: z.string().optional(),
});

const readyEventSchema = z.object({ event: z.literal('ready') });

const focusEventSchema = z.object({
    event: z.literal('focus'),
    name: z.string(),
    control_type: z.string().optional(),
});

/* -------------------------------------------------------------------------- */
/* Bridge                                                                     */
/* -------------------------------------------------------------------------- */

export interface SentinelBridgeOptions {
    input: Readable;
    output: Writable;
    callTimeoutMs: number;
    readyTimeoutMs: number;
    onKill?: () => void;
    logger?: Logger;
    now?: () => Date;
}

interface PendingCall {
    cmd: string;
    resolve: (result: unknown) => void;
    reject: (err: Error) => void;
    timer: NodeJS.Timeout;
}

export class SentinelBridge implements Sentinel {
    private readonly output: Writable;
    private readonly callTimeoutMs: number;
    private readonly readyTimeoutMs: number;
    private readonly onKill?: () => void;
    private readonly log: Logger;
    private readonly now: () => Date;
    private readonly rl: readline.Interface;

    private readonly pending = new Map<string, PendingCall>();
    private readonly focusQueue: FocusEvent[] = [];
    private readyWaiters: Array<(ready: boolean) => void> = [];
    private ready = false;
    private closed = false;

    constructor(opts: SentinelBridgeOptions) {
        this.output = opts.output;
        this.callTimeoutMs = opts.callTimeoutMs;
        this.readyTimeoutMs = opts.readyTimeoutMs;
        this.onKill = opts.onKill;
        this.log = opts.logger ?? createLogger('sentinel');
        this.now = opts.now ?? (() => new Date());

        this.rl = readline.createInterface({ input: opts.input, crlfDelay: Infinity });
        this.rl.on('line', (line) => this.onLine(line));
        this.rl.on('close', () => this.close('Sentinel exited'));
        this.output.on('error', (e) => this.log.warn('Sentinel stdin error', { error: errorMessage(e) }));
    }

    /* ------------------------------- commands ------------------------------ */

    async pressKey(key: string): Promise<void> {
        await this.call('press_key', { key });
    }

    async typeText(text: string): Promise<void> {
        await this.call('type_text', { text });
    }

    async click(x: number, y: number): Promise<void> {
        await this.call('click', { x, y });
    }

    async scanFullTree(): Promise<unknown> {
        const result = await this.call('scan_full_tree', {});
        return result ?? null;
    }

    waitUntilReady(): Promise<boolean> {
        if (this.ready) return Promise.resolve(true);
        if (this.closed) return Promise.resolve(false);

        return new Promise<boolean>((resolve) => {
            const timer = setTimeout(() => {
                this.readyWaiters = this.readyWaiters.filter((w) => w !== waiter);
                this.log.warn(`Sentinel not ready after ${this.readyTimeoutMs}ms`);
                resolve(false);
            }, this.readyTimeoutMs);
            const waiter = (ready: boolean): void => {
                clearTimeout(timer);
                resolve(ready);
            };
            this.readyWaiters.push(waiter);
        });
    }

    drainFocusEvents(): FocusEvent[] {
        return this.focusQueue.splice(0, this.focusQueue.length);
    }

    kill(): void {
        if (this.closed) return;
        this.onKill?.();
        this.close('Sentinel killed');
    }

    /** Reject everything in flight and refuse further calls. Idempotent. */
    close(reason: string): void {
        if (this.closed) return;
        this.closed = true;
        this.rl.close();

        for (const [id, call] of this.pending) {
            clearTimeout(call.timer);
            call.reject(new DeskpilotError(ErrorFactory.sentinel(reason, call.cmd)));
            this.pending.delete(id);
        }
        for (const waiter of this.readyWaiters) waiter(false);
        this.readyWaiters = [];
        this.log.info(reason);
    }

    /* ------------------------------- internals ----------------------------- */

    private call(cmd: string, args: Record<string, unknown>): Promise<unknown> {
        if (this.closed) {
            return Promise.reject(new DeskpilotError(ErrorFactory.sentinel('Sentinel is not running', cmd)));
        }

        const id = uuidv4();
        return new Promise<unknown>((resolve, reject) => {
            const timer = setTimeout(() => {
                this.pending.delete(id);
                reject(new DeskpilotError(ErrorFactory.sentinel(`Sentinel timeout after ${this.callTimeoutMs}ms`, cmd)));
            }, this.callTimeoutMs);

            this.pending.set(id, { cmd, resolve, reject, timer });
            this.output.write(JSON.stringify({ id, cmd, args }) + '\n');
        });
    }

    private onLine(line: string): void {
        const trimmed = line.trim();
        if (!trimmed) return;

        let msg: unknown;
        try {
            msg = JSON.parse(trimmed);
        } catch {
            this.log.debug('Sentinel output (non-JSON)', { line: trimmed.slice(0, 200) });
            return;
        }

        const response = responseSchema.safeParse(msg);
        if (response.success) {
            const call = this.pending.get(response.data.id);
            if (!call) {
                this.log.debug('Late or unknown Sentinel response', { id: response.data.id });
                return;
            }
            this.pending.delete(response.data.id);
            clearTimeout(call.timer);
            if (response.data.ok) {
                call.resolve(response.data.result);
            } else {
                call.reject(new DeskpilotError(ErrorFactory.sentinel(response.data.error ?? 'command failed', call.cmd)));
            }
            return;
        }

        if (readyEventSchema.safeParse(msg).success) {
            this.ready = true;
            for (const waiter of this.readyWaiters) waiter(true);
            this.readyWaiters = [];
            this.log.info('Sentinel ready');
            return;
        }

        const focus = focusEventSchema.safeParse(msg);
        if (focus.success) {
            if (this.focusQueue.length >= FOCUS_QUEUE_LIMIT) this.focusQueue.shift();
            this.focusQueue.push({ name: focus.data.name, controlType: focus.data.control_type ?? null, at: this.now() });
            return;
        }

        this.log.warn('Unrecognized Sentinel message', { line: trimmed.slice(0, 200) });
    }
}

/* -------------------------------------------------------------------------- */
/* Headless stand-in                                                          */
/* -------------------------------------------------------------------------- */

/** Used when no Sentinel command is configured: every call is logged and succeeds. */
export class NullSentinel implements Sentinel {
    private readonly log: Logger;

    constructor(logger?: Logger) {
        this.log = logger ?? createLogger('sentinel');
    }

    async pressKey(key: string): Promise<void> {
        this.log.info(`(no sentinel) press_key ${key}`);
    }

    async typeText(text: string): Promise<void> {
        this.log.info('(no sentinel) type_text', { chars: text.length });
    }

    async click(x: number, y: number): Promise<void> {
        this.log.info(`(no sentinel) click (${x}, ${y})`);
    }

    async scanFullTree(): Promise<unknown> {
        this.log.info('(no sentinel) scan_full_tree');
        return null;
    }

    async waitUntilReady(): Promise<boolean> {
        return true;
    }

    drainFocusEvents(): FocusEvent[] {
        return [];
    }

    kill(): void {
        // nothing to stop
    }
}

/* -------------------------------------------------------------------------- */
/* Process launch                                                             */
/* -------------------------------------------------------------------------- */

export function spawnSentinel(cfg: DeskpilotConfig['sentinel'], logger?: Logger): Sentinel {
    const log = logger ?? createLogger('sentinel');
    if (!cfg.command) {
        log.warn('No sentinel command configured, running headless');
        return new NullSentinel(log);
    }

    const child = spawn(cfg.command, cfg.args, { stdio: ['pipe', 'pipe', 'inherit'] });
    const bridge = new SentinelBridge({
        input: child.stdout,
        output: child.stdin,
        callTimeoutMs: cfg.call_timeout_ms,
        readyTimeoutMs: cfg.ready_timeout_ms,
        onKill: () => {
            child.kill();
        },
        logger: log,
    });

    child.on('error', (e) => {
        log.error('Sentinel failed to start', { command: cfg.command, error: errorMessage(e) });
        bridge.close('Sentinel failed to start');
    });
    child.on('exit', (code, signal) => {
        bridge.close(`Sentinel exited (code=${code ?? 'null'}, signal=${signal ?? 'none'})`);
    });

    log.info('Sentinel spawned', { command: cfg.command, pid: child.pid });
    return bridge;
}
