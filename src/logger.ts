/**
 * Structured Logger
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when DESKPILOT_LOG_JSON=1
 * - Optional file output via DESKPILOT_LOG_FILE or configureLogFile()
 * - Component name on every line
 * - Utterance trace ID propagated through all log entries
 *
 * Environment:
 *   DESKPILOT_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   DESKPILOT_LOG_JSON   = 1 (default: text)
 *   DESKPILOT_LOG_FILE   = path (optional, appends)
 *   DESKPILOT_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function parseLogLevel(raw: string | undefined): LogLevel | null {
    const v = (raw || '').trim().toLowerCase();
    return v === 'debug' || v === 'info' || v === 'warn' || v === 'error' ? v : null;
}

const DEBUG_OVERRIDE = process.env.DESKPILOT_DEBUG === '1' || process.env.DESKPILOT_DEBUG === 'true';
let minLevel: number = DEBUG_OVERRIDE ? 0 : LEVEL_ORDER[parseLogLevel(process.env.DESKPILOT_LOG_LEVEL) ?? 'info'];

const JSON_MODE = process.env.DESKPILOT_LOG_JSON === '1';
let logFile = process.env.DESKPILOT_LOG_FILE || '';
let fileWarned = false;

/** Config-driven level. The DESKPILOT_DEBUG override still wins. */
export function setLogLevel(level: LogLevel): void {
    if (!DEBUG_OVERRIDE) minLevel = LEVEL_ORDER[level];
}

/** Config-driven log file. An env-provided file takes precedence. */
export function configureLogFile(filePath: string): void {
    if (!process.env.DESKPILOT_LOG_FILE) logFile = filePath;
}

/* -------------------------------------------------------------------------- */
/* Trace Context (singleton, one utterance in flight at a time)              */
/* -------------------------------------------------------------------------- */

let _traceId: string = '';
let _intent: string = '';

/** Set the active utterance context. Called by the engine when it takes the lock. */
export function setTraceContext(opts: { traceId?: string; intent?: string }): void {
    if (opts.traceId !== undefined) _traceId = opts.traceId;
    if (opts.intent !== undefined) _intent = opts.intent;
}

export function clearTraceContext(): void {
    _traceId = '';
    _intent = '';
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < minLevel) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_traceId) entry.trace_id = _traceId;
        if (_intent) entry.intent = _intent;
        if (data) entry.data = data;
        writeOutput(level, JSON.stringify(entry));
    } else {
        const ctx = _traceId ? ` [${_traceId}${_intent ? ':' + _intent : ''}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(level, line);
    }
}

function writeOutput(level: LogLevel, line: string): void {
    switch (level) {
        case 'error': process.stderr.write(line + '\n'); break;
        case 'warn':  process.stderr.write(line + '\n'); break;
        default:      process.stdout.write(line + '\n'); break;
    }

    if (logFile) {
        try {
            fs.appendFileSync(logFile, line + '\n');
        } catch (e) {
            // Report once, then keep logging to the console only.
            if (!fileWarned) {
                fileWarned = true;
                process.stderr.write(`[logger] cannot append to ${logFile}: ${String(e)}\n`);
            }
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => emit('debug', component, msg, data),
        info:  (msg, data) => emit('info',  component, msg, data),
        warn:  (msg, data) => emit('warn',  component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`),
    };
}
