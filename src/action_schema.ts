/**
 * Action Schema & Validator
 *
 * The closed vocabulary of actions a plan may contain and the per-kind bounds
 * each one must satisfy. Every plan source (fresh generation, reflex cache,
 * recovery) goes through the same checks. Pure apart from the sandbox
 * lookups made for file paths.
 */

import { isSafePath } from './path_guard';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export const ACTION_KINDS = [
    'KEY', 'TYPE', 'CLICK', 'WAIT', 'SPEAK', 'MEMORIZE',
    'SCAN', 'LIST', 'READ', 'SEARCH', 'WRITE', 'EDIT',
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

export interface KeyAction { type: 'KEY'; key: string }
export interface TypeAction { type: 'TYPE'; text: string }
export interface ClickAction { type: 'CLICK'; x: number; y: number }
export interface WaitAction { type: 'WAIT'; duration: number }
export interface SpeakAction { type: 'SPEAK'; text: string }
export interface MemorizeAction { type: 'MEMORIZE'; key: string; value: string }
export interface ScanAction { type: 'SCAN' }
export interface ListAction { type: 'LIST'; path: string }
export interface ReadAction { type: 'READ'; path: string }
export interface SearchAction { type: 'SEARCH'; directory: string; pattern: string }
export interface WriteAction { type: 'WRITE'; path: string; content: string }
export interface EditAction { type: 'EDIT'; path: string; find: string; replace: string }

export type Action =
    | KeyAction | TypeAction | ClickAction | WaitAction | SpeakAction | MemorizeAction
    | ScanAction | ListAction | ReadAction | SearchAction | WriteAction | EditAction;

/** Actions that leave the process (keyboard, mouse, screen, files, audio). */
export type PhysicalAction = Exclude<Action, MemorizeAction>;

export type FileAction = ListAction | ReadAction | SearchAction | WriteAction | EditAction;

export const PHYSICAL_KINDS: ReadonlyArray<PhysicalAction['type']> =
    ACTION_KINDS.filter((k): k is PhysicalAction['type'] => k !== 'MEMORIZE');

export interface Plan {
    intent: string;
    plan: string[];
    actions: Action[];
}

/* -------------------------------------------------------------------------- */
/* Bounds                                                                     */
/* -------------------------------------------------------------------------- */

export const LIMITS = {
    TYPE_TEXT_MAX: 500,
    SPEAK_TEXT_MAX: 1000,
    CLICK_MIN: 0,
    CLICK_MAX: 10000,
    WAIT_MIN: 0,
    WAIT_MAX: 30,
    MEMORIZE_KEY_MAX: 100,
    MEMORIZE_VALUE_MAX: 500,
} as const;

export const SAFE_KEYS: ReadonlySet<string> = new Set([
    'gui', 'enter', 'escape', 'tab', 'backspace', 'delete',
    'up', 'down', 'left', 'right', 'home', 'end', 'pageup', 'pagedown',
    'space', 'ctrl', 'alt', 'shift', 'win', 'windows', 'return',
]);

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

type Check<T> = { ok: true; value: T } | { ok: false; reason: string };

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function toActionKind(raw: string): ActionKind | undefined {
    const upper = raw.toUpperCase();
    return ACTION_KINDS.find((k) => k === upper);
}

export function isKeyComboSafe(combo: string): boolean {
    const parts = combo.toLowerCase().split('+').map((p) => p.trim());
    if (parts.length === 1) return SAFE_KEYS.has(parts[0]);
    // Single characters only count inside a combo (ctrl+c, win+r).
    return parts.every((p) => SAFE_KEYS.has(p) || /^[a-z0-9]$/.test(p));
}

/** Length in code points, so astral characters count once. */
export function charCount(text: string): number {
    return [...text].length;
}

function nonEmptyString(v: unknown): v is string {
    return typeof v === 'string' && v.trim().length > 0;
}

function finiteNumber(v: unknown): v is number {
    return typeof v === 'number' && Number.isFinite(v);
}

function safePattern(pattern: string): boolean {
    if (pattern.startsWith('/') || pattern.startsWith('\\') || /^[a-zA-Z]:/.test(pattern)) return false;
    return !pattern.split(/[\\/]/).includes('..');
}

export function assertNever(x: never): never {
    throw new Error(`Unhandled action kind: ${String(x)}`);
}

/* -------------------------------------------------------------------------- */
/* Per-kind rules                                                             */
/* -------------------------------------------------------------------------- */

function checkFields(kind: ActionKind, raw: Record<string, unknown>, root: string): Check<Action> {
    switch (kind) {
        case 'KEY': {
            const key = raw.key;
            if (!nonEmptyString(key)) return { ok: false, reason: 'KEY requires a non-empty key' };
            if (!isKeyComboSafe(key)) return { ok: false, reason: `KEY '${key}' is not an allowed key` };
            return { ok: true, value: { type: 'KEY', key: key.toLowerCase() } };
        }
        case 'TYPE': {
            const text = raw.text;
            if (typeof text !== 'string') return { ok: false, reason: 'TYPE text must be a string' };
            if (charCount(text) > LIMITS.TYPE_TEXT_MAX) {
                return { ok: false, reason: `TYPE text exceeds ${LIMITS.TYPE_TEXT_MAX} characters` };
            }
            return { ok: true, value: { type: 'TYPE', text } };
        }
        case 'CLICK': {
            const { x, y } = raw;
            if (!finiteNumber(x) || !finiteNumber(y)) return { ok: false, reason: 'CLICK x and y must be numbers' };
            if (x < LIMITS.CLICK_MIN || x > LIMITS.CLICK_MAX || y < LIMITS.CLICK_MIN || y > LIMITS.CLICK_MAX) {
                return { ok: false, reason: `CLICK coordinates must be within [${LIMITS.CLICK_MIN}, ${LIMITS.CLICK_MAX}]` };
            }
            return { ok: true, value: { type: 'CLICK', x, y } };
        }
        case 'WAIT': {
            const duration = raw.duration;
            if (!finiteNumber(duration)) return { ok: false, reason: 'WAIT duration must be a number' };
            if (duration < LIMITS.WAIT_MIN || duration > LIMITS.WAIT_MAX) {
                return { ok: false, reason: `WAIT duration must be within [${LIMITS.WAIT_MIN}, ${LIMITS.WAIT_MAX}] seconds` };
            }
            return { ok: true, value: { type: 'WAIT', duration } };
        }
        case 'SPEAK': {
            const text = raw.text;
            if (!nonEmptyString(text)) return { ok: false, reason: 'SPEAK requires non-empty text' };
            if (charCount(text) > LIMITS.SPEAK_TEXT_MAX) {
                return { ok: false, reason: `SPEAK text exceeds ${LIMITS.SPEAK_TEXT_MAX} characters` };
            }
            return { ok: true, value: { type: 'SPEAK', text } };
        }
        case 'MEMORIZE': {
            const { key, value } = raw;
            if (!nonEmptyString(key)) return { ok: false, reason: 'MEMORIZE requires a non-empty key' };
            if (charCount(key) > LIMITS.MEMORIZE_KEY_MAX) {
                return { ok: false, reason: `MEMORIZE key exceeds ${LIMITS.MEMORIZE_KEY_MAX} characters` };
            }
            if (typeof value !== 'string') return { ok: false, reason: 'MEMORIZE value must be a string' };
            if (charCount(value) > LIMITS.MEMORIZE_VALUE_MAX) {
                return { ok: false, reason: `MEMORIZE value exceeds ${LIMITS.MEMORIZE_VALUE_MAX} characters` };
            }
            return { ok: true, value: { type: 'MEMORIZE', key, value } };
        }
        case 'SCAN': {
            const extra = Object.keys(raw).filter((k) => k !== 'type');
            if (extra.length > 0) return { ok: false, reason: `SCAN takes no fields (got ${extra.join(', ')})` };
            return { ok: true, value: { type: 'SCAN' } };
        }
        case 'LIST':
        case 'READ': {
            const p = raw.path;
            if (!nonEmptyString(p)) return { ok: false, reason: `${kind} requires a non-empty path` };
            if (!isSafePath(p, root)) return { ok: false, reason: `${kind} path '${p}' is outside the sandbox` };
            return { ok: true, value: kind === 'LIST' ? { type: 'LIST', path: p } : { type: 'READ', path: p } };
        }
        case 'SEARCH': {
            const { directory, pattern } = raw;
            if (!nonEmptyString(directory)) return { ok: false, reason: 'SEARCH requires a non-empty directory' };
            if (!isSafePath(directory, root)) {
                return { ok: false, reason: `SEARCH directory '${directory}' is outside the sandbox` };
            }
            if (!nonEmptyString(pattern)) return { ok: false, reason: 'SEARCH requires a non-empty pattern' };
            if (!safePattern(pattern)) return { ok: false, reason: `SEARCH pattern '${pattern}' escapes the directory` };
            return { ok: true, value: { type: 'SEARCH', directory, pattern } };
        }
        case 'WRITE': {
            const { path: p, content } = raw;
            if (!nonEmptyString(p)) return { ok: false, reason: 'WRITE requires a non-empty path' };
            if (!isSafePath(p, root)) return { ok: false, reason: `WRITE path '${p}' is outside the sandbox` };
            if (typeof content !== 'string') return { ok: false, reason: 'WRITE content must be a string' };
            return { ok: true, value: { type: 'WRITE', path: p, content } };
        }
        case 'EDIT': {
            const { path: p, find, replace } = raw;
            if (!nonEmptyString(p)) return { ok: false, reason: 'EDIT requires a non-empty path' };
            if (!isSafePath(p, root)) return { ok: false, reason: `EDIT path '${p}' is outside the sandbox` };
            if (typeof find !== 'string' || find.length === 0) return { ok: false, reason: 'EDIT requires non-empty find text' };
            if (typeof replace !== 'string') return { ok: false, reason: 'EDIT replace must be a string' };
            return { ok: true, value: { type: 'EDIT', path: p, find, replace } };
        }
        default:
            return assertNever(kind);
    }
}

/* -------------------------------------------------------------------------- */
/* Public API                                                                 */
/* -------------------------------------------------------------------------- */

export type ParseActionsResult =
    | { ok: true; actions: Action[] }
    | { ok: false; reason: string };

/**
 * Whole-list validation: the first violation rejects the list.
 * On success the actions come back typed, with kinds uppercased and keys lowercased.
 */
export function parseActions(raw: unknown, sandboxRoot: string = process.cwd()): ParseActionsResult {
    if (!Array.isArray(raw)) return { ok: false, reason: 'actions must be a list' };

    const actions: Action[] = [];
    for (let i = 0; i < raw.length; i++) {
        const item: unknown = raw[i];
        if (!isRecord(item)) return { ok: false, reason: `Action ${i}: must be an object` };

        const type = item.type;
        if (typeof type !== 'string' || type.trim() === '') {
            return { ok: false, reason: `Action ${i}: missing 'type'` };
        }
        const kind = toActionKind(type.trim());
        if (!kind) return { ok: false, reason: `Action ${i}: type '${type}' is not allowed` };

        const checked = checkFields(kind, item, sandboxRoot);
        if (!checked.ok) return { ok: false, reason: `Action ${i}: ${checked.reason}` };
        actions.push(checked.value);
    }
    return { ok: true, actions };
}

/** Failure reason, or null when every action is acceptable. */
export function validateActions(actions: unknown, sandboxRoot: string = process.cwd()): string | null {
    const res = parseActions(actions, sandboxRoot);
    return res.ok ? null : res.reason;
}

export function isPhysical(action: Action): action is PhysicalAction {
    return action.type !== 'MEMORIZE';
}

/** Wire shape used in permission requests: kind plus every other field as payload. */
export function toWireAction(action: Action): { type: ActionKind; payload: Record<string, unknown> } {
    const { type, ...payload } = action;
    return { type, payload };
}

/** One-line description for logs and console output. */
export function describeAction(action: Action): string {
    switch (action.type) {
        case 'KEY': return `KEY ${action.key}`;
        case 'TYPE': return `TYPE "${action.text.length > 40 ? action.text.slice(0, 40) + '...' : action.text}"`;
        case 'CLICK': return `CLICK (${action.x}, ${action.y})`;
        case 'WAIT': return `WAIT ${action.duration}s`;
        case 'SPEAK': return `SPEAK "${action.text.length > 40 ? action.text.slice(0, 40) + '...' : action.text}"`;
        case 'MEMORIZE': return `MEMORIZE ${action.key}`;
        case 'SCAN': return 'SCAN';
        case 'LIST': return `LIST ${action.path}`;
        case 'READ': return `READ ${action.path}`;
        case 'SEARCH': return `SEARCH ${action.directory} ${action.pattern}`;
        case 'WRITE': return `WRITE ${action.path}`;
        case 'EDIT': return `EDIT ${action.path}`;
        default: return assertNever(action);
    }
}
