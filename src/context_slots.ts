/**
 * Vision / File Context Slots
 *
 * At most one live snapshot of each kind, each stamped with its capture time.
 * A new SCAN or file result replaces the slot wholesale; nothing is merged.
 * Prompt assembly works on a copy taken by snapshot(), never on the live slot.
 */

export interface ContextSlot {
    data: unknown;
    capturedAt: Date;
}

export interface ContextSnapshot {
    vision: ContextSlot | null;
    file: ContextSlot | null;
}

export const VISION_MAX_CHARS = 12000;
export const FILE_MAX_CHARS = 8000;

const VISION_TRUNCATION_MARKER = '\n... [TRUNCATED - UI tree too large]';
const FILE_TRUNCATION_MARKER = '\n... [TRUNCATED - file data too large]';

function copySlot(slot: ContextSlot | null): ContextSlot | null {
    return slot ? { data: structuredClone(slot.data), capturedAt: new Date(slot.capturedAt.getTime()) } : null;
}

export class ContextSlots {
    private vision: ContextSlot | null = null;
    private file: ContextSlot | null = null;

    constructor(private readonly now: () => Date = () => new Date()) { }

    updateVision(data: unknown): void {
        this.vision = { data: structuredClone(data), capturedAt: this.now() };
    }

    clearVision(): void {
        this.vision = null;
    }

    updateFile(data: unknown): void {
        this.file = { data: structuredClone(data), capturedAt: this.now() };
    }

    clearFile(): void {
        this.file = null;
    }

    snapshot(): ContextSnapshot {
        return Object.freeze({ vision: copySlot(this.vision), file: copySlot(this.file) });
    }
}

/* -------------------------------------------------------------------------- */
/* Prompt formatting                                                          */
/* -------------------------------------------------------------------------- */

function boundedJson(data: unknown, maxChars: number, marker: string): string {
    let json: string;
    try {
        json = JSON.stringify(data, null, 2) ?? 'null';
    } catch (e) {
        json = `[unserializable: ${e instanceof Error ? e.message : String(e)}]`;
    }
    return json.length > maxChars ? json.slice(0, maxChars) + marker : json;
}

export function formatVisionContext(slot: ContextSlot | null, maxChars: number = VISION_MAX_CHARS): string {
    if (!slot) {
        return '\n=== VISUAL CONTEXT ===\nNo visual data available. (Use SCAN action to capture current screen state)\n=== END VISUAL CONTEXT ===\n';
    }
    const body = boundedJson(slot.data, maxChars, VISION_TRUNCATION_MARKER);
    return `\n=== VISUAL CONTEXT ===\nLast Scan: ${slot.capturedAt.toISOString()}\nUI Tree Data:\n${body}\n=== END VISUAL CONTEXT ===\n`;
}

/** Empty string when no file operation has run yet. */
export function formatFileContext(slot: ContextSlot | null, maxChars: number = FILE_MAX_CHARS): string {
    if (!slot) return '';
    const body = boundedJson(slot.data, maxChars, FILE_TRUNCATION_MARKER);
    return `\n=== FILE CONTEXT ===\nLast Operation: ${slot.capturedAt.toISOString()}\n${body}\n=== END FILE CONTEXT ===\n`;
}
