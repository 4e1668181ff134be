/**
 * Context blocks injected into the planning prompt: long-term memories
 * returned by the Kernel and the local user-fact profile.
 */

import type { Fact } from '../fact_store';
import type { MemoryArtifact } from '../kernel_client';

export const MEMORY_MAX_CHARS = 2000;

const UNSAFE_MEMORY_PATTERNS = [
    'eval(', 'exec(', 'subprocess', 'os.system',
    '__import__', 'compile(', 'globals(', 'locals(',
    'rm -rf', 'del /', 'format c:', 'shutdown',
];

/** Poisoned or oversized memories never reach the prompt. */
export function isMemorySafe(content: string): boolean {
    if (!content || content.length > MEMORY_MAX_CHARS) return false;
    const lower = content.toLowerCase();
    return !UNSAFE_MEMORY_PATTERNS.some((p) => lower.includes(p));
}

export function formatMemories(artifacts: MemoryArtifact[]): string {
    const safe = artifacts.filter((a) => isMemorySafe(a.content));
    if (safe.length === 0) return '';

    const lines = ['\n=== RELEVANT MEMORIES ==='];
    safe.forEach((a, idx) => {
        lines.push(`\nMemory ${idx + 1}: [${a.timestamp || 'Unknown time'}] ${a.classification}`);
        if (a.summary) lines.push(`  Summary: ${a.summary}`);
        lines.push(`  Content: ${a.content}`);
    });
    lines.push('\n=== END MEMORIES ===\n');
    return lines.join('\n');
}

export function formatUserFacts(facts: Record<string, Fact>): string {
    const entries = Object.entries(facts);
    if (entries.length === 0) return '';

    let out = '\n=== USER FACTS (Local Profile) ===\n';
    for (const [key, fact] of entries) {
        out += `- ${key}: ${fact.value}`;
        if (fact.context) out += ` (context: ${fact.context})`;
        out += '\n';
    }
    out += '=== END USER FACTS ===\n';
    return out;
}
