// src/fact_store/types.ts

import { z } from "zod";

export const factSchema = z.object({
    value: z.string(),
    context: z.string(),
    timestamp: z.string(),
    updated_count: z.number().int().min(0),
});

export const historyEntrySchema = z.object({
    key: z.string(),
    value: z.string(),
    context: z.string(),
    timestamp: z.string(),
});

export const identitySchema = z.object({
    name: z.string().min(1),
    voice_style: z.string(),
    directives: z.array(z.string()),
    forbidden_behaviors: z.array(z.string()),
    backstory: z.string(),
});

export type Fact = z.infer<typeof factSchema>;
export type HistoryEntry = z.infer<typeof historyEntrySchema>;
export type Identity = z.infer<typeof identitySchema>;

/**
 * On-disk profile: `{ facts, history, ...other }`. Keys the store does not
 * own (identity, preferences) are carried in `extras` and written back untouched.
 */
export interface ProfileDocument {
    facts: Record<string, Fact>;
    history: HistoryEntry[];
    extras: Record<string, unknown>;
}

export type RememberStatus = "stored" | "unchanged" | "failed";

export interface RememberResult {
    status: RememberStatus;
    key: string;
    fact?: Fact;
    error?: string;
}
