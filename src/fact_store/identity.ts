// src/fact_store/identity.ts

import { createLogger, Logger } from "../logger";
import { readProfileDocument } from "./store";
import { Identity, identitySchema } from "./types";

export const DEFAULT_IDENTITY: Identity = {
    name: "Ghost",
    voice_style: "Concise, Professional",
    directives: ["You are a local desktop agent acting on the user's behalf."],
    forbidden_behaviors: ["Never stay silent when the user speaks to you."],
    backstory: "You are Ghost, a desktop agent running locally on the user's machine.",
};

/**
 * Persona from the profile's `identity` block. Missing fields fall back to
 * the defaults field by field; a missing or invalid block yields the defaults.
 */
export function loadIdentity(profilePath: string, logger?: Logger): Identity {
    const log = logger ?? createLogger("identity");
    const block = readProfileDocument(profilePath, log).extras.identity;
    if (block === undefined) {
        log.info("No identity block in profile, using defaults");
        return DEFAULT_IDENTITY;
    }

    const parsed = identitySchema.partial().safeParse(block);
    if (!parsed.success) {
        log.warn("Identity block invalid, using defaults", { issues: parsed.error.issues.length });
        return DEFAULT_IDENTITY;
    }

    const identity: Identity = { ...DEFAULT_IDENTITY, ...parsed.data };
    log.info(`Identity loaded: ${identity.name} (${identity.voice_style})`);
    return identity;
}
