/**
 * Shared Configuration
 *
 * Loads config.json (or DESKPILOT_CONFIG), merges it over the defaults one
 * section at a time, applies DESKPILOT_* environment overrides and validates
 * the result. A missing file means defaults; a malformed one is fatal.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { DeskpilotError, ErrorFactory, errorMessage } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Schema                                                                     */
/* -------------------------------------------------------------------------- */

const port = z.number().int().min(1).max(65535);
const nonNegInt = z.number().int().min(0);

export const configSchema = z.object({
    system: z.object({
        version: z.string(),
        environment: z.string(),
        log_level: z.enum(['debug', 'info', 'warn', 'error']),
        log_file: z.string(),
    }),
    network: z.object({
        kernel_host: z.string().min(1),
        kernel_port: port,
        kernel_timeout_ms: z.number().int().positive(),
        ollama_url: z.string().url(),
        ollama_model: z.string().min(1),
        embedding_model: z.string(),
        llm_timeout_ms: z.number().int().positive(),
    }),
    vision: z.object({
        retry_limit: z.number().int().min(1),
        retry_delay_ms: nonNegInt,
        progress_every: z.number().int().min(1),
        pending_poll_ms: nonNegInt,
    }),
    security: z.object({
        sandbox_root: z.string(),
    }),
    delays: z.object({
        action_pacing_ms: nonNegInt,
        enter_pacing_ms: nonNegInt,
    }),
    paths: z.object({
        profile_path: z.string().min(1),
        token_path: z.string().min(1),
    }),
    sentinel: z.object({
        command: z.string(),
        args: z.array(z.string()),
        ready_timeout_ms: z.number().int().positive(),
        call_timeout_ms: z.number().int().positive(),
    }),
    speech: z.object({
        piper_bin: z.string(),
        piper_model: z.string(),
        output_file: z.string().min(1),
        chars_per_second: z.number().positive(),
        tail_seconds: z.number().min(0),
    }),
    recovery: z.object({
        enabled: z.boolean(),
    }),
});

export type DeskpilotConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: DeskpilotConfig = {
    system: {
        version: '0.3.0',
        environment: 'production',
        log_level: 'info',
        log_file: '',
    },
    network: {
        kernel_host: 'localhost',
        kernel_port: 5005,
        kernel_timeout_ms: 2000,
        ollama_url: 'http://localhost:11434',
        ollama_model: 'llama3.1',
        embedding_model: 'nomic-embed-text',
        llm_timeout_ms: 60000,
    },
    vision: {
        retry_limit: 50,
        retry_delay_ms: 100,
        progress_every: 10,
        pending_poll_ms: 500,
    },
    security: {
        sandbox_root: '',
    },
    delays: {
        action_pacing_ms: 100,
        enter_pacing_ms: 1200,
    },
    paths: {
        profile_path: 'data/user_profile.json',
        token_path: 'ghost.token',
    },
    sentinel: {
        command: '',
        args: [],
        ready_timeout_ms: 10000,
        call_timeout_ms: 5000,
    },
    speech: {
        piper_bin: '',
        piper_model: '',
        output_file: 'voice_out.wav',
        chars_per_second: 12,
        tail_seconds: 1.5,
    },
    recovery: {
        enabled: true,
    },
};

/* -------------------------------------------------------------------------- */
/* Loading                                                                    */
/* -------------------------------------------------------------------------- */

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Section-level merge: a section present in the file overrides only the keys it names. */
export function mergeSections(defaults: DeskpilotConfig, file: Record<string, unknown>): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [section, base] of Object.entries(defaults)) {
        const override = file[section];
        out[section] = isRecord(override) ? { ...base, ...override } : { ...base };
    }
    return out;
}

function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return undefined;
    // Leave NaN in place so the schema reports it against the right field.
    return Number(raw);
}

export function applyEnvOverrides(cfg: DeskpilotConfig, env: NodeJS.ProcessEnv): DeskpilotConfig {
    return {
        ...cfg,
        network: {
            ...cfg.network,
            kernel_host: env.DESKPILOT_KERNEL_HOST || cfg.network.kernel_host,
            kernel_port: envInt(env, 'DESKPILOT_KERNEL_PORT') ?? cfg.network.kernel_port,
            ollama_url: env.DESKPILOT_OLLAMA_URL || cfg.network.ollama_url,
            ollama_model: env.DESKPILOT_MODEL || cfg.network.ollama_model,
        },
        vision: {
            ...cfg.vision,
            retry_limit: envInt(env, 'DESKPILOT_RETRY_LIMIT') ?? cfg.vision.retry_limit,
            retry_delay_ms: envInt(env, 'DESKPILOT_RETRY_DELAY_MS') ?? cfg.vision.retry_delay_ms,
        },
        security: {
            ...cfg.security,
            sandbox_root: env.DESKPILOT_SANDBOX_ROOT || cfg.security.sandbox_root,
        },
    };
}

function validate(raw: unknown, source: string): DeskpilotConfig {
    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
        throw new DeskpilotError(ErrorFactory.configInvalid(issues, source));
    }
    return parsed.data;
}

export interface LoadConfigOptions {
    configPath?: string;
    env?: NodeJS.ProcessEnv;
    cwd?: string;
}

export function loadConfig(opts: LoadConfigOptions = {}): Readonly<DeskpilotConfig> {
    const env = opts.env ?? process.env;
    const cwd = opts.cwd ?? process.cwd();
    const configPath = path.resolve(cwd, opts.configPath ?? env.DESKPILOT_CONFIG ?? 'config.json');

    let fileData: Record<string, unknown> = {};
    if (fs.existsSync(configPath)) {
        let parsed: unknown;
        try {
            parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
        } catch (e) {
            throw new DeskpilotError(ErrorFactory.configInvalid([errorMessage(e)], configPath));
        }
        if (!isRecord(parsed)) {
            throw new DeskpilotError(ErrorFactory.configInvalid(['top level must be an object'], configPath));
        }
        fileData = parsed;
    }

    const merged = validate(mergeSections(DEFAULT_CONFIG, fileData), configPath);
    const withEnv = validate(applyEnvOverrides(merged, env), 'environment');

    const sandboxRoot = withEnv.security.sandbox_root
        ? path.resolve(cwd, withEnv.security.sandbox_root)
        : cwd;

    return Object.freeze({
        ...withEnv,
        security: { ...withEnv.security, sandbox_root: sandboxRoot },
    });
}
