/**
 * Application wiring
 *
 * Builds every collaborator from one validated config and hands back the
 * pieces the CLI (and embedders of the library) drive. Nothing here talks to
 * the network at construction time; the Kernel and Ollama are reached lazily.
 */

import * as path from 'path';
import { loadOrCreateToken } from './auth_token';
import type { DeskpilotConfig } from './config';
import { Embedder, OllamaEmbedder } from './embedder';
import { ExecutionEngine } from './engine';
import { LocalFactStore, loadIdentity } from './fact_store';
import { KernelClient } from './kernel_client';
import { Librarian } from './librarian';
import { ChatModel, FetchLike, OllamaChatClient } from './llm_client';
import { configureLogFile, createLogger, Logger, parseLogLevel, setLogLevel } from './logger';
import { PermissionGate } from './permission_gate';
import { Planner } from './planner';
import { Sentinel, spawnSentinel } from './sentinel';
import { SingleFlightLock } from './single_flight';
import { ConsoleSpeaker, PiperSpeaker, Speaker } from './speech';
import { LoggingStatusIndicator, StatusIndicator } from './status';
import { errorMessage } from './structured_error';
import { Transcriber, VoiceInput } from './voice_input';

export interface AppOverrides {
    cwd?: string;
    fetchImpl?: FetchLike;
    llm?: ChatModel;
    embedder?: Embedder | null;
    sentinel?: Sentinel;
    speaker?: Speaker;
    status?: StatusIndicator;
    transcriber?: Transcriber;
    logger?: Logger;
}

export interface App {
    readonly config: Readonly<DeskpilotConfig>;
    readonly engine: ExecutionEngine;
    readonly planner: Planner;
    readonly kernel: KernelClient;
    readonly sentinel: Sentinel;
    readonly status: StatusIndicator;
    readonly lock: SingleFlightLock;
    readonly facts: LocalFactStore;
    /** null when no transcriber was supplied. */
    readonly voice: VoiceInput | null;
    shutdown(): Promise<void>;
}

function applyLogSettings(config: DeskpilotConfig): void {
    if (parseLogLevel(process.env.DESKPILOT_LOG_LEVEL) === null) setLogLevel(config.system.log_level);
    if (config.system.log_file) configureLogFile(config.system.log_file);
}

export function createApp(config: Readonly<DeskpilotConfig>, overrides: AppOverrides = {}): App {
    applyLogSettings(config);
    const log = overrides.logger ?? createLogger('app');
    const cwd = overrides.cwd ?? process.cwd();
    const net = config.network;

    const token = loadOrCreateToken(path.resolve(cwd, config.paths.token_path), log.child('token'));
    const kernel = new KernelClient({
        host: net.kernel_host,
        port: net.kernel_port,
        authToken: token,
        timeoutMs: net.kernel_timeout_ms,
    });

    const llm = overrides.llm ?? new OllamaChatClient({
        baseUrl: net.ollama_url,
        model: net.ollama_model,
        timeoutMs: net.llm_timeout_ms,
        fetchImpl: overrides.fetchImpl,
    });

    let embedder: Embedder | undefined;
    if (overrides.embedder !== undefined) {
        embedder = overrides.embedder ?? undefined;
    } else if (net.embedding_model) {
        embedder = new OllamaEmbedder({ baseUrl: net.ollama_url, model: net.embedding_model, fetchImpl: overrides.fetchImpl });
    }

    const profilePath = path.resolve(cwd, config.paths.profile_path);
    const facts = new LocalFactStore({ filePath: profilePath });
    const identity = loadIdentity(profilePath);

    const planner = new Planner({
        kernel,
        llm,
        facts,
        identity,
        sandboxRoot: config.security.sandbox_root,
        embedder,
    });

    const gate = new PermissionGate({
        transport: kernel,
        retryLimit: config.vision.retry_limit,
        retryDelayMs: config.vision.retry_delay_ms,
        progressEvery: config.vision.progress_every,
        pendingPollMs: config.vision.pending_poll_ms,
    });

    const sentinel = overrides.sentinel ?? spawnSentinel(config.sentinel);
    const speaker = overrides.speaker ?? (config.speech.piper_bin
        ? new PiperSpeaker({
            binPath: config.speech.piper_bin,
            modelPath: config.speech.piper_model,
            outputFile: path.resolve(cwd, config.speech.output_file),
        })
        : new ConsoleSpeaker());
    const status = overrides.status ?? new LoggingStatusIndicator();
    const lock = new SingleFlightLock();

    const engine = new ExecutionEngine({
        planner,
        gate,
        kernel,
        sentinel,
        librarian: new Librarian(config.security.sandbox_root),
        speaker,
        lock,
        config,
        status,
    });

    const transcriber = overrides.transcriber;
    const voice = transcriber ? new VoiceInput({ engine, lock, transcriber, status }) : null;

    log.info(`${identity.name} ready`, {
        version: config.system.version,
        kernel: `${net.kernel_host}:${net.kernel_port}`,
        model: net.ollama_model,
        sandbox: config.security.sandbox_root,
        voice: voice !== null,
    });

    let stopped: Promise<void> | null = null;
    const shutdown = (): Promise<void> => {
        if (stopped) return stopped;
        const stopping = (async () => {
            log.info('Shutting down');
            sentinel.kill();
            if (transcriber) {
                try {
                    await transcriber.unload();
                } catch (e) {
                    log.warn('Transcriber unload failed', { error: errorMessage(e) });
                }
            }
            status.set('idle');
        })();
        stopped = stopping;
        return stopping;
    };

    return { config, engine, planner, kernel, sentinel, status, lock, facts, voice, shutdown };
}
