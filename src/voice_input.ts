/**
 * Voice Input
 *
 * Second producer into the engine, next to typed input. A capture that
 * arrives while an utterance is in flight is dropped, not queued: otherwise
 * the agent hears its own speech and acts on it again.
 */

import * as fs from 'fs';
import type { ExecutionReport } from './engine';
import { createLogger, Logger } from './logger';
import type { SingleFlightLock } from './single_flight';
import type { StatusIndicator } from './status';
import { errorMessage } from './structured_error';

export interface Transcriber {
    transcribe(audioPath: string): Promise<string>;
    unload(): Promise<void>;
}

export interface UtteranceExecutor {
    execute(userInput: string): Promise<ExecutionReport>;
}

export type VoiceOutcome =
    | { kind: 'rejected_busy' }
    | { kind: 'empty' }
    | { kind: 'error'; reason: string }
    | { kind: 'executed'; text: string; report: ExecutionReport };

export interface VoiceInputOptions {
    engine: UtteranceExecutor;
    lock: SingleFlightLock;
    transcriber: Transcriber;
    status?: StatusIndicator;
    logger?: Logger;
}

export class VoiceInput {
    private readonly log: Logger;

    constructor(private readonly opts: VoiceInputOptions) {
        this.log = opts.logger ?? createLogger('voice');
    }

    async handleAudio(audioPath: string): Promise<VoiceOutcome> {
        if (this.opts.lock.isLocked()) {
            this.log.warn('Brain busy - Echo Rejected', { holder: this.opts.lock.holder() });
            this.discard(audioPath);
            return { kind: 'rejected_busy' };
        }

        let text: string;
        this.opts.status?.set('busy');
        try {
            this.log.info('Transcribing...');
            text = (await this.opts.transcriber.transcribe(audioPath)).trim();
        } catch (e) {
            const reason = errorMessage(e);
            this.log.error(`Voice processing error: ${reason}`);
            return { kind: 'error', reason };
        } finally {
            this.discard(audioPath);
            // A typed utterance may have taken the lock while we were transcribing.
            if (!this.opts.lock.isLocked()) this.opts.status?.set('idle');
        }

        if (!text) {
            this.log.info('No speech detected');
            return { kind: 'empty' };
        }

        this.log.info(`Heard: "${text}"`);
        const report = await this.opts.engine.execute(text);
        return { kind: 'executed', text, report };
    }

    private discard(audioPath: string): void {
        try {
            fs.rmSync(audioPath, { force: true });
        } catch (e) {
            this.log.debug('Could not remove audio capture', { path: audioPath, error: errorMessage(e) });
        }
    }
}
