// speech.ts - text-to-speech output (piper subprocess, or console when none is configured)

import { spawn } from 'child_process';
import { createLogger, Logger } from './logger';
import { errorMessage } from './structured_error';

export interface Speaker {
    /** Never rejects; a synthesis failure is logged and swallowed into silence. */
    say(text: string): Promise<void>;
}

/** Quotes removed, newlines flattened: the text goes to piper's stdin as a single utterance. */
export function sanitizeSpeechText(text: string): string {
    return text.replace(/"/g, '').replace(/\r?\n/g, ' ');
}

/** Seconds to stay quiet after speaking so the microphone does not hear the agent. */
export function speechDuration(text: string, charsPerSecond: number, tailSeconds: number): number {
    return text.length / charsPerSecond + tailSeconds;
}

export interface PiperSpeakerOptions {
    binPath: string;
    modelPath: string;
    outputFile: string;
    logger?: Logger;
}

export class PiperSpeaker implements Speaker {
    private readonly log: Logger;

    constructor(private readonly opts: PiperSpeakerOptions) {
        this.log = opts.logger ?? createLogger('speech');
    }

    say(text: string): Promise<void> {
        const clean = sanitizeSpeechText(text);
        if (!clean.trim()) return Promise.resolve();

        const args = ['--model', this.opts.modelPath, '--output_file', this.opts.outputFile];
        return new Promise<void>((resolve) => {
            let done = false;
            const finish = (err?: string): void => {
                if (done) return;
                done = true;
                if (err) this.log.error(`Piper error: ${err}`);
                resolve();
            };

            const child = spawn(this.opts.binPath, args, { stdio: ['pipe', 'ignore', 'ignore'] });
            child.on('error', (e) => finish(errorMessage(e)));
            child.on('close', (code) => {
                if (code === 0) {
                    this.log.debug('Speech synthesized', { output: this.opts.outputFile, chars: clean.length });
                    finish();
                } else {
                    finish(`piper exited with code ${code ?? 'null'}`);
                }
            });
            child.stdin.on('error', (e) => this.log.debug('Piper stdin closed early', { error: errorMessage(e) }));
            child.stdin.end(clean, 'utf-8');
        });
    }
}

export class ConsoleSpeaker implements Speaker {
    constructor(private readonly write: (line: string) => void = (line) => process.stdout.write(line + '\n')) { }

    async say(text: string): Promise<void> {
        this.write(`[SPEAK] ${text}`);
    }
}
