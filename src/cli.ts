#!/usr/bin/env node
/**
 * CLI Entry Point for deskpilot
 *
 * Interactive REPL: every line is an utterance for the engine, except the
 * reserved commands, which are handled here and never reach it.
 *
 *   exit           shut down and quit
 *   scan           print focus events the Sentinel reported since last time
 *   debug:<state>  force the status indicator (idle | pulse | busy)
 */

import * as readline from 'readline';
import { createApp } from './app';
import { loadConfig } from './config';
import type { ExecutionReport } from './engine';
import type { FocusEvent } from './sentinel';
import { isStatusState, StatusIndicator } from './status';
import { DeskpilotError, errorMessage } from './structured_error';
import type { UtteranceExecutor } from './voice_input';

export interface CliSession {
    engine: UtteranceExecutor;
    sentinel: { drainFocusEvents(): FocusEvent[] };
    status: StatusIndicator;
    shutdown(): Promise<void>;
}

export type LineResult = 'continue' | 'exit';

export function formatReport(report: ExecutionReport): string {
    const head = `[${report.traceId}] ${report.status}`;
    const parts = [head];
    if (report.intent) parts.push(`intent=${report.intent}`);
    parts.push(`executed=${report.executed}`);
    if (report.reason) parts.push(`reason=${report.reason}`);
    if (report.recovery) parts.push(`recovery=${report.recovery.status}`);
    return parts.join(' | ');
}

class DeskpilotCLI {
    constructor(
        private readonly session: CliSession,
        private readonly print: (line: string) => void = (line) => console.log(line)
    ) { }

    async handleLine(raw: string): Promise<LineResult> {
        const line = raw.trim();
        if (!line) return 'continue';
        const lowered = line.toLowerCase();

        if (lowered === 'exit') {
            await this.session.shutdown();
            return 'exit';
        }

        if (lowered === 'scan') {
            const events = this.session.sentinel.drainFocusEvents();
            if (events.length === 0) {
                this.print('(No new UI elements detected)');
            } else {
                for (const e of events) this.print(`Found: ${e.name}`);
            }
            return 'continue';
        }

        if (lowered.startsWith('debug:')) {
            const state = lowered.slice('debug:'.length);
            if (isStatusState(state)) {
                this.session.status.set(state);
                this.print(`Status: ${state}`);
            } else {
                this.print(`Unknown debug command: ${state}`);
            }
            return 'continue';
        }

        const report = await this.session.engine.execute(line);
        this.print(formatReport(report));
        return 'continue';
    }

    async repl(input: NodeJS.ReadableStream = process.stdin): Promise<void> {
        const rl = readline.createInterface({ input, output: process.stdout, terminal: false });
        rl.on('SIGINT', () => rl.close());
        process.once('SIGINT', () => rl.close());

        this.print("deskpilot ready. Type a command, 'scan', or 'exit'.");
        for await (const line of rl) {
            if ((await this.handleLine(line)) === 'exit') break;
        }
        rl.close();
        await this.session.shutdown();
    }
}

function configPathFromArgs(args: string[]): string | undefined {
    const i = args.indexOf('--config');
    return i >= 0 ? args[i + 1] : undefined;
}

async function main(argv: string[]): Promise<void> {
    const args = argv.slice(2);
    if (args.includes('--help') || args.includes('help')) {
        console.log('Usage: deskpilot [--config <path>]');
        return;
    }

    const config = loadConfig({ configPath: configPathFromArgs(args) });
    const app = createApp(config);
    if (!(await app.sentinel.waitUntilReady())) {
        console.error('Sentinel did not become ready; physical actions will fail.');
    }
    await new DeskpilotCLI(app).repl();
}

// Run CLI
if (require.main === module) {
    main(process.argv).catch((err: unknown) => {
        if (err instanceof DeskpilotError) {
            console.error(`Fatal error [${err.code}]: ${err.message}`);
        } else {
            console.error('Fatal error:', errorMessage(err));
        }
        process.exit(1);
    });
}

export { DeskpilotCLI };
