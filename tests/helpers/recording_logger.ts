import type { Logger } from '../../src/logger';

export interface LogEntry {
    level: 'debug' | 'info' | 'warn' | 'error';
    msg: string;
    data?: Record<string, unknown>;
}

/** In-memory logger so tests can assert on what a component reported. */
export function createRecordingLogger(entries: LogEntry[] = []): Logger & { entries: LogEntry[] } {
    const record = (level: LogEntry['level']) => (msg: string, data?: Record<string, unknown>): void => {
        entries.push({ level, msg, data });
    };
    return {
        entries,
        debug: record('debug'),
        info: record('info'),
        warn: record('warn'),
        error: record('error'),
        child: () => createRecordingLogger(entries),
    };
}
