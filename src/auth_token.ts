/**
 * Kernel auth token: a 64-hex shared secret kept beside the app with 0600
 * permissions. Created on first run; an unreadable or malformed file is
 * replaced.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import { errnoCode, writeFileAtomic } from './fact_store/atomic_write';
import { createLogger, Logger } from './logger';
import { errorMessage } from './structured_error';

const TOKEN_RE = /^[0-9a-f]{64}$/i;

export function isValidToken(token: string): boolean {
    return TOKEN_RE.test(token);
}

export function loadOrCreateToken(tokenPath: string, logger?: Logger): string {
    const log = logger ?? createLogger('auth-token');

    try {
        const existing = fs.readFileSync(tokenPath, 'utf-8').trim();
        if (isValidToken(existing)) return existing;
        log.warn('Token file malformed, regenerating', { file: tokenPath });
    } catch (e) {
        if (errnoCode(e) !== 'ENOENT') {
            log.warn('Token file unreadable, regenerating', { file: tokenPath, error: errorMessage(e) });
        }
    }

    const token = crypto.randomBytes(32).toString('hex');
    for (const w of writeFileAtomic(tokenPath, token, 0o600)) log.warn(w);
    log.info('Generated new kernel auth token', { file: tokenPath });
    return token;
}
