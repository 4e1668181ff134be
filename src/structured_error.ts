/**
 * Structured Errors
 *
 * Machine-readable failures shared by every component. Expected outcomes
 * (LLM down, permission denied, validation failure) travel as result unions;
 * DeskpilotError is only thrown where a failure has to cross a promise
 * rejection or a constructor.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Plan / action issues
    | 'VALIDATION_FAILED'
    | 'UNSAFE_PATH'

    // Language-model service
    | 'LLM_UNAVAILABLE'
    | 'LLM_BAD_OUTPUT'

    // Kernel (permission/memory service)
    | 'KERNEL_UNAVAILABLE'
    | 'PERMISSION_DENIED'
    | 'FOCUS_MISMATCH'
    | 'FOCUS_TIMEOUT'

    // Execution
    | 'BUSY'
    | 'SENTINEL_ERROR'
    | 'ACTION_FAILED'

    // Infrastructure
    | 'CONFIG_INVALID'
    | 'FILESYSTEM_ERROR';

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Error Builders                                                             */
/* -------------------------------------------------------------------------- */

export function createStructuredError(
    code: ErrorCode,
    message: string,
    context: Record<string, unknown> = {}
): StructuredError {
    return {
        code,
        message,
        severity: getSeverity(code),
        context,
        timestamp: new Date().toISOString()
    };
}

function getSeverity(code: ErrorCode): Severity {
    const fatalCodes: ErrorCode[] = [
        'CONFIG_INVALID'
    ];

    // recoverable: the caller falls back or retries
    const warningCodes: ErrorCode[] = [
        'VALIDATION_FAILED',
        'LLM_BAD_OUTPUT',
        'BUSY',
        'KERNEL_UNAVAILABLE',
        'FOCUS_MISMATCH'
    ];

    if (fatalCodes.includes(code)) return 'FATAL';
    if (warningCodes.includes(code)) return 'WARNING';
    return 'ERROR';
}

export class DeskpilotError extends Error {
    readonly detail: StructuredError;

    constructor(detail: StructuredError) {
        super(detail.message);
        this.name = 'DeskpilotError';
        this.detail = detail;
    }

    get code(): ErrorCode {
        return this.detail.code;
    }
}

/** Narrow a caught value to a printable message. */
export function errorMessage(e: unknown): string {
    if (e instanceof Error) return e.message;
    return String(e);
}

/* -------------------------------------------------------------------------- */
/* Error Factory Methods                                                      */
/* -------------------------------------------------------------------------- */

export class ErrorFactory {
    static validationFailed(reason: string, source: string): StructuredError {
        return createStructuredError('VALIDATION_FAILED', reason, { source });
    }

    static unsafePath(p: string): StructuredError {
        return createStructuredError('UNSAFE_PATH', `Path escapes sandbox: ${p}`, { path: p });
    }

    static llmUnavailable(detail: string): StructuredError {
        return createStructuredError('LLM_UNAVAILABLE', 'LLM unavailable', { detail });
    }

    static llmBadOutput(chars: number): StructuredError {
        return createStructuredError('LLM_BAD_OUTPUT', 'Model returned no usable plan', { chars });
    }

    static kernelUnavailable(actionType: string): StructuredError {
        return createStructuredError('KERNEL_UNAVAILABLE', 'Kernel unavailable', { action: actionType });
    }

    static permissionDenied(reason: string, actionType: string): StructuredError {
        return createStructuredError('PERMISSION_DENIED', reason, { action: actionType });
    }

    static focusMismatch(expectedWindow: string, attempts: number, elapsedMs: number): StructuredError {
        return createStructuredError(
            'FOCUS_MISMATCH',
            `'${expectedWindow}' is not focused yet`,
            { expected_window: expectedWindow, attempts, elapsed_ms: elapsedMs }
        );
    }

    static focusTimeout(expectedWindow: string, attempts: number): StructuredError {
        return createStructuredError(
            'FOCUS_TIMEOUT',
            `Focus verification timeout: '${expectedWindow}' not detected`,
            { expected_window: expectedWindow, attempts }
        );
    }

    static busy(holder: string | null): StructuredError {
        return createStructuredError('BUSY', 'Another utterance is executing', { holder });
    }

    static sentinel(message: string, cmd?: string): StructuredError {
        return createStructuredError('SENTINEL_ERROR', message, cmd ? { cmd } : {});
    }

    static actionFailed(actionType: string, index: number, cause: string): StructuredError {
        return createStructuredError(
            'ACTION_FAILED',
            `${actionType} (step ${index}) failed: ${cause}`,
            { action: actionType, index, cause }
        );
    }

    static configInvalid(issues: string[], source: string): StructuredError {
        return createStructuredError(
            'CONFIG_INVALID',
            `Invalid configuration in ${source}: ${issues.join('; ')}`,
            { source, issues }
        );
    }

    static filesystem(op: string, p: string, cause: string): StructuredError {
        return createStructuredError('FILESYSTEM_ERROR', `${op} failed for ${p}: ${cause}`, { op, path: p });
    }
}
