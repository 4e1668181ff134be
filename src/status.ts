// status.ts - the agent's one-glance state (idle / listening pulse / busy)

import { createLogger, Logger } from './logger';

export type StatusState = 'idle' | 'pulse' | 'busy';

export interface StatusIndicator {
    set(state: StatusState): void;
    current(): StatusState;
}

export function isStatusState(v: string): v is StatusState {
    return v === 'idle' || v === 'pulse' || v === 'busy';
}

/** Headless indicator: records the state and logs transitions. */
export class LoggingStatusIndicator implements StatusIndicator {
    private state: StatusState = 'idle';
    private readonly log: Logger;

    constructor(logger?: Logger) {
        this.log = logger ?? createLogger('status');
    }

    set(state: StatusState): void {
        if (state === this.state) return;
        this.log.debug(`Status ${this.state} -> ${state}`);
        this.state = state;
    }

    current(): StatusState {
        return this.state;
    }
}
