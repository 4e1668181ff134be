/**
 * Expected-window inference for focus verification.
 *
 * Launch verbs are exempt: the target window does not exist yet, so there is
 * nothing to verify before the first keystroke.
 */

const LAUNCH_VERBS = ['open', 'launch', 'start', 'run'];

const WINDOW_KEYWORDS: ReadonlyArray<[string, string]> = [
    ['notepad', 'Notepad'],
    ['chrome', 'Chrome'],
    ['browser', 'Chrome'],
    ['firefox', 'Firefox'],
    ['edge', 'Edge'],
    ['explorer', 'File Explorer'],
    ['calculator', 'Calculator'],
    ['terminal', 'Terminal'],
    ['cmd', 'Command Prompt'],
    ['powershell', 'PowerShell'],
    ['vscode', 'Visual Studio Code'],
    ['code', 'Visual Studio Code'],
];

function escapeRegExp(s: string): string {
    return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function mentions(text: string, word: string): boolean {
    return new RegExp(`\\b${escapeRegExp(word)}\\b`).test(text);
}

export function isLaunchIntent(text: string): boolean {
    const lowered = text.trim().toLowerCase();
    return LAUNCH_VERBS.some((v) => lowered === v || lowered.startsWith(v + ' '));
}

export function inferExpectedWindow(text: string): string | null {
    const lowered = text.trim().toLowerCase();
    if (!lowered || isLaunchIntent(lowered)) return null;

    for (const [keyword, window] of WINDOW_KEYWORDS) {
        if (mentions(lowered, keyword)) return window;
    }
    if (mentions(lowered, 'desktop') || mentions(lowered, 'start')) return 'Desktop';
    return null;
}
