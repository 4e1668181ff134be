/**
 * Action vocabulary reference embedded in every planning prompt.
 * Must stay in step with ACTION_KINDS and LIMITS in action_schema.
 */

import { LIMITS, SAFE_KEYS } from '../action_schema';

export function getActionVocabulary(): string {
    const keys = [...SAFE_KEYS].join(', ');
    return `=== ACTION VOCABULARY (WHITELIST) ===
1. KEY - Press a key or combo.
   {"type": "KEY", "key": "enter"}   combos: {"type": "KEY", "key": "win+r"}
   Allowed keys: ${keys}, or any single letter/digit inside a combo.

2. TYPE - Type a text string (max ${LIMITS.TYPE_TEXT_MAX} chars).
   {"type": "TYPE", "text": "exact text to type"}

3. WAIT - Pause (${LIMITS.WAIT_MIN}-${LIMITS.WAIT_MAX} seconds).
   {"type": "WAIT", "duration": 0.5}

4. CLICK - Click screen coordinates (${LIMITS.CLICK_MIN}-${LIMITS.CLICK_MAX}). Only with precise coordinates from VISUAL CONTEXT.
   {"type": "CLICK", "x": 500, "y": 300}

5. SPEAK - Talk to the user (max ${LIMITS.SPEAK_TEXT_MAX} chars).
   {"type": "SPEAK", "text": "your response here"}

6. MEMORIZE - Remember a fact about the user (key max ${LIMITS.MEMORIZE_KEY_MAX}, value max ${LIMITS.MEMORIZE_VALUE_MAX} chars).
   {"type": "MEMORIZE", "key": "has_resume", "value": "False"}

7. SCAN - Capture the UI tree of the screen. Takes no fields. Heavy; use only when visual grounding is needed.
   {"type": "SCAN"}

8. LIST - List a directory.          {"type": "LIST", "path": "notes"}
9. READ - Read a file (first 5000 chars). {"type": "READ", "path": "notes/todo.txt"}
10. SEARCH - Find files by glob.     {"type": "SEARCH", "directory": "notes", "pattern": "**/*.txt"}
11. WRITE - Create or overwrite.     {"type": "WRITE", "path": "notes/todo.txt", "content": "Buy milk"}
12. EDIT - Replace exact text.       {"type": "EDIT", "path": "notes/todo.txt", "find": "milk", "replace": "bread"}

File paths MUST be relative to the working directory. Absolute paths and ".." are rejected.`;
}
