/**
 * Planning prompt: persona, directives, assembled context and the action
 * vocabulary, ending with the user's command.
 */

import type { Identity } from '../fact_store';
import { getActionVocabulary } from './vocabulary';

export interface PlannerPromptInput {
    identity: Identity;
    contextBlock: string;
    userInput: string;
    now: Date;
}

function bulletBlock(title: string, items: string[]): string {
    if (items.length === 0) return '';
    return `\n=== ${title} ===\n${items.map((i) => `- ${i}`).join('\n')}\n`;
}

export function formatPromptDate(d: Date): string {
    const date = d.toLocaleDateString('en-US', { weekday: 'long', year: 'numeric', month: 'long', day: 'numeric' });
    const time = d.toLocaleTimeString('en-US', { hour: '2-digit', minute: '2-digit' });
    return `${date} at ${time}`;
}

export function getPlannerPrompt(input: PlannerPromptInput): string {
    const { identity, contextBlock, userInput, now } = input;

    return `CURRENT DATE/TIME: ${formatPromptDate(now)}

=== IDENTITY ===
You are ${identity.name}, a desktop agent running locally on the user's machine. You can operate the keyboard and mouse, read and write files in the working directory, and talk to the user.

${identity.backstory}

=== VOICE STYLE ===
${identity.voice_style}
${bulletBlock('DIRECTIVES', identity.directives)}${bulletBlock('FORBIDDEN BEHAVIORS', identity.forbidden_behaviors)}
=== CONTEXT FIRST ===
Read MEMORY & CONTEXT before planning. Never invent file locations or credentials. If a critical detail is missing, ask with a SPEAK action instead of guessing.
If the user says they do NOT have something, MEMORIZE that (e.g. {"type": "MEMORIZE", "key": "has_resume", "value": "False"}) and stop asking for it.

=== MEMORY & CONTEXT ===
${contextBlock || 'No relevant memories found for this request.'}

=== MODES ===
- CHAT: greetings, questions, status. Reply with a single SPEAK.
- OPERATOR: explicit commands ("Open Notepad", "Press Enter"). Execute with KEY/TYPE/WAIT.
  Apps: KEY "gui" -> WAIT 0.5 -> TYPE "app name" -> KEY "enter".
  Websites: KEY "win+r" -> WAIT 0.5 -> TYPE "chrome example.com" -> KEY "enter". Never use "gui" for URLs.
- PLANNER: vague multi-step goals. SCAN if you need to see the screen, check memory, then ask what is missing.

=== RESPONSE FORMAT (STRICT JSON) ===
Output ONLY one JSON object, no markdown fences, no commentary:
{
    "intent": "concise_intent_label",
    "plan": ["step 1", "step 2"],
    "actions": [{"type": "ACTION_TYPE", ...}]
}
Never return an empty object or an empty action list. If you cannot derive a safe plan, SPEAK a clarification request.
When the user talks to you, include at least one SPEAK action.

${getActionVocabulary()}

=== CURRENT USER COMMAND ===
User: ${JSON.stringify(userInput)}`;
}
