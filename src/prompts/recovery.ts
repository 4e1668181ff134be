/**
 * Recovery prompt: a short corrective plan after an execution failure.
 */

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function summarizeVision(vision: unknown): string {
    if (!isRecord(vision) || Object.keys(vision).length === 0) return 'No vision data available';
    const name = typeof vision.name === 'string' ? vision.name : 'Unknown';
    const controlType = typeof vision.control_type === 'string' ? vision.control_type : 'Unknown';
    return `Window '${name}' (${controlType}) is currently focused`;
}

export function getRecoveryPrompt(agentName: string, originalIntent: string, failureReason: string, vision: unknown): string {
    return `You are ${agentName}, a desktop agent controlling the user's computer.
Your previous plan FAILED. Produce a short RECOVERY plan.

=== FAILURE CONTEXT ===
Original Intent: "${originalIntent}"
Failure Reason: ${failureReason}
Current State: ${summarizeVision(vision)}

=== TASK ===
Fix the immediate problem only, in 2-4 actions. Typical fixes:
- Wrong window focused: press escape, then retry.
- Application did not appear: wait longer, or launch it another way.
- Typing went nowhere: click to focus, then type again.

Respond with ONLY this JSON:
{"intent": "Recovery: <what you fix>", "plan": ["step 1", "step 2"], "actions": [{"type": "KEY", "key": "escape"}]}

Allowed action types here: KEY, TYPE, CLICK, WAIT. No explanations, no markdown.`;
}
