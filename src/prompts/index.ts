/**
 * Prompt builders for the planner.
 */

export { getPlannerPrompt, formatPromptDate } from './system';
export type { PlannerPromptInput } from './system';
export { getRecoveryPrompt, summarizeVision } from './recovery';
export { getActionVocabulary } from './vocabulary';
export { formatMemories, formatUserFacts, isMemorySafe, MEMORY_MAX_CHARS } from './context';
