/**
 * Main entry point - exports all public APIs
 */

export {
    ACTION_KINDS,
    LIMITS,
    SAFE_KEYS,
    PHYSICAL_KINDS,
    parseActions,
    validateActions,
    isPhysical,
    charCount,
    isKeyComboSafe,
    toWireAction,
    describeAction,
} from './action_schema';
export type {
    Action,
    ActionKind,
    PhysicalAction,
    FileAction,
    Plan,
    ParseActionsResult,
} from './action_schema';
export { isSafePath, isInside, resolveInSandbox } from './path_guard';
export { KernelClient, REFLEX_TRUST_THRESHOLD } from './kernel_client';
export type {
    KernelClientOptions,
    PermissionRequest,
    PermissionResponse,
    MemoryArtifact,
    MemoryStoreRequest,
    ReflexHit,
} from './kernel_client';
export { Planner, buildFallbackPlan, normalizePlan, extractJsonObject, MEMORIZE_ACK_TEXT } from './planner';
export type { Decision, PlannerOptions, PlanSource, MemorizeOutcome } from './planner';
export { ContextSlots, formatVisionContext, formatFileContext } from './context_slots';
export type { ContextSlot, ContextSnapshot } from './context_slots';
export { LocalFactStore, loadIdentity, DEFAULT_IDENTITY } from './fact_store';
export type { Fact, HistoryEntry, Identity, RememberResult } from './fact_store';
export { ExecutionEngine } from './engine';
export type { ExecutionReport, ExecutionStatus, ExecutionEngineOptions, RecoveryReport } from './engine';
export { PermissionGate, trustLabel } from './permission_gate';
export type { GateResult, PermissionGateOptions } from './permission_gate';
export { SingleFlightLock } from './single_flight';
export { inferExpectedWindow, isLaunchIntent } from './window_focus';
export { SentinelBridge, NullSentinel, spawnSentinel } from './sentinel';
export type { Sentinel, FocusEvent } from './sentinel';
export { Librarian } from './librarian';
export type { FileContext } from './librarian';
export { PiperSpeaker, ConsoleSpeaker, speechDuration, sanitizeSpeechText } from './speech';
export type { Speaker } from './speech';
export { VoiceInput } from './voice_input';
export type { Transcriber, VoiceOutcome } from './voice_input';
export { OllamaChatClient, CircuitBreaker } from './llm_client';
export type { ChatModel, ChatMessage, ChatResult } from './llm_client';
export { OllamaEmbedder } from './embedder';
export type { Embedder } from './embedder';
export { LoggingStatusIndicator } from './status';
export type { StatusIndicator, StatusState } from './status';
export { loadConfig, DEFAULT_CONFIG, configSchema } from './config';
export type { DeskpilotConfig } from './config';
export { createApp } from './app';
export type { App, AppOverrides } from './app';
export { createLogger, setTraceContext, clearTraceContext } from './logger';
export type { Logger } from './logger';
export { DeskpilotError, ErrorFactory, createStructuredError } from './structured_error';
export type { ErrorCode, StructuredError } from './structured_error';
