export * from './sandbox';
export { MemoryStore, tokenize } from './memory/store';
export type { LessonMetadata, RetrievalIndex } from './memory/store';
export { OllamaClient, normalizeBaseUrl, messagesToPrompt } from './models/ollama-client';
export * from './models/errors';
export type { ChatMessage, ModelGateway, CompletionRequest } from './models/types';
export { parseActionResponse, ActionRequestSchema, ModelTurnResultSchema } from './agents/schema';
export type { ActionRequest, ModelTurnResult } from './agents/schema';
export { validateAction } from './agents/action-guards';
export { ActionValidationError, ModelResponseParseError } from './agents/errors';
export { TaskRunner } from './orchestrator/workflow';
export type { TaskRunnerOptions } from './orchestrator/workflow';
export { StateMachine, InvalidTransitionError } from './orchestrator/state-machine';
export { transitions } from './orchestrator/transitions';
export type { Trigger } from './orchestrator/transitions';
export * from './orchestrator/states';
export * from './orchestrator/errors';
export { loadTaskFile } from './orchestrator/task-loader';
export { InteractiveCoordinator } from './interactive/coordinator';
export { FileWatcher } from './watch/file-watcher';
export { loadConfig } from './config/loader';
export { ConfigValidationError } from './config/validator';
export type { Config } from './config/validator';
export { ConsoleLogger, silentLogger } from './utils/logger';
export type { Logger } from './utils/logger';
