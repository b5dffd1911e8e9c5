export type {
  JsonValue,
  JsonObject,
  Logger,
  NamedStep,
  CommandStep,
  SagaContext,
  InlineStep,
  AttemptStatus,
  SagaStatus,
  AttemptRecord,
  SagaInstance,
  CommandMessage,
  ActionReply,
  CompensationReply,
  SagaCompletedEvent,
  SagaFailedEvent,
  BeforeStepHook,
  AfterStepHook,
  ErrorHook,
  CompensationHook,
  DispatchHook,
  TerminalHook,
} from './types.js';
export { TERMINAL_STATUSES, NOT_COMPENSATING, isTerminal } from './types.js';
export {
  SagaError,
  DefinitionError,
  ExecutionError,
  CompensationError,
  PersistenceError,
  ProtocolError,
  DuplicateSagaError,
  SagaNotFoundError,
  ConfigurationError,
  describeError,
} from './errors.js';
export type { CompensationFailure } from './errors.js';
export { SagaBuilder, SagaDefinition, defineSaga } from './builder.js';
export type { SagaMetadata } from './builder.js';
export { SagaOrchestrator } from './orchestrator.js';
export type { SagaOrchestratorOptions, StartOptions, ReplyDisposition } from './orchestrator.js';
export { InlineSagaExecutor } from './executor.js';
export { createInlineInvoker, createDispatchInvoker } from './invoker.js';
export type { StepInvoker, InlineInvoker, DispatchInvoker, InvocationOutcome } from './invoker.js';
export type { SagaRepository } from './persistence.js';
export { InMemorySagaRepository } from './persistence.js';
export type { CommandChannel, MessageHandler, MessageHeaders, PublishedMessage } from './channel.js';
export { InMemoryCommandChannel, destinations } from './channel.js';
export { SagaRecovery } from './recovery.js';
export type { SagaRecoveryOptions, SweepResult } from './recovery.js';
export { KeyedLock } from './keyed-lock.js';
export {
  SagaEngineConfigSchema,
  loadEngineConfig,
  configFromEnv,
} from './config.js';
export type { SagaEngineConfig, SagaEngineConfigInput } from './config.js';
export { createPinoLogger } from './logger.js';
export {
  parseActionReply,
  parseCompensationReply,
  parseSagaInstance,
  sagaInstanceSchema,
  jsonObjectSchema,
} from './schemas.js';
export { SerializationError, assertJsonSerializable, toJsonObject } from './serialization.js';
