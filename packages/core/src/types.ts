/**
 * Any value that survives a `JSON.stringify` / `JSON.parse` round trip.
 * Payloads, step results and the shared payload are all JSON values so that
 * every {@link SagaRepository} backend can store them verbatim.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** A JSON object, used for payloads and the shared accumulator. */
export type JsonObject = { [key: string]: JsonValue };

/**
 * Minimal structured logger accepted by the orchestrator, the inline executor
 * and the recovery sweep. Any logger with these four methods fits; see
 * {@link createPinoLogger} for a pino adapter.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

// ---------------------------------------------------------------------------
// Step definitions
// ---------------------------------------------------------------------------

/** Anything that can be placed in a {@link SagaDefinition}. */
export interface NamedStep {
  /** Unique name that identifies this step within the saga. */
  readonly name: string;
}

/**
 * A step of an asynchronous saga. The forward action and its compensation are
 * commands published to the named destinations; their outcome arrives later
 * as a reply.
 */
export interface CommandStep extends NamedStep {
  /** Destination the forward action command is published to. */
  readonly actionCommand: string;
  /** Destination the compensation command is published to. */
  readonly compensationCommand: string;
  /** Human-readable description of what this step does. */
  readonly description?: string;
  /**
   * Build the action payload from the current shared payload.
   * Defaults to a copy of the shared payload.
   */
  readonly buildActionPayload?: (sharedPayload: JsonObject) => JsonObject;
  /**
   * Build the compensation payload from the action's result and the current
   * shared payload. Defaults to `{ action_result, shared_payload }`.
   */
  readonly buildCompensationPayload?: (
    actionResult: JsonValue | undefined,
    sharedPayload: JsonObject,
  ) => JsonObject;
}

/**
 * The context object threaded through every step of an inline saga.
 * Extend this interface to add domain-specific fields.
 *
 * @example
 * ```typescript
 * interface PaymentContext extends SagaContext {
 *   userId: string;
 *   amount: number;
 * }
 * ```
 */
export interface SagaContext {
  /** Results produced by each completed step, keyed by step name. */
  results: Record<string, unknown>;
}

/**
 * A step of an inline saga, called directly on the executor's call stack.
 * - `TResult`  – the value returned by `execute()`.
 * - `TContext` – the shared context object passed through all steps.
 */
export interface InlineStep<TResult = unknown, TContext extends SagaContext = SagaContext>
  extends NamedStep {
  /** Run the forward action. A thrown error or rejection marks the step failed. */
  execute(ctx: TContext): TResult | Promise<TResult>;
  /**
   * Undo the forward action. Called during rollback with the value
   * previously returned by `execute()`.
   */
  compensate(ctx: TContext, result: TResult): void | Promise<void>;
  /** Human-readable description of what this step does. */
  readonly description?: string;
}

// ---------------------------------------------------------------------------
// Persisted state
// ---------------------------------------------------------------------------

export type AttemptStatus =
  | 'Pending'
  | 'Completed'
  | 'Failed'
  | 'PendingCompensation'
  | 'Compensated'
  | 'CompensationFailed';

export type SagaStatus =
  | 'Created'
  | 'Running'
  | 'Compensating'
  | 'Succeeded'
  | 'FailedAction'
  | 'FailedCompensation';

export const TERMINAL_STATUSES: readonly SagaStatus[] = Object.freeze([
  'Succeeded',
  'FailedAction',
  'FailedCompensation',
]);

export function isTerminal(status: SagaStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/** Value of `compensationCursor` while the saga is not compensating. */
export const NOT_COMPENSATING = -1;

/** One entry of a saga instance's append-only attempt log. */
export interface AttemptRecord {
  readonly stepName: string;
  readonly stepIndex: number;
  /** The exact payload sent with the action command. */
  readonly requestPayload: JsonObject;
  readonly status: AttemptStatus;
  /** Output reported by a successful action. */
  readonly result?: JsonValue;
  /** Error reported by a failed action. */
  readonly error?: string;
  /** Error reported by a failed compensation. */
  readonly compensationError?: string;
  /** The exact payload sent with the compensation command, once dispatched. */
  readonly compensationPayload?: JsonObject;
}

/** Durable state of one saga execution. */
export interface SagaInstance {
  readonly id: string;
  readonly definitionId: string;
  /** Index of the next step to attempt. */
  readonly forwardCursor: number;
  /** Index into `attempts` being undone, or {@link NOT_COMPENSATING}. */
  readonly compensationCursor: number;
  readonly status: SagaStatus;
  readonly attempts: readonly AttemptRecord[];
  readonly sharedPayload: JsonObject;
  readonly correlationId: string | null;
  /** ISO-8601 timestamp. */
  readonly createdAt: string;
  /** ISO-8601 timestamp. */
  readonly updatedAt: string;
}

// ---------------------------------------------------------------------------
// Wire messages
// ---------------------------------------------------------------------------

/** Published to a step's action or compensation destination. */
export interface CommandMessage {
  readonly saga_id: string;
  readonly step_index: number;
  readonly step_name: string;
  readonly payload: JsonObject;
  readonly reply_destination: string;
  readonly correlation_id: string | null;
}

export interface ActionReply {
  readonly saga_id: string;
  readonly step_index: number;
  readonly success: boolean;
  readonly output?: JsonValue;
  readonly error?: string;
  readonly updated_shared_payload?: JsonObject;
}

export interface CompensationReply {
  readonly saga_id: string;
  readonly step_index_to_compensate: number;
  readonly success: boolean;
  readonly error?: string;
}

export interface SagaCompletedEvent {
  readonly saga_id: string;
  readonly final_shared_payload: JsonObject;
}

export interface SagaFailedEvent {
  readonly saga_id: string;
  readonly reason: string;
}

// ---------------------------------------------------------------------------
// Lifecycle hook types
// ---------------------------------------------------------------------------

/** Called immediately before a step's `execute()` is invoked. */
export type BeforeStepHook<TContext extends SagaContext> = (
  stepName: string,
  ctx: TContext,
) => void | Promise<void>;

/** Called immediately after a step's `execute()` resolves successfully. */
export type AfterStepHook<TContext extends SagaContext> = (
  stepName: string,
  result: unknown,
  ctx: TContext,
) => void | Promise<void>;

/** Called when a step's `execute()` throws. */
export type ErrorHook<TContext extends SagaContext> = (
  stepName: string,
  error: unknown,
  ctx: TContext,
) => void | Promise<void>;

/** Called each time a step's `compensate()` resolves during rollback. */
export type CompensationHook<TContext extends SagaContext> = (
  stepName: string,
  result: unknown,
  ctx: TContext,
) => void | Promise<void>;

/** Called after a command has been durably recorded and published. */
export type DispatchHook = (
  phase: 'action' | 'compensation',
  command: CommandMessage,
  instance: SagaInstance,
) => void | Promise<void>;

/** Called when a saga reaches a terminal status. */
export type TerminalHook = (instance: SagaInstance) => void | Promise<void>;
