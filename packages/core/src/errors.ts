/**
 * Base class of every error raised by the saga engine.
 */
export class SagaError extends Error {
  /** The saga instance the error concerns, when there is one. */
  readonly sagaId: string | undefined;

  constructor(message: string, sagaId?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SagaError';
    this.sagaId = sagaId;
  }
}

/**
 * Thrown for an invalid saga definition (duplicate or missing step names) or
 * when a persisted instance does not match the definition it is run against.
 */
export class DefinitionError extends SagaError {
  constructor(message: string, sagaId?: string) {
    super(message, sagaId);
    this.name = 'DefinitionError';
  }
}

/**
 * A forward action failed. Always followed by a rollback of the steps that
 * ran before it.
 */
export class ExecutionError extends SagaError {
  /** Name of the step whose action failed. */
  readonly stepName: string;

  constructor(stepName: string, cause: unknown, sagaId?: string) {
    super(`step "${stepName}" failed: ${describeError(cause)}`, sagaId, { cause });
    this.name = 'ExecutionError';
    this.stepName = stepName;
  }
}

/** One compensation that did not succeed during rollback. */
export interface CompensationFailure {
  readonly stepName: string;
  readonly cause: unknown;
}

/**
 * One or more compensations failed after an action failure. This signals a
 * potentially compromised state that requires manual intervention; the engine
 * never retries a compensation on its own.
 */
export class CompensationError extends SagaError {
  /** The action failure that started the rollback. */
  readonly actionError: ExecutionError;
  /** Every compensation that failed, in the order they were attempted. */
  readonly failures: readonly CompensationFailure[];

  constructor(actionError: ExecutionError, failures: readonly CompensationFailure[], sagaId?: string) {
    const names = failures.map((f) => `"${f.stepName}"`).join(', ');
    super(
      `${actionError.message}; compensation failed for ${names}. Manual intervention may be required.`,
      sagaId,
      { cause: actionError },
    );
    this.name = 'CompensationError';
    this.actionError = actionError;
    this.failures = Object.freeze([...failures]);
  }
}

/** The saga repository could not read or write an instance. */
export class PersistenceError extends SagaError {
  constructor(message: string, sagaId?: string, cause?: unknown) {
    super(message, sagaId, { cause });
    this.name = 'PersistenceError';
  }
}

/**
 * A reply does not fit the instance it names: wrong phase, wrong cursor,
 * already handled, unknown saga or malformed. Replies that raise it are
 * discarded without touching the store.
 */
export class ProtocolError extends SagaError {
  constructor(message: string, sagaId?: string) {
    super(message, sagaId);
    this.name = 'ProtocolError';
  }
}

/** `start()` was asked to create an instance whose id is already stored. */
export class DuplicateSagaError extends SagaError {
  constructor(sagaId: string) {
    super(`saga "${sagaId}" already exists`, sagaId);
    this.name = 'DuplicateSagaError';
  }
}

/** No stored instance carries the requested id. */
export class SagaNotFoundError extends SagaError {
  constructor(sagaId: string) {
    super(`saga "${sagaId}" not found`, sagaId);
    this.name = 'SagaNotFoundError';
  }
}

/** Engine configuration failed validation. */
export class ConfigurationError extends SagaError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Render an unknown thrown value as a short message. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
