import { randomUUID } from 'node:crypto';
import type {
  ActionReply,
  AttemptRecord,
  AttemptStatus,
  CommandMessage,
  CommandStep,
  CompensationReply,
  DispatchHook,
  JsonObject,
  Logger,
  SagaCompletedEvent,
  SagaFailedEvent,
  SagaInstance,
  SagaStatus,
  TerminalHook,
} from './types.js';
import { NOT_COMPENSATING, isTerminal } from './types.js';
import type { SagaDefinition } from './builder.js';
import type { SagaRepository } from './persistence.js';
import type { CommandChannel } from './channel.js';
import { destinations } from './channel.js';
import type { DispatchInvoker } from './invoker.js';
import { createDispatchInvoker } from './invoker.js';
import type { SagaEngineConfig, SagaEngineConfigInput } from './config.js';
import { loadEngineConfig } from './config.js';
import {
  DefinitionError,
  DuplicateSagaError,
  PersistenceError,
  ProtocolError,
  SagaNotFoundError,
  describeError,
} from './errors.js';
import { parseActionReply, parseCompensationReply } from './schemas.js';
import { toJsonObject } from './serialization.js';
import { KeyedLock } from './keyed-lock.js';

/** Attempts the backward walk stops at: both may have side effects to undo. */
const COMPENSABLE: ReadonlySet<AttemptStatus> = new Set<AttemptStatus>(['Completed', 'Failed']);

export interface SagaOrchestratorOptions {
  definition: SagaDefinition<CommandStep>;
  repository: SagaRepository;
  channel: CommandChannel;
  logger?: Logger;
  config?: SagaEngineConfigInput;
  /** Source of `createdAt` / `updatedAt`. Defaults to the system clock. */
  clock?: () => Date;
  /** Source of the unique part of generated saga ids. Defaults to `randomUUID`. */
  generateId?: () => string;
}

export interface StartOptions {
  /** Opaque token copied onto every command of the saga. */
  correlationId?: string;
  /** Use this id instead of generating one. */
  sagaId?: string;
}

/** What happened to a reply handed to the orchestrator. */
export type ReplyDisposition =
  | { readonly status: 'applied'; readonly instance: SagaInstance }
  | { readonly status: 'discarded'; readonly error: ProtocolError };

function replaceAttempt(
  attempts: readonly AttemptRecord[],
  index: number,
  attempt: AttemptRecord,
): readonly AttemptRecord[] {
  return attempts.map((existing, i) => (i === index ? attempt : existing));
}

/**
 * Drives persisted sagas whose steps run elsewhere.
 *
 * Each step is dispatched as a command over the {@link CommandChannel}; its
 * outcome arrives later as a reply passed to {@link handleActionReply} or
 * {@link handleCompensationReply}. Every transition is written to the
 * {@link SagaRepository} before the command it implies is published, so a
 * crash leaves at most one in-flight command that {@link resume} can send
 * again.
 *
 * When a step fails, attempts are compensated from the failed step backwards.
 * The first compensation failure halts the rollback and leaves the saga in
 * `FailedCompensation` for an operator to resolve.
 *
 * @example
 * ```typescript
 * const orchestrator = new SagaOrchestrator({ definition, repository, channel, logger });
 * const instance = await orchestrator.start({ order_id: '123' }, { correlationId: 'req-1' });
 * ```
 */
export class SagaOrchestrator {
  private readonly _definition: SagaDefinition<CommandStep>;
  private readonly _repository: SagaRepository;
  private readonly _channel: CommandChannel;
  private readonly _logger: Logger | undefined;
  private readonly _config: SagaEngineConfig;
  private readonly _clock: () => Date;
  private readonly _generateId: () => string;
  private readonly _invoker: DispatchInvoker;
  private readonly _lock = new KeyedLock();
  private readonly _subscriptions = new Map<string, string[]>();

  private readonly _dispatchHooks: DispatchHook[] = [];
  private readonly _completedHooks: TerminalHook[] = [];
  private readonly _failedHooks: TerminalHook[] = [];

  constructor(options: SagaOrchestratorOptions) {
    this._definition = options.definition;
    this._repository = options.repository;
    this._channel = options.channel;
    this._logger = options.logger;
    this._config = loadEngineConfig(options.config ?? {});
    this._clock = options.clock ?? (() => new Date());
    this._generateId = options.generateId ?? randomUUID;
    this._invoker = createDispatchInvoker(options.channel);
  }

  get definition(): SagaDefinition<CommandStep> {
    return this._definition;
  }

  get config(): SagaEngineConfig {
    return this._config;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle hook registration
  // ---------------------------------------------------------------------------

  /** Register a hook called after each command is persisted and published. */
  onDispatch(hook: DispatchHook): this {
    this._dispatchHooks.push(hook);
    return this;
  }

  /** Register a hook called when a saga reaches `Succeeded`. */
  onCompleted(hook: TerminalHook): this {
    this._completedHooks.push(hook);
    return this;
  }

  /** Register a hook called when a saga reaches `FailedAction` or `FailedCompensation`. */
  onFailed(hook: TerminalHook): this {
    this._failedHooks.push(hook);
    return this;
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  /**
   * Create an instance in `Running` status and dispatch its first step.
   *
   * @returns The instance as persisted, with a `Pending` attempt for step 0.
   * @throws {@link DuplicateSagaError} If an instance with the same id is stored.
   * @throws {@link PersistenceError} If the instance could not be saved; nothing is dispatched.
   * @throws {@link SerializationError} If the first step's payload is not JSON.
   *
   * Reply subscriptions are released whenever the instance was never stored.
   */
  async start(initialPayload: JsonObject, options: StartOptions = {}): Promise<SagaInstance> {
    const sagaId =
      options.sagaId ?? `${this._config.sagaIdPrefix}-${this._definition.id}-${this._generateId()}`;

    return this._lock.run(sagaId, async () => {
      if ((await this._load(sagaId)) !== undefined) {
        throw new DuplicateSagaError(sagaId);
      }
      const now = this._now();
      const instance: SagaInstance = {
        id: sagaId,
        definitionId: this._definition.id,
        forwardCursor: 0,
        compensationCursor: NOT_COMPENSATING,
        status: 'Running',
        attempts: [],
        sharedPayload: toJsonObject(initialPayload, this._definition.steps[0].name),
        correlationId: options.correlationId ?? null,
        createdAt: now,
        updatedAt: now,
      };
      this._logger?.info('saga:start', {
        sagaId,
        definitionId: this._definition.id,
        correlationId: instance.correlationId,
      });

      await this._subscribeReplies(sagaId);
      let stored = false;
      try {
        const { next, attempt, step } = this._appendAction(instance);
        await this._save(next);
        stored = true;
        await this._publishAction(next, attempt, step);
        return next;
      } catch (err) {
        // Nothing was stored, so nothing can be resumed later.
        if (!stored) {
          await this._unsubscribeReplies(sagaId);
        }
        throw err;
      }
    });
  }

  /**
   * Apply an action reply. Replies that do not match the instance's current
   * forward cursor, or arrive after the attempt was resolved, are discarded
   * without touching the store.
   *
   * @throws {@link PersistenceError} If the transition could not be saved.
   * @throws {@link DefinitionError} If the instance belongs to another definition.
   */
  async handleActionReply(message: unknown): Promise<ReplyDisposition> {
    let reply: ActionReply;
    try {
      reply = parseActionReply(message);
    } catch (err) {
      if (err instanceof ProtocolError) return this._discard(err);
      throw err;
    }

    return this._lock.run(reply.saga_id, async () => {
      const instance = await this._load(reply.saga_id);
      if (instance === undefined) {
        return this._discard(new ProtocolError('action reply for unknown saga', reply.saga_id));
      }
      this._assertDefinition(instance);
      if (isTerminal(instance.status)) {
        return this._discard(
          new ProtocolError(`action reply for saga already ${instance.status}`, instance.id),
        );
      }
      if (instance.status !== 'Running' && instance.status !== 'Created') {
        return this._discard(
          new ProtocolError(`action reply while ${instance.status}`, instance.id),
        );
      }
      if (reply.step_index !== instance.forwardCursor) {
        return this._discard(
          new ProtocolError(
            `action reply for step ${reply.step_index} but forward cursor is ${instance.forwardCursor}`,
            instance.id,
          ),
        );
      }
      const attempt = instance.attempts[reply.step_index];
      if (attempt === undefined || attempt.status !== 'Pending') {
        return this._discard(
          new ProtocolError(`action reply for step ${reply.step_index} with no pending attempt`, instance.id),
        );
      }

      const next = reply.success
        ? await this._onActionSucceeded(instance, attempt, reply)
        : await this._onActionFailed(instance, attempt, reply);
      return { status: 'applied', instance: next };
    });
  }

  /**
   * Apply a compensation reply. Replies that do not match the instance's
   * current compensation cursor are discarded without touching the store.
   *
   * @throws {@link PersistenceError} If the transition could not be saved.
   * @throws {@link DefinitionError} If the instance belongs to another definition.
   */
  async handleCompensationReply(message: unknown): Promise<ReplyDisposition> {
    let reply: CompensationReply;
    try {
      reply = parseCompensationReply(message);
    } catch (err) {
      if (err instanceof ProtocolError) return this._discard(err);
      throw err;
    }

    return this._lock.run(reply.saga_id, async () => {
      const instance = await this._load(reply.saga_id);
      if (instance === undefined) {
        return this._discard(new ProtocolError('compensation reply for unknown saga', reply.saga_id));
      }
      this._assertDefinition(instance);
      if (isTerminal(instance.status)) {
        return this._discard(
          new ProtocolError(`compensation reply for saga already ${instance.status}`, instance.id),
        );
      }
      if (instance.status !== 'Compensating') {
        return this._discard(
          new ProtocolError(`compensation reply while ${instance.status}`, instance.id),
        );
      }
      const index = reply.step_index_to_compensate;
      if (index !== instance.compensationCursor) {
        return this._discard(
          new ProtocolError(
            `compensation reply for attempt ${index} but compensation cursor is ${instance.compensationCursor}`,
            instance.id,
          ),
        );
      }
      const attempt = instance.attempts[index];
      if (attempt === undefined || attempt.status !== 'PendingCompensation') {
        return this._discard(
          new ProtocolError(`compensation reply for attempt ${index} with no pending compensation`, instance.id),
        );
      }

      const next = reply.success
        ? await this._onCompensationSucceeded(instance, attempt)
        : await this._onCompensationFailed(instance, attempt, reply);
      return { status: 'applied', instance: next };
    });
  }

  /**
   * Reload an instance and re-derive its next action. A pending command is
   * re-published with exactly the payload that was persisted; consumers are
   * expected to de-duplicate on `(saga_id, step_index, phase)`. Terminal
   * instances are returned untouched.
   *
   * @throws {@link SagaNotFoundError} If no instance is stored under `sagaId`.
   * @throws {@link DefinitionError} If the instance belongs to another definition.
   */
  async resume(sagaId: string): Promise<SagaInstance> {
    return this._lock.run(sagaId, async () => {
      const instance = await this._load(sagaId);
      if (instance === undefined) {
        throw new SagaNotFoundError(sagaId);
      }
      this._assertDefinition(instance);

      if (isTerminal(instance.status)) {
        this._logger?.info('saga:resume-skipped', { sagaId, status: instance.status });
        return instance;
      }
      this._logger?.info('saga:resume', { sagaId, status: instance.status });
      await this._subscribeReplies(sagaId);

      if (instance.status === 'Compensating') {
        const attempt = instance.attempts[instance.compensationCursor];
        if (attempt?.status === 'PendingCompensation' && attempt.compensationPayload !== undefined) {
          const step = this._stepOf(attempt);
          if (step === undefined) {
            return this._failUnknownStep(instance, attempt);
          }
          await this._publishCompensation(instance, attempt, step, attempt.compensationPayload);
          return instance;
        }
        return this._continueCompensation(instance);
      }

      const last = instance.attempts[instance.attempts.length - 1];
      if (last?.status === 'Pending' && last.stepIndex === instance.forwardCursor) {
        const step = this._stepOf(last);
        if (step === undefined) {
          return this._failUnknownStep(instance, last);
        }
        await this._publishAction(instance, last, step);
        return instance;
      }
      return this._dispatchAction(instance);
    });
  }

  /** Read the stored state of an instance. */
  async getInstance(sagaId: string): Promise<SagaInstance | undefined> {
    return this._load(sagaId);
  }

  // ---------------------------------------------------------------------------
  // Forward transitions
  // ---------------------------------------------------------------------------

  /** Append a `Pending` attempt for the step at the forward cursor, persist, publish. */
  private async _dispatchAction(instance: SagaInstance): Promise<SagaInstance> {
    if (instance.forwardCursor >= this._definition.size) {
      return this._complete(instance);
    }
    const { next, attempt, step } = this._appendAction(instance);
    await this._save(next);
    await this._publishAction(next, attempt, step);
    return next;
  }

  private _appendAction(instance: SagaInstance): {
    next: SagaInstance;
    attempt: AttemptRecord;
    step: CommandStep;
  } {
    const index = instance.forwardCursor;
    const step = this._definition.steps[index];
    const shared = structuredClone(instance.sharedPayload);
    const requestPayload = toJsonObject(
      step.buildActionPayload ? step.buildActionPayload(shared) : shared,
      step.name,
    );
    const attempt: AttemptRecord = {
      stepName: step.name,
      stepIndex: index,
      requestPayload,
      status: 'Pending',
    };
    const next = this._touch({
      ...instance,
      status: 'Running',
      attempts: [...instance.attempts, attempt],
    });
    return { next, attempt, step };
  }

  private async _onActionSucceeded(
    instance: SagaInstance,
    attempt: AttemptRecord,
    reply: ActionReply,
  ): Promise<SagaInstance> {
    const completed: AttemptRecord = {
      ...attempt,
      status: 'Completed',
      ...(reply.output !== undefined ? { result: reply.output } : {}),
    };
    this._logger?.info('step:complete', { sagaId: instance.id, stepName: attempt.stepName });
    const next: SagaInstance = {
      ...instance,
      attempts: replaceAttempt(instance.attempts, attempt.stepIndex, completed),
      sharedPayload: { ...instance.sharedPayload, ...(reply.updated_shared_payload ?? {}) },
      forwardCursor: attempt.stepIndex + 1,
    };
    // The completed attempt and the next pending one are written together.
    return this._dispatchAction(next);
  }

  private async _onActionFailed(
    instance: SagaInstance,
    attempt: AttemptRecord,
    reply: ActionReply,
  ): Promise<SagaInstance> {
    const error = reply.error ?? 'unspecified error';
    this._logger?.warn('step:failed', { sagaId: instance.id, stepName: attempt.stepName, error });
    const next = this._touch({
      ...instance,
      status: 'Compensating',
      // Compensation starts at the failed step itself.
      compensationCursor: attempt.stepIndex,
      attempts: replaceAttempt(instance.attempts, attempt.stepIndex, {
        ...attempt,
        status: 'Failed',
        error,
      }),
    });
    await this._save(next);
    return this._continueCompensation(next);
  }

  private async _complete(instance: SagaInstance): Promise<SagaInstance> {
    const next = this._touch({ ...instance, status: 'Succeeded' });
    await this._save(next);
    const event: SagaCompletedEvent = {
      saga_id: next.id,
      final_shared_payload: next.sharedPayload,
    };
    await this._channel.publish(destinations.completed(next.id), event, { 'saga-id': next.id });
    this._logger?.info('saga:complete', { sagaId: next.id });
    await this._unsubscribeReplies(next.id);
    for (const hook of this._completedHooks) {
      await hook(next);
    }
    return next;
  }

  // ---------------------------------------------------------------------------
  // Backward transitions
  // ---------------------------------------------------------------------------

  /**
   * Find the nearest compensable attempt at or before the compensation cursor
   * and dispatch its compensation, or finish the saga when none is left.
   */
  private async _continueCompensation(instance: SagaInstance): Promise<SagaInstance> {
    let cursor = instance.compensationCursor;
    while (cursor >= 0 && !COMPENSABLE.has(instance.attempts[cursor].status)) {
      cursor--;
    }
    if (cursor < 0) {
      const compensationFailed = instance.attempts.some((a) => a.status === 'CompensationFailed');
      const failed = instance.attempts.find((a) => a.error !== undefined);
      const reason = compensationFailed
        ? 'rollback ended with failed compensations'
        : failed !== undefined
          ? `step "${failed.stepName}" failed: ${failed.error}; rollback completed`
          : 'rollback completed';
      return this._fail(instance, compensationFailed ? 'FailedCompensation' : 'FailedAction', reason);
    }

    const attempt = instance.attempts[cursor];
    const step = this._stepOf(attempt);
    if (step === undefined) {
      return this._failUnknownStep(instance, attempt);
    }
    const shared = structuredClone(instance.sharedPayload);
    const compensationPayload = toJsonObject(
      step.buildCompensationPayload
        ? step.buildCompensationPayload(attempt.result, shared)
        : { action_result: attempt.result ?? null, shared_payload: shared },
      step.name,
    );
    const pending: AttemptRecord = { ...attempt, status: 'PendingCompensation', compensationPayload };
    const next = this._touch({
      ...instance,
      compensationCursor: cursor,
      attempts: replaceAttempt(instance.attempts, cursor, pending),
    });
    await this._save(next);
    await this._publishCompensation(next, pending, step, compensationPayload);
    return next;
  }

  private async _onCompensationSucceeded(
    instance: SagaInstance,
    attempt: AttemptRecord,
  ): Promise<SagaInstance> {
    this._logger?.info('step:compensated', { sagaId: instance.id, stepName: attempt.stepName });
    const next = this._touch({
      ...instance,
      compensationCursor: attempt.stepIndex - 1,
      attempts: replaceAttempt(instance.attempts, attempt.stepIndex, {
        ...attempt,
        status: 'Compensated',
      }),
    });
    await this._save(next);
    return this._continueCompensation(next);
  }

  /** A failed compensation halts the rollback; it is never retried automatically. */
  private async _onCompensationFailed(
    instance: SagaInstance,
    attempt: AttemptRecord,
    reply: CompensationReply,
  ): Promise<SagaInstance> {
    const error = reply.error ?? 'unspecified error';
    const failedInstance: SagaInstance = {
      ...instance,
      attempts: replaceAttempt(instance.attempts, attempt.stepIndex, {
        ...attempt,
        status: 'CompensationFailed',
        compensationError: error,
      }),
    };
    return this._fail(
      failedInstance,
      'FailedCompensation',
      `compensation for step "${attempt.stepName}" failed: ${error}`,
    );
  }

  /**
   * The attempt log names a step the definition does not have, so the walk
   * cannot go on. The instance is parked for an operator.
   */
  private async _failUnknownStep(instance: SagaInstance, attempt: AttemptRecord): Promise<SagaInstance> {
    const error = new DefinitionError(
      `saga definition "${this._definition.id}" has no step named "${attempt.stepName}"`,
      instance.id,
    );
    this._logger?.error('saga:unknown-step', { sagaId: instance.id, stepName: attempt.stepName });
    return this._fail(instance, 'FailedCompensation', error.message);
  }

  private async _fail(
    instance: SagaInstance,
    status: Extract<SagaStatus, 'FailedAction' | 'FailedCompensation'>,
    reason: string,
  ): Promise<SagaInstance> {
    const next = this._touch({
      ...instance,
      status,
      compensationCursor: status === 'FailedAction' ? NOT_COMPENSATING : instance.compensationCursor,
    });
    await this._save(next);
    const event: SagaFailedEvent = { saga_id: next.id, reason };
    await this._channel.publish(destinations.failed(next.id), event, { 'saga-id': next.id });
    this._logger?.error('saga:failed', { sagaId: next.id, status, reason });
    await this._unsubscribeReplies(next.id);
    for (const hook of this._failedHooks) {
      await hook(next);
    }
    return next;
  }

  // ---------------------------------------------------------------------------
  // Dispatch
  // ---------------------------------------------------------------------------

  private async _publishAction(
    instance: SagaInstance,
    attempt: AttemptRecord,
    step: CommandStep,
  ): Promise<void> {
    const command: CommandMessage = {
      saga_id: instance.id,
      step_index: attempt.stepIndex,
      step_name: step.name,
      payload: attempt.requestPayload,
      reply_destination: destinations.actionResult(instance.id),
      correlation_id: instance.correlationId,
    };
    const messageId = await this._invoker.dispatch('action', step.actionCommand, command);
    this._logger?.debug('step:dispatch', {
      sagaId: instance.id,
      stepName: step.name,
      destination: step.actionCommand,
      messageId,
    });
    for (const hook of this._dispatchHooks) {
      await hook('action', command, instance);
    }
  }

  private async _publishCompensation(
    instance: SagaInstance,
    attempt: AttemptRecord,
    step: CommandStep,
    payload: JsonObject,
  ): Promise<void> {
    const command: CommandMessage = {
      saga_id: instance.id,
      step_index: attempt.stepIndex,
      step_name: step.name,
      payload,
      reply_destination: destinations.compensationResult(instance.id),
      correlation_id: instance.correlationId,
    };
    const messageId = await this._invoker.dispatch('compensation', step.compensationCommand, command);
    this._logger?.debug('step:dispatch-compensation', {
      sagaId: instance.id,
      stepName: step.name,
      destination: step.compensationCommand,
      messageId,
    });
    for (const hook of this._dispatchHooks) {
      await hook('compensation', command, instance);
    }
  }

  // ---------------------------------------------------------------------------
  // Reply subscriptions
  // ---------------------------------------------------------------------------

  private async _subscribeReplies(sagaId: string): Promise<void> {
    if (!this._config.manageReplySubscriptions || this._subscriptions.has(sagaId)) {
      return;
    }
    const ids = [
      await this._channel.subscribe(destinations.actionResult(sagaId), async (message) => {
        await this.handleActionReply(message);
      }),
      await this._channel.subscribe(destinations.compensationResult(sagaId), async (message) => {
        await this.handleCompensationReply(message);
      }),
    ];
    this._subscriptions.set(sagaId, ids);
  }

  private async _unsubscribeReplies(sagaId: string): Promise<void> {
    const ids = this._subscriptions.get(sagaId);
    if (ids === undefined) {
      return;
    }
    this._subscriptions.delete(sagaId);
    for (const id of ids) {
      await this._channel.unsubscribe(id);
    }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _discard(error: ProtocolError): ReplyDisposition {
    this._logger?.warn('reply:discarded', { sagaId: error.sagaId, reason: error.message });
    return { status: 'discarded', error };
  }

  private _stepOf(attempt: AttemptRecord): CommandStep | undefined {
    return this._definition.steps.find((step) => step.name === attempt.stepName);
  }

  private _assertDefinition(instance: SagaInstance): void {
    if (instance.definitionId !== this._definition.id) {
      throw new DefinitionError(
        `saga "${instance.id}" was started from definition "${instance.definitionId}" ` +
          `but this orchestrator runs "${this._definition.id}"`,
        instance.id,
      );
    }
  }

  private _now(): string {
    return this._clock().toISOString();
  }

  private _touch(instance: SagaInstance): SagaInstance {
    return { ...instance, updatedAt: this._now() };
  }

  private async _load(sagaId: string): Promise<SagaInstance | undefined> {
    try {
      return await this._repository.load(sagaId);
    } catch (err) {
      throw err instanceof PersistenceError
        ? err
        : new PersistenceError(`failed to load saga state: ${describeError(err)}`, sagaId, err);
    }
  }

  /** Nothing is published for a transition until this resolves. */
  private async _save(instance: SagaInstance): Promise<void> {
    try {
      await this._repository.save(instance);
    } catch (err) {
      this._logger?.error('saga:persist-failed', { sagaId: instance.id, error: describeError(err) });
      throw err instanceof PersistenceError
        ? err
        : new PersistenceError(`failed to save saga state: ${describeError(err)}`, instance.id, err);
    }
  }
}
