import type {
  AfterStepHook,
  BeforeStepHook,
  CompensationHook,
  ErrorHook,
  InlineStep,
  Logger,
  SagaContext,
} from './types.js';
import type { SagaDefinition } from './builder.js';
import type { CompensationFailure } from './errors.js';
import { CompensationError, ExecutionError, describeError } from './errors.js';
import type { InlineInvoker } from './invoker.js';
import { createInlineInvoker } from './invoker.js';

interface CompletedStep<TContext extends SagaContext> {
  step: InlineStep<unknown, TContext>;
  result: unknown;
}

/**
 * Runs a {@link SagaDefinition} of {@link InlineStep}s in process,
 * accumulating results in the shared {@link SagaContext}.
 *
 * When a step fails, every step that completed before it is compensated in
 * reverse order, each compensation receiving its own step's result. Rollback
 * is best-effort: a failing compensation is recorded and the remaining ones
 * still run. There is no persistence and no resume; use the
 * {@link SagaOrchestrator} for steps that live in other processes.
 *
 * @example
 * ```typescript
 * const executor = new InlineSagaExecutor(saga, { results: {} });
 * const finalContext = await executor.run();
 * ```
 */
export class InlineSagaExecutor<TContext extends SagaContext = SagaContext> {
  private readonly _definition: SagaDefinition<InlineStep<unknown, TContext>>;
  private readonly _context: TContext;
  private readonly _logger: Logger | undefined;
  private readonly _invoker: InlineInvoker = createInlineInvoker();

  private readonly _beforeStepHooks: Array<BeforeStepHook<TContext>> = [];
  private readonly _afterStepHooks: Array<AfterStepHook<TContext>> = [];
  private readonly _errorHooks: Array<ErrorHook<TContext>> = [];
  private readonly _compensationHooks: Array<CompensationHook<TContext>> = [];

  constructor(
    definition: SagaDefinition<InlineStep<unknown, TContext>>,
    context: TContext,
    logger?: Logger,
  ) {
    this._definition = definition;
    this._context = context;
    this._logger = logger;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle hook registration
  // ---------------------------------------------------------------------------

  /**
   * Register a hook called immediately **before** each step's `execute()`.
   * A hook that throws fails the step. Returns `this` for fluent chaining.
   */
  onBeforeStep(hook: BeforeStepHook<TContext>): this {
    this._beforeStepHooks.push(hook);
    return this;
  }

  /**
   * Register a hook called immediately **after** each step's `execute()`
   * resolves. Returns `this` for fluent chaining.
   */
  onAfterStep(hook: AfterStepHook<TContext>): this {
    this._afterStepHooks.push(hook);
    return this;
  }

  /**
   * Register a hook called when a step fails, before rollback starts. A hook
   * that throws is logged and the rollback still runs. Returns `this` for
   * fluent chaining.
   */
  onError(hook: ErrorHook<TContext>): this {
    this._errorHooks.push(hook);
    return this;
  }

  /**
   * Register a hook called each time a step's `compensate()` resolves during
   * rollback. Returns `this` for fluent chaining.
   */
  onCompensation(hook: CompensationHook<TContext>): this {
    this._compensationHooks.push(hook);
    return this;
  }

  // ---------------------------------------------------------------------------
  // Public execution API
  // ---------------------------------------------------------------------------

  /**
   * Run all steps in order, storing each result under
   * `context.results[step.name]`.
   *
   * @returns The context once every step has succeeded.
   * @throws {@link ExecutionError} When a step failed and every compensation succeeded.
   * @throws {@link CompensationError} When a step failed and at least one
   *   compensation failed too; it carries the {@link ExecutionError} and every
   *   compensation failure.
   */
  async run(): Promise<TContext> {
    const definitionId = this._definition.id;
    this._logger?.info('saga:start', { definitionId, steps: this._definition.size });

    const completed: Array<CompletedStep<TContext>> = [];

    for (const step of this._definition.steps) {
      try {
        for (const hook of this._beforeStepHooks) {
          await hook(step.name, this._context);
        }
        this._logger?.debug('step:start', { definitionId, stepName: step.name });
        const outcome = await this._invoker.execute(step, this._context);
        if (!outcome.ok) {
          throw outcome.error;
        }
        this._context.results[step.name] = outcome.value;
        completed.push({ step, result: outcome.value });
        this._logger?.info('step:complete', { definitionId, stepName: step.name });
        for (const hook of this._afterStepHooks) {
          await hook(step.name, outcome.value, this._context);
        }
      } catch (err) {
        this._logger?.error('step:error', {
          definitionId,
          stepName: step.name,
          error: describeError(err),
        });
        await this._runErrorHooks(step.name, err);
        const actionError = new ExecutionError(step.name, err);
        const failures = await this._rollback(completed);
        if (failures.length > 0) {
          throw new CompensationError(actionError, failures);
        }
        throw actionError;
      }
    }

    this._logger?.info('saga:complete', { definitionId });
    return this._context;
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  /** A throwing error hook is logged; it never prevents the rollback. */
  private async _runErrorHooks(stepName: string, err: unknown): Promise<void> {
    for (const hook of this._errorHooks) {
      try {
        await hook(stepName, err, this._context);
      } catch (hookError) {
        this._logger?.error('hook:error-hook-failed', {
          definitionId: this._definition.id,
          stepName,
          error: describeError(hookError),
        });
      }
    }
  }

  /**
   * Walk the completed steps backwards and compensate each one. Failures are
   * collected rather than thrown so that every completed step gets its
   * compensation attempted.
   */
  private async _rollback(
    completed: Array<CompletedStep<TContext>>,
  ): Promise<CompensationFailure[]> {
    const definitionId = this._definition.id;
    const failures: CompensationFailure[] = [];

    for (let i = completed.length - 1; i >= 0; i--) {
      const { step, result } = completed[i];
      const outcome = await this._invoker.compensate(step, this._context, result);
      if (!outcome.ok) {
        this._logger?.error('step:compensation-failed', {
          definitionId,
          stepName: step.name,
          error: describeError(outcome.error),
        });
        failures.push({ stepName: step.name, cause: outcome.error });
        continue;
      }
      this._logger?.info('step:compensate', { definitionId, stepName: step.name });
      try {
        for (const hook of this._compensationHooks) {
          await hook(step.name, result, this._context);
        }
      } catch (hookError) {
        failures.push({ stepName: step.name, cause: hookError });
      }
    }

    if (failures.length === 0) {
      this._logger?.info('saga:rolled-back', { definitionId, compensated: completed.length });
    }
    return failures;
  }
}
