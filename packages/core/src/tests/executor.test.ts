import { describe, it, expect, vi } from 'vitest';
import { SagaBuilder } from '../builder.js';
import { InlineSagaExecutor } from '../executor.js';
import type { InlineStep, Logger, SagaContext } from '../types.js';
import { CompensationError, ExecutionError } from '../errors.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeStep<TResult>(name: string, executeResult: TResult): InlineStep<unknown, SagaContext> {
  return {
    name,
    execute: vi.fn(async () => executeResult),
    compensate: vi.fn(async () => undefined),
  };
}

function failingStep(name: string, error: Error): InlineStep<unknown, SagaContext> {
  return {
    name,
    execute: vi.fn(async () => {
      throw error;
    }),
    compensate: vi.fn(async () => undefined),
  };
}

function makeCtx(): SagaContext {
  return { results: {} };
}

function build(...steps: Array<InlineStep<unknown, SagaContext>>) {
  const builder = new SagaBuilder<InlineStep<unknown, SagaContext>>('inline-test');
  for (const step of steps) builder.addStep(step);
  return builder.build();
}

function makeLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

// ---------------------------------------------------------------------------
// InlineSagaExecutor – forward execution
// ---------------------------------------------------------------------------

describe('InlineSagaExecutor – forward execution', () => {
  it('run() resolves with the context object', async () => {
    const ctx = makeCtx();
    const result = await new InlineSagaExecutor(build(makeStep('only', 1)), ctx).run();
    expect(result).toBe(ctx);
  });

  it('calls steps in insertion order and stores each result by name', async () => {
    const order: string[] = [];
    const ordered = (name: string, value: number): InlineStep<unknown, SagaContext> => ({
      name,
      execute: async () => {
        order.push(name);
        return value;
      },
      compensate: async () => undefined,
    });

    const ctx = await new InlineSagaExecutor(
      build(ordered('first', 1), ordered('second', 2), ordered('third', 3)),
      makeCtx(),
    ).run();

    expect(order).toEqual(['first', 'second', 'third']);
    expect(ctx.results).toEqual({ first: 1, second: 2, third: 3 });
  });

  it('lets later steps read earlier results from the context', async () => {
    const second: InlineStep<unknown, SagaContext> = {
      name: 'second',
      execute: async (ctx) => `${String(ctx.results.first)}-b`,
      compensate: async () => undefined,
    };
    const ctx = await new InlineSagaExecutor(build(makeStep('first', 'a'), second), makeCtx()).run();
    expect(ctx.results.second).toBe('a-b');
  });

  it('never compensates when every step succeeds', async () => {
    const a = makeStep('a', 1);
    const b = makeStep('b', 2);
    await new InlineSagaExecutor(build(a, b), makeCtx()).run();
    expect(a.compensate).not.toHaveBeenCalled();
    expect(b.compensate).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// InlineSagaExecutor – rollback
// ---------------------------------------------------------------------------

describe('InlineSagaExecutor – rollback', () => {
  it('compensates completed steps in reverse order with their own results, then throws ExecutionError', async () => {
    const calls: string[] = [];
    const tracked = (name: string, value: string): InlineStep<unknown, SagaContext> => ({
      name,
      execute: async () => value,
      compensate: async (_ctx, result) => {
        calls.push(`${name}:${String(result)}`);
      },
    });
    const boom = new Error('card declined');
    const third = failingStep('ship_order', boom);

    const run = new InlineSagaExecutor(
      build(tracked('charge_payment', 'ch_1'), tracked('reserve_inventory', 'res_1'), third),
      makeCtx(),
    ).run();

    await expect(run).rejects.toBeInstanceOf(ExecutionError);
    await run.catch((err: unknown) => {
      expect(err).toBeInstanceOf(ExecutionError);
      if (err instanceof ExecutionError) {
        expect(err.stepName).toBe('ship_order');
        expect(err.message).toBe('step "ship_order" failed: card declined');
        expect(err.cause).toBe(boom);
      }
    });
    expect(calls).toEqual(['reserve_inventory:res_1', 'charge_payment:ch_1']);
    expect(third.compensate).not.toHaveBeenCalled();
  });

  it('does not run steps after the failing one', async () => {
    const after = makeStep('after', 1);
    await expect(
      new InlineSagaExecutor(build(failingStep('first', new Error('x')), after), makeCtx()).run(),
    ).rejects.toThrow('step "first" failed: x');
    expect(after.execute).not.toHaveBeenCalled();
  });

  it('keeps compensating after a compensation fails and reports every failure', async () => {
    const a = makeStep('a', 1);
    const b: InlineStep<unknown, SagaContext> = {
      name: 'b',
      execute: async () => 2,
      compensate: async () => {
        throw new Error('b undo failed');
      },
    };
    const c: InlineStep<unknown, SagaContext> = {
      name: 'c',
      execute: async () => 3,
      compensate: async () => {
        throw new Error('c undo failed');
      },
    };

    let caught: unknown;
    try {
      await new InlineSagaExecutor(build(a, b, c, failingStep('d', new Error('down'))), makeCtx()).run();
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(CompensationError);
    if (!(caught instanceof CompensationError)) return;
    expect(caught.failures.map((f) => f.stepName)).toEqual(['c', 'b']);
    expect(caught.actionError.stepName).toBe('d');
    expect(caught.message).toBe(
      'step "d" failed: down; compensation failed for "c", "b". Manual intervention may be required.',
    );
    expect(a.compensate).toHaveBeenCalledTimes(1);
  });

  it('reports the failed action and the failed compensation, and still compensates step 0', async () => {
    const step0 = makeStep('reserve_funds', 'hold_1');
    const step1: InlineStep<unknown, SagaContext> = {
      name: 'charge_card',
      execute: async () => 'ch_1',
      compensate: vi.fn(async () => {
        throw new Error('refund rejected');
      }),
    };
    const actionFailure = new Error('receipt service down');
    const step2 = failingStep('send_receipt', actionFailure);

    const error = await new InlineSagaExecutor(build(step0, step1, step2), makeCtx()).run().then(
      () => undefined,
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(CompensationError);
    if (!(error instanceof CompensationError)) return;
    expect(error.actionError.stepName).toBe('send_receipt');
    expect(error.actionError.cause).toBe(actionFailure);
    expect(error.failures).toHaveLength(1);
    expect(error.failures[0].stepName).toBe('charge_card');
    expect(error.failures[0].cause).toEqual(new Error('refund rejected'));
    expect(step1.compensate).toHaveBeenCalledTimes(1);
    expect(step0.compensate).toHaveBeenCalledWith({ results: { reserve_funds: 'hold_1', charge_card: 'ch_1' } }, 'hold_1');
  });

  it('treats a synchronous throw like a rejection', async () => {
    const step: InlineStep<unknown, SagaContext> = {
      name: 'sync',
      execute: () => {
        throw new Error('sync failure');
      },
      compensate: () => undefined,
    };
    await expect(new InlineSagaExecutor(build(step), makeCtx()).run()).rejects.toThrow(
      'step "sync" failed: sync failure',
    );
  });
});

// ---------------------------------------------------------------------------
// InlineSagaExecutor – hooks and logging
// ---------------------------------------------------------------------------

describe('InlineSagaExecutor – hooks', () => {
  it('calls before/after hooks around each step and returns this from registration', async () => {
    const events: string[] = [];
    const executor = new InlineSagaExecutor(build(makeStep('a', 1), makeStep('b', 2)), makeCtx());
    const chained = executor
      .onBeforeStep((name) => {
        events.push(`before:${name}`);
      })
      .onAfterStep((name, result) => {
        events.push(`after:${name}:${String(result)}`);
      });

    expect(chained).toBe(executor);
    await executor.run();
    expect(events).toEqual(['before:a', 'after:a:1', 'before:b', 'after:b:2']);
  });

  it('calls error and compensation hooks during rollback', async () => {
    const onError = vi.fn();
    const onCompensation = vi.fn();
    const boom = new Error('boom');

    await expect(
      new InlineSagaExecutor(build(makeStep('a', 'ra'), failingStep('b', boom)), makeCtx())
        .onError(onError)
        .onCompensation(onCompensation)
        .run(),
    ).rejects.toBeInstanceOf(ExecutionError);

    expect(onError).toHaveBeenCalledWith('b', boom, { results: { a: 'ra' } });
    expect(onCompensation).toHaveBeenCalledWith('a', 'ra', { results: { a: 'ra' } });
  });

  it('still rolls back and reports the step failure when an error hook throws', async () => {
    const a = makeStep('a', 1);
    const logger = makeLogger();
    const run = new InlineSagaExecutor(build(a, failingStep('b', new Error('down'))), makeCtx(), logger)
      .onError(() => {
        throw new Error('hook failed');
      })
      .run();

    await expect(run).rejects.toBeInstanceOf(ExecutionError);
    await expect(run).rejects.toThrow('step "b" failed: down');
    expect(a.compensate).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith('hook:error-hook-failed', {
      definitionId: 'inline-test',
      stepName: 'b',
      error: 'hook failed',
    });
  });

  it('fails the step when a before hook throws', async () => {
    const step = makeStep('a', 1);
    await expect(
      new InlineSagaExecutor(build(step), makeCtx())
        .onBeforeStep(() => {
          throw new Error('not allowed');
        })
        .run(),
    ).rejects.toThrow('step "a" failed: not allowed');
    expect(step.execute).not.toHaveBeenCalled();
  });

  it('logs the run lifecycle', async () => {
    const logger = makeLogger();
    await new InlineSagaExecutor(build(makeStep('a', 1)), makeCtx(), logger).run();
    expect(logger.info).toHaveBeenCalledWith('saga:start', { definitionId: 'inline-test', steps: 1 });
    expect(logger.info).toHaveBeenCalledWith('step:complete', { definitionId: 'inline-test', stepName: 'a' });
    expect(logger.info).toHaveBeenCalledWith('saga:complete', { definitionId: 'inline-test' });
  });

  it('logs each failed compensation', async () => {
    const logger = makeLogger();
    const a: InlineStep<unknown, SagaContext> = {
      name: 'a',
      execute: async () => 1,
      compensate: async () => {
        throw new Error('stuck');
      },
    };
    await expect(
      new InlineSagaExecutor(build(a, failingStep('b', new Error('x'))), makeCtx(), logger).run(),
    ).rejects.toBeInstanceOf(CompensationError);
    expect(logger.error).toHaveBeenCalledWith('step:compensation-failed', {
      definitionId: 'inline-test',
      stepName: 'a',
      error: 'stuck',
    });
  });
});
