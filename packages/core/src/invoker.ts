import type { CommandChannel, MessageHeaders } from './channel.js';
import type { CommandMessage, InlineStep, SagaContext } from './types.js';

/** Result of calling a step function directly. */
export type InvocationOutcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: unknown };

/**
 * Calls step functions on the current call stack and reports their outcome
 * immediately.
 */
export interface InlineInvoker {
  readonly kind: 'inline';
  execute<TResult, TContext extends SagaContext>(
    step: InlineStep<TResult, TContext>,
    ctx: TContext,
  ): Promise<InvocationOutcome<TResult>>;
  compensate<TResult, TContext extends SagaContext>(
    step: InlineStep<TResult, TContext>,
    ctx: TContext,
    result: TResult,
  ): Promise<InvocationOutcome<void>>;
}

/**
 * Publishes step commands and returns as soon as the channel accepts them.
 * The outcome arrives later as a reply handed to the orchestrator.
 */
export interface DispatchInvoker {
  readonly kind: 'dispatch';
  dispatch(
    phase: 'action' | 'compensation',
    destination: string,
    command: CommandMessage,
  ): Promise<string>;
}

/** How a step gets run: inline on the caller's stack, or dispatched over a channel. */
export type StepInvoker = InlineInvoker | DispatchInvoker;

async function attempt<T>(fn: () => T | Promise<T>): Promise<InvocationOutcome<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return { ok: false, error };
  }
}

export function createInlineInvoker(): InlineInvoker {
  return {
    kind: 'inline',
    execute: (step, ctx) => attempt(() => step.execute(ctx)),
    compensate: (step, ctx, result) => attempt(() => step.compensate(ctx, result)),
  };
}

/**
 * Build a dispatch invoker over `channel`. Each command carries headers that
 * let consumers de-duplicate redeliveries on `(saga-id, step-index, phase)`.
 */
export function createDispatchInvoker(channel: CommandChannel): DispatchInvoker {
  return {
    kind: 'dispatch',
    dispatch: (phase, destination, command) => {
      const headers: MessageHeaders = {
        'saga-id': command.saga_id,
        'step-index': String(command.step_index),
        phase,
      };
      if (command.correlation_id !== null) {
        headers['correlation-id'] = command.correlation_id;
      }
      return channel.publish(destination, command, headers);
    },
  };
}
