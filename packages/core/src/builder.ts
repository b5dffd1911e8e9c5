import type { CommandStep, NamedStep } from './types.js';
import { DefinitionError } from './errors.js';

/**
 * Optional top-level metadata for a saga definition.
 */
export interface SagaMetadata {
  /** Human-readable description of what the saga does. */
  description?: string;
}

/**
 * Immutable, ordered catalog of uniquely-named steps.
 *
 * The same type backs both execution modes: a definition of
 * {@link CommandStep}s runs on the {@link SagaOrchestrator}, a definition of
 * {@link InlineStep}s on the {@link InlineSagaExecutor}.
 */
export class SagaDefinition<TStep extends NamedStep = CommandStep> {
  /** Identifier stored on every instance started from this definition. */
  readonly id: string;
  /** Ordered, frozen array of steps. */
  readonly steps: readonly TStep[];
  readonly metadata: SagaMetadata | undefined;

  private readonly _indexByName = new Map<string, number>();

  /**
   * @throws {@link DefinitionError} If `steps` is empty or two steps share a name.
   */
  constructor(id: string, steps: readonly TStep[], metadata?: SagaMetadata) {
    if (steps.length === 0) {
      throw new DefinitionError(`saga definition "${id}" has no steps`);
    }
    steps.forEach((step, index) => {
      if (this._indexByName.has(step.name)) {
        throw new DefinitionError(
          `saga definition "${id}": a step named "${step.name}" appears more than once. Step names must be unique.`,
        );
      }
      this._indexByName.set(step.name, index);
    });
    this.id = id;
    this.steps = Object.freeze([...steps]);
    this.metadata = metadata;
  }

  /** Number of steps. */
  get size(): number {
    return this.steps.length;
  }

  hasStep(name: string): boolean {
    return this._indexByName.has(name);
  }

  /**
   * Look a step up by name. Used when rebuilding compensation payloads from
   * an attempt log, where only the step name is persisted.
   *
   * @throws {@link DefinitionError} If no step carries `name`, which means the
   *   instance was written by a different version of the definition.
   */
  getStep(name: string): TStep {
    return this.steps[this.indexOf(name)];
  }

  /**
   * @throws {@link DefinitionError} If no step carries `name`.
   */
  indexOf(name: string): number {
    const index = this._indexByName.get(name);
    if (index === undefined) {
      throw new DefinitionError(`saga definition "${this.id}" has no step named "${name}"`);
    }
    return index;
  }
}

/**
 * Build a {@link SagaDefinition} from an ordered list of steps.
 *
 * @example
 * ```typescript
 * const orderSaga = defineSaga('order', [
 *   { name: 'charge_payment', actionCommand: 'payments.charge', compensationCommand: 'payments.refund' },
 *   { name: 'reserve_inventory', actionCommand: 'inventory.reserve', compensationCommand: 'inventory.release' },
 * ]);
 * ```
 */
export function defineSaga<TStep extends NamedStep>(
  id: string,
  steps: readonly TStep[],
  metadata?: SagaMetadata,
): SagaDefinition<TStep> {
  return new SagaDefinition(id, steps, metadata);
}

/**
 * Fluent builder for constructing a {@link SagaDefinition}.
 *
 * Steps run in the order they are added.
 *
 * @example
 * ```typescript
 * const saga = new SagaBuilder<InlineStep<unknown, PaymentContext>>('payment')
 *   .addStep(reserveFundsStep)
 *   .addStep(chargeCardStep)
 *   .addStep(sendReceiptStep)
 *   .build();
 * ```
 */
export class SagaBuilder<TStep extends NamedStep = CommandStep> {
  private readonly _id: string;
  private readonly _steps: TStep[] = [];

  constructor(id: string) {
    this._id = id;
  }

  /**
   * Append a step to the saga. Returns `this` to allow fluent chaining.
   *
   * @throws {@link DefinitionError} If a step with the same `name` has already been added.
   */
  addStep(step: TStep): this {
    if (this._steps.some((s) => s.name === step.name)) {
      throw new DefinitionError(
        `SagaBuilder: a step named "${step.name}" has already been added. Step names must be unique.`,
      );
    }
    this._steps.push(step);
    return this;
  }

  /**
   * Finalise the builder and return an immutable {@link SagaDefinition}.
   *
   * @throws {@link DefinitionError} If no steps have been added.
   */
  build(metadata?: SagaMetadata): SagaDefinition<TStep> {
    return new SagaDefinition(this._id, this._steps, metadata);
  }
}
