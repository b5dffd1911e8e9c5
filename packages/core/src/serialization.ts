import { SagaError } from './errors.js';
import { jsonObjectSchema } from './schemas.js';
import type { JsonObject } from './types.js';

/**
 * Thrown when a payload built for a saga step cannot be round-tripped through
 * `JSON.stringify` / `JSON.parse`.
 *
 * Payload builders sometimes return class instances or objects with circular
 * references. If these reach a {@link SagaRepository}, most storage backends
 * will crash or silently corrupt the persisted state, so the orchestrator
 * checks every payload before it is saved.
 */
export class SerializationError extends SagaError {
  /** Name of the step whose payload is not serializable. */
  readonly stepName: string;

  constructor(stepName: string, cause: unknown) {
    super(
      `payload for step "${stepName}" is not JSON-serializable. ` +
        `Ensure payload builders do not return circular objects, BigInts, or other non-serializable values.`,
      undefined,
      { cause },
    );
    this.name = 'SerializationError';
    this.stepName = stepName;
  }
}

/**
 * Throws a {@link SerializationError} if `value` cannot be serialized with
 * `JSON.stringify`.
 *
 * @param stepName - The saga step the value belongs to; used in the message.
 */
export function assertJsonSerializable(value: unknown, stepName: string): void {
  try {
    JSON.stringify(value);
  } catch (cause) {
    throw new SerializationError(stepName, cause);
  }
}

/**
 * Normalize a payload to its JSON form: `undefined` members are dropped and
 * `toJSON()` methods applied, so the object that is published is the same one
 * that is persisted.
 *
 * @throws {@link SerializationError} If the value cannot be serialized.
 */
export function toJsonObject(value: JsonObject, stepName: string): JsonObject {
  assertJsonSerializable(value, stepName);
  const parsed = jsonObjectSchema.safeParse(JSON.parse(JSON.stringify(value)));
  if (!parsed.success) {
    throw new SerializationError(stepName, parsed.error);
  }
  return parsed.data;
}
