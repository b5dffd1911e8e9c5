import { z } from 'zod';
import type {
  ActionReply,
  CompensationReply,
  JsonObject,
  JsonValue,
  SagaInstance,
} from './types.js';
import { PersistenceError, ProtocolError } from './errors.js';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

export const actionReplySchema = z.object({
  saga_id: z.string().min(1),
  step_index: z.number().int().nonnegative(),
  success: z.boolean(),
  output: jsonValueSchema.optional(),
  error: z.string().optional(),
  updated_shared_payload: jsonObjectSchema.optional(),
});

export const compensationReplySchema = z.object({
  saga_id: z.string().min(1),
  step_index_to_compensate: z.number().int().nonnegative(),
  success: z.boolean(),
  error: z.string().optional(),
});

export const attemptRecordSchema = z.object({
  stepName: z.string().min(1),
  stepIndex: z.number().int().nonnegative(),
  requestPayload: jsonObjectSchema,
  status: z.enum([
    'Pending',
    'Completed',
    'Failed',
    'PendingCompensation',
    'Compensated',
    'CompensationFailed',
  ]),
  result: jsonValueSchema.optional(),
  error: z.string().optional(),
  compensationError: z.string().optional(),
  compensationPayload: jsonObjectSchema.optional(),
});

export const sagaInstanceSchema = z.object({
  id: z.string().min(1),
  definitionId: z.string().min(1),
  forwardCursor: z.number().int().nonnegative(),
  compensationCursor: z.number().int().min(-1),
  status: z.enum([
    'Created',
    'Running',
    'Compensating',
    'Succeeded',
    'FailedAction',
    'FailedCompensation',
  ]),
  attempts: z.array(attemptRecordSchema),
  sharedPayload: jsonObjectSchema,
  correlationId: z.string().nullable(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Best-effort saga id of a message that failed validation, for logging. */
function sagaIdOf(message: unknown): string | undefined {
  if (typeof message === 'object' && message !== null && 'saga_id' in message) {
    const { saga_id } = message;
    return typeof saga_id === 'string' ? saga_id : undefined;
  }
  return undefined;
}

/**
 * Validate an incoming action reply.
 *
 * @throws {@link ProtocolError} If the message does not have the reply shape.
 */
export function parseActionReply(message: unknown): ActionReply {
  const parsed = actionReplySchema.safeParse(message);
  if (!parsed.success) {
    throw new ProtocolError(`malformed action reply: ${formatIssues(parsed.error)}`, sagaIdOf(message));
  }
  return parsed.data;
}

/**
 * Validate an incoming compensation reply.
 *
 * @throws {@link ProtocolError} If the message does not have the reply shape.
 */
export function parseCompensationReply(message: unknown): CompensationReply {
  const parsed = compensationReplySchema.safeParse(message);
  if (!parsed.success) {
    throw new ProtocolError(
      `malformed compensation reply: ${formatIssues(parsed.error)}`,
      sagaIdOf(message),
    );
  }
  return parsed.data;
}

/**
 * Validate a snapshot read back from a repository.
 *
 * @throws {@link PersistenceError} If the stored data is not a saga instance.
 */
export function parseSagaInstance(data: unknown, sagaId?: string): SagaInstance {
  const parsed = sagaInstanceSchema.safeParse(data);
  if (!parsed.success) {
    throw new PersistenceError(
      `stored saga state is corrupt: ${formatIssues(parsed.error)}`,
      sagaId,
      parsed.error,
    );
  }
  return parsed.data;
}
