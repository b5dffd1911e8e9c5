import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export const SagaEngineConfigSchema = z.object({
  /** Prefix of generated saga ids: `<prefix>-<definitionId>-<uuid>`. */
  sagaIdPrefix: z.string().min(1).default('saga'),
  /** Subscribe to each instance's reply destinations on start/resume. */
  manageReplySubscriptions: z.boolean().default(true),
  /** Age after which a non-terminal instance is picked up by the recovery sweep. */
  staleAfterMs: z.number().int().positive().default(300_000),
  /** Interval between two recovery sweeps when run on a timer. */
  sweepIntervalMs: z.number().int().positive().default(60_000),
});

export type SagaEngineConfig = z.infer<typeof SagaEngineConfigSchema>;
export type SagaEngineConfigInput = z.input<typeof SagaEngineConfigSchema>;

/**
 * Validate engine configuration and fill in defaults.
 *
 * @throws {@link ConfigurationError} If a value is out of range or of the wrong type.
 */
export function loadEngineConfig(input: unknown = {}): SagaEngineConfig {
  const parsed = SagaEngineConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`invalid saga engine config: ${issues}`);
  }
  return parsed.data;
}

function readNumber(value: string | undefined): number | string | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isNaN(n) ? value : n;
}

function readBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      return value;
  }
}

/**
 * Read engine configuration from environment variables:
 * `SAGA_ID_PREFIX`, `SAGA_MANAGE_REPLY_SUBSCRIPTIONS`, `SAGA_STALE_AFTER_MS`
 * and `SAGA_SWEEP_INTERVAL_MS`. Unset variables take the defaults.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): SagaEngineConfig {
  return loadEngineConfig({
    sagaIdPrefix: env.SAGA_ID_PREFIX || undefined,
    manageReplySubscriptions: readBoolean(env.SAGA_MANAGE_REPLY_SUBSCRIPTIONS),
    staleAfterMs: readNumber(env.SAGA_STALE_AFTER_MS),
    sweepIntervalMs: readNumber(env.SAGA_SWEEP_INTERVAL_MS),
  });
}
