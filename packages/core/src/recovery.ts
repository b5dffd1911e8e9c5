import type { Logger } from './types.js';
import type { SagaRepository } from './persistence.js';
import type { SagaOrchestrator } from './orchestrator.js';
import type { SagaEngineConfig, SagaEngineConfigInput } from './config.js';
import { loadEngineConfig } from './config.js';
import { describeError } from './errors.js';

export interface SagaRecoveryOptions {
  logger?: Logger;
  config?: SagaEngineConfigInput;
  clock?: () => Date;
}

export interface SweepResult {
  /** Instances that were resumed. */
  readonly resumed: string[];
  /** Instances that could not be loaded or resumed; the sweep carries on past them. */
  readonly failed: Array<{ readonly sagaId: string; readonly error: unknown }>;
}

/**
 * Periodically resumes instances that have not moved for `staleAfterMs`.
 *
 * A saga stalls when the process that owned it died between persisting a
 * transition and publishing its command, or when a reply was lost. Resuming
 * re-publishes the pending command; duplicates are absorbed by the
 * participants and by the orchestrator's reply guard.
 */
export class SagaRecovery {
  private readonly _orchestrator: SagaOrchestrator;
  private readonly _repository: SagaRepository;
  private readonly _logger: Logger | undefined;
  private readonly _config: SagaEngineConfig;
  private readonly _clock: () => Date;
  private _timer: ReturnType<typeof setInterval> | null = null;
  private _sweeping = false;

  constructor(orchestrator: SagaOrchestrator, repository: SagaRepository, options: SagaRecoveryOptions = {}) {
    this._orchestrator = orchestrator;
    this._repository = repository;
    this._logger = options.logger;
    this._config = loadEngineConfig(options.config ?? {});
    this._clock = options.clock ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this._timer !== null;
  }

  /**
   * Resume every stale instance once. Instances of other definitions are
   * skipped; failures are collected, not thrown.
   */
  async sweep(): Promise<SweepResult> {
    const cutoff = new Date(this._clock().getTime() - this._config.staleAfterMs);
    const ids = await this._repository.findStale(cutoff);
    const result: SweepResult = { resumed: [], failed: [] };

    for (const sagaId of ids) {
      try {
        const instance = await this._repository.load(sagaId);
        if (instance === undefined || instance.definitionId !== this._orchestrator.definition.id) {
          continue;
        }
        await this._orchestrator.resume(sagaId);
        result.resumed.push(sagaId);
      } catch (error) {
        this._logger?.error('recovery:resume-failed', { sagaId, error: describeError(error) });
        result.failed.push({ sagaId, error });
      }
    }

    if (ids.length > 0) {
      this._logger?.info('recovery:sweep', {
        stale: ids.length,
        resumed: result.resumed.length,
        failed: result.failed.length,
      });
    }
    return result;
  }

  /** Run {@link sweep} every `sweepIntervalMs`. The timer does not keep the process alive. */
  start(): void {
    if (this._timer !== null) {
      return;
    }
    this._timer = setInterval(() => {
      void this._tick();
    }, this._config.sweepIntervalMs);
    this._timer.unref();
    this._logger?.info('recovery:start', { intervalMs: this._config.sweepIntervalMs });
  }

  stop(): void {
    if (this._timer === null) {
      return;
    }
    clearInterval(this._timer);
    this._timer = null;
    this._logger?.info('recovery:stop');
  }

  private async _tick(): Promise<void> {
    // A slow sweep is never overlapped by the next one.
    if (this._sweeping) {
      return;
    }
    this._sweeping = true;
    try {
      await this.sweep();
    } catch (error) {
      this._logger?.error('recovery:sweep-failed', { error: describeError(error) });
    } finally {
      this._sweeping = false;
    }
  }
}
