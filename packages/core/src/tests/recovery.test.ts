import { describe, it, expect, vi, afterEach } from 'vitest';
import { defineSaga } from '../builder.js';
import { SagaOrchestrator } from '../orchestrator.js';
import { SagaRecovery } from '../recovery.js';
import { InMemorySagaRepository } from '../persistence.js';
import { InMemoryCommandChannel } from '../channel.js';
import { PersistenceError } from '../errors.js';
import type { SagaInstance } from '../types.js';

const STARTED = new Date('2026-01-01T00:00:00.000Z');
const LATER = new Date('2026-01-01T00:10:00.000Z');

function setup() {
  const repository = new InMemorySagaRepository();
  const channel = new InMemoryCommandChannel();
  const orchestrator = new SagaOrchestrator({
    definition: defineSaga('order', [
      { name: 'charge_payment', actionCommand: 'payments.charge', compensationCommand: 'payments.refund' },
    ]),
    repository,
    channel,
    config: { manageReplySubscriptions: false },
    clock: () => STARTED,
    generateId: () => 'fixed',
  });
  const recovery = new SagaRecovery(orchestrator, repository, { clock: () => LATER });
  return { repository, channel, orchestrator, recovery };
}

function storedInstance(overrides: Partial<SagaInstance>): SagaInstance {
  return {
    id: 'other',
    definitionId: 'order',
    forwardCursor: 0,
    compensationCursor: -1,
    status: 'Running',
    attempts: [],
    sharedPayload: {},
    correlationId: null,
    createdAt: STARTED.toISOString(),
    updatedAt: STARTED.toISOString(),
    ...overrides,
  };
}

afterEach(() => {
  vi.useRealTimers();
});

describe('SagaRecovery.sweep', () => {
  it('resumes instances that have not moved for staleAfterMs', async () => {
    const { orchestrator, channel, recovery } = setup();
    await orchestrator.start({ order_id: '123' });

    const result = await recovery.sweep();

    expect(result).toEqual({ resumed: ['saga-order-fixed'], failed: [] });
    expect(channel.published.map((p) => p.destination)).toEqual(['payments.charge', 'payments.charge']);
  });

  it('ignores fresh instances and other definitions', async () => {
    const { repository, recovery } = setup();
    await repository.save(storedInstance({ id: 'fresh', updatedAt: LATER.toISOString() }));
    await repository.save(storedInstance({ id: 'foreign', definitionId: 'refund' }));

    expect(await recovery.sweep()).toEqual({ resumed: [], failed: [] });
  });

  it('collects an unreadable snapshot as a failure and resumes the rest', async () => {
    class UnreadableRepository extends InMemorySagaRepository {
      override async load(id: string): Promise<SagaInstance | undefined> {
        if (id === 'bad') throw new PersistenceError('stored saga state is corrupt', id);
        return super.load(id);
      }

      override async findStale(updatedBefore: Date): Promise<string[]> {
        return ['bad', ...(await super.findStale(updatedBefore))];
      }
    }
    const repository = new UnreadableRepository();
    const channel = new InMemoryCommandChannel();
    const orchestrator = new SagaOrchestrator({
      definition: defineSaga('order', [
        { name: 'charge_payment', actionCommand: 'payments.charge', compensationCommand: 'payments.refund' },
      ]),
      repository,
      channel,
      config: { manageReplySubscriptions: false },
      clock: () => STARTED,
      generateId: () => 'fixed',
    });
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const recovery = new SagaRecovery(orchestrator, repository, { logger, clock: () => LATER });
    await orchestrator.start({});

    const result = await recovery.sweep();

    expect(result.resumed).toEqual(['saga-order-fixed']);
    expect(result.failed).toHaveLength(1);
    expect(result.failed[0].sagaId).toBe('bad');
    expect(result.failed[0].error).toBeInstanceOf(PersistenceError);
    expect(logger.error).toHaveBeenCalledWith('recovery:resume-failed', {
      sagaId: 'bad',
      error: 'stored saga state is corrupt',
    });
    expect(channel.published.map((p) => p.destination)).toEqual(['payments.charge', 'payments.charge']);
  });

  it('parks an instance whose pending step is missing from the definition', async () => {
    const { orchestrator, repository, channel, recovery } = setup();
    await repository.save(
      storedInstance({
        id: 'broken',
        attempts: [{ stepName: 'removed_step', stepIndex: 0, requestPayload: {}, status: 'Pending' }],
      }),
    );
    await orchestrator.start({});

    const result = await recovery.sweep();

    expect(result).toEqual({ resumed: ['broken', 'saga-order-fixed'], failed: [] });
    const broken = await repository.load('broken');
    expect(broken?.status).toBe('FailedCompensation');
    expect(channel.messagesFor('saga_events.broken.failed')).toEqual([
      { saga_id: 'broken', reason: 'saga definition "order" has no step named "removed_step"' },
    ]);
    expect(await recovery.sweep()).toEqual({ resumed: ['saga-order-fixed'], failed: [] });
  });
});

describe('SagaRecovery timer', () => {
  it('sweeps every sweepIntervalMs until stopped', async () => {
    vi.useFakeTimers();
    const { orchestrator, repository } = setup();
    const recovery = new SagaRecovery(orchestrator, repository, { config: { sweepIntervalMs: 1000 } });
    const sweep = vi.spyOn(recovery, 'sweep').mockResolvedValue({ resumed: [], failed: [] });

    recovery.start();
    expect(recovery.isRunning).toBe(true);
    await vi.advanceTimersByTimeAsync(2500);
    expect(sweep).toHaveBeenCalledTimes(2);

    recovery.stop();
    expect(recovery.isRunning).toBe(false);
    await vi.advanceTimersByTimeAsync(5000);
    expect(sweep).toHaveBeenCalledTimes(2);
  });

  it('logs a sweep that throws and keeps the timer alive', async () => {
    vi.useFakeTimers();
    const { orchestrator, repository } = setup();
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const recovery = new SagaRecovery(orchestrator, repository, { logger, config: { sweepIntervalMs: 1000 } });
    vi.spyOn(recovery, 'sweep').mockRejectedValue(new Error('store unavailable'));

    recovery.start();
    await vi.advanceTimersByTimeAsync(1000);
    recovery.stop();

    expect(logger.error).toHaveBeenCalledWith('recovery:sweep-failed', { error: 'store unavailable' });
  });
});
