import { randomUUID } from 'node:crypto';
import type { CommandChannel, Logger, MessageHandler, MessageHeaders } from '@compensa/core';
import { describeError } from '@compensa/core';
import type { Redis } from 'ioredis';
import { z } from 'zod';

/** What travels over a Redis pub/sub channel. */
export const envelopeSchema = z.object({
  id: z.string(),
  headers: z.record(z.string()),
  body: z.unknown(),
});

export type Envelope = z.infer<typeof envelopeSchema>;

export interface RedisCommandChannelOptions {
  logger?: Logger;
  /** Source of message ids. Defaults to `randomUUID`. */
  generateId?: () => string;
}

interface Subscription {
  readonly destination: string;
  readonly handler: MessageHandler;
}

/**
 * {@link CommandChannel} over Redis pub/sub. Destinations map one-to-one to
 * Redis channels and each message is a JSON {@link Envelope}.
 *
 * Redis puts a connection in subscriber mode once it subscribes, so
 * publishing and subscribing take separate clients.
 *
 * Handler failures are logged; pub/sub has no acknowledgement to withhold.
 *
 * @example
 * ```typescript
 * const channel = new RedisCommandChannel(new Redis(url), new Redis(url), { logger });
 * ```
 */
export class RedisCommandChannel implements CommandChannel {
  private readonly _publisher: Redis;
  private readonly _subscriber: Redis;
  private readonly _logger: Logger | undefined;
  private readonly _generateId: () => string;
  private readonly _subscriptions = new Map<string, Subscription>();
  private readonly _listener = (destination: string, raw: string): void => {
    this._deliver(destination, raw);
  };

  constructor(publisher: Redis, subscriber: Redis, options: RedisCommandChannelOptions = {}) {
    this._publisher = publisher;
    this._subscriber = subscriber;
    this._logger = options.logger;
    this._generateId = options.generateId ?? randomUUID;
    this._subscriber.on('message', this._listener);
  }

  async publish(destination: string, message: unknown, headers: MessageHeaders = {}): Promise<string> {
    const envelope: Envelope = { id: this._generateId(), headers, body: message };
    await this._publisher.publish(destination, JSON.stringify(envelope));
    return envelope.id;
  }

  async subscribe(destination: string, handler: MessageHandler): Promise<string> {
    const id = this._generateId();
    const first = !this._hasSubscribers(destination);
    this._subscriptions.set(id, { destination, handler });
    if (first) {
      await this._subscriber.subscribe(destination);
    }
    return id;
  }

  async unsubscribe(subscriptionId: string): Promise<void> {
    const subscription = this._subscriptions.get(subscriptionId);
    if (subscription === undefined) {
      return;
    }
    this._subscriptions.delete(subscriptionId);
    if (!this._hasSubscribers(subscription.destination)) {
      await this._subscriber.unsubscribe(subscription.destination);
    }
  }

  /** Detach from the subscriber client. The clients themselves stay open. */
  close(): void {
    this._subscriber.off('message', this._listener);
    this._subscriptions.clear();
  }

  private _hasSubscribers(destination: string): boolean {
    for (const subscription of this._subscriptions.values()) {
      if (subscription.destination === destination) return true;
    }
    return false;
  }

  private _deliver(destination: string, raw: string): void {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      this._logger?.warn('channel:malformed-message', { destination, error: describeError(err) });
      return;
    }
    const parsed = envelopeSchema.safeParse(data);
    if (!parsed.success) {
      this._logger?.warn('channel:malformed-message', { destination, error: parsed.error.message });
      return;
    }
    const { id, headers, body } = parsed.data;
    for (const subscription of [...this._subscriptions.values()]) {
      if (subscription.destination !== destination) continue;
      void Promise.resolve()
        .then(() => subscription.handler(body, headers))
        .catch((err: unknown) => {
          this._logger?.error('channel:handler-failed', {
            destination,
            messageId: id,
            error: describeError(err),
          });
        });
    }
  }
}
