/** Transport headers attached to a published message. */
export type MessageHeaders = Record<string, string>;

/** Receives messages delivered to a subscribed destination. */
export type MessageHandler = (message: unknown, headers: MessageHeaders) => void | Promise<void>;

/**
 * Publish/subscribe contract the orchestrator dispatches commands over.
 * Delivery is assumed to be at-least-once; duplicates and reordering are
 * tolerated by the orchestrator's reply guard.
 */
export interface CommandChannel {
  /** Publish `message` to `destination`. Resolves with the message id. */
  publish(destination: string, message: unknown, headers?: MessageHeaders): Promise<string>;
  /** Route messages published to `destination` into `handler`. Resolves with the subscription id. */
  subscribe(destination: string, handler: MessageHandler): Promise<string>;
  /** Stop a subscription. Unknown ids are ignored. */
  unsubscribe(subscriptionId: string): Promise<void>;
}

/** Destination naming convention for replies and lifecycle events. */
export const destinations = {
  actionResult: (sagaId: string): string => `saga.${sagaId}.action_result`,
  compensationResult: (sagaId: string): string => `saga.${sagaId}.compensation_result`,
  completed: (sagaId: string): string => `saga_events.${sagaId}.completed`,
  failed: (sagaId: string): string => `saga_events.${sagaId}.failed`,
} as const;

/** A message recorded by {@link InMemoryCommandChannel}. */
export interface PublishedMessage {
  readonly id: string;
  readonly destination: string;
  readonly message: unknown;
  readonly headers: MessageHeaders;
}

/**
 * In-process {@link CommandChannel}.
 *
 * Every publish is recorded in {@link published} and handed to the matching
 * subscribers. Handlers that return a promise are tracked; {@link drain}
 * waits for them and rethrows their failures.
 */
export class InMemoryCommandChannel implements CommandChannel {
  /** Every message published so far, in publish order. */
  readonly published: PublishedMessage[] = [];

  private readonly _subscriptions = new Map<string, { destination: string; handler: MessageHandler }>();
  private readonly _inFlight = new Set<Promise<void>>();
  private readonly _errors: unknown[] = [];
  private _sequence = 0;

  async publish(destination: string, message: unknown, headers: MessageHeaders = {}): Promise<string> {
    const id = `msg-${++this._sequence}`;
    this.published.push({ id, destination, message, headers });
    for (const subscription of [...this._subscriptions.values()]) {
      if (subscription.destination === destination) {
        this._track(subscription.handler(message, headers));
      }
    }
    return id;
  }

  async subscribe(destination: string, handler: MessageHandler): Promise<string> {
    const id = `sub-${++this._sequence}`;
    this._subscriptions.set(id, { destination, handler });
    return id;
  }

  async unsubscribe(subscriptionId: string): Promise<void> {
    this._subscriptions.delete(subscriptionId);
  }

  /** Messages published to `destination`, in publish order. */
  messagesFor(destination: string): unknown[] {
    return this.published.filter((p) => p.destination === destination).map((p) => p.message);
  }

  /** Destinations that currently have at least one subscriber. */
  subscribedDestinations(): string[] {
    return [...new Set([...this._subscriptions.values()].map((s) => s.destination))];
  }

  /**
   * Wait until every handler started by a publish has settled, including
   * handlers started while waiting.
   *
   * @throws {AggregateError} If any handler rejected.
   */
  async drain(): Promise<void> {
    while (this._inFlight.size > 0) {
      await Promise.all([...this._inFlight]);
    }
    if (this._errors.length > 0) {
      const errors = this._errors.splice(0);
      throw new AggregateError(errors, `${errors.length} message handler(s) failed`);
    }
  }

  private _track(result: void | Promise<void>): void {
    if (!(result instanceof Promise)) {
      return;
    }
    const settled: Promise<void> = result
      .catch((err: unknown) => {
        this._errors.push(err);
      })
      .finally(() => {
        this._inFlight.delete(settled);
      });
    this._inFlight.add(settled);
  }
}
