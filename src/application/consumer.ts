import type { Logger } from 'pino';
import { BrokerError, ConfigError, ConsumerError, describeError, errorKind } from '../domain/index.js';
import type {
  BrokerConnection,
  PullSubscription,
  StreamMessage,
} from '../infrastructure/broker/index.js';
import type { ConsumerConfig } from '../infrastructure/config/index.js';
import { createLogger } from '../infrastructure/logger.js';
import { EventMetrics, getDefaultMetrics } from '../infrastructure/metrics/index.js';
import { decodeEvent } from './event-codec.js';
import type { DomainEvent } from './event-schema.js';
import { matchesAny } from './subject-filter.js';

export type ConsumerState = 'created' | 'subscribing' | 'running' | 'stopping' | 'stopped';

/**
 * Handles one event. The handler owns acknowledgment: it calls
 * `message.ack()` on success or `message.nak()` to ask for redelivery.
 */
export type EventHandler = (event: DomainEvent, message: StreamMessage) => Promise<void>;

export interface EventConsumerOptions {
  connection: BrokerConnection;
  streamName: string;
  config: ConsumerConfig;
  batchSize?: number;
  fetchTimeoutSeconds?: number;
  /** Pause after a failed fetch before polling again. */
  fetchErrorBackoffMs?: number;
  metrics?: EventMetrics;
  log?: Logger;
}

export interface SubscribeOptions {
  gracefulShutdownTimeoutSeconds?: number;
  /** Aborting stops the consumer; `subscribe` then rejects with the abort reason. */
  signal?: AbortSignal;
}

type Settled = { status: 'fulfilled' } | { status: 'rejected'; reason: unknown } | { status: 'timeout' };

/** Waits for `promise` at most `ms`, never rejecting. */
async function settleWithin(promise: Promise<unknown>, ms: number): Promise<Settled> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<Settled>((resolve) => {
    timer = setTimeout(() => resolve({ status: 'timeout' }), ms);
  });
  try {
    return await Promise.race([
      promise.then(
        (): Settled => ({ status: 'fulfilled' }),
        (reason: unknown): Settled => ({ status: 'rejected', reason }),
      ),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Durable pull consumer.
 *
 * Lifecycle: created → subscribing → running → stopping → stopped.
 * `stopped` is terminal; build a new instance to consume again. The durable
 * name is the cursor: a new instance with the same name resumes after the
 * last acknowledged message.
 */
export class EventConsumer {
  private readonly connection: BrokerConnection;
  private readonly streamName: string;
  private readonly config: ConsumerConfig;
  private readonly batchSize: number;
  private readonly fetchTimeoutMs: number;
  private readonly fetchErrorBackoffMs: number;
  private readonly metrics: EventMetrics;
  private readonly log: Logger;
  private readonly clientFilters: readonly string[] | undefined;

  private stateValue: ConsumerState = 'created';
  private stopRequested = false;
  private graceMs = 30_000;
  private subscription: PullSubscription | undefined;
  private subscriptionClosed = false;
  private loopDone: Promise<void> | undefined;
  private shutdown: Promise<void> | undefined;
  private wakeBackoff: (() => void) | undefined;
  private markStopped: (() => void) | undefined;
  private inFlightCount = 0;

  constructor(options: EventConsumerOptions) {
    const batchSize = options.batchSize ?? 10;
    const maxPending = options.connection.maxPendingMessages;
    if (!Number.isInteger(batchSize) || batchSize < 1 || batchSize > maxPending) {
      throw new ConfigError(
        `batchSize must be an integer between 1 and ${maxPending}, got ${batchSize}`,
      );
    }

    this.connection = options.connection;
    this.streamName = options.streamName;
    this.config = options.config;
    this.batchSize = batchSize;
    this.fetchTimeoutMs = (options.fetchTimeoutSeconds ?? 5) * 1000;
    this.fetchErrorBackoffMs = options.fetchErrorBackoffMs ?? 1000;
    this.metrics = options.metrics ?? getDefaultMetrics();
    this.log = options.log ?? createLogger('event-consumer');
    this.clientFilters =
      this.config.subject_filter_mode === 'client' && this.config.filter_subjects.length > 0
        ? this.config.filter_subjects
        : undefined;

    this.log.info(
      { stream: this.streamName, consumer: this.durableName, batch_size: this.batchSize },
      'EventConsumer initialized',
    );
  }

  get state(): ConsumerState {
    return this.stateValue;
  }

  get durableName(): string {
    return this.config.durable_name;
  }

  /** Messages currently inside decode or the handler. */
  get inFlight(): number {
    return this.inFlightCount;
  }

  /**
   * Ensures the durable consumer, then fetches and dispatches until stopped.
   *
   * Resolves once `stop()` has finished, at the latest when its grace period
   * ends. Rejects with `ConsumerError` when setup fails, or with the signal's
   * reason after an abort.
   */
  async subscribe(handler: EventHandler, options: SubscribeOptions = {}): Promise<void> {
    if (this.stateValue !== 'created') {
      throw new ConsumerError(
        `Consumer ${this.durableName} cannot subscribe from state ${this.stateValue}`,
      );
    }

    const { gracefulShutdownTimeoutSeconds = 30, signal } = options;
    this.graceMs = gracefulShutdownTimeoutSeconds * 1000;
    if (signal?.aborted) {
      this.stateValue = 'stopped';
      throw signal.reason;
    }

    this.stateValue = 'subscribing';
    const onAbort = (): void => {
      this.shutdown ??= this.beginShutdown(this.graceMs);
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    let finish: () => void = () => undefined;
    this.loopDone = new Promise<void>((resolve) => {
      finish = resolve;
    });
    const stopped = new Promise<'stopped'>((resolve) => {
      this.markStopped = () => resolve('stopped');
    });

    const running = this.run(handler).finally(finish);
    try {
      // A handler still running past the grace period keeps going detached.
      const first = await Promise.race([running.then(() => 'finished' as const), stopped]);
      if (first === 'stopped') {
        void running.catch((err: unknown) => {
          this.log.error({ err, consumer: this.durableName }, 'Consumer loop failed after stop');
        });
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    if (this.shutdown) await this.shutdown;
    if (signal?.aborted) throw signal.reason;
  }

  /**
   * Stops fetching, tears down the subscription and waits for the current
   * batch, all within the grace period. Never rejects; repeated calls share
   * the same shutdown.
   */
  stop(timeoutSeconds?: number): Promise<void> {
    if (this.shutdown) return this.shutdown;
    if (this.stateValue === 'created' || this.stateValue === 'stopped') {
      this.stateValue = 'stopped';
      this.stopRequested = true;
      return Promise.resolve();
    }
    const graceMs = timeoutSeconds !== undefined ? timeoutSeconds * 1000 : this.graceMs;
    this.shutdown = this.beginShutdown(graceMs);
    return this.shutdown;
  }

  // --- Loop ---

  private async run(handler: EventHandler): Promise<void> {
    try {
      await this.ensureDurable();
      const filterSubject =
        this.config.subject_filter_mode === 'server' && this.config.filter_subjects.length === 1
          ? this.config.filter_subjects[0]
          : undefined;
      this.subscription = await this.connection.streams.pullSubscribe({
        stream: this.streamName,
        durable: this.durableName,
        filterSubject,
      });
      this.log.info(
        { stream: this.streamName, consumer: this.durableName, filter: filterSubject ?? 'all' },
        'Started pull subscription',
      );
    } catch (err: unknown) {
      this.log.error({ err, consumer: this.durableName }, 'Subscription failed');
      if (!this.shutdown) this.stateValue = 'stopped';
      throw new ConsumerError(
        `Failed to subscribe consumer ${this.durableName}: ${describeError(err)}`,
        { cause: err },
      );
    }

    if (!this.stopRequested) {
      this.stateValue = 'running';
      await this.loop(this.subscription, handler);
    }
    await this.closeSubscription(this.graceMs);
  }

  private async loop(subscription: PullSubscription, handler: EventHandler): Promise<void> {
    while (!this.stopRequested) {
      let messages: StreamMessage[];
      try {
        messages = await subscription.fetch(this.batchSize, this.fetchTimeoutMs);
      } catch (err: unknown) {
        if (this.stopRequested) break;
        this.log.error({ err, consumer: this.durableName }, 'Fetch failed; retrying');
        await this.backoff();
        continue;
      }

      if (messages.length === 0) continue;
      this.log.debug({ count: messages.length, consumer: this.durableName }, 'Fetched messages');

      for (const message of messages) {
        await this.processMessage(message, handler);
      }
      await this.refreshLag();
    }
  }

  private async processMessage(message: StreamMessage, handler: EventHandler): Promise<void> {
    const consumer = this.durableName;
    let eventType = 'unknown';

    this.inFlightCount++;
    this.metrics.consumerProcessing.inc({ consumer });
    try {
      if (this.clientFilters && !matchesAny(this.clientFilters, message.subject)) {
        this.log.debug({ subject: message.subject, seq: message.seq }, 'Terminating message outside filter');
        this.metrics.eventsConsumed.inc({ event_type: message.subject, consumer, status: 'filtered' });
        this.settle(message, 'term');
        return;
      }

      let event: DomainEvent;
      try {
        event = decodeEvent(message.data);
      } catch (err: unknown) {
        this.log.error({ err, subject: message.subject, seq: message.seq }, 'Failed to decode message');
        this.metrics.consumerErrors.inc({ consumer, error_type: errorKind(err) });
        this.metrics.eventsConsumed.inc({ event_type: eventType, consumer, status: 'nak' });
        this.settle(message, 'nak');
        return;
      }

      eventType = event.event_type;
      this.log.debug({ event_id: event.event_id, event_type: eventType }, 'Processing event');

      const endTimer = this.metrics.consumeDuration.startTimer({ event_type: eventType, consumer });
      try {
        await handler(event, message);
      } finally {
        endTimer();
      }
      this.metrics.eventsConsumed.inc({ event_type: eventType, consumer, status: 'ack' });
    } catch (err: unknown) {
      this.log.error(
        { err, subject: message.subject, seq: message.seq, event_type: eventType },
        'Error processing message',
      );
      this.metrics.consumerErrors.inc({ consumer, error_type: errorKind(err) });
      this.metrics.eventsConsumed.inc({ event_type: eventType, consumer, status: 'error' });
      this.settle(message, 'nak');
    } finally {
      this.inFlightCount--;
      this.metrics.consumerProcessing.dec({ consumer });
    }
  }

  /** nak or term; a failure here must not take the loop down. */
  private settle(message: StreamMessage, action: 'nak' | 'term'): void {
    try {
      if (action === 'nak') message.nak();
      else message.term();
    } catch (err: unknown) {
      this.log.error({ err, seq: message.seq, action }, 'Failed to settle message');
    }
  }

  private backoff(): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.wakeBackoff = undefined;
        resolve();
      }, this.fetchErrorBackoffMs);
      this.wakeBackoff = () => {
        clearTimeout(timer);
        this.wakeBackoff = undefined;
        resolve();
      };
    });
  }

  // --- Broker state ---

  /** Reuses the durable by name, or creates it from config when absent. */
  private async ensureDurable(): Promise<void> {
    const streams = this.connection.streams;
    try {
      await streams.consumerInfo(this.streamName, this.durableName);
      this.log.info({ stream: this.streamName, consumer: this.durableName }, 'Using existing consumer');
    } catch (err: unknown) {
      if (!(err instanceof BrokerError && err.code === 'not_found')) throw err;

      // Client-side filtering needs every subject delivered.
      const config: ConsumerConfig = this.clientFilters
        ? { ...this.config, filter_subjects: [] }
        : this.config;
      await streams.addConsumer(this.streamName, config);
      this.log.info({ stream: this.streamName, consumer: this.durableName }, 'Created consumer');
    }
  }

  private async refreshLag(): Promise<void> {
    try {
      const info = await this.connection.streams.consumerInfo(this.streamName, this.durableName);
      this.metrics.consumerLag.set({ stream: this.streamName, consumer: this.durableName }, info.numPending);
    } catch (err: unknown) {
      this.log.debug({ err, consumer: this.durableName }, 'Could not refresh consumer lag');
    }
  }

  // --- Shutdown ---

  private async beginShutdown(graceMs: number): Promise<void> {
    const deadline = Date.now() + graceMs;
    this.stopRequested = true;
    this.stateValue = 'stopping';
    this.log.info({ consumer: this.durableName, timeout_ms: graceMs }, 'Stopping consumer');
    this.wakeBackoff?.();

    await this.closeSubscription(graceMs);

    if (this.loopDone) {
      const outcome = await settleWithin(this.loopDone, Math.max(deadline - Date.now(), 0));
      if (outcome.status === 'timeout') {
        this.log.warn({ consumer: this.durableName }, 'Graceful shutdown timed out, forcing stop');
      }
    }

    this.stateValue = 'stopped';
    this.log.info({ consumer: this.durableName }, 'Consumer stopped');
    this.markStopped?.();
  }

  private async closeSubscription(graceMs: number): Promise<void> {
    const subscription = this.subscription;
    if (!subscription || this.subscriptionClosed) return;
    this.subscriptionClosed = true;

    const outcome = await settleWithin(
      Promise.resolve().then(() => subscription.unsubscribe()),
      graceMs,
    );
    if (outcome.status === 'rejected') {
      this.log.error({ err: outcome.reason, consumer: this.durableName }, 'Error unsubscribing');
    } else if (outcome.status === 'timeout') {
      this.log.warn({ consumer: this.durableName }, 'Unsubscribe timed out');
    }
  }
}
