import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';
import {
  ConfigError,
  PayloadTooLargeError,
  PublishError,
  errorKind,
  isRetryableError,
} from '../domain/index.js';
import type { EventEnvelope, PubAck } from '../domain/index.js';
import type { BrokerConnection, MessageHeaders } from '../infrastructure/broker/index.js';
import { createLogger } from '../infrastructure/logger.js';
import { EventMetrics, getDefaultMetrics } from '../infrastructure/metrics/index.js';
import { encodeEvent } from './event-codec.js';

export interface EventPublisherOptions {
  connection: BrokerConnection;
  defaultTimeoutSeconds?: number;
  /** Total attempts per event, the first included. */
  maxRetries?: number;
  /** Wait before retry `n` (0-based) is `retryBackoffBase ** n` seconds. */
  retryBackoffBase?: number;
  metrics?: EventMetrics;
  log?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface PublishCallOptions {
  headers?: MessageHeaders;
  timeoutSeconds?: number;
}

export interface PublishBatchOptions extends PublishCallOptions {
  /** Publish concurrently (default) or one after another. */
  parallel?: boolean;
}

/**
 * Publishes events to the stream that captures their `event_type`.
 *
 * At-least-once: a failed attempt is retried with exponential backoff, and
 * the event id doubles as the broker's message id so a retry after a lost
 * ack is stored only once.
 */
export class EventPublisher {
  private readonly connection: BrokerConnection;
  private readonly defaultTimeoutSeconds: number;
  private readonly maxRetries: number;
  private readonly retryBackoffBase: number;
  private readonly metrics: EventMetrics;
  private readonly log: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: EventPublisherOptions) {
    const maxRetries = options.maxRetries ?? 3;
    if (!Number.isInteger(maxRetries) || maxRetries < 1) {
      throw new ConfigError(`maxRetries must be a positive integer, got ${maxRetries}`);
    }

    this.connection = options.connection;
    this.defaultTimeoutSeconds = options.defaultTimeoutSeconds ?? 5;
    this.maxRetries = maxRetries;
    this.retryBackoffBase = options.retryBackoffBase ?? 2;
    this.metrics = options.metrics ?? getDefaultMetrics();
    this.log = options.log ?? createLogger('event-publisher');
    this.sleep = options.sleep ?? ((ms) => delay(ms));

    this.log.info(
      {
        timeout_seconds: this.defaultTimeoutSeconds,
        max_retries: this.maxRetries,
        backoff_base: this.retryBackoffBase,
      },
      'EventPublisher initialized',
    );
  }

  async publish(event: EventEnvelope, options: PublishCallOptions = {}): Promise<PubAck> {
    const eventType = event.event_type;
    const payload = encodeEvent(event);

    this.metrics.payloadSize.observe({ event_type: eventType }, payload.byteLength);
    const limit = this.connection.maxPayloadBytes;
    if (payload.byteLength > limit) {
      throw new PayloadTooLargeError(event.event_id, eventType, payload.byteLength, limit);
    }

    // Identity headers win over caller headers of the same name.
    const headers: Record<string, string> = {
      ...options.headers,
      'event-id': event.event_id,
      'event-version': event.event_version,
      'source-service': event.metadata.source_service,
    };
    if (event.metadata.correlation_id) {
      headers['correlation-id'] = event.metadata.correlation_id;
    }

    const timeoutMs = (options.timeoutSeconds ?? this.defaultTimeoutSeconds) * 1000;
    let lastError: unknown;
    let attempts = 0;

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      attempts = attempt + 1;
      const endTimer = this.metrics.publishDuration.startTimer({ event_type: eventType });
      try {
        const ack = await this.connection.streams.publish(eventType, payload, {
          headers,
          timeoutMs,
          messageId: event.event_id,
        });
        endTimer();

        this.metrics.eventsPublished.inc({ event_type: eventType, stream: ack.stream, status: 'success' });
        this.log.info(
          {
            event_id: event.event_id,
            event_type: eventType,
            stream: ack.stream,
            seq: ack.seq,
            duplicate: ack.duplicate,
            attempt: attempts,
          },
          'Published event',
        );
        return ack;
      } catch (err: unknown) {
        endTimer();
        lastError = err;

        if (attempt > 0) {
          this.metrics.publishRetries.inc({ event_type: eventType, attempt: String(attempts) });
        }

        const retryable = isRetryableError(err);
        const willRetry = retryable && attempt < this.maxRetries - 1;
        const waitSeconds = this.retryBackoffBase ** attempt;
        this.log.warn(
          {
            err,
            event_id: event.event_id,
            event_type: eventType,
            attempt: attempts,
            max_retries: this.maxRetries,
            wait_seconds: willRetry ? waitSeconds : undefined,
            error_type: errorKind(err),
          },
          `Publish attempt ${attempts}/${this.maxRetries} failed`,
        );

        if (!retryable) break;
        if (willRetry) await this.sleep(waitSeconds * 1000);
      }
    }

    const errorType = errorKind(lastError);
    this.metrics.eventsPublished.inc({ event_type: eventType, stream: 'unknown', status: 'failure' });
    this.metrics.publishErrors.inc({ event_type: eventType, error_type: errorType });
    this.log.error(
      { err: lastError, event_id: event.event_id, event_type: eventType, attempts },
      'Failed to publish event',
    );
    throw new PublishError(event.event_id, eventType, attempts, lastError);
  }

  /**
   * Publishes every event and returns the acks in input order.
   *
   * Parallel mode rejects with the first failure while the other publishes
   * keep running; sequential mode stops at the first failure.
   */
  async publishBatch(
    events: readonly EventEnvelope[],
    options: PublishBatchOptions = {},
  ): Promise<PubAck[]> {
    if (events.length === 0) return [];

    const { parallel = true, ...callOptions } = options;
    this.log.info({ count: events.length, parallel }, 'Publishing event batch');

    if (parallel) {
      return Promise.all(events.map((event) => this.publish(event, callOptions)));
    }

    const acks: PubAck[] = [];
    for (const event of events) {
      acks.push(await this.publish(event, callOptions));
    }
    return acks;
  }

  /** Publishes with a `reply-to` header naming where responders should answer. */
  async publishWithReply(
    event: EventEnvelope,
    replySubject: string,
    options: PublishCallOptions = {},
  ): Promise<PubAck> {
    return this.publish(event, {
      ...options,
      headers: { ...options.headers, 'reply-to': replySubject },
    });
  }
}
