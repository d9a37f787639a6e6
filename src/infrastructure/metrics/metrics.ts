import { Counter, Gauge, Histogram, Registry } from 'prom-client';

const DURATION_BUCKETS = [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5];
const PAYLOAD_BUCKETS = [100, 500, 1000, 5000, 10000, 50000, 100000, 500000, 1000000];

/**
 * Prometheus metrics for publishing, consuming and the broker connection.
 *
 * Each instance owns its registry so tests and multiple clients in one
 * process never collide on metric names. Components receive an instance
 * through their options and fall back to `getDefaultMetrics()`.
 */
export class EventMetrics {
  readonly registry: Registry;

  // --- Publisher ---
  readonly eventsPublished: Counter<'event_type' | 'stream' | 'status'>;
  readonly publishDuration: Histogram<'event_type'>;
  readonly publishErrors: Counter<'event_type' | 'error_type'>;
  readonly publishRetries: Counter<'event_type' | 'attempt'>;
  readonly payloadSize: Histogram<'event_type'>;

  // --- Consumer ---
  readonly eventsConsumed: Counter<'event_type' | 'consumer' | 'status'>;
  readonly consumeDuration: Histogram<'event_type' | 'consumer'>;
  readonly consumerLag: Gauge<'stream' | 'consumer'>;
  readonly consumerProcessing: Gauge<'consumer'>;
  readonly consumerErrors: Counter<'consumer' | 'error_type'>;

  // --- Connection ---
  readonly connectionStatus: Gauge<'client_name'>;
  readonly reconnectionAttempts: Counter<'client_name' | 'status'>;
  readonly connectionDuration: Gauge<'client_name'>;

  // --- Streams ---
  readonly streamMessages: Gauge<'stream'>;
  readonly streamBytes: Gauge<'stream'>;

  private readonly connectedSince = new Map<string, number>();

  constructor(registry: Registry = new Registry()) {
    this.registry = registry;
    const registers = [registry];

    this.eventsPublished = new Counter({
      name: 'nats_events_published_total',
      help: 'Total number of events published to NATS JetStream',
      labelNames: ['event_type', 'stream', 'status'] as const,
      registers,
    });
    this.publishDuration = new Histogram({
      name: 'nats_publish_duration_seconds',
      help: 'Time taken to publish event to NATS JetStream',
      labelNames: ['event_type'] as const,
      buckets: DURATION_BUCKETS,
      registers,
    });
    this.publishErrors = new Counter({
      name: 'nats_publish_errors_total',
      help: 'Total number of publish errors by error type',
      labelNames: ['event_type', 'error_type'] as const,
      registers,
    });
    this.publishRetries = new Counter({
      name: 'nats_publish_retries_total',
      help: 'Total number of publish retry attempts',
      labelNames: ['event_type', 'attempt'] as const,
      registers,
    });
    this.payloadSize = new Histogram({
      name: 'nats_event_payload_size_bytes',
      help: 'Size of event payloads in bytes',
      labelNames: ['event_type'] as const,
      buckets: PAYLOAD_BUCKETS,
      registers,
    });

    this.eventsConsumed = new Counter({
      name: 'nats_events_consumed_total',
      help: 'Total number of events consumed from NATS JetStream',
      labelNames: ['event_type', 'consumer', 'status'] as const,
      registers,
    });
    this.consumeDuration = new Histogram({
      name: 'nats_consume_duration_seconds',
      help: 'Time taken to process consumed event',
      labelNames: ['event_type', 'consumer'] as const,
      buckets: DURATION_BUCKETS,
      registers,
    });
    this.consumerLag = new Gauge({
      name: 'nats_consumer_lag_messages',
      help: 'Number of pending messages waiting to be consumed',
      labelNames: ['stream', 'consumer'] as const,
      registers,
    });
    this.consumerProcessing = new Gauge({
      name: 'nats_consumer_processing_messages',
      help: 'Number of messages currently being processed by consumer',
      labelNames: ['consumer'] as const,
      registers,
    });
    this.consumerErrors = new Counter({
      name: 'nats_consumer_errors_total',
      help: 'Total number of consumer errors',
      labelNames: ['consumer', 'error_type'] as const,
      registers,
    });

    this.connectionStatus = new Gauge({
      name: 'nats_connection_status',
      help: 'NATS connection status (1=connected, 0=disconnected)',
      labelNames: ['client_name'] as const,
      registers,
    });
    this.reconnectionAttempts = new Counter({
      name: 'nats_reconnection_attempts_total',
      help: 'Total number of reconnection attempts',
      labelNames: ['client_name', 'status'] as const,
      registers,
    });
    this.connectionDuration = new Gauge({
      name: 'nats_connection_duration_seconds',
      help: 'Duration of current NATS connection in seconds',
      labelNames: ['client_name'] as const,
      registers,
      collect: () => {
        const now = Date.now();
        for (const [clientName, since] of this.connectedSince) {
          this.connectionDuration.set({ client_name: clientName }, (now - since) / 1000);
        }
      },
    });

    this.streamMessages = new Gauge({
      name: 'nats_stream_messages_total',
      help: 'Total number of messages in stream',
      labelNames: ['stream'] as const,
      registers,
    });
    this.streamBytes = new Gauge({
      name: 'nats_stream_bytes_total',
      help: 'Total size of messages in stream (bytes)',
      labelNames: ['stream'] as const,
      registers,
    });
  }

  /** Flips the status gauge and starts or stops the connection clock. */
  setConnected(clientName: string, connected: boolean): void {
    this.connectionStatus.set({ client_name: clientName }, connected ? 1 : 0);
    if (connected) {
      if (!this.connectedSince.has(clientName)) this.connectedSince.set(clientName, Date.now());
    } else {
      this.connectedSince.delete(clientName);
      this.connectionDuration.set({ client_name: clientName }, 0);
    }
  }

  /** Prometheus exposition text for this registry. */
  async expose(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  reset(): void {
    this.connectedSince.clear();
    this.registry.resetMetrics();
  }
}

let defaultMetrics: EventMetrics | undefined;

/** Process-wide metrics used by components that are not handed an instance. */
export function getDefaultMetrics(): EventMetrics {
  defaultMetrics ??= new EventMetrics();
  return defaultMetrics;
}
