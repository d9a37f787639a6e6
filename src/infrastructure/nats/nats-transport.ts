import { DebugEvents, Events, connect, headers as createHeaders } from 'nats';
import type {
  ConnectionOptions,
  Consumer,
  ConsumerMessages,
  JetStreamClient,
  JetStreamManager,
  JetStreamOptions,
  JetStreamPublishOptions,
  JsMsg,
  NatsConnection,
} from 'nats';
import { BrokerError } from '../../domain/index.js';
import type { PubAck } from '../../domain/index.js';
import type {
  BrokerTransport,
  ConsumerInfo,
  MessageHeaders,
  PublishOptions,
  PullSubscribeOptions,
  PullSubscription,
  StreamContext,
  StreamContextOptions,
  StreamInfo,
  StreamMessage,
  TransportConnector,
  TransportOptions,
  TransportStatusListener,
} from '../broker/index.js';
import type { ConsumerConfig, StreamConfig } from '../config/index.js';
import {
  consumerFilters,
  fromNatsConsumerInfo,
  fromNatsStreamInfo,
  toBrokerError,
  toNatsConsumerConfig,
  toNatsStreamConfig,
} from './nats-mapping.js';

// The server rejects pull expirations under one second.
const MIN_FETCH_EXPIRES_MS = 1000;

/**
 * Runs `fn` and rethrows anything the NATS client raises as a `BrokerError`.
 */
async function natsCall<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err: unknown) {
    throw toBrokerError(err);
  }
}

// --- Messages ---

class NatsStreamMessage implements StreamMessage {
  readonly headers: MessageHeaders;

  constructor(private readonly msg: JsMsg) {
    const headers: Record<string, string> = {};
    if (msg.headers) {
      for (const key of msg.headers.keys()) headers[key] = msg.headers.get(key);
    }
    this.headers = headers;
  }

  get data(): Uint8Array {
    return this.msg.data;
  }

  get subject(): string {
    return this.msg.subject;
  }

  get seq(): number {
    return this.msg.seq;
  }

  // The client counts deliveries from 1.
  get redeliveryCount(): number {
    return this.msg.info.redeliveryCount - 1;
  }

  ack(): void {
    this.msg.ack();
  }

  nak(delayMs?: number): void {
    this.msg.nak(delayMs);
  }

  term(): void {
    this.msg.term();
  }

  working(): void {
    this.msg.working();
  }
}

class NatsPullSubscription implements PullSubscription {
  private active: ConsumerMessages | undefined;
  private closed = false;

  constructor(private readonly consumer: Consumer) {}

  async fetch(batch: number, timeoutMs: number): Promise<StreamMessage[]> {
    if (this.closed) return [];

    return natsCall(async () => {
      const iter = await this.consumer.fetch({
        max_messages: batch,
        expires: Math.max(timeoutMs, MIN_FETCH_EXPIRES_MS),
      });
      this.active = iter;
      const messages: StreamMessage[] = [];
      try {
        for await (const msg of iter) messages.push(new NatsStreamMessage(msg));
      } finally {
        this.active = undefined;
      }
      return messages;
    });
  }

  async unsubscribe(): Promise<void> {
    this.closed = true;
    const active = this.active;
    this.active = undefined;
    if (active) await natsCall(async () => active.close());
  }
}

// --- JetStream ---

class NatsStreamContext implements StreamContext {
  constructor(
    private readonly js: JetStreamClient,
    private readonly jsm: JetStreamManager,
  ) {}

  async publish(subject: string, payload: Uint8Array, options: PublishOptions): Promise<PubAck> {
    const opts: Partial<JetStreamPublishOptions> = { timeout: options.timeoutMs };
    if (options.messageId !== undefined) opts.msgID = options.messageId;
    if (options.headers) {
      const h = createHeaders();
      for (const [key, value] of Object.entries(options.headers)) h.set(key, value);
      opts.headers = h;
    }

    const ack = await natsCall(() => this.js.publish(subject, payload, opts));
    return { stream: ack.stream, seq: ack.seq, duplicate: ack.duplicate };
  }

  async streamInfo(name: string): Promise<StreamInfo> {
    return fromNatsStreamInfo(await natsCall(() => this.jsm.streams.info(name)));
  }

  async addStream(config: StreamConfig): Promise<StreamInfo> {
    return fromNatsStreamInfo(await natsCall(() => this.jsm.streams.add(toNatsStreamConfig(config))));
  }

  async updateStream(config: StreamConfig): Promise<StreamInfo> {
    const natsConfig = toNatsStreamConfig(config);
    return fromNatsStreamInfo(await natsCall(() => this.jsm.streams.update(config.name, natsConfig)));
  }

  async consumerInfo(stream: string, durable: string): Promise<ConsumerInfo> {
    return fromNatsConsumerInfo(await natsCall(() => this.jsm.consumers.info(stream, durable)));
  }

  async addConsumer(stream: string, config: ConsumerConfig): Promise<ConsumerInfo> {
    const natsConfig = toNatsConsumerConfig(config);
    return fromNatsConsumerInfo(await natsCall(() => this.jsm.consumers.add(stream, natsConfig)));
  }

  /**
   * Binds to an existing durable. Filtering happens on the server through
   * the durable's config; a requested filter the durable does not carry is
   * rejected rather than silently ignored.
   */
  async pullSubscribe(options: PullSubscribeOptions): Promise<PullSubscription> {
    const consumer = await natsCall(() => this.js.consumers.get(options.stream, options.durable));
    if (options.filterSubject !== undefined) {
      const info = await natsCall(() => consumer.info(true));
      const filters = consumerFilters(info.config);
      if (filters.length > 0 && !filters.includes(options.filterSubject)) {
        throw new BrokerError(
          `Consumer ${options.durable} does not filter on ${options.filterSubject}`,
          'bad_request',
        );
      }
    }
    return new NatsPullSubscription(consumer);
  }
}

// --- Connection ---

class NatsTransport implements BrokerTransport {
  constructor(private readonly nc: NatsConnection) {}

  get connectedUrl(): string {
    return this.nc.getServer();
  }

  isClosed(): boolean {
    return this.nc.isClosed();
  }

  async drain(): Promise<void> {
    if (this.nc.isClosed() || this.nc.isDraining()) return;
    await natsCall(() => this.nc.drain());
  }

  async close(): Promise<void> {
    if (this.nc.isClosed()) return;
    await natsCall(() => this.nc.close());
  }

  async streamContext(options: StreamContextOptions): Promise<StreamContext> {
    const jsOptions: JetStreamOptions = { timeout: options.timeoutMs };
    if (options.domain !== undefined) jsOptions.domain = options.domain;

    const jsm = await natsCall(() => this.nc.jetstreamManager(jsOptions));
    return new NatsStreamContext(this.nc.jetstream(jsOptions), jsm);
  }
}

function toConnectionOptions(options: TransportOptions): ConnectionOptions {
  const out: ConnectionOptions = {
    servers: [...options.servers],
    name: options.name,
    maxReconnectAttempts: options.maxReconnectAttempts,
    reconnectTimeWait: options.reconnectWaitMs,
    timeout: options.timeoutMs,
  };
  if (options.token !== undefined) out.token = options.token;
  if (options.user !== undefined) {
    out.user = options.user;
    out.pass = options.pass;
  }
  if (options.tls !== undefined) {
    out.tls = {
      caFile: options.tls.caFile,
      certFile: options.tls.certFile,
      keyFile: options.tls.keyFile,
    };
  }
  return out;
}

/** Forwards the client's status stream until the connection closes. */
async function watchStatus(nc: NatsConnection, onStatus: TransportStatusListener): Promise<void> {
  for await (const status of nc.status()) {
    const server = typeof status.data === 'string' ? status.data : undefined;
    switch (status.type) {
      case Events.Disconnect:
        onStatus({ type: 'disconnected', server });
        break;
      case DebugEvents.Reconnecting:
        onStatus({ type: 'reconnecting', server });
        break;
      case Events.Reconnect:
        onStatus({ type: 'reconnected', server });
        break;
      case Events.Error:
        onStatus({ type: 'error', error: new Error(String(status.data)) });
        break;
      default:
        break;
    }
  }

  const err = await nc.closed();
  if (err) onStatus({ type: 'error', error: err });
  onStatus({ type: 'closed' });
}

/** Opens a NATS connection behind the broker transport port. */
export const connectNats: TransportConnector = async (options, onStatus) => {
  const nc = await natsCall(() => connect(toConnectionOptions(options)));

  watchStatus(nc, onStatus).catch((err: unknown) => {
    onStatus({ type: 'error', error: err instanceof Error ? err : new Error(String(err)) });
  });
  return new NatsTransport(nc);
};
