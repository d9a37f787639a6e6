import { BrokerError } from '../../domain/index.js';
import type { PubAck } from '../../domain/index.js';
import { matchesAny, subjectMatches } from '../../application/subject-filter.js';
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
  TransportStatus,
  TransportStatusListener,
} from '../broker/index.js';
import type { ConsumerConfig, StreamConfig } from '../config/index.js';

/**
 * In-process broker implementing the broker port.
 *
 * Built for tests: streams, durable pull consumers, acknowledgment and
 * redelivery behave like JetStream, but nothing is persisted, replicated or
 * expired. Message-id de-duplication has no time window.
 */

export interface InMemoryBrokerOptions {
  /** Largest payload `publish` accepts. */
  maxPayloadBytes?: number;
  /** When false, `streamContext` fails as on a server without JetStream. */
  jetstream?: boolean;
  /** Credentials a connecting client must present. */
  auth?: { token?: string; user?: string; pass?: string };
  /** Time source for ack deadlines and nak delays. */
  clock?: () => number;
}

export interface StoredMessage {
  readonly seq: number;
  readonly subject: string;
  readonly data: Uint8Array;
  readonly headers: MessageHeaders;
  readonly timestamp: number;
}

interface PublishFault {
  error: BrokerError;
  /** Store the message before failing, as when the ack is lost in transit. */
  stored: boolean;
}

interface Delivery {
  seq: number;
  deliveries: number;
  /** Ack deadline, or the end of a nak delay. */
  redeliverAt: number;
}

export class MemoryStream {
  readonly messages: StoredMessage[] = [];
  readonly messageIds = new Map<string, number>();
  readonly consumers = new Map<string, MemoryConsumer>();
  readonly waiters = new Set<() => void>();
  bytes = 0;

  constructor(public config: StreamConfig) {}

  get lastSeq(): number {
    return this.messages.length;
  }

  get(seq: number): StoredMessage | undefined {
    return this.messages[seq - 1];
  }

  captures(subject: string): boolean {
    return this.config.subjects.some((pattern) => subjectMatches(pattern, subject));
  }

  append(subject: string, data: Uint8Array, headers: MessageHeaders, now: number): StoredMessage {
    const stored: StoredMessage = { seq: this.lastSeq + 1, subject, data, headers, timestamp: now };
    this.messages.push(stored);
    this.bytes += data.byteLength;
    return stored;
  }

  info(): StreamInfo {
    return {
      name: this.config.name,
      subjects: [...this.config.subjects],
      messages: this.messages.length,
      bytes: this.bytes,
    };
  }

  wake(): void {
    for (const waiter of [...this.waiters]) waiter();
  }
}

export class MemoryConsumer {
  private readonly pending = new Map<number, Delivery>();
  private cursor: number;

  constructor(
    readonly config: ConsumerConfig,
    private readonly stream: MemoryStream,
    private readonly clock: () => number,
  ) {
    this.cursor = this.startSeq();
  }

  private startSeq(): number {
    const cfg = this.config;
    switch (cfg.deliver_policy) {
      case 'all':
        return 1;
      case 'new':
        return this.stream.lastSeq + 1;
      case 'last': {
        for (let seq = this.stream.lastSeq; seq >= 1; seq--) {
          const msg = this.stream.get(seq);
          if (msg && this.accepts(msg.subject)) return seq;
        }
        return this.stream.lastSeq + 1;
      }
      case 'by_start_sequence':
        return cfg.opt_start_seq ?? 1;
      case 'by_start_time': {
        const from = cfg.opt_start_time ? Date.parse(cfg.opt_start_time) : 0;
        const first = this.stream.messages.find((msg) => msg.timestamp >= from);
        return first ? first.seq : this.stream.lastSeq + 1;
      }
    }
  }

  private get ackWaitMs(): number {
    return this.config.ack_wait_seconds * 1000;
  }

  private exhausted(delivery: Delivery): boolean {
    return this.config.max_deliver > 0 && delivery.deliveries >= this.config.max_deliver;
  }

  accepts(subject: string): boolean {
    return matchesAny(this.config.filter_subjects, subject);
  }

  /** Next deliverable messages: due redeliveries first, then new ones in order. */
  take(batch: number): Array<{ stored: StoredMessage; redeliveryCount: number }> {
    const now = this.clock();
    const out: Array<{ stored: StoredMessage; redeliveryCount: number }> = [];

    const due = [...this.pending.values()]
      .filter((delivery) => delivery.redeliverAt <= now)
      .sort((a, b) => a.seq - b.seq);
    for (const delivery of due) {
      if (out.length >= batch) break;
      const stored = this.stream.get(delivery.seq);
      if (!stored || this.exhausted(delivery)) {
        this.pending.delete(delivery.seq);
        continue;
      }
      delivery.deliveries++;
      delivery.redeliverAt = now + this.ackWaitMs;
      out.push({ stored, redeliveryCount: delivery.deliveries - 1 });
    }

    while (out.length < batch && this.cursor <= this.stream.lastSeq) {
      const stored = this.stream.get(this.cursor);
      this.cursor++;
      if (!stored || !this.accepts(stored.subject)) continue;
      if (this.config.ack_policy !== 'none') {
        this.pending.set(stored.seq, {
          seq: stored.seq,
          deliveries: 1,
          redeliverAt: now + this.ackWaitMs,
        });
      }
      out.push({ stored, redeliveryCount: 0 });
    }
    return out;
  }

  /** Earliest time a pending message becomes due again, if any. */
  nextDue(): number | undefined {
    let next: number | undefined;
    for (const delivery of this.pending.values()) {
      if (this.exhausted(delivery)) continue;
      if (next === undefined || delivery.redeliverAt < next) next = delivery.redeliverAt;
    }
    return next;
  }

  ack(seq: number): void {
    if (this.config.ack_policy === 'all') {
      for (const pendingSeq of [...this.pending.keys()]) {
        if (pendingSeq <= seq) this.pending.delete(pendingSeq);
      }
      return;
    }
    this.pending.delete(seq);
  }

  nak(seq: number, delayMs = 0): void {
    const delivery = this.pending.get(seq);
    if (!delivery) return;
    delivery.redeliverAt = this.clock() + delayMs;
    if (delayMs === 0) this.stream.wake();
  }

  term(seq: number): void {
    this.pending.delete(seq);
  }

  working(seq: number): void {
    const delivery = this.pending.get(seq);
    if (delivery) delivery.redeliverAt = this.clock() + this.ackWaitMs;
  }

  info(): ConsumerInfo {
    let numPending = 0;
    for (let seq = this.cursor; seq <= this.stream.lastSeq; seq++) {
      const msg = this.stream.get(seq);
      if (msg && this.accepts(msg.subject)) numPending++;
    }
    return {
      stream: this.stream.config.name,
      name: this.config.durable_name,
      numPending,
      numAckPending: this.pending.size,
    };
  }
}

class MemoryStreamMessage implements StreamMessage {
  constructor(
    private readonly stored: StoredMessage,
    readonly redeliveryCount: number,
    private readonly consumer: MemoryConsumer,
  ) {}

  get data(): Uint8Array {
    return this.stored.data;
  }

  get subject(): string {
    return this.stored.subject;
  }

  get seq(): number {
    return this.stored.seq;
  }

  get headers(): MessageHeaders {
    return this.stored.headers;
  }

  ack(): void {
    this.consumer.ack(this.stored.seq);
  }

  nak(delayMs?: number): void {
    this.consumer.nak(this.stored.seq, delayMs);
  }

  term(): void {
    this.consumer.term(this.stored.seq);
  }

  working(): void {
    this.consumer.working(this.stored.seq);
  }
}

class MemoryPullSubscription implements PullSubscription {
  private closed = false;

  constructor(
    private readonly broker: InMemoryBroker,
    private readonly stream: MemoryStream,
    private readonly consumer: MemoryConsumer,
    private readonly clock: () => number,
  ) {}

  async fetch(batch: number, timeoutMs: number): Promise<StreamMessage[]> {
    const deadline = this.clock() + timeoutMs;

    for (;;) {
      if (this.closed) return [];
      this.broker.assertReachable();

      const taken = this.consumer.take(batch);
      if (taken.length > 0) {
        return taken.map(
          ({ stored, redeliveryCount }) => new MemoryStreamMessage(stored, redeliveryCount, this.consumer),
        );
      }

      const now = this.clock();
      const remaining = deadline - now;
      if (remaining <= 0) return [];
      const due = this.consumer.nextDue();
      const wait = due === undefined ? remaining : Math.min(remaining, Math.max(due - now, 1));
      await this.waitForActivity(wait);
    }
  }

  async unsubscribe(): Promise<void> {
    this.closed = true;
    this.stream.wake();
  }

  private waitForActivity(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.stream.waiters.delete(done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.stream.waiters.add(done);
    });
  }
}

class MemoryStreamContext implements StreamContext {
  constructor(private readonly broker: InMemoryBroker) {}

  async publish(subject: string, payload: Uint8Array, options: PublishOptions): Promise<PubAck> {
    return this.broker.publish(subject, payload, options);
  }

  async streamInfo(name: string): Promise<StreamInfo> {
    this.broker.assertReachable();
    return this.broker.stream(name).info();
  }

  async addStream(config: StreamConfig): Promise<StreamInfo> {
    return this.broker.addStream(config);
  }

  async updateStream(config: StreamConfig): Promise<StreamInfo> {
    return this.broker.updateStream(config);
  }

  async consumerInfo(stream: string, durable: string): Promise<ConsumerInfo> {
    this.broker.assertReachable();
    return this.broker.consumer(stream, durable).info();
  }

  async addConsumer(stream: string, config: ConsumerConfig): Promise<ConsumerInfo> {
    return this.broker.addConsumer(stream, config);
  }

  async pullSubscribe(options: PullSubscribeOptions): Promise<PullSubscription> {
    return this.broker.pullSubscribe(options);
  }
}

export class MemoryTransport implements BrokerTransport {
  private closed = false;

  constructor(
    private readonly broker: InMemoryBroker,
    readonly connectedUrl: string,
    private readonly onStatus: TransportStatusListener,
  ) {}

  isClosed(): boolean {
    return this.closed;
  }

  async drain(): Promise<void> {
    await this.close();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.broker.detach(this);
    this.onStatus({ type: 'closed' });
  }

  notify(status: TransportStatus): void {
    if (!this.closed) this.onStatus(status);
  }

  async streamContext(_options: StreamContextOptions): Promise<StreamContext> {
    if (this.closed) throw new BrokerError('Connection closed', 'closed');
    this.broker.assertReachable();
    if (!this.broker.jetstreamEnabled) {
      throw new BrokerError('JetStream not enabled', 'unavailable');
    }
    return new MemoryStreamContext(this.broker);
  }
}

export class InMemoryBroker {
  readonly jetstreamEnabled: boolean;
  private readonly streams = new Map<string, MemoryStream>();
  private readonly transports = new Set<MemoryTransport>();
  private readonly publishFaults: PublishFault[] = [];
  private readonly maxPayloadBytes: number;
  private readonly auth: InMemoryBrokerOptions['auth'];
  private readonly clock: () => number;
  private reachable = true;

  constructor(options: InMemoryBrokerOptions = {}) {
    this.maxPayloadBytes = options.maxPayloadBytes ?? 1024 * 1024;
    this.jetstreamEnabled = options.jetstream ?? true;
    this.auth = options.auth;
    this.clock = options.clock ?? Date.now;
  }

  /** Connector to hand to `ConnectionManager` in place of the NATS one. */
  readonly connector: TransportConnector = async (
    options: TransportOptions,
    onStatus: TransportStatusListener,
  ) => {
    this.assertReachable();
    this.authenticate(options);
    const transport = new MemoryTransport(this, options.servers[0] ?? 'memory://local', onStatus);
    this.transports.add(transport);
    return transport;
  };

  get connectionCount(): number {
    return this.transports.size;
  }

  // --- Fault injection ---

  /** Drops every client connection into the reconnecting state. */
  simulateDisconnect(): void {
    this.reachable = false;
    for (const transport of this.transports) {
      transport.notify({ type: 'disconnected', server: transport.connectedUrl });
      transport.notify({ type: 'reconnecting', server: transport.connectedUrl });
    }
  }

  simulateReconnect(): void {
    this.reachable = true;
    for (const transport of this.transports) {
      transport.notify({ type: 'reconnected', server: transport.connectedUrl });
    }
    for (const stream of this.streams.values()) stream.wake();
  }

  /**
   * Fails the next `count` publishes with `error`. With `stored`, each
   * message is kept before the failure, as when the ack is lost.
   */
  failNextPublishes(
    count: number,
    error: BrokerError = new BrokerError('Publish timed out', 'timeout'),
    { stored = false }: { stored?: boolean } = {},
  ): void {
    for (let i = 0; i < count; i++) this.publishFaults.push({ error, stored });
  }

  // --- Inspection ---

  messages(streamName: string): readonly StoredMessage[] {
    return [...this.stream(streamName).messages];
  }

  // --- Port operations ---

  assertReachable(): void {
    if (!this.reachable) throw new BrokerError('Broker unreachable', 'unavailable');
  }

  stream(name: string): MemoryStream {
    const stream = this.streams.get(name);
    if (!stream) throw new BrokerError(`stream not found: ${name}`, 'not_found');
    return stream;
  }

  consumer(streamName: string, durable: string): MemoryConsumer {
    const consumer = this.stream(streamName).consumers.get(durable);
    if (!consumer) throw new BrokerError(`consumer not found: ${durable}`, 'not_found');
    return consumer;
  }

  detach(transport: MemoryTransport): void {
    this.transports.delete(transport);
  }

  publish(subject: string, payload: Uint8Array, options: PublishOptions): PubAck {
    this.assertReachable();
    if (payload.byteLength > this.maxPayloadBytes) {
      throw new BrokerError('maximum payload exceeded', 'payload_too_large');
    }
    const stream = [...this.streams.values()].find((candidate) => candidate.captures(subject));
    if (!stream) throw new BrokerError(`no stream matches subject ${subject}`, 'unavailable');

    const fault = this.publishFaults.shift();
    if (fault && !fault.stored) throw fault.error;

    const ack = this.store(stream, subject, payload, options);
    if (fault) throw fault.error;
    return ack;
  }

  private store(
    stream: MemoryStream,
    subject: string,
    payload: Uint8Array,
    options: PublishOptions,
  ): PubAck {
    const { messageId } = options;
    if (messageId !== undefined) {
      const existing = stream.messageIds.get(messageId);
      if (existing !== undefined) {
        return { stream: stream.config.name, seq: existing, duplicate: true };
      }
    }

    const stored = stream.append(subject, payload, { ...options.headers }, this.clock());
    if (messageId !== undefined) stream.messageIds.set(messageId, stored.seq);
    stream.wake();
    return { stream: stream.config.name, seq: stored.seq, duplicate: false };
  }

  addStream(config: StreamConfig): StreamInfo {
    this.assertReachable();
    const existing = this.streams.get(config.name);
    if (existing) {
      if (JSON.stringify(existing.config) === JSON.stringify(config)) return existing.info();
      throw new BrokerError('stream name already in use with a different configuration', 'bad_request');
    }
    this.assertNoOverlap(config);
    const stream = new MemoryStream(config);
    this.streams.set(config.name, stream);
    return stream.info();
  }

  updateStream(config: StreamConfig): StreamInfo {
    this.assertReachable();
    const stream = this.stream(config.name);
    if (stream.config.storage !== config.storage) {
      throw new BrokerError('stream configuration update can not change storage type', 'bad_request');
    }
    if (stream.config.retention !== config.retention) {
      throw new BrokerError('stream configuration update can not change retention policy', 'bad_request');
    }
    this.assertNoOverlap(config);
    stream.config = config;
    return stream.info();
  }

  addConsumer(streamName: string, config: ConsumerConfig): ConsumerInfo {
    this.assertReachable();
    const stream = this.stream(streamName);
    const existing = stream.consumers.get(config.durable_name);
    if (existing) {
      if (JSON.stringify(existing.config) === JSON.stringify(config)) return existing.info();
      throw new BrokerError('consumer already exists', 'bad_request');
    }
    const consumer = new MemoryConsumer(config, stream, this.clock);
    stream.consumers.set(config.durable_name, consumer);
    return consumer.info();
  }

  pullSubscribe(options: PullSubscribeOptions): PullSubscription {
    this.assertReachable();
    const stream = this.stream(options.stream);
    const consumer = this.consumer(options.stream, options.durable);
    const filters = consumer.config.filter_subjects;
    if (
      options.filterSubject !== undefined &&
      filters.length > 0 &&
      !filters.includes(options.filterSubject)
    ) {
      throw new BrokerError(
        `Consumer ${options.durable} does not filter on ${options.filterSubject}`,
        'bad_request',
      );
    }
    return new MemoryPullSubscription(this, stream, consumer, this.clock);
  }

  private assertNoOverlap(config: StreamConfig): void {
    for (const other of this.streams.values()) {
      if (other.config.name === config.name) continue;
      const overlaps = config.subjects.some((subject) =>
        other.config.subjects.some(
          (existing) => subjectMatches(existing, subject) || subjectMatches(subject, existing),
        ),
      );
      if (overlaps) {
        throw new BrokerError(`subjects overlap with stream ${other.config.name}`, 'bad_request');
      }
    }
  }

  private authenticate(options: TransportOptions): void {
    const auth = this.auth;
    if (!auth) return;
    const tokenOk = auth.token !== undefined && options.token === auth.token;
    const userOk =
      auth.user !== undefined && options.user === auth.user && options.pass === auth.pass;
    if (!tokenOk && !userOk) throw new BrokerError('Authorization Violation', 'permission');
  }
}
