import type { PubAck } from '../../domain/index.js';
import type { ConsumerConfig, StreamConfig } from '../config/index.js';

/**
 * Broker port.
 *
 * The publisher, consumer and connection manager talk to the message
 * broker only through these interfaces. `nats/` adapts the NATS client to
 * them; `memory/` implements them in process for tests.
 *
 * Every method rejects with `BrokerError` so callers can classify failures
 * without knowing which implementation is underneath.
 */

// --- Connection lifecycle ---

export type TransportStatus =
  | { type: 'disconnected'; server?: string | undefined }
  | { type: 'reconnecting'; server?: string | undefined }
  | { type: 'reconnected'; server?: string | undefined }
  | { type: 'error'; error: Error }
  | { type: 'closed' };

export type TransportStatusListener = (status: TransportStatus) => void;

export interface TransportOptions {
  servers: readonly string[];
  name: string;
  maxReconnectAttempts: number;
  reconnectWaitMs: number;
  timeoutMs: number;
  token?: string | undefined;
  user?: string | undefined;
  pass?: string | undefined;
  tls?:
    | {
        caFile?: string | undefined;
        certFile?: string | undefined;
        keyFile?: string | undefined;
      }
    | undefined;
}

/** Opens a transport and reports its lifecycle through `onStatus`. */
export type TransportConnector = (
  options: TransportOptions,
  onStatus: TransportStatusListener,
) => Promise<BrokerTransport>;

export interface BrokerTransport {
  /** Server the transport is currently attached to. */
  readonly connectedUrl: string;
  isClosed(): boolean;
  /** Flushes pending work and stops new deliveries; the transport closes afterwards. */
  drain(): Promise<void>;
  close(): Promise<void>;
  streamContext(options: StreamContextOptions): Promise<StreamContext>;
}

export interface StreamContextOptions {
  domain?: string | undefined;
  timeoutMs: number;
}

// --- Streams ---

export interface StreamInfo {
  name: string;
  subjects: string[];
  messages: number;
  bytes: number;
}

export interface ConsumerInfo {
  stream: string;
  name: string;
  /** Messages matching the consumer that have not been delivered yet. */
  numPending: number;
  /** Messages delivered and awaiting acknowledgment. */
  numAckPending: number;
}

export type MessageHeaders = Readonly<Record<string, string>>;

export interface PublishOptions {
  headers?: MessageHeaders | undefined;
  timeoutMs: number;
  /** De-duplication id; the broker stores a repeated id only once. */
  messageId?: string | undefined;
}

export interface PullSubscribeOptions {
  stream: string;
  durable: string;
  filterSubject?: string | undefined;
}

export interface StreamContext {
  publish(subject: string, payload: Uint8Array, options: PublishOptions): Promise<PubAck>;
  streamInfo(name: string): Promise<StreamInfo>;
  addStream(config: StreamConfig): Promise<StreamInfo>;
  updateStream(config: StreamConfig): Promise<StreamInfo>;
  consumerInfo(stream: string, durable: string): Promise<ConsumerInfo>;
  addConsumer(stream: string, config: ConsumerConfig): Promise<ConsumerInfo>;
  pullSubscribe(options: PullSubscribeOptions): Promise<PullSubscription>;
}

// --- Consumption ---

export interface PullSubscription {
  /** Up to `batch` messages; resolves empty when nothing arrives within `timeoutMs`. */
  fetch(batch: number, timeoutMs: number): Promise<StreamMessage[]>;
  unsubscribe(): Promise<void>;
}

export interface StreamMessage {
  readonly data: Uint8Array;
  readonly subject: string;
  readonly seq: number;
  /** 0 on first delivery. */
  readonly redeliveryCount: number;
  readonly headers: MessageHeaders;
  ack(): void;
  /** Requests redelivery, optionally after `delayMs`. */
  nak(delayMs?: number): void;
  /** Stops redelivery for good. */
  term(): void;
  /** Extends the ack deadline. */
  working(): void;
}

// --- Connection as seen by publishers and consumers ---

export interface BrokerConnection {
  /** Stream operations; throws `NotConnectedError` before a successful connect. */
  readonly streams: StreamContext;
  readonly maxPayloadBytes: number;
  readonly maxPendingMessages: number;
  readonly clientName: string;
  isConnected(): boolean;
}
