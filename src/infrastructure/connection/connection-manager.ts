import type { Logger } from 'pino';
import {
  BrokerError,
  ConnectionError,
  NotConnectedError,
  describeError,
} from '../../domain/index.js';
import type {
  BrokerConnection,
  BrokerTransport,
  StreamContext,
  StreamInfo,
  TransportConnector,
  TransportOptions,
  TransportStatus,
  TransportStatusListener,
} from '../broker/index.js';
import type { BrokerConfig, StreamConfig } from '../config/index.js';
import { createLogger } from '../logger.js';
import { EventMetrics, getDefaultMetrics } from '../metrics/index.js';
import { connectNats } from '../nats/index.js';
import { Mutex } from './mutex.js';

export interface ConnectionManagerOptions {
  /** Opens the transport; defaults to the NATS client. */
  connector?: TransportConnector;
  log?: Logger;
  metrics?: EventMetrics;
}

/**
 * Owns the broker connection and its stream context.
 *
 * - `connect()` opens the transport and declares the configured streams.
 * - Lifecycle events from the transport update `isConnected()`, the
 *   connection metrics, and every `onStatus` listener.
 * - `close()` drains and closes; both transitions hold the same lock.
 */
export class ConnectionManager implements BrokerConnection {
  private readonly connector: TransportConnector;
  private readonly log: Logger;
  private readonly metrics: EventMetrics;
  private readonly lock = new Mutex();
  private readonly listeners = new Set<TransportStatusListener>();

  private transportRef: BrokerTransport | undefined;
  private streamCtx: StreamContext | undefined;
  private connected = false;
  // Status events from an older transport are ignored.
  private generation = 0;
  private closingGeneration = -1;

  constructor(
    readonly config: BrokerConfig,
    options: ConnectionManagerOptions = {},
  ) {
    this.connector = options.connector ?? connectNats;
    this.log = options.log ?? createLogger(config.service_name);
    this.metrics = options.metrics ?? getDefaultMetrics();
  }

  get clientName(): string {
    return this.config.client_name;
  }

  get maxPayloadBytes(): number {
    return this.config.max_payload_bytes;
  }

  get maxPendingMessages(): number {
    return this.config.max_pending_messages;
  }

  /** Stream operations. Throws until `connect()` succeeds with JetStream enabled. */
  get streams(): StreamContext {
    if (!this.streamCtx) {
      throw new NotConnectedError(
        this.transportRef
          ? 'JetStream is not enabled on this connection'
          : 'Not connected to the broker',
      );
    }
    return this.streamCtx;
  }

  get transport(): BrokerTransport {
    if (!this.transportRef) throw new NotConnectedError('Not connected to the broker');
    return this.transportRef;
  }

  isConnected(): boolean {
    return this.connected && this.transportRef !== undefined && !this.transportRef.isClosed();
  }

  /** Registers a lifecycle listener; returns its unsubscribe function. */
  onStatus(listener: TransportStatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async connect(): Promise<void> {
    await this.lock.runExclusive(async () => {
      if (this.transportRef && !this.transportRef.isClosed()) {
        this.log.warn({ client_name: this.clientName }, 'Already connected to broker');
        return;
      }

      const generation = ++this.generation;
      this.log.info(
        { servers: this.config.servers, client_name: this.clientName },
        'Connecting to broker',
      );

      let transport: BrokerTransport;
      try {
        transport = await this.connector(this.transportOptions(), (status) =>
          this.handleStatus(status, generation),
        );
      } catch (err: unknown) {
        this.log.error({ err, servers: this.config.servers }, 'Failed to connect to broker');
        this.metrics.setConnected(this.clientName, false);
        throw new ConnectionError(`Broker connection failed: ${describeError(err)}`, {
          cause: err,
        });
      }

      this.transportRef = transport;
      this.connected = true;
      this.metrics.setConnected(this.clientName, true);
      this.log.info({ connected_url: transport.connectedUrl }, 'Connected to broker');

      if (!this.config.enable_jetstream) return;

      let ctx: StreamContext;
      try {
        ctx = await transport.streamContext({
          domain: this.config.jetstream_domain,
          timeoutMs: this.config.request_timeout_seconds * 1000,
        });
      } catch (err: unknown) {
        this.log.error({ err }, 'Failed to create stream context');
        await this.release(transport);
        throw new ConnectionError(`Stream context unavailable: ${describeError(err)}`, {
          cause: err,
        });
      }

      this.streamCtx = ctx;
      this.log.info({ domain: this.config.jetstream_domain }, 'Stream context created');
      await this.declareStreams(ctx);
    });
  }

  async close(): Promise<void> {
    await this.lock.runExclusive(async () => {
      const transport = this.transportRef;
      if (!transport) return;
      await this.release(transport);
    });
  }

  // --- Streams ---

  private async declareStreams(ctx: StreamContext): Promise<void> {
    for (const stream of this.config.streams) {
      try {
        await this.declareStream(ctx, stream);
      } catch (err: unknown) {
        this.log.error({ err, stream: stream.name }, 'Failed to create or update stream');
      }
    }
  }

  /** Creates the stream when absent, updates it when present. */
  private async declareStream(ctx: StreamContext, stream: StreamConfig): Promise<void> {
    try {
      await ctx.streamInfo(stream.name);
    } catch (err: unknown) {
      if (err instanceof BrokerError && err.code === 'not_found') {
        const info = await ctx.addStream(stream);
        this.log.info({ stream: stream.name, subjects: stream.subjects }, 'Created stream');
        this.recordStreamInfo(info);
        return;
      }
      throw err;
    }

    let info: StreamInfo;
    try {
      info = await ctx.updateStream(stream);
    } catch (err: unknown) {
      if (err instanceof BrokerError && err.code === 'bad_request') {
        this.log.warn(
          { err, stream: stream.name },
          'Stream exists with an incompatible configuration; keeping it',
        );
        return;
      }
      throw err;
    }
    this.log.info({ stream: stream.name, subjects: stream.subjects }, 'Updated stream');
    this.recordStreamInfo(info);
  }

  private recordStreamInfo(info: StreamInfo): void {
    this.metrics.streamMessages.set({ stream: info.name }, info.messages);
    this.metrics.streamBytes.set({ stream: info.name }, info.bytes);
  }

  // --- Lifecycle ---

  private transportOptions(): TransportOptions {
    const cfg = this.config;
    const options: TransportOptions = {
      servers: cfg.servers,
      name: cfg.client_name,
      maxReconnectAttempts: cfg.max_reconnect_attempts,
      reconnectWaitMs: cfg.reconnect_wait_seconds * 1000,
      timeoutMs: cfg.connect_timeout_seconds * 1000,
    };

    if (cfg.enable_auth) {
      if (cfg.token !== undefined) {
        options.token = cfg.token;
      } else {
        options.user = cfg.username;
        options.pass = cfg.password;
      }
    }

    if (cfg.enable_tls) {
      options.tls = {
        caFile: cfg.tls_ca_cert_file,
        certFile: cfg.tls_cert_file,
        keyFile: cfg.tls_key_file,
      };
    }
    return options;
  }

  /** Drains and closes `transport`, logging failures, and resets state. */
  private async release(transport: BrokerTransport): Promise<void> {
    this.closingGeneration = this.generation;
    try {
      if (!transport.isClosed()) {
        await transport.drain();
        await transport.close();
      }
      this.log.info('Broker connection closed');
    } catch (err: unknown) {
      this.log.error({ err }, 'Error closing broker connection');
    } finally {
      this.transportRef = undefined;
      this.streamCtx = undefined;
      this.connected = false;
      this.metrics.setConnected(this.clientName, false);
    }
  }

  private handleStatus(status: TransportStatus, generation: number): void {
    if (generation !== this.generation) return;

    switch (status.type) {
      case 'disconnected':
        this.connected = false;
        this.metrics.setConnected(this.clientName, false);
        this.log.warn({ server: status.server }, 'Disconnected from broker');
        break;
      case 'reconnecting':
        this.log.info({ server: status.server }, 'Reconnecting to broker');
        break;
      case 'reconnected':
        this.connected = true;
        this.metrics.setConnected(this.clientName, true);
        this.metrics.reconnectionAttempts.inc({ client_name: this.clientName, status: 'success' });
        this.log.info({ server: status.server }, 'Reconnected to broker');
        break;
      case 'error':
        this.log.error({ err: status.error }, 'Broker connection error');
        break;
      case 'closed':
        this.connected = false;
        this.metrics.setConnected(this.clientName, false);
        if (this.closingGeneration !== generation) {
          this.metrics.reconnectionAttempts.inc({ client_name: this.clientName, status: 'failure' });
          this.log.warn('Broker connection closed unexpectedly');
        }
        break;
    }

    for (const listener of this.listeners) {
      try {
        listener(status);
      } catch (err: unknown) {
        this.log.error({ err, status: status.type }, 'Status listener failed');
      }
    }
  }
}

/**
 * Connects, runs `fn` with the live connection, and closes on every exit path.
 */
export async function withConnection<T>(
  config: BrokerConfig,
  fn: (connection: ConnectionManager) => Promise<T>,
  options: ConnectionManagerOptions = {},
): Promise<T> {
  const connection = new ConnectionManager(config, options);
  await connection.connect();
  try {
    return await fn(connection);
  } finally {
    await connection.close();
  }
}
