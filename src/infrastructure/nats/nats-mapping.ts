import {
  AckPolicy,
  DeliverPolicy,
  DiscardPolicy,
  ErrorCode,
  NatsError,
  ReplayPolicy,
  RetentionPolicy,
  StorageType,
  nanos,
} from 'nats';
import type {
  ConsumerConfig as NatsConsumerConfig,
  ConsumerInfo as NatsConsumerInfo,
  StreamConfig as NatsStreamConfig,
  StreamInfo as NatsStreamInfo,
} from 'nats';
import { BrokerError, describeError } from '../../domain/index.js';
import type { BrokerErrorCode } from '../../domain/index.js';
import type { ConsumerInfo, StreamInfo } from '../broker/index.js';
import type { ConsumerConfig, StreamConfig } from '../config/index.js';

// --- Config mapping ---

const RETENTION: Record<StreamConfig['retention'], RetentionPolicy> = {
  limits: RetentionPolicy.Limits,
  interest: RetentionPolicy.Interest,
  workqueue: RetentionPolicy.Workqueue,
};

const STORAGE: Record<StreamConfig['storage'], StorageType> = {
  file: StorageType.File,
  memory: StorageType.Memory,
};

const DISCARD: Record<StreamConfig['discard'], DiscardPolicy> = {
  old: DiscardPolicy.Old,
  new: DiscardPolicy.New,
};

const ACK: Record<ConsumerConfig['ack_policy'], AckPolicy> = {
  explicit: AckPolicy.Explicit,
  all: AckPolicy.All,
  none: AckPolicy.None,
};

const DELIVER: Record<ConsumerConfig['deliver_policy'], DeliverPolicy> = {
  all: DeliverPolicy.All,
  last: DeliverPolicy.Last,
  new: DeliverPolicy.New,
  by_start_sequence: DeliverPolicy.StartSequence,
  by_start_time: DeliverPolicy.StartTime,
};

const REPLAY: Record<ConsumerConfig['replay_policy'], ReplayPolicy> = {
  instant: ReplayPolicy.Instant,
  original: ReplayPolicy.Original,
};

/** Stream config in the server's units (durations in nanoseconds). */
export function toNatsStreamConfig(cfg: StreamConfig): Partial<NatsStreamConfig> {
  return {
    name: cfg.name,
    subjects: [...cfg.subjects],
    retention: RETENTION[cfg.retention],
    storage: STORAGE[cfg.storage],
    max_age: nanos(cfg.max_age_seconds * 1000),
    max_bytes: cfg.max_bytes,
    num_replicas: cfg.replicas,
    discard: DISCARD[cfg.discard],
  };
}

/**
 * Durable pull consumer config.
 *
 * One filter goes in `filter_subject`; several need `filter_subjects`,
 * which the server accepts from 2.10 on.
 */
export function toNatsConsumerConfig(cfg: ConsumerConfig): Partial<NatsConsumerConfig> {
  const out: Partial<NatsConsumerConfig> = {
    durable_name: cfg.durable_name,
    ack_policy: ACK[cfg.ack_policy],
    ack_wait: nanos(cfg.ack_wait_seconds * 1000),
    max_deliver: cfg.max_deliver,
    deliver_policy: DELIVER[cfg.deliver_policy],
    replay_policy: REPLAY[cfg.replay_policy],
  };

  const [single, ...rest] = cfg.filter_subjects;
  if (single !== undefined && rest.length === 0) {
    out.filter_subject = single;
  } else if (single !== undefined) {
    out.filter_subjects = [...cfg.filter_subjects];
  }

  if (cfg.deliver_policy === 'by_start_sequence') out.opt_start_seq = cfg.opt_start_seq;
  if (cfg.deliver_policy === 'by_start_time') out.opt_start_time = cfg.opt_start_time;
  return out;
}

export function fromNatsStreamInfo(info: NatsStreamInfo): StreamInfo {
  return {
    name: info.config.name,
    subjects: info.config.subjects ?? [],
    messages: info.state.messages,
    bytes: info.state.bytes,
  };
}

export function fromNatsConsumerInfo(info: NatsConsumerInfo): ConsumerInfo {
  return {
    stream: info.stream_name,
    name: info.name,
    numPending: info.num_pending,
    numAckPending: info.num_ack_pending,
  };
}

/** Filter subjects a server-side consumer config carries, whichever field holds them. */
export function consumerFilters(config: Partial<NatsConsumerConfig>): string[] {
  if (config.filter_subjects && config.filter_subjects.length > 0) return config.filter_subjects;
  return config.filter_subject ? [config.filter_subject] : [];
}

// --- Error classification ---

function classifyApiError(status: number): BrokerErrorCode {
  switch (status) {
    case 400:
      return 'bad_request';
    case 403:
      return 'permission';
    case 404:
      return 'not_found';
    case 408:
      return 'timeout';
    case 503:
      return 'unavailable';
    default:
      return 'unknown';
  }
}

function classifyClientError(code: string): BrokerErrorCode {
  switch (code) {
    case ErrorCode.Timeout:
    case ErrorCode.ConnectionTimeout:
    case ErrorCode.JetStream408RequestTimeout:
      return 'timeout';
    case ErrorCode.NoResponders:
    case ErrorCode.Disconnect:
    case ErrorCode.ConnectionRefused:
      return 'unavailable';
    case ErrorCode.PermissionsViolation:
    case ErrorCode.AuthorizationViolation:
    case ErrorCode.AuthenticationExpired:
    case ErrorCode.BadAuthentication:
      return 'permission';
    case ErrorCode.MaxPayloadExceeded:
      return 'payload_too_large';
    case ErrorCode.ConnectionClosed:
    case ErrorCode.ConnectionDraining:
      return 'closed';
    case ErrorCode.JetStream404NoMessages:
      return 'not_found';
    default:
      return 'unknown';
  }
}

/**
 * Maps anything the NATS client throws onto a `BrokerError`.
 *
 * JetStream API errors are classified by their HTTP-like status, client
 * errors by their `ErrorCode`. A `BrokerError` passes through unchanged.
 */
export function toBrokerError(err: unknown): BrokerError {
  if (err instanceof BrokerError) return err;
  if (err instanceof NatsError) {
    const code =
      err.api_error !== undefined
        ? classifyApiError(err.api_error.code)
        : classifyClientError(err.code);
    return new BrokerError(err.message, code, { cause: err });
  }
  return new BrokerError(describeError(err), 'unknown', { cause: err });
}
