import {
  AckPolicy,
  DeliverPolicy,
  DiscardPolicy,
  ErrorCode,
  NatsError,
  ReplayPolicy,
  RetentionPolicy,
  StorageType,
} from 'nats';
import { BrokerError } from '../../src/domain/index.js';
import { parseConsumerConfig, parseStreamConfig } from '../../src/infrastructure/config/index.js';
import {
  consumerFilters,
  toBrokerError,
  toNatsConsumerConfig,
  toNatsStreamConfig,
} from '../../src/infrastructure/nats/nats-mapping.js';

function apiError(status: number, description: string): NatsError {
  const err = new NatsError(description, String(status));
  err.api_error = { code: status, err_code: 10000 + status, description };
  return err;
}

describe('toNatsStreamConfig', () => {
  it('maps policies and converts max age to nanoseconds', () => {
    const cfg = parseStreamConfig({
      name: 'ACADEMIC_EVENTS',
      subjects: ['academic.>'],
      retention: 'interest',
      max_age_seconds: 60,
    });

    expect(toNatsStreamConfig(cfg)).toEqual({
      name: 'ACADEMIC_EVENTS',
      subjects: ['academic.>'],
      retention: RetentionPolicy.Interest,
      storage: StorageType.File,
      max_age: 60_000_000_000,
      max_bytes: 10737418240,
      num_replicas: 1,
      discard: DiscardPolicy.Old,
    });
  });
});

describe('toNatsConsumerConfig', () => {
  it('maps a durable with defaults', () => {
    expect(toNatsConsumerConfig(parseConsumerConfig({ durable_name: 'grades' }))).toEqual({
      durable_name: 'grades',
      ack_policy: AckPolicy.Explicit,
      ack_wait: 30_000_000_000,
      max_deliver: 3,
      deliver_policy: DeliverPolicy.All,
      replay_policy: ReplayPolicy.Instant,
    });
  });

  it('puts a single filter in filter_subject', () => {
    const out = toNatsConsumerConfig(
      parseConsumerConfig({ durable_name: 'exams', filter_subjects: ['academic.exam.*'] }),
    );
    expect(out.filter_subject).toBe('academic.exam.*');
    expect(out.filter_subjects).toBeUndefined();
  });

  it('puts several filters in filter_subjects', () => {
    const out = toNatsConsumerConfig(
      parseConsumerConfig({
        durable_name: 'assessments',
        filter_subjects: ['academic.exam.*', 'academic.quiz.*'],
      }),
    );
    expect(out.filter_subjects).toEqual(['academic.exam.*', 'academic.quiz.*']);
    expect(out.filter_subject).toBeUndefined();
  });

  it('carries the start position for its deliver policy', () => {
    const bySeq = toNatsConsumerConfig(
      parseConsumerConfig({ durable_name: 'replay', deliver_policy: 'by_start_sequence', opt_start_seq: 42 }),
    );
    expect(bySeq.deliver_policy).toBe(DeliverPolicy.StartSequence);
    expect(bySeq.opt_start_seq).toBe(42);
    expect(bySeq.opt_start_time).toBeUndefined();
  });
});

describe('consumerFilters', () => {
  it('reads either filter field', () => {
    expect(consumerFilters({ filter_subject: 'a.*' })).toEqual(['a.*']);
    expect(consumerFilters({ filter_subjects: ['a.*', 'b.*'] })).toEqual(['a.*', 'b.*']);
    expect(consumerFilters({})).toEqual([]);
  });
});

// --- Errors ---

describe('toBrokerError', () => {
  it.each<[number, string, boolean]>([
    [400, 'bad_request', false],
    [403, 'permission', false],
    [404, 'not_found', true],
    [408, 'timeout', true],
    [503, 'unavailable', true],
    [500, 'unknown', true],
  ])('classifies API status %i as %s', (status, code, retryable) => {
    const err = toBrokerError(apiError(status, 'api failure'));
    expect(err.code).toBe(code);
    expect(err.retryable).toBe(retryable);
    expect(err.message).toBe('api failure');
  });

  it.each<[string, string]>([
    [ErrorCode.Timeout, 'timeout'],
    [ErrorCode.NoResponders, 'unavailable'],
    [ErrorCode.AuthorizationViolation, 'permission'],
    [ErrorCode.MaxPayloadExceeded, 'payload_too_large'],
    [ErrorCode.ConnectionClosed, 'closed'],
    [ErrorCode.JetStream404NoMessages, 'not_found'],
  ])('classifies client error %s as %s', (natsCode, code) => {
    const cause = new NatsError('client failure', natsCode);
    const err = toBrokerError(cause);
    expect(err.code).toBe(code);
    expect(err.cause).toBe(cause);
  });

  it('passes a BrokerError through', () => {
    const original = new BrokerError('already mapped', 'timeout');
    expect(toBrokerError(original)).toBe(original);
  });

  it('wraps anything else as unknown', () => {
    const err = toBrokerError('socket hang up');
    expect(err).toEqual(expect.objectContaining({ code: 'unknown', message: 'socket hang up' }));
    expect(err.retryable).toBe(true);
  });
});
