import { ConfigError } from '../../src/domain/index.js';
import {
  DEFAULT_STREAMS,
  loadBrokerConfig,
  parseBrokerConfig,
  parseConsumerConfig,
  parseStreamConfig,
} from '../../src/infrastructure/config/index.js';

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

// --- Broker config ---

describe('parseBrokerConfig', () => {
  it('fills every default', () => {
    const cfg = parseBrokerConfig();

    expect(cfg.servers).toEqual(['nats://localhost:4222']);
    expect(cfg.client_name).toBe('eventline-client');
    expect(cfg.max_reconnect_attempts).toBe(10);
    expect(cfg.reconnect_wait_seconds).toBe(2);
    expect(cfg.enable_auth).toBe(false);
    expect(cfg.enable_tls).toBe(false);
    expect(cfg.enable_jetstream).toBe(true);
    expect(cfg.connect_timeout_seconds).toBe(5);
    expect(cfg.request_timeout_seconds).toBe(5);
    expect(cfg.max_payload_bytes).toBe(1048576);
    expect(cfg.max_pending_messages).toBe(65536);
    expect(cfg.service_name).toBe('eventline');
    expect(cfg.streams.map((s) => s.name)).toEqual(['ACADEMIC_EVENTS', 'NOTES_EVENTS']);
  });

  it('applies stream defaults to the default streams', () => {
    const [academic, notes] = parseBrokerConfig().streams;

    expect(academic).toEqual({
      name: 'ACADEMIC_EVENTS',
      subjects: DEFAULT_STREAMS[0]?.subjects,
      retention: 'interest',
      storage: 'file',
      max_age_seconds: 604800,
      max_bytes: 10737418240,
      replicas: 1,
      discard: 'old',
    });
    expect(notes?.subjects).toEqual(['notes.*']);
    expect(notes?.max_age_seconds).toBe(2592000);
  });

  it('requires credentials when auth is enabled', () => {
    const err = configError(() => parseBrokerConfig({ enable_auth: true }));
    expect(err.issues).toEqual(['enable_auth: Authentication needs a token or a username and password']);
    expect(err.message).toBe(
      'Invalid broker config: enable_auth: Authentication needs a token or a username and password',
    );
  });

  it('accepts a token or a username and password', () => {
    expect(parseBrokerConfig({ enable_auth: true, token: 'test-token' }).token).toBe('test-token');
    expect(
      parseBrokerConfig({ enable_auth: true, username: 'svc', password: 'test-secret' }).username,
    ).toBe('svc');
  });

  it('rejects a username without a password', () => {
    expect(() => parseBrokerConfig({ enable_auth: true, username: 'svc' })).toThrow(ConfigError);
  });

  it('pairs the TLS certificate with its key', () => {
    expect(configError(() => parseBrokerConfig({ tls_cert_file: '/tls/client.crt' })).issues).toEqual([
      'tls_key_file: tls_key_file is required with tls_cert_file',
    ]);
    expect(configError(() => parseBrokerConfig({ tls_key_file: '/tls/client.key' })).issues).toEqual([
      'tls_cert_file: tls_cert_file is required with tls_key_file',
    ]);
  });

  it('rejects payload limits under 1 KiB', () => {
    const err = configError(() => parseBrokerConfig({ max_payload_bytes: 512 }));
    expect(err.issues).toEqual(['max_payload_bytes: Number must be greater than or equal to 1024']);
  });

  it('rejects duplicate stream names', () => {
    const err = configError(() =>
      parseBrokerConfig({
        streams: [
          { name: 'A', subjects: ['a.*'] },
          { name: 'A', subjects: ['b.*'] },
        ],
      }),
    );
    expect(err.issues).toEqual(['streams.1.name: Duplicate stream name A']);
  });
});

// --- Stream and consumer config ---

describe('parseStreamConfig', () => {
  it('needs at least one subject', () => {
    const err = configError(() => parseStreamConfig({ name: 'EMPTY', subjects: [] }));
    expect(err.issues).toEqual(['subjects: A stream needs at least one subject']);
  });

  it('bounds replicas to 1..5', () => {
    expect(() => parseStreamConfig({ name: 'S', subjects: ['s.*'], replicas: 6 })).toThrow(ConfigError);
    expect(parseStreamConfig({ name: 'S', subjects: ['s.*'], replicas: 5 }).replicas).toBe(5);
  });
});

describe('parseConsumerConfig', () => {
  it('fills every default', () => {
    expect(parseConsumerConfig({ durable_name: 'grades' })).toEqual({
      durable_name: 'grades',
      ack_policy: 'explicit',
      ack_wait_seconds: 30,
      max_deliver: 3,
      filter_subjects: [],
      deliver_policy: 'all',
      replay_policy: 'instant',
      subject_filter_mode: 'server',
    });
  });

  it('requires a start sequence for by_start_sequence', () => {
    const err = configError(() =>
      parseConsumerConfig({ durable_name: 'grades', deliver_policy: 'by_start_sequence' }),
    );
    expect(err.issues).toEqual([
      'opt_start_seq: opt_start_seq is required when deliver_policy is by_start_sequence',
    ]);
  });

  it('requires a start time for by_start_time', () => {
    expect(() =>
      parseConsumerConfig({ durable_name: 'grades', deliver_policy: 'by_start_time' }),
    ).toThrow(ConfigError);
    expect(
      parseConsumerConfig({
        durable_name: 'grades',
        deliver_policy: 'by_start_time',
        opt_start_time: '2026-03-01T00:00:00Z',
      }).opt_start_time,
    ).toBe('2026-03-01T00:00:00Z');
  });

  it('accepts max_deliver -1 for unlimited', () => {
    expect(parseConsumerConfig({ durable_name: 'grades', max_deliver: -1 }).max_deliver).toBe(-1);
  });
});

// --- Environment ---

describe('loadBrokerConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadBrokerConfig({})).toEqual(parseBrokerConfig());
  });

  it('reads NATS_* variables with their types', () => {
    const cfg = loadBrokerConfig({
      NATS_SERVERS: 'nats://a:4222, nats://b:4222,',
      NATS_CLIENT_NAME: 'grades-worker',
      NATS_MAX_RECONNECT_ATTEMPTS: '-1',
      NATS_ENABLE_AUTH: 'TRUE',
      NATS_TOKEN: 'test-token',
      NATS_ENABLE_JETSTREAM: '0',
      NATS_MAX_PAYLOAD_BYTES: '2048',
    });

    expect(cfg.servers).toEqual(['nats://a:4222', 'nats://b:4222']);
    expect(cfg.client_name).toBe('grades-worker');
    expect(cfg.max_reconnect_attempts).toBe(-1);
    expect(cfg.enable_auth).toBe(true);
    expect(cfg.token).toBe('test-token');
    expect(cfg.enable_jetstream).toBe(false);
    expect(cfg.max_payload_bytes).toBe(2048);
  });

  it('ignores blank variables', () => {
    expect(loadBrokerConfig({ NATS_CLIENT_NAME: '   ' }).client_name).toBe('eventline-client');
  });

  it('reports unparseable values against their field', () => {
    const err = configError(() =>
      loadBrokerConfig({ NATS_CONNECT_TIMEOUT_SECONDS: 'soon', NATS_ENABLE_TLS: 'maybe' }),
    );
    expect(err.issues).toEqual([
      'enable_tls: Expected boolean, received string',
      'connect_timeout_seconds: Expected number, received nan',
    ]);
  });
});
