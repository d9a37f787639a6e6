import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { ConfigError } from '../../domain/index.js';
import { brokerConfigSchema, consumerConfigSchema, streamConfigSchema } from './schema.js';
import type { BrokerConfig, ConsumerConfig, StreamConfig } from './schema.js';

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function parseWith<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown, label: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid ${label}: ${issues.join('; ')}`, issues, {
      cause: result.error,
    });
  }
  return result.data;
}

export function parseBrokerConfig(input: unknown = {}): BrokerConfig {
  return parseWith(brokerConfigSchema, input, 'broker config');
}

export function parseStreamConfig(input: unknown): StreamConfig {
  return parseWith(streamConfigSchema, input, 'stream config');
}

export function parseConsumerConfig(input: unknown): ConsumerConfig {
  return parseWith(consumerConfigSchema, input, 'consumer config');
}

// --- Environment ---

type EnvKind = 'string' | 'int' | 'bool' | 'list';

/** Broker fields read from `NATS_<FIELD>`; streams are only configurable in code. */
const ENV_FIELDS = {
  servers: 'list',
  client_name: 'string',
  max_reconnect_attempts: 'int',
  reconnect_wait_seconds: 'int',
  enable_auth: 'bool',
  token: 'string',
  username: 'string',
  password: 'string',
  enable_tls: 'bool',
  tls_ca_cert_file: 'string',
  tls_cert_file: 'string',
  tls_key_file: 'string',
  enable_jetstream: 'bool',
  jetstream_domain: 'string',
  connect_timeout_seconds: 'int',
  request_timeout_seconds: 'int',
  max_payload_bytes: 'int',
  max_pending_messages: 'int',
  service_name: 'string',
} as const satisfies Record<string, EnvKind>;

/**
 * Converts an environment string to the field's type.
 *
 * Values that do not convert are passed through unchanged (or as NaN) so
 * the schema reports them against the right field.
 */
function convertEnv(raw: string, kind: EnvKind): unknown {
  switch (kind) {
    case 'string':
      return raw;
    case 'int':
      return /^-?\d+$/.test(raw) ? Number(raw) : Number.NaN;
    case 'bool': {
      const lower = raw.toLowerCase();
      if (lower === 'true' || lower === '1') return true;
      if (lower === 'false' || lower === '0') return false;
      return raw;
    }
    case 'list':
      return raw
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0);
  }
}

/**
 * Builds a broker config from `NATS_*` environment variables.
 *
 * Unset or blank variables fall back to the schema defaults.
 */
export function loadBrokerConfig(env: NodeJS.ProcessEnv = process.env): BrokerConfig {
  const input: Record<string, unknown> = {};
  for (const [field, kind] of Object.entries(ENV_FIELDS)) {
    const raw = env[`NATS_${field.toUpperCase()}`]?.trim();
    if (raw === undefined || raw === '') continue;
    input[field] = convertEnv(raw, kind);
  }
  return parseBrokerConfig(input);
}
