import { z } from 'zod';

/**
 * Zod schemas for broker, stream and consumer configuration.
 *
 * Field names follow the environment variables they are loaded from
 * (`NATS_MAX_PAYLOAD_BYTES` → `max_payload_bytes`). Durations are whole
 * seconds; the NATS adapter converts them to the units the server expects.
 */

const SEVEN_DAYS_SECONDS = 7 * 24 * 60 * 60;
const THIRTY_DAYS_SECONDS = 30 * 24 * 60 * 60;

export const streamConfigSchema = z.object({
  name: z.string().min(1),
  subjects: z.array(z.string().min(1)).min(1, 'A stream needs at least one subject'),
  retention: z.enum(['limits', 'interest', 'workqueue']).default('workqueue'),
  storage: z.enum(['file', 'memory']).default('file'),
  max_age_seconds: z.number().int().min(0).default(SEVEN_DAYS_SECONDS),
  max_bytes: z.number().int().min(-1).default(10 * 1024 * 1024 * 1024),
  replicas: z.number().int().min(1).max(5).default(1),
  discard: z.enum(['old', 'new']).default('old'),
});

export const consumerConfigSchema = z
  .object({
    durable_name: z.string().min(1),
    ack_policy: z.enum(['explicit', 'all', 'none']).default('explicit'),
    ack_wait_seconds: z.number().int().min(1).default(30),
    max_deliver: z.number().int().min(-1).default(3),
    filter_subjects: z.array(z.string().min(1)).default([]),
    deliver_policy: z
      .enum(['all', 'last', 'new', 'by_start_sequence', 'by_start_time'])
      .default('all'),
    opt_start_seq: z.number().int().min(1).optional(),
    opt_start_time: z.string().datetime({ offset: true }).optional(),
    replay_policy: z.enum(['instant', 'original']).default('instant'),
    // 'server' lets the broker filter; 'client' also terminates stray subjects locally
    subject_filter_mode: z.enum(['server', 'client']).default('server'),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.deliver_policy === 'by_start_sequence' && cfg.opt_start_seq === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['opt_start_seq'],
        message: 'opt_start_seq is required when deliver_policy is by_start_sequence',
      });
    }
    if (cfg.deliver_policy === 'by_start_time' && cfg.opt_start_time === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['opt_start_time'],
        message: 'opt_start_time is required when deliver_policy is by_start_time',
      });
    }
  });

export type StreamConfig = z.infer<typeof streamConfigSchema>;
export type StreamConfigInput = z.input<typeof streamConfigSchema>;
export type ConsumerConfig = z.infer<typeof consumerConfigSchema>;
export type ConsumerConfigInput = z.input<typeof consumerConfigSchema>;

/** Streams declared when a broker config names none. */
export const DEFAULT_STREAMS: readonly StreamConfigInput[] = [
  {
    name: 'ACADEMIC_EVENTS',
    subjects: [
      'academic.profile.*',
      'academic.course.*',
      'academic.assignment.*',
      'academic.exam.*',
      'academic.quiz.*',
      'academic.lab.*',
      'academic.study.*',
      'academic.challenge.*',
      'academic.schedule.*',
    ],
    retention: 'interest',
    storage: 'file',
    max_age_seconds: SEVEN_DAYS_SECONDS,
    replicas: 1,
  },
  {
    name: 'NOTES_EVENTS',
    subjects: ['notes.*'],
    retention: 'interest',
    storage: 'file',
    max_age_seconds: THIRTY_DAYS_SECONDS,
    replicas: 1,
  },
];

export const brokerConfigSchema = z
  .object({
    // --- Connection ---
    servers: z.array(z.string().min(1)).min(1).default(['nats://localhost:4222']),
    client_name: z.string().min(1).default('eventline-client'),
    max_reconnect_attempts: z.number().int().min(-1).default(10),
    reconnect_wait_seconds: z.number().int().min(1).default(2),

    // --- Authentication ---
    enable_auth: z.boolean().default(false),
    token: z.string().min(1).optional(),
    username: z.string().min(1).optional(),
    password: z.string().min(1).optional(),

    // --- TLS ---
    enable_tls: z.boolean().default(false),
    tls_ca_cert_file: z.string().min(1).optional(),
    tls_cert_file: z.string().min(1).optional(),
    tls_key_file: z.string().min(1).optional(),

    // --- JetStream ---
    enable_jetstream: z.boolean().default(true),
    jetstream_domain: z.string().min(1).optional(),

    // --- Timeouts and limits ---
    connect_timeout_seconds: z.number().int().min(1).default(5),
    request_timeout_seconds: z.number().int().min(1).default(5),
    max_payload_bytes: z.number().int().min(1024).default(1024 * 1024),
    max_pending_messages: z.number().int().min(1).default(65536),

    service_name: z.string().min(1).default('eventline'),
    streams: z.array(streamConfigSchema).default([...DEFAULT_STREAMS]),
  })
  .superRefine((cfg, ctx) => {
    const hasCredentials = cfg.username !== undefined && cfg.password !== undefined;
    if (cfg.enable_auth && cfg.token === undefined && !hasCredentials) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['enable_auth'],
        message: 'Authentication needs a token or a username and password',
      });
    }
    if (cfg.tls_cert_file !== undefined && cfg.tls_key_file === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['tls_key_file'],
        message: 'tls_key_file is required with tls_cert_file',
      });
    }
    if (cfg.tls_key_file !== undefined && cfg.tls_cert_file === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['tls_cert_file'],
        message: 'tls_cert_file is required with tls_key_file',
      });
    }

    const seen = new Set<string>();
    cfg.streams.forEach((stream, index) => {
      if (seen.has(stream.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['streams', index, 'name'],
          message: `Duplicate stream name ${stream.name}`,
        });
      }
      seen.add(stream.name);
    });
  });

export type BrokerConfig = z.infer<typeof brokerConfigSchema>;
export type BrokerConfigInput = z.input<typeof brokerConfigSchema>;
