import { randomUUID } from 'node:crypto';
import { DEFAULT_EVENT_VERSION, DecodeError } from '../domain/index.js';
import type { EventEnvelope } from '../domain/index.js';
import { domainEventSchema } from './event-schema.js';
import type {
  DomainEvent,
  EventFields,
  EventMetadataInput,
  EventOf,
  EventType,
} from './event-schema.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

/** Envelope fields a caller may pin instead of letting `createEvent` assign them. */
export interface EventOverrides {
  event_id?: string;
  event_version?: string;
  timestamp?: string;
}

function isEventOf<T extends EventType>(event: DomainEvent, type: T): event is EventOf<T> {
  return event.event_type === type;
}

/**
 * Builds a validated catalog event.
 *
 * Assigns a random UUID, the current UTC timestamp and the default schema
 * version unless `overrides` pins them. Field defaults from the catalog are
 * applied; invalid fields throw a `ZodError`.
 */
export function createEvent<T extends EventType>(
  type: T,
  fields: EventFields<T>,
  metadata: EventMetadataInput,
  overrides: EventOverrides = {},
): EventOf<T> {
  const event = domainEventSchema.parse({
    ...fields,
    event_type: type,
    event_id: overrides.event_id ?? randomUUID(),
    event_version: overrides.event_version ?? DEFAULT_EVENT_VERSION,
    timestamp: overrides.timestamp ?? new Date().toISOString(),
    metadata,
  });

  if (!isEventOf(event, type)) {
    throw new TypeError(`Schema for ${type} produced ${event.event_type}`);
  }
  return event;
}

/** UTF-8 JSON wire form of an event. */
export function encodeEvent(event: EventEnvelope): Uint8Array {
  return encoder.encode(JSON.stringify(event));
}

/**
 * Parses a wire payload back into a catalog event.
 *
 * Throws `DecodeError` with reason `malformed_payload` for bytes that are
 * not UTF-8 JSON, and `invalid_event` for JSON that matches no variant.
 */
export function decodeEvent(data: Uint8Array): DomainEvent {
  let raw: unknown;
  try {
    raw = JSON.parse(decoder.decode(data));
  } catch (err: unknown) {
    throw new DecodeError('Event payload is not valid UTF-8 JSON', 'malformed_payload', {
      cause: err,
    });
  }

  const result = domainEventSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new DecodeError(`Invalid event: ${issues}`, 'invalid_event', { cause: result.error });
  }
  return result.data;
}
