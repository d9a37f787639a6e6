/**
 * Core domain types for the eventline event model.
 *
 * These types define the envelope every event carries as it flows
 * from a publisher, through the broker, to a consumer. They carry no
 * framework dependencies; the per-type payload schemas live in
 * `application/event-schema.ts`.
 */

/** Schema version stamped on events that do not set one. */
export const DEFAULT_EVENT_VERSION = '1.0';

/**
 * Tracing and correlation context attached to every event.
 *
 * Purely descriptive: never consulted for routing or retry decisions.
 */
export interface EventMetadata {
  readonly source_service: string;
  readonly correlation_id?: string | undefined;
  readonly causation_id?: string | undefined;
  readonly user_id?: string | undefined;
  readonly institution_id?: string | undefined;
  readonly trace_context: Record<string, unknown>;
}

/**
 * Fields shared by every event variant.
 *
 * `event_type` doubles as the publish subject. `event_id` is unique per
 * logical occurrence and is reused as the broker's de-duplication id.
 */
export interface EventEnvelope<TType extends string = string> {
  readonly event_id: string;
  readonly event_type: TType;
  readonly event_version: string;
  readonly timestamp: string; // ISO-8601, UTC
  readonly metadata: EventMetadata;
}

/** Acknowledgment of a stored publish. */
export interface PubAck {
  readonly stream: string;
  readonly seq: number;
  readonly duplicate: boolean;
}
