export {
  EVENT_SCHEMAS,
  EVENT_TYPES,
  baseEventSchema,
  domainEventSchema,
  eventMetadataSchema,
  isEventType,
} from './event-schema.js';
export type {
  DomainEvent,
  EventFields,
  EventMetadataInput,
  EventOf,
  EventType,
} from './event-schema.js';
export { createEvent, decodeEvent, encodeEvent } from './event-codec.js';
export type { EventOverrides } from './event-codec.js';
export { matchesAny, subjectMatches } from './subject-filter.js';
export { EventPublisher } from './publisher.js';
export type { EventPublisherOptions, PublishBatchOptions, PublishCallOptions } from './publisher.js';
export { EventConsumer } from './consumer.js';
export type { ConsumerState, EventConsumerOptions, EventHandler, SubscribeOptions } from './consumer.js';
