export { DEFAULT_EVENT_VERSION } from './event.js';
export type { EventMetadata, EventEnvelope, PubAck } from './event.js';
export {
  ConfigError,
  BrokerError,
  PayloadTooLargeError,
  PublishError,
  ConnectionError,
  NotConnectedError,
  ConsumerError,
  DecodeError,
  isRetryableError,
  errorKind,
  describeError,
} from './errors.js';
export type { BrokerErrorCode, DecodeFailure } from './errors.js';
