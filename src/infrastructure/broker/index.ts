export type {
  TransportStatus,
  TransportStatusListener,
  TransportOptions,
  TransportConnector,
  BrokerTransport,
  StreamContextOptions,
  StreamInfo,
  ConsumerInfo,
  MessageHeaders,
  PublishOptions,
  PullSubscribeOptions,
  StreamContext,
  PullSubscription,
  StreamMessage,
  BrokerConnection,
} from './types.js';
