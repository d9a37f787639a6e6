export {
  brokerConfigSchema,
  streamConfigSchema,
  consumerConfigSchema,
  DEFAULT_STREAMS,
} from './schema.js';
export type {
  BrokerConfig,
  BrokerConfigInput,
  StreamConfig,
  StreamConfigInput,
  ConsumerConfig,
  ConsumerConfigInput,
} from './schema.js';
export { parseBrokerConfig, parseStreamConfig, parseConsumerConfig, loadBrokerConfig } from './load.js';
