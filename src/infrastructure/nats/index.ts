export { connectNats } from './nats-transport.js';
export {
  toBrokerError,
  toNatsStreamConfig,
  toNatsConsumerConfig,
  fromNatsStreamInfo,
  fromNatsConsumerInfo,
  consumerFilters,
} from './nats-mapping.js';
