/**
 * Job queue module.
 * Dequeues test-case jobs from the broker, runs them, acknowledges them.
 */

export { connectAmqp } from './broker.js';
export type {
  BrokerChannel,
  BrokerConnect,
  BrokerConnection,
  DeliveredMessage,
} from './broker.js';
export {
  MalformedJobError,
  parseJobMessage,
  handleDelivery,
  runConsumer,
} from './consumer.js';
export type { DeliveryResult, ConsumerOptions } from './consumer.js';
export { publishJob } from './publisher.js';
