import type { TestCaseJobInput } from '../schema/job.js';
import type { BrokerChannel } from './broker.js';
import * as log from '../utils/logger.js';

/**
 * Publish a job as a persistent message on a durable queue.
 */
export async function publishJob(
  channel: Pick<BrokerChannel, 'assertQueue' | 'sendToQueue'>,
  queue: string,
  job: TestCaseJobInput,
): Promise<void> {
  await channel.assertQueue(queue, { durable: true });
  const flushed = channel.sendToQueue(queue, Buffer.from(JSON.stringify(job)), {
    persistent: true,
    contentType: 'application/json',
  });
  // amqplib still sends the message; false only signals back-pressure.
  if (!flushed) {
    log.warn(`Broker write buffer full while queueing ${job.test_case_id}`);
  }
  log.queue(`Queued ${job.test_case_id} on ${queue}`);
}
