import { ZodError } from 'zod';

import { LIMITS } from '../config/defaults.js';
import type { BrokerConfig } from '../schema/config.js';
import type { TestCaseJob } from '../schema/job.js';
import { parseTestCaseJob } from '../schema/job.js';
import type { RunOutcome } from '../schema/run.js';
import type { RunController } from '../core/runController.js';
import { messageOf } from '../core/errors.js';
import type {
  BrokerChannel,
  BrokerConnect,
  BrokerConnection,
  DeliveredMessage,
} from './broker.js';
import * as log from '../utils/logger.js';

// ── Error ─────────────────────────────────────────────────────

export class MalformedJobError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Malformed job: ${issues.join('; ')}`);
    this.name = 'MalformedJobError';
    this.issues = issues;
  }
}

// ── Message handling ─────────────────────────────────────────

export type DeliveryResult =
  | { outcome: 'processed'; testCaseId: string; runs: RunOutcome[] }
  | { outcome: 'malformed'; error: MalformedJobError }
  | { outcome: 'dispatch_error'; testCaseId: string; error: unknown };

export function parseJobMessage(content: Buffer): TestCaseJob {
  let data: unknown;
  try {
    data = JSON.parse(content.toString('utf-8'));
  } catch (err) {
    throw new MalformedJobError([`invalid JSON (${messageOf(err)})`]);
  }

  try {
    return parseTestCaseJob(data);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new MalformedJobError(
        err.issues.map((issue) =>
          issue.path.length > 0
            ? `${issue.path.join('.')}: ${issue.message}`
            : issue.message,
        ),
      );
    }
    throw err;
  }
}

/**
 * Parse and run one delivered job. Whatever happens, the message is
 * done with afterwards: a failed test is not a failed job, and a job
 * that cannot be parsed or dispatched would only fail again if requeued.
 */
export async function handleDelivery(
  content: Buffer,
  controller: RunController,
): Promise<DeliveryResult> {
  let job: TestCaseJob;
  try {
    job = parseJobMessage(content);
  } catch (err) {
    if (err instanceof MalformedJobError) {
      log.error(err.message);
      return { outcome: 'malformed', error: err };
    }
    throw err;
  }

  log.queue(`Received job ${job.test_case_id}`);
  try {
    const runs = await controller.runJob(job);
    const failed = runs.filter((r) => r.status === 'FAIL').length;
    log.queue(
      `Finished job ${job.test_case_id}: ${String(runs.length - failed)} passed, ${String(failed)} failed`,
    );
    return { outcome: 'processed', testCaseId: job.test_case_id, runs };
  } catch (err) {
    log.error(`Job ${job.test_case_id} could not be dispatched: ${messageOf(err)}`);
    return { outcome: 'dispatch_error', testCaseId: job.test_case_id, error: err };
  }
}

// ── Consumer loop ────────────────────────────────────────────

export interface ConsumerOptions {
  connect: BrokerConnect;
  broker: BrokerConfig;
  controller: RunController;
  /** Stops the loop once the job in flight has been handled and acked. */
  signal?: AbortSignal | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
  onDelivery?: ((result: DeliveryResult) => void) | undefined;
}

/**
 * Consume jobs until aborted. One message in flight (prefetch 1).
 * A lost or refused connection is retried after a fixed delay, forever,
 * but never while a job from the previous connection is still running.
 * Unacknowledged messages are redelivered by the broker.
 */
export async function runConsumer(options: ConsumerOptions): Promise<void> {
  const { broker, signal } = options;
  const sleep = options.sleep ?? delay;

  while (!signal?.aborted) {
    try {
      const connection = await options.connect(broker.url);
      await consumeUntilClosed(connection, options);
      if (signal?.aborted) break;
      log.warn(
        `Broker connection lost. Reconnecting in ${String(broker.reconnectDelayMs / 1000)}s...`,
      );
    } catch (err) {
      if (signal?.aborted) break;
      log.warn(
        `Broker unavailable: ${messageOf(err)}. Retrying in ${String(broker.reconnectDelayMs / 1000)}s...`,
      );
    }
    await sleep(broker.reconnectDelayMs);
  }

  log.queue('Consumer stopped');
}

/**
 * Consume on one connection until it is lost or the signal stops the
 * worker. Either way the job in flight finishes (and is acked, if the
 * channel still allows it) before the connection is closed and before
 * the caller may reconnect.
 */
async function consumeUntilClosed(
  connection: BrokerConnection,
  options: ConsumerOptions,
): Promise<void> {
  const { broker, signal } = options;

  let connectionClosed = false;
  let markLost: () => void = () => {};
  const lost = new Promise<'lost'>((resolve) => {
    markLost = () => {
      resolve('lost');
    };
  });
  connection.on('close', () => {
    connectionClosed = true;
    markLost();
  });
  connection.on('error', (err) => {
    log.warn(`Broker connection error: ${messageOf(err)}`);
  });

  let requestStop: () => void = () => {};
  const stopRequested = new Promise<'stop'>((resolve) => {
    requestStop = () => {
      resolve('stop');
    };
  });
  if (signal?.aborted) requestStop();
  signal?.addEventListener('abort', requestStop, { once: true });

  // Deliveries are handled strictly one after another.
  let stopping = false;
  let inFlight: Promise<void> = Promise.resolve();

  try {
    const channel = await connection.createChannel();
    channel.on('error', (err) => {
      log.warn(`Broker channel error: ${messageOf(err)}`);
    });
    channel.on('close', () => {
      markLost();
    });

    await channel.assertQueue(broker.queue, { durable: true });
    await channel.prefetch(LIMITS.PREFETCH);

    const { consumerTag } = await channel.consume(
      broker.queue,
      (message) => {
        // Left unacked: the broker requeues it once the connection closes.
        if (stopping) return;
        if (message === null) {
          // Consumer cancelled by the broker (queue deleted); reconnect.
          log.warn(`Consumer on ${broker.queue} cancelled by broker`);
          markLost();
          return;
        }
        const delivered = message;
        inFlight = inFlight
          .then(() => processMessage(channel, delivered, options))
          .catch((err: unknown) => {
            log.error(`Delivery handler failed: ${messageOf(err)}`);
          });
      },
      { noAck: false },
    );

    log.queue(`Connected. Waiting for jobs on ${broker.queue}`);
    const reason = await Promise.race([lost, stopRequested]);
    stopping = true;

    if (reason === 'stop') {
      await channel.cancel(consumerTag).catch((err: unknown) => {
        log.warn(`Could not cancel consumer: ${messageOf(err)}`);
      });
      log.info('Waiting for the current job before disconnecting...');
    }
  } finally {
    stopping = true;
    await inFlight;
    signal?.removeEventListener('abort', requestStop);
    if (!connectionClosed) {
      await connection.close().catch((err: unknown) => {
        log.warn(`Error while closing broker connection: ${messageOf(err)}`);
      });
    }
  }
}

async function processMessage(
  channel: Pick<BrokerChannel, 'ack'>,
  message: DeliveredMessage,
  options: ConsumerOptions,
): Promise<void> {
  let result: DeliveryResult;
  try {
    result = await handleDelivery(message.content, options.controller);
  } catch (err) {
    log.error(`Unexpected error while handling a job: ${messageOf(err)}`);
    result = {
      outcome: 'dispatch_error',
      testCaseId: 'unknown',
      error: err,
    };
  }

  try {
    channel.ack(message);
  } catch (err) {
    // Channel already gone; the broker will redeliver.
    log.warn(`Could not acknowledge message: ${messageOf(err)}`);
  }

  options.onDelivery?.(result);
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
