import amqp from 'amqplib';

// ── Broker surface ───────────────────────────────────────────
// The slice of amqplib the worker uses. amqplib's own connection and
// channel satisfy these structurally; tests supply in-process fakes.

export interface DeliveredMessage {
  content: Buffer;
}

export interface BrokerChannel {
  assertQueue(queue: string, options: { durable: boolean }): Promise<unknown>;
  prefetch(count: number): Promise<unknown>;
  consume(
    queue: string,
    onMessage: (message: DeliveredMessage | null) => void,
    options: { noAck: boolean },
  ): Promise<{ consumerTag: string }>;
  /** Stop deliveries to a consumer; messages already delivered stay ackable. */
  cancel(consumerTag: string): Promise<unknown>;
  ack(message: DeliveredMessage): void;
  sendToQueue(
    queue: string,
    content: Buffer,
    options: { persistent: boolean; contentType: string },
  ): boolean;
  close(): Promise<void>;
  /** A channel the server closes emits `error`, then `close`. */
  on(event: 'close' | 'error', listener: (err?: unknown) => void): unknown;
}

export interface BrokerConnection {
  createChannel(): Promise<BrokerChannel>;
  on(event: 'close' | 'error', listener: (err?: unknown) => void): unknown;
  close(): Promise<void>;
}

export type BrokerConnect = (url: string) => Promise<BrokerConnection>;

/** Connect to RabbitMQ (or any AMQP 0-9-1 broker). */
export const connectAmqp: BrokerConnect = (url) => amqp.connect(url);
