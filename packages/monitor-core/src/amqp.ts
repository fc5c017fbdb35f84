/**
 * RabbitMQ access
 *
 * One lazily opened connection per process. The worker consumes signals on
 * a long-lived channel; dead-letter inspection opens a short-lived channel
 * per queue because a failed declare (missing queue) closes the channel it
 * ran on.
 */

import { connect, type Channel, type GetMessage } from 'amqplib';
import { createLogger, errorMessage, type Logger } from '@sentinel/logger';

type AmqpConnection = Awaited<ReturnType<typeof connect>>;

const NOT_FOUND = 404;

export class AmqpClient {
  private connection: AmqpConnection | null = null;
  private connecting: Promise<AmqpConnection> | null = null;
  private sharedChannel: Channel | null = null;
  private logger: Logger;

  constructor(private readonly url: string, logger?: Logger) {
    this.logger = logger ?? createLogger('amqp');
  }

  async channel(): Promise<Channel> {
    if (this.sharedChannel) {
      return this.sharedChannel;
    }
    const connection = await this.connect();
    const channel = await connection.createChannel();
    await channel.prefetch(10);
    channel.on('error', (error: Error) => {
      this.logger.error('RabbitMQ channel error', { error: error.message });
    });
    channel.on('close', () => {
      this.sharedChannel = null;
    });
    this.sharedChannel = channel;
    return channel;
  }

  async withChannel<T>(fn: (channel: Channel) => Promise<T>): Promise<T> {
    const connection = await this.connect();
    const channel = await connection.createChannel();
    let closed = false;
    channel.on('error', (error: Error) => {
      this.logger.debug('RabbitMQ short-lived channel error', { error: error.message });
    });
    channel.on('close', () => {
      closed = true;
    });

    try {
      return await fn(channel);
    } finally {
      if (!closed) {
        await channel.close().catch((error: unknown) => {
          this.logger.debug('RabbitMQ channel already closed', { error: errorMessage(error) });
        });
      }
    }
  }

  async close(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    this.sharedChannel = null;
    if (connection) {
      await connection.close();
    }
  }

  private async connect(): Promise<AmqpConnection> {
    if (this.connection) {
      return this.connection;
    }
    if (!this.connecting) {
      this.connecting = connect(this.url)
        .then((connection) => {
          connection.on('error', (error: Error) => {
            this.logger.error('RabbitMQ connection error', { error: error.message });
          });
          connection.on('close', () => {
            this.logger.warn('RabbitMQ connection closed, will reconnect');
            this.connection = null;
            this.sharedChannel = null;
          });
          this.connection = connection;
          return connection;
        })
        .finally(() => {
          this.connecting = null;
        });
    }
    return this.connecting;
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === NOT_FOUND;
}

export interface DeadLetterMessage {
  messageId: string | null;
  timestamp: Date | null;
  redelivered: boolean;
  body: string;
}

/**
 * Non-destructive view of a dead-letter queue. peek() returns null when the
 * queue does not exist.
 */
export interface DeadLetterSource {
  peek(queue: string, limit: number): Promise<DeadLetterMessage[] | null>;
  exactCount(queue: string): Promise<number>;
}

function toDeadLetterMessage(message: GetMessage): DeadLetterMessage {
  const id: unknown = message.properties.messageId;
  const timestamp: unknown = message.properties.timestamp;
  return {
    messageId: typeof id === 'string' ? id : null,
    // AMQP timestamps are seconds since the epoch
    timestamp: typeof timestamp === 'number' ? new Date(timestamp * 1000) : null,
    redelivered: message.fields.redelivered,
    body: message.content.toString('utf-8'),
  };
}

export class AmqpDeadLetterSource implements DeadLetterSource {
  constructor(private readonly client: AmqpClient) {}

  async peek(queue: string, limit: number): Promise<DeadLetterMessage[] | null> {
    try {
      return await this.client.withChannel(async (channel) => {
        await channel.checkQueue(queue);
        const held: GetMessage[] = [];
        try {
          while (held.length < limit) {
            const message = await channel.get(queue, { noAck: false });
            if (message === false) {
              break;
            }
            held.push(message);
          }
          return held.map(toDeadLetterMessage);
        } finally {
          // Put everything back; peeking must never consume
          for (const message of held) {
            channel.nack(message, false, true);
          }
        }
      });
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async exactCount(queue: string): Promise<number> {
    return this.client.withChannel(async (channel) => {
      const reply = await channel.checkQueue(queue);
      return reply.messageCount;
    });
  }
}
