/**
 * Inbound signal queues
 *
 * Processors publish completion and gap signals to two durable RabbitMQ
 * queues. The worker polls both with manual acknowledgement: a message is
 * acked only after it has been handled, rejected without requeue when it can
 * never be handled (dead-lettered by the broker), and requeued otherwise.
 */

import type { Channel, GetMessage } from 'amqplib';
import { createLogger, errorMessage, type Logger } from '@sentinel/logger';
import type { AmqpClient } from '@sentinel/monitor-core';

export type SignalKind = 'completion' | 'gap';

export const SIGNAL_QUEUES: Record<SignalKind, string> = {
  completion: 'sentinel.completions',
  gap: 'sentinel.gaps',
};

export interface SignalMessage {
  kind: SignalKind;
  messageId: string;
  /** Parsed JSON body; null when the payload was not JSON */
  body: unknown;
  redelivered: boolean;
  receipt: string;
}

export interface SignalQueue {
  /**
   * Non-blocking; returns an empty array when nothing is waiting
   */
  poll(maxMessages: number): Promise<SignalMessage[]>;
  acknowledge(message: SignalMessage): Promise<void>;
  reject(message: SignalMessage, requeue: boolean): Promise<void>;
  close(): Promise<void>;
}

/**
 * In-memory queue for local runs and tests. Rejected messages that are
 * requeued go to the back of the queue and come back marked redelivered.
 */
export class InMemorySignalQueue implements SignalQueue {
  private messages: SignalMessage[] = [];
  private sequence = 0;
  acknowledged: string[] = [];
  deadLettered: string[] = [];

  add(kind: SignalKind, body: unknown, messageId?: string): void {
    this.sequence += 1;
    const id = messageId ?? `${kind}-${this.sequence}`;
    this.messages.push({ kind, messageId: id, body, redelivered: false, receipt: `${id}#${this.sequence}` });
  }

  size(): number {
    return this.messages.length;
  }

  async poll(maxMessages: number): Promise<SignalMessage[]> {
    return this.messages.splice(0, maxMessages);
  }

  async acknowledge(message: SignalMessage): Promise<void> {
    this.acknowledged.push(message.messageId);
  }

  async reject(message: SignalMessage, requeue: boolean): Promise<void> {
    if (requeue) {
      this.messages.push({ ...message, redelivered: true });
    } else {
      this.deadLettered.push(message.messageId);
    }
  }

  async close(): Promise<void> {
    this.messages = [];
  }
}

interface HeldMessage {
  channel: Channel;
  message: GetMessage;
}

function parseBody(content: Buffer): unknown {
  try {
    const parsed: unknown = JSON.parse(content.toString('utf-8'));
    return parsed;
  } catch {
    return null;
  }
}

export class RabbitMQSignalQueue implements SignalQueue {
  private held: Map<string, HeldMessage> = new Map();
  private declaredOn: Channel | null = null;
  private logger: Logger;

  constructor(private readonly client: AmqpClient, logger?: Logger) {
    this.logger = logger ?? createLogger('signal-queue');
  }

  async poll(maxMessages: number): Promise<SignalMessage[]> {
    const channel = await this.client.channel();
    if (this.declaredOn !== channel) {
      for (const queue of Object.values(SIGNAL_QUEUES)) {
        await channel.assertQueue(queue, { durable: true });
      }
      this.declaredOn = channel;
    }

    const messages: SignalMessage[] = [];
    const kinds: SignalKind[] = ['completion', 'gap'];
    const drained = new Set<SignalKind>();

    // Alternate between queues so a burst of one kind cannot starve the other
    while (messages.length < maxMessages && drained.size < kinds.length) {
      for (const kind of kinds) {
        if (messages.length >= maxMessages || drained.has(kind)) {
          continue;
        }
        const message = await channel.get(SIGNAL_QUEUES[kind], { noAck: false });
        if (message === false) {
          drained.add(kind);
          continue;
        }

        const id: unknown = message.properties.messageId;
        const messageId = typeof id === 'string' && id.length > 0 ? id : `${kind}-${message.fields.deliveryTag}`;
        const receipt = `${kind}:${message.fields.deliveryTag}`;
        const body = parseBody(message.content);
        if (body === null) {
          this.logger.warn('Signal is not valid JSON', { kind, messageId });
        }

        this.held.set(receipt, { channel, message });
        messages.push({ kind, messageId, body, redelivered: message.fields.redelivered, receipt });
      }
    }

    return messages;
  }

  async acknowledge(message: SignalMessage): Promise<void> {
    const held = this.take(message);
    if (!held) {
      return;
    }
    try {
      held.channel.ack(held.message);
    } catch (error) {
      // Channel went away; the broker redelivers the message
      this.logger.warn('Failed to ack signal', { messageId: message.messageId, error: errorMessage(error) });
    }
  }

  async reject(message: SignalMessage, requeue: boolean): Promise<void> {
    const held = this.take(message);
    if (!held) {
      return;
    }
    try {
      held.channel.nack(held.message, false, requeue);
    } catch (error) {
      this.logger.warn('Failed to nack signal', { messageId: message.messageId, error: errorMessage(error) });
    }
  }

  async close(): Promise<void> {
    this.held.clear();
    this.declaredOn = null;
  }

  private take(message: SignalMessage): HeldMessage | undefined {
    const held = this.held.get(message.receipt);
    if (!held) {
      this.logger.warn('Signal is not held by this queue', { messageId: message.messageId });
      return undefined;
    }
    this.held.delete(message.receipt);
    return held;
  }
}

export function createSignalQueue(type: 'rabbitmq' | 'memory', client: AmqpClient, logger?: Logger): SignalQueue {
  if (type === 'memory') {
    return new InMemorySignalQueue();
  }
  return new RabbitMQSignalQueue(client, logger);
}
