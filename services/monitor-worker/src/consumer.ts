/**
 * SignalConsumer - polls inbound signals and routes them
 *
 * Completion signals go to the completeness checker, gap signals to the
 * backfill trigger. A signal that fails validation is dead-lettered at once;
 * a handler failure is retried once through the broker and dead-lettered on
 * the second failure.
 */

import {
  validateCompletionSignal,
  validateGapSignal,
  type BackfillTrigger,
  type CompletenessChecker,
} from '@sentinel/monitor-core';
import { createLogger, errorMessage, type Logger } from '@sentinel/logger';
import type { SignalMessage, SignalQueue } from './queue';

export interface ConsumerConfig {
  pollIntervalMs: number;
  batchSize: number;
}

const DEFAULT_CONFIG: ConsumerConfig = {
  pollIntervalMs: 2000,
  batchSize: 10,
};

export interface SignalHandlers {
  completeness: Pick<CompletenessChecker, 'handleCompletion'>;
  backfill: Pick<BackfillTrigger, 'handleGapSignal' | 'knownGapTypes'>;
}

export interface BatchResult {
  handled: number;
  invalid: number;
  failed: number;
}

type Disposition = 'handled' | 'invalid';

export class SignalConsumer {
  private config: ConsumerConfig;
  private logger: Logger;
  private isRunning = false;
  private pollTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly queue: SignalQueue,
    private readonly handlers: SignalHandlers,
    config: Partial<ConsumerConfig> = {},
    logger?: Logger
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = logger ?? createLogger('signal-consumer');
  }

  start(): void {
    if (this.isRunning) {
      this.logger.warn('Signal consumer already running');
      return;
    }
    this.isRunning = true;
    this.logger.info('Signal consumer started', {
      pollInterval: this.config.pollIntervalMs,
      batchSize: this.config.batchSize,
    });
    this.pollLoop();
  }

  stop(): void {
    this.isRunning = false;
    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = null;
    }
    this.logger.info('Signal consumer stopped');
  }

  private pollLoop(): void {
    if (!this.isRunning) {
      return;
    }

    this.processBatch()
      .catch((error) => {
        this.logger.error('Error in poll loop', { error: errorMessage(error) });
      })
      .finally(() => {
        if (this.isRunning) {
          this.pollTimer = setTimeout(() => this.pollLoop(), this.config.pollIntervalMs);
        }
      });
  }

  async processBatch(): Promise<BatchResult> {
    const result: BatchResult = { handled: 0, invalid: 0, failed: 0 };
    const messages = await this.queue.poll(this.config.batchSize);
    if (messages.length === 0) {
      return result;
    }

    this.logger.debug('Processing signals', { count: messages.length });

    for (const message of messages) {
      try {
        const disposition = await this.dispatch(message);
        if (disposition === 'invalid') {
          result.invalid += 1;
          await this.queue.reject(message, false);
        } else {
          result.handled += 1;
          await this.queue.acknowledge(message);
        }
      } catch (error) {
        result.failed += 1;
        const requeue = !message.redelivered;
        this.logger.error('Error handling signal', {
          messageId: message.messageId,
          kind: message.kind,
          requeue,
          error: errorMessage(error),
        });
        await this.queue.reject(message, requeue);
      }
    }

    return result;
  }

  private async dispatch(message: SignalMessage): Promise<Disposition> {
    switch (message.kind) {
      case 'completion': {
        const validation = validateCompletionSignal(message.body);
        if (!validation.success || !validation.data) {
          this.logger.warn('Invalid completion signal', {
            messageId: message.messageId,
            error: validation.error,
            issues: validation.details?.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
          });
          return 'invalid';
        }
        const outcome = await this.handlers.completeness.handleCompletion(validation.data);
        this.logger.info('Completion handled', {
          processor: validation.data.processorName,
          gameDate: validation.data.gameDate,
          stageKey: outcome.stageKey,
          stageComplete: outcome.stageComplete,
          status: outcome.result.status,
        });
        return 'handled';
      }

      case 'gap': {
        const validation = validateGapSignal(message.body, this.handlers.backfill.knownGapTypes());
        if (!validation.success || !validation.data) {
          this.logger.warn('Invalid gap signal', { messageId: message.messageId, error: validation.error });
          return 'invalid';
        }
        const outcome = await this.handlers.backfill.handleGapSignal(validation.data);
        this.logger.info('Gap signal handled', {
          gapType: outcome.gapType,
          action: outcome.action,
          requestId: outcome.requestId,
        });
        return 'handled';
      }
    }
  }
}
