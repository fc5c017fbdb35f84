import { HttpTransport, type TransportResponse } from '@sentinel/alerting';
import { err, ok, type Result } from '@sentinel/shared-types';
import { errorMessage } from '@sentinel/logger';
import type { GapAction } from './config';

export interface RecoveryPayload {
  start_date: string;
  end_date: string;
  processors: string[];
  backfill_mode: true;
  skip_dependency_check: true;
  correlation_id: string;
}

export interface RecoveryTrigger {
  trigger(action: GapAction, gameDates: string[], requestId: string): Promise<Result<TransportResponse>>;
}

export function buildRecoveryPayload(action: GapAction, gameDates: string[], requestId: string): RecoveryPayload {
  const sorted = [...gameDates].sort();
  return {
    start_date: sorted[0],
    end_date: sorted[sorted.length - 1],
    processors: action.processors,
    backfill_mode: true,
    skip_dependency_check: true,
    correlation_id: `backfill-${requestId}`,
  };
}

/**
 * Calls the per-gap-type reprocessing endpoint. A single attempt: the
 * backfill trigger records failures and the next gap signal after the
 * cooldown retries.
 */
export class RecoveryClient implements RecoveryTrigger {
  private transport: HttpTransport;

  constructor(
    private readonly authToken: string | undefined,
    timeoutMs: number,
    transport?: HttpTransport
  ) {
    this.transport = transport ?? new HttpTransport({ timeoutMs, maxRetries: 0 });
  }

  async trigger(action: GapAction, gameDates: string[], requestId: string): Promise<Result<TransportResponse>> {
    if (gameDates.length === 0) {
      return err(new Error('No game dates available for recovery'));
    }

    const headers: Record<string, string> = {};
    if (this.authToken) {
      headers.Authorization = `Bearer ${this.authToken}`;
    }

    try {
      const response = await this.transport.postJson(
        `${action.serviceUrl}${action.endpoint}`,
        buildRecoveryPayload(action, gameDates, requestId),
        headers
      );
      return ok(response);
    } catch (error) {
      return err(error instanceof Error ? error : new Error(errorMessage(error)));
    }
  }
}
