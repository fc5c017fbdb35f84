/**
 * Durable backfill request store
 *
 * The store is the only source of truth for backfill deduplication, so the
 * cooldown check and the write must be one atomic step. claim() is a
 * compare-and-swap: it succeeds only when no request with the same id was
 * created inside the cooldown window, and two concurrent claims for the same
 * id can never both succeed.
 *
 * MongoDB implements this with a conditional upsert on _id; the in-memory
 * store mirrors the same semantics for tests and local runs.
 */

import { MongoClient, MongoServerError, type Collection } from 'mongodb';
import { BackfillRequest, BackfillStatus, Severity } from '@sentinel/shared-types';

export interface NewBackfillRequest {
  requestId: string;
  gapType: string;
  identifiers: string[];
  gameDates: string[];
  teamAbbrs: string[];
  source: string;
  severity: Severity;
  detectedAt: Date;
}

export type ClaimResult =
  | { claimed: true; request: BackfillRequest }
  | { claimed: false; existing: BackfillRequest | null };

export interface ListFilter {
  status?: BackfillStatus;
  limit: number;
}

export interface BackfillStore {
  claim(request: NewBackfillRequest, cooldownMs: number, now: Date): Promise<ClaimResult>;
  markTriggered(requestId: string, now: Date): Promise<void>;
  markFailed(requestId: string, error: string, now: Date): Promise<void>;
  get(requestId: string): Promise<BackfillRequest | null>;
  list(filter: ListFilter): Promise<BackfillRequest[]>;
  close(): Promise<void>;
}

export class InMemoryBackfillStore implements BackfillStore {
  private requests: Map<string, BackfillRequest> = new Map();

  async claim(request: NewBackfillRequest, cooldownMs: number, now: Date): Promise<ClaimResult> {
    const existing = this.requests.get(request.requestId);
    if (existing && now.getTime() - existing.createdAt.getTime() < cooldownMs) {
      return { claimed: false, existing: { ...existing } };
    }

    const claimed: BackfillRequest = {
      ...request,
      status: BackfillStatus.PENDING,
      createdAt: now,
      updatedAt: now,
      triggerAttempts: existing?.triggerAttempts ?? 0,
      lastTriggerAt: existing?.lastTriggerAt ?? null,
      completedAt: null,
      error: null,
    };
    this.requests.set(request.requestId, claimed);
    return { claimed: true, request: { ...claimed } };
  }

  async markTriggered(requestId: string, now: Date): Promise<void> {
    const request = this.requests.get(requestId);
    if (request) {
      request.status = BackfillStatus.TRIGGERED;
      request.triggerAttempts += 1;
      request.lastTriggerAt = now;
      request.updatedAt = now;
    }
  }

  async markFailed(requestId: string, error: string, now: Date): Promise<void> {
    const request = this.requests.get(requestId);
    if (request) {
      request.status = BackfillStatus.FAILED;
      request.error = error;
      request.updatedAt = now;
    }
  }

  async get(requestId: string): Promise<BackfillRequest | null> {
    const request = this.requests.get(requestId);
    return request ? { ...request } : null;
  }

  async list(filter: ListFilter): Promise<BackfillRequest[]> {
    return [...this.requests.values()]
      .filter((request) => !filter.status || request.status === filter.status)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, filter.limit)
      .map((request) => ({ ...request }));
  }

  async close(): Promise<void> {}
}

interface BackfillDocument extends Omit<BackfillRequest, 'requestId'> {
  _id: string;
}

function fromDocument(doc: BackfillDocument): BackfillRequest {
  const { _id, ...rest } = doc;
  return { requestId: _id, ...rest };
}

const DUPLICATE_KEY = 11000;

export interface MongoStoreConfig {
  url: string;
  database: string;
  collection?: string;
}

export class MongoBackfillStore implements BackfillStore {
  private client: MongoClient;
  private collection: Collection<BackfillDocument>;

  constructor(config: MongoStoreConfig, client?: MongoClient) {
    this.client = client ?? new MongoClient(config.url, { serverSelectionTimeoutMS: 10000 });
    this.collection = this.client
      .db(config.database)
      .collection<BackfillDocument>(config.collection ?? 'backfill_requests');
  }

  async initialize(): Promise<void> {
    await this.client.connect();
    await this.collection.createIndex({ status: 1, createdAt: -1 });
  }

  async claim(request: NewBackfillRequest, cooldownMs: number, now: Date): Promise<ClaimResult> {
    const cutoff = new Date(now.getTime() - cooldownMs);
    const { requestId, ...fields } = request;

    try {
      // Matches only an expired request; when a fresh one exists the filter
      // misses, the upsert tries to insert the same _id and fails on the
      // unique index
      await this.collection.updateOne(
        { _id: requestId, createdAt: { $lte: cutoff } },
        {
          $set: {
            ...fields,
            status: BackfillStatus.PENDING,
            createdAt: now,
            updatedAt: now,
            completedAt: null,
            error: null,
          },
          $setOnInsert: {
            triggerAttempts: 0,
            lastTriggerAt: null,
          },
        },
        { upsert: true }
      );
    } catch (error) {
      if (error instanceof MongoServerError && error.code === DUPLICATE_KEY) {
        return { claimed: false, existing: await this.get(requestId) };
      }
      throw error;
    }

    const claimed = await this.get(requestId);
    if (!claimed) {
      throw new Error(`Backfill request ${requestId} vanished after claim`);
    }
    return { claimed: true, request: claimed };
  }

  async markTriggered(requestId: string, now: Date): Promise<void> {
    await this.collection.updateOne(
      { _id: requestId },
      {
        $set: { status: BackfillStatus.TRIGGERED, lastTriggerAt: now, updatedAt: now },
        $inc: { triggerAttempts: 1 },
      }
    );
  }

  async markFailed(requestId: string, error: string, now: Date): Promise<void> {
    await this.collection.updateOne(
      { _id: requestId },
      { $set: { status: BackfillStatus.FAILED, error, updatedAt: now } }
    );
  }

  async get(requestId: string): Promise<BackfillRequest | null> {
    const doc = await this.collection.findOne({ _id: requestId });
    return doc ? fromDocument(doc) : null;
  }

  async list(filter: ListFilter): Promise<BackfillRequest[]> {
    const query = filter.status ? { status: filter.status } : {};
    const docs = await this.collection.find(query).sort({ createdAt: -1 }).limit(filter.limit).toArray();
    return docs.map(fromDocument);
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
