export * from './config';
export * from './errors';
export * from './dates';
export * from './timeout';
export * from './signals';
export * from './clickhouse';
export * from './s3';
export * from './amqp';
export * from './backfillStore';
export * from './recovery';
export * from './backfill';
export * from './detectors/ThresholdDetector';
export * from './detectors/freshness';
export * from './detectors/gap';
export * from './detectors/stall';
export * from './detectors/coverage';
export * from './detectors/completeness';
export * from './latency';
export * from './dlq';
export * from './runtime';
