/**
 * CloudWatch Metrics Utilities
 *
 * Provides functions to emit custom CloudWatch metrics for leaderboard
 * runs: generation duration and previous-snapshot load failures.
 * Emission is off unless METRICS_ENABLED=true.
 */

import {
  CloudWatchClient,
  PutMetricDataCommand,
  MetricDatum,
  StandardUnit,
} from '@aws-sdk/client-cloudwatch';
import { log, LogLevel } from './logger';

/**
 * CloudWatch client instance
 * Reused across runs in the same process
 */
const cloudWatchClient = new CloudWatchClient({
  region: process.env.AWS_REGION || 'us-east-1',
});

/**
 * Namespace for custom metrics
 */
const METRIC_NAMESPACE = 'PollRank/Leaderboards';

/**
 * Metric names
 */
export enum MetricName {
  LEADERBOARD_GENERATION_DURATION = 'LeaderboardGenerationDuration',
  SNAPSHOT_LOAD_FAILURE = 'SnapshotLoadFailure',
}

/**
 * Metric units
 */
export const MetricUnit = {
  MILLISECONDS: StandardUnit.Milliseconds,
  COUNT: StandardUnit.Count,
} as const;

export type MetricUnit = (typeof MetricUnit)[keyof typeof MetricUnit];

/**
 * Metric dimensions for filtering and grouping
 */
export interface MetricDimensions {
  scope?: string;
  kind?: string;
  operation_type?: string;
  [key: string]: string | undefined;
}

/**
 * Whether metrics are emitted in this process
 */
export function metricsEnabled(): boolean {
  return process.env.METRICS_ENABLED === 'true';
}

/**
 * Emit a custom CloudWatch metric
 *
 * Failures are logged and never thrown: metrics must not fail a run.
 *
 * @param metricName - Name of the metric
 * @param value - Metric value
 * @param unit - Metric unit (Milliseconds, Count, etc.)
 * @param dimensions - Optional dimensions for filtering
 */
export async function emitMetric(
  metricName: MetricName,
  value: number,
  unit: MetricUnit,
  dimensions?: MetricDimensions
): Promise<void> {
  if (!metricsEnabled()) {
    return;
  }

  try {
    const metricData: MetricDatum = {
      MetricName: metricName,
      Value: value,
      Unit: unit,
      Timestamp: new Date(),
    };

    if (dimensions) {
      metricData.Dimensions = Object.entries(dimensions).flatMap(([name, dimensionValue]) =>
        dimensionValue === undefined ? [] : [{ Name: name, Value: dimensionValue }]
      );
    }

    const command = new PutMetricDataCommand({
      Namespace: METRIC_NAMESPACE,
      MetricData: [metricData],
    });

    await cloudWatchClient.send(command);
  } catch (error) {
    log(LogLevel.ERROR, 'Failed to emit CloudWatch metric', {
      metric_name: metricName,
      value,
      unit,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}

/**
 * Emit leaderboard generation duration metric
 *
 * @param kind - Leaderboard view (weekly, overall, ...)
 * @param scope - Leaderboard lineage
 * @param durationMs - Duration in milliseconds
 * @param failed - Whether the run failed
 */
export async function emitLeaderboardGenerationDuration(
  kind: string,
  scope: string,
  durationMs: number,
  failed = false
): Promise<void> {
  await emitMetric(
    MetricName.LEADERBOARD_GENERATION_DURATION,
    durationMs,
    MetricUnit.MILLISECONDS,
    {
      kind,
      scope,
      operation_type: 'leaderboard_generation',
      error: failed ? 'true' : undefined,
    }
  );
}

/**
 * Emit previous-snapshot load failure metric
 *
 * Counts runs that fell back to "no previous snapshot".
 *
 * @param scope - Leaderboard lineage whose snapshot was unreadable
 */
export async function emitSnapshotLoadFailure(scope: string): Promise<void> {
  await emitMetric(MetricName.SNAPSHOT_LOAD_FAILURE, 1, MetricUnit.COUNT, {
    scope,
    operation_type: 'snapshot_load',
  });
}
