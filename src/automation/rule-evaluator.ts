/**
 * Rule Evaluator - alert threshold logic
 *
 * Decides from current metrics whether an alert rule's condition holds. A
 * metrics failure counts as "no signal": the rule does not fire and the error
 * never reaches the scheduler.
 */

import { createLogger } from '../utils/logger';
import type { MetricsSource } from './metrics';
import { DAY_MS, HOUR_MS, type AlertRule, type JsonObject } from './types';

const logger = createLogger('rule-evaluator');

export const DEFAULT_DROP_THRESHOLD = 0.5;
export const DEFAULT_VOLUME_THRESHOLD = 10;
export const DEFAULT_NEGATIVE_RATIO_THRESHOLD = 0.3;

function threshold(config: JsonObject, key: string, fallback: number): number {
  const value = config[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

async function ratingDropped(metrics: MetricsSource, config: JsonObject, now: number): Promise<boolean> {
  const recentAvg = await metrics.averageRating(now - DAY_MS, now);
  const previousAvg = await metrics.averageRating(now - 7 * DAY_MS, now - DAY_MS);
  if (recentAvg === null || previousAvg === null) return false;

  return previousAvg - recentAvg >= threshold(config, 'drop_threshold', DEFAULT_DROP_THRESHOLD);
}

async function volumeReached(metrics: MetricsSource, config: JsonObject, now: number): Promise<boolean> {
  const count = await metrics.reviewCount(now - HOUR_MS);
  return count >= threshold(config, 'volume_threshold', DEFAULT_VOLUME_THRESHOLD);
}

async function sentimentTurnedNegative(metrics: MetricsSource, config: JsonObject, now: number): Promise<boolean> {
  const ratio = await metrics.negativeSentimentRatio(now - DAY_MS);
  return ratio >= threshold(config, 'negative_ratio_threshold', DEFAULT_NEGATIVE_RATIO_THRESHOLD);
}

/**
 * Whether the rule's threshold is met at `now`. Cooldown is the caller's
 * concern; this only looks at metrics.
 */
export async function evaluateAlertRule(
  rule: Pick<AlertRule, 'id' | 'metricType' | 'thresholdConfig'>,
  metrics: MetricsSource,
  now: number,
): Promise<boolean> {
  try {
    switch (rule.metricType) {
      case 'rating_drop':
        return await ratingDropped(metrics, rule.thresholdConfig, now);
      case 'review_volume':
        return await volumeReached(metrics, rule.thresholdConfig, now);
      case 'negative_sentiment':
        return await sentimentTurnedNegative(metrics, rule.thresholdConfig, now);
      default:
        logger.debug({ ruleId: rule.id, metricType: rule.metricType }, 'Unknown metric type');
        return false;
    }
  } catch (err) {
    logger.warn({ err, ruleId: rule.id, metricType: rule.metricType }, 'Metrics unavailable, treating as no signal');
    return false;
  }
}
