/**
 * Metrics Source - review statistics the alert evaluator reads
 */

import type { Database } from '../db/index';
import { readNullableNumber, readNumber } from '../db/rows';

export interface MetricsSource {
  /** Mean rating of reviews created in [start, end], or null without data */
  averageRating(start: number, end: number): Promise<number | null>;
  /** Reviews created at or after `since` */
  reviewCount(since: number): Promise<number>;
  /** Share of reviews since `since` with negative sentiment; 0 when there are none */
  negativeSentimentRatio(since: number): Promise<number>;
}

/**
 * Metrics over the `reviews` read model, which review ingestion keeps filled.
 */
export function createSqlMetricsSource(db: Database): MetricsSource {
  return {
    async averageRating(start: number, end: number): Promise<number | null> {
      const rows = db.query(
        'SELECT AVG(rating) AS avg_rating FROM reviews WHERE created_at >= ? AND created_at <= ? AND rating IS NOT NULL',
        [start, end],
      );
      return rows.length > 0 ? readNullableNumber(rows[0], 'avg_rating') : null;
    },

    async reviewCount(since: number): Promise<number> {
      const rows = db.query('SELECT COUNT(*) AS count FROM reviews WHERE created_at >= ?', [since]);
      return rows.length > 0 ? readNumber(rows[0], 'count') : 0;
    },

    async negativeSentimentRatio(since: number): Promise<number> {
      const rows = db.query(
        `SELECT COUNT(*) AS total,
                SUM(CASE WHEN LOWER(sentiment) = 'negative' THEN 1 ELSE 0 END) AS negative
         FROM reviews WHERE created_at >= ?`,
        [since],
      );
      if (rows.length === 0) return 0;
      const total = readNumber(rows[0], 'total');
      if (total === 0) return 0;
      return readNumber(rows[0], 'negative') / total;
    },
  };
}
