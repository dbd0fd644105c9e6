/**
 * Condition Matcher - decides whether an event payload satisfies a rule's conditions
 *
 * Condition keys:
 * - rating_threshold / rating_max: payload.rating <= value
 * - rating_min: payload.rating >= value
 * - platforms: payload.platform is one of the listed platforms
 * - sentiment: payload.sentiment equals value (case-insensitive)
 * - any other key: payload[key] equals value, or is one of value when value is a list
 *
 * All keys must hold. Empty or missing conditions match everything.
 */

import type { JsonObject } from './types';

export type ConditionMatcher = (conditions: JsonObject | null, payload: JsonObject) => boolean;

export const alwaysMatch: ConditionMatcher = () => true;

/** Parse a number, returning null if invalid */
function safeNum(value: unknown): number | null {
  if (value === null || value === undefined || value === '') return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

function sameText(a: unknown, b: unknown): boolean {
  return typeof a === 'string' && typeof b === 'string' && a.toLowerCase() === b.toLowerCase();
}

function equalsOrContains(expected: unknown, actual: unknown): boolean {
  if (Array.isArray(expected)) {
    return expected.some((item) => item === actual || sameText(item, actual));
  }
  return expected === actual || sameText(expected, actual);
}

function matchesCondition(key: string, expected: unknown, payload: JsonObject): boolean {
  switch (key) {
    case 'rating_threshold':
    case 'rating_max': {
      const limit = safeNum(expected);
      const rating = safeNum(payload.rating);
      return limit === null || (rating !== null && rating <= limit);
    }

    case 'rating_min': {
      const limit = safeNum(expected);
      const rating = safeNum(payload.rating);
      return limit === null || (rating !== null && rating >= limit);
    }

    case 'platforms':
      return !Array.isArray(expected) || expected.length === 0 || equalsOrContains(expected, payload.platform);

    case 'sentiment':
      return sameText(expected, payload.sentiment);

    default:
      return equalsOrContains(expected, payload[key]);
  }
}

export const matchEventConditions: ConditionMatcher = (conditions, payload) => {
  if (!conditions) return true;
  return Object.entries(conditions).every(([key, expected]) => matchesCondition(key, expected, payload));
};
