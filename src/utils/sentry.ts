import * as Sentry from '@sentry/node';
import type { MatchEngineError } from '../core/errors.js';

/**
 * Add a breadcrumb for tracking operation flow
 * Breadcrumbs create a trail of events leading up to errors
 */
export function addBreadcrumb(
  category: string,
  message: string,
  data?: Record<string, unknown>,
  level: Sentry.SeverityLevel = 'info'
): void {
  Sentry.addBreadcrumb({
    category,
    message,
    data,
    level,
    timestamp: Date.now() / 1000,
  });
}

/**
 * Record a soft failure. The pipeline keeps going, so these are breadcrumbs
 * rather than captured exceptions.
 */
export function addSoftFailureBreadcrumb(
  error: MatchEngineError,
  data?: Record<string, unknown>
): void {
  addBreadcrumb('matching', `${error.code}: ${error.message}`, data, 'warning');
}

/**
 * Add a breadcrumb for aggregation stages
 */
export function addMatchStageBreadcrumb(
  stage: 'similarity' | 'catalogue' | 'aggregation' | 'completed',
  queryTitle: string,
  data?: Record<string, unknown>
): void {
  addBreadcrumb('matching', `Stage: ${stage} - ${queryTitle}`, data);
}

/**
 * Execute a function within a scoped Sentry context
 * Tags added within the scope don't affect other operations
 */
export async function withSentryScope<T>(
  tags: Record<string, string>,
  callback: () => Promise<T>
): Promise<T> {
  return Sentry.withScope(async (scope) => {
    for (const [key, value] of Object.entries(tags)) {
      scope.setTag(key, value);
    }
    return callback();
  });
}
