/**
 * @description: Provides one-line request logging for static asset responses.
 * @scope: utility
 * @module: RequestLogger
 * @risk: low - Logging failures reduce observability but do not block requests.
 */
import type { IncomingMessage, ServerResponse } from 'node:http';
import { logger } from '@asset-resolver/shared';

/**
 * Builds a short log entry per request. The raw URL is logged as received;
 * the shared logger scrubs control characters.
 */
function logRequest(req: IncomingMessage, res: ServerResponse, extra = ''): void {
  const level = res.statusCode >= 500 ? 'error' : 'info';
  logger.log(level, `${req.method ?? 'GET'} ${req.url ?? ''} -> ${res.statusCode} ${extra}`.trim());
}

export { logRequest };
