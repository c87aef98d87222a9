/**
 * HTTP Request Logger Middleware
 * Layer: Interfaces (HTTP)
 *
 * pino-http on top of the shared logger: one line per request with method,
 * URL, status and response time. Request bodies are not logged, since
 * questions may contain data the user would rather keep out of log files.
 */
import pinoHttp from 'pino-http';

import { logger } from '@core/logger';

export const requestLogger = pinoHttp({
  logger,
  customLogLevel: (_req, res, err) => {
    if (err || res.statusCode >= 500) return 'error';
    if (res.statusCode >= 400) return 'warn';
    return 'info';
  },
});
