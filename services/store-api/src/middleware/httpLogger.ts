import { Context, Next } from 'koa';
import { logger } from '../logger';

function errorMessageOf(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('error' in body)) {
    return undefined;
  }
  const { error } = body;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return undefined;
}

/**
 * HTTP request logging middleware with structured logging
 * Logs: method, path, message tag, status, duration
 */
export async function httpLogger(ctx: Context, next: Next): Promise<void> {
  const start = Date.now();
  let errorOccurred = false;

  try {
    await next();
  } catch (err) {
    // errorHandler sits outside this middleware and logs server errors with their stack
    errorOccurred = true;
    throw err;
  } finally {
    if (!errorOccurred) {
      const duration = Date.now() - start;
      const success = ctx.status < 400;
      const error = errorMessageOf(ctx.body);

      const logContext = {
        method: ctx.method,
        path: ctx.path,
        tag: ctx.state.tag,
        status: ctx.status,
        duration,
        success,
        ip: ctx.ip,
        userAgent: ctx.get('user-agent'),
        ...(error !== undefined ? { error } : {}),
      };

      if (success) {
        logger.info(logContext, 'HTTP request completed');
      } else {
        logger.warn(logContext, 'HTTP request completed with client error');
      }
    }
  }
}
