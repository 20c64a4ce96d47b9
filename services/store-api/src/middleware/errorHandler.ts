import { Context, Next } from 'koa';
import { ProtocolError } from '@bookstore/shared';
import { logger } from '../logger';

/** Protocol errors carry their own status; Koa's http-errors carry `status` */
function statusOf(err: unknown): number {
  if (err instanceof ProtocolError) {
    return err.status ?? 500;
  }
  if (err instanceof Error && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export async function errorHandler(ctx: Context, next: Next): Promise<void> {
  try {
    await next();
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    ctx.status = statusOf(err);
    ctx.body = {
      error: {
        message: ctx.status === 500 ? 'Internal server error' : error.message,
        status: ctx.status,
      },
    };

    if (ctx.status === 500) {
      logger.error(
        {
          error: {
            message: error.message,
            stack: error.stack,
            name: error.name,
          },
          path: ctx.path,
          method: ctx.method,
          tag: ctx.state.tag,
          status: ctx.status,
        },
        'Internal server error'
      );
    } else {
      logger.warn(
        { path: ctx.path, method: ctx.method, tag: ctx.state.tag, status: ctx.status, error: error.message },
        'Request rejected'
      );
    }
  }
}
