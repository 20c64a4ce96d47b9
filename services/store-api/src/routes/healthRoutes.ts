import Router from 'koa-router';
import { PROTOCOL_VERSION } from '@bookstore/shared';

const router = new Router();

router.get('/health', async (ctx) => {
  ctx.body = { status: 'ok', service: 'store-api', protocolVersion: PROTOCOL_VERSION };
});

export default router;
