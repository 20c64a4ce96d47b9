import Koa from 'koa';
import { getCodec, type BookStoreCodec } from '@bookstore/shared';
import { CatalogStore } from './catalog/CatalogStore';
import { config } from './config';
import { errorHandler } from './middleware/errorHandler';
import { httpLogger } from './middleware/httpLogger';
import { RpcDispatcher } from './rpc/dispatcher';
import healthRoutes from './routes/healthRoutes';
import { createRpcRouter } from './routes/rpcRoutes';

export interface AppOptions {
  store?: CatalogStore;
  codec?: BookStoreCodec;
  bodyLimitBytes?: number;
}

export function createApp(options: AppOptions = {}): Koa {
  const app = new Koa();
  const store = options.store ?? new CatalogStore();
  const codec = options.codec ?? getCodec();
  const rpcRoutes = createRpcRouter(new RpcDispatcher(store, codec), {
    protocolVersion: codec.version,
    bodyLimitBytes: options.bodyLimitBytes ?? config.bodyLimitBytes,
  });

  // Middleware
  app.use(errorHandler);
  app.use(httpLogger);

  // Routes
  app.use(healthRoutes.routes());
  app.use(rpcRoutes.routes());

  return app;
}
