export { BookStoreClient } from './api/BookStoreClient';
export { StockManagerClient } from './api/StockManagerClient';
export { BaseRpcClient } from './api/BaseRpcClient';
export type { RpcClientOptions } from './api/BaseRpcClient';
export { performExchange } from './api/exchange';
export type { ExchangeOptions } from './api/exchange';
export { loadClientConfig } from './config';
export type { ClientConfig } from './config';
