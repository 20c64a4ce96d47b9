import { createLogger } from '@bookstore/shared';

export const logger = createLogger('store-api');
